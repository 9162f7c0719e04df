import { requireArgument, InvalidArgumentError } from "../errors";
import type {
  FilterOperator,
  FilterValue,
  QueryAccumulator,
  SortDirection,
} from "../datastore/query";

/**
 * The part of an attribute meta a criterion is bound to.
 */
export interface AttributeRef {
  readonly name: string;
}

export type ComparisonKind =
  | "equal"
  | "notEqual"
  | "lessThan"
  | "lessThanOrEqual"
  | "greaterThan"
  | "greaterThanOrEqual"
  | "contains";

/**
 * Criteria append their own term to a query.
 */
export interface Applicable {
  apply(query: QueryAccumulator): void;
}

export interface ComparisonCriterion extends Applicable {
  readonly kind: ComparisonKind;
  readonly attributeMeta: AttributeRef;
  readonly parameter: FilterValue;
}

export interface InCriterion extends Applicable {
  readonly kind: "in";
  readonly attributeMeta: AttributeRef;
  readonly parameter: readonly FilterValue[];
}

/** Tests whether the stored property is absent (`isNull`) or set (`isNotNull`). */
export interface NullCriterion extends Applicable {
  readonly kind: "isNull" | "isNotNull";
  readonly attributeMeta: AttributeRef;
}

export type FilterCriterion = ComparisonCriterion | InCriterion | NullCriterion;

export interface SortCriterion extends Applicable {
  readonly kind: "sort";
  readonly attributeMeta: AttributeRef;
  readonly direction: SortDirection;
}

export type Criterion = FilterCriterion | SortCriterion;

/**
 * Wire operator per comparison. `contains` is an equality test: the backend
 * matches an equality filter on a multi-valued property against each element.
 */
export const COMPARISON_OPERATORS: Readonly<
  Record<ComparisonKind, FilterOperator>
> = {
  equal: "EQUAL",
  notEqual: "NOT_EQUAL",
  lessThan: "LESS_THAN",
  lessThanOrEqual: "LESS_THAN_OR_EQUAL",
  greaterThan: "GREATER_THAN",
  greaterThanOrEqual: "GREATER_THAN_OR_EQUAL",
  contains: "EQUAL",
};

/**
 * Appends the criterion's term to `query`. Filter criteria add exactly one
 * filter term; sort criteria add one sort term.
 */
export function applyCriterion(
  criterion: Criterion,
  query: QueryAccumulator,
): void {
  const name = criterion.attributeMeta.name;
  switch (criterion.kind) {
    case "in":
      query.addFilter(name, "IN", criterion.parameter);
      return;
    case "isNull":
      query.addFilter(name, "EQUAL", null);
      return;
    case "isNotNull":
      query.addFilter(name, "NOT_EQUAL", null);
      return;
    case "sort":
      query.addSort(name, criterion.direction);
      return;
    default:
      query.addFilter(
        name,
        COMPARISON_OPERATORS[criterion.kind],
        criterion.parameter,
      );
  }
}

const comparison = (
  kind: ComparisonKind,
  attributeMeta: AttributeRef | null | undefined,
  parameter: FilterValue | null | undefined,
): ComparisonCriterion => {
  const criterion: ComparisonCriterion = Object.freeze({
    kind,
    attributeMeta: requireArgument(attributeMeta, "attributeMeta"),
    parameter: requireArgument(parameter, "parameter"),
    apply: (query: QueryAccumulator) => applyCriterion(criterion, query),
  });
  return criterion;
};

export const equal = (
  attributeMeta: AttributeRef | null | undefined,
  parameter: FilterValue | null | undefined,
) => comparison("equal", attributeMeta, parameter);

export const notEqual = (
  attributeMeta: AttributeRef | null | undefined,
  parameter: FilterValue | null | undefined,
) => comparison("notEqual", attributeMeta, parameter);

export const lessThan = (
  attributeMeta: AttributeRef | null | undefined,
  parameter: FilterValue | null | undefined,
) => comparison("lessThan", attributeMeta, parameter);

export const lessThanOrEqual = (
  attributeMeta: AttributeRef | null | undefined,
  parameter: FilterValue | null | undefined,
) => comparison("lessThanOrEqual", attributeMeta, parameter);

export const greaterThan = (
  attributeMeta: AttributeRef | null | undefined,
  parameter: FilterValue | null | undefined,
) => comparison("greaterThan", attributeMeta, parameter);

export const greaterThanOrEqual = (
  attributeMeta: AttributeRef | null | undefined,
  parameter: FilterValue | null | undefined,
) => comparison("greaterThanOrEqual", attributeMeta, parameter);

/**
 * Matches entities whose multi-valued property holds `parameter`.
 */
export const contains = (
  attributeMeta: AttributeRef | null | undefined,
  parameter: FilterValue | null | undefined,
) => comparison("contains", attributeMeta, parameter);

/**
 * Matches entities whose property equals one of `candidates`.
 */
export function isIn(
  attributeMeta: AttributeRef | null | undefined,
  candidates: Iterable<FilterValue | null> | null | undefined,
): InCriterion {
  const values: FilterValue[] = [];
  for (const candidate of requireArgument(candidates, "parameter")) {
    if (candidate === null) {
      throw new InvalidArgumentError(
        "The element of the parameter parameter is null.",
      );
    }
    values.push(candidate);
  }
  const criterion: InCriterion = Object.freeze({
    kind: "in",
    attributeMeta: requireArgument(attributeMeta, "attributeMeta"),
    parameter: Object.freeze(values),
    apply: (query: QueryAccumulator) => applyCriterion(criterion, query),
  });
  return criterion;
}

const nullCheck = (
  kind: NullCriterion["kind"],
  attributeMeta: AttributeRef | null | undefined,
): NullCriterion => {
  const criterion: NullCriterion = Object.freeze({
    kind,
    attributeMeta: requireArgument(attributeMeta, "attributeMeta"),
    apply: (query: QueryAccumulator) => applyCriterion(criterion, query),
  });
  return criterion;
};

export const isNull = (attributeMeta: AttributeRef | null | undefined) =>
  nullCheck("isNull", attributeMeta);

export const isNotNull = (attributeMeta: AttributeRef | null | undefined) =>
  nullCheck("isNotNull", attributeMeta);

const sort = (
  attributeMeta: AttributeRef | null | undefined,
  direction: SortDirection,
): SortCriterion => {
  const criterion: SortCriterion = Object.freeze({
    kind: "sort",
    attributeMeta: requireArgument(attributeMeta, "attributeMeta"),
    direction,
    apply: (query: QueryAccumulator) => applyCriterion(criterion, query),
  });
  return criterion;
};

export const asc = (attributeMeta: AttributeRef | null | undefined) =>
  sort(attributeMeta, "ASCENDING");

export const desc = (attributeMeta: AttributeRef | null | undefined) =>
  sort(attributeMeta, "DESCENDING");
