import { Blob, ShortBlob, Text } from "./values";
import type { FilterCriterion, SortCriterion } from "../criteria/criterion";

/**
 * Comparison operators a backend filter term may use.
 */
export type FilterOperator =
  | "EQUAL"
  | "NOT_EQUAL"
  | "LESS_THAN"
  | "LESS_THAN_OR_EQUAL"
  | "GREATER_THAN"
  | "GREATER_THAN_OR_EQUAL"
  | "IN";

export type SortDirection = "ASCENDING" | "DESCENDING";

/**
 * Values a filter term may compare against.
 */
export type FilterValue =
  | bigint
  | number
  | boolean
  | string
  | Text
  | ShortBlob
  | Blob;

export type FilterTermValue = FilterValue | readonly FilterValue[] | null;

export const isFilterValueList = (
  value: FilterTermValue,
): value is readonly FilterValue[] => Array.isArray(value);

export interface FilterPredicate {
  readonly propertyName: string;
  readonly operator: FilterOperator;
  readonly value: FilterTermValue;
}

export interface SortPredicate {
  readonly propertyName: string;
  readonly direction: SortDirection;
}

/**
 * What a criterion needs from a query: appending terms, in order.
 */
export interface QueryAccumulator {
  addFilter(
    propertyName: string,
    operator: FilterOperator,
    value: FilterTermValue,
  ): void;
  addSort(propertyName: string, direction: SortDirection): void;
}

/**
 * A mutable query over one entity kind. Filter terms form a conjunction and
 * keep the order they were added in.
 */
export class Query implements QueryAccumulator {
  readonly kind: string;
  private readonly filters: FilterPredicate[] = [];
  private readonly sorts: SortPredicate[] = [];

  constructor(kind: string) {
    this.kind = kind;
  }

  addFilter(
    propertyName: string,
    operator: FilterOperator,
    value: FilterTermValue,
  ): this {
    this.filters.push(Object.freeze({ propertyName, operator, value }));
    return this;
  }

  addSort(propertyName: string, direction: SortDirection = "ASCENDING"): this {
    this.sorts.push(Object.freeze({ propertyName, direction }));
    return this;
  }

  /** Applies each criterion in turn. */
  filter(...criteria: FilterCriterion[]): this {
    for (const criterion of criteria) {
      criterion.apply(this);
    }
    return this;
  }

  sort(...criteria: SortCriterion[]): this {
    for (const criterion of criteria) {
      criterion.apply(this);
    }
    return this;
  }

  getFilterPredicates(): readonly FilterPredicate[] {
    return Object.freeze([...this.filters]);
  }

  getSortPredicates(): readonly SortPredicate[] {
    return Object.freeze([...this.sorts]);
  }
}
