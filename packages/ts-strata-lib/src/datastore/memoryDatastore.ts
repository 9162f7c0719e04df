/**
 * In-process datastore
 *
 * Keeps entities per kind in memory and evaluates queries with datastore
 * semantics. Used as the reference backend in tests.
 */

import { mapperLog } from "../commons";
import { FilterCriterion, SortCriterion } from "../criteria/criterion";
import type { ModelMeta } from "../meta/modelMeta";
import { Entity } from "./entity";
import {
  FilterPredicate,
  FilterValue,
  Query,
  SortPredicate,
  isFilterValueList,
} from "./query";
import {
  StorageValue,
  listElements,
  storageValuesEqual,
} from "./values";

export interface QueryOptions {
  limit?: number;
  offset?: number;
}

export interface QueryResult<T> {
  data: T[];
  /** Matches before offset and limit were applied. */
  count: number;
  hasMore: boolean;
}

const isNumeric = (v: unknown): v is bigint | number =>
  typeof v === "bigint" || typeof v === "number";

const order = <T extends bigint | number | string>(a: T, b: T): number =>
  a < b ? -1
  : a > b ? 1
  : 0;

/**
 * Natural order of two stored scalars, or `undefined` when they are of
 * different kinds. Numbers compare across the bigint/number split.
 */
export const compareScalars = (a: unknown, b: unknown): number | undefined => {
  if (isNumeric(a) && isNumeric(b)) return order<bigint | number>(a, b);
  if (typeof a === "string" && typeof b === "string") return order(a, b);
  if (typeof a === "boolean" && typeof b === "boolean") {
    return Number(a) - Number(b);
  }
  return undefined;
};

/** Elements of a list value, or the value itself as a single candidate. */
const candidatesOf = (value: StorageValue): readonly StorageValue[] =>
  listElements(value) ?? [value];

const ORDER_TESTS = {
  LESS_THAN: (order: number) => order < 0,
  LESS_THAN_OR_EQUAL: (order: number) => order <= 0,
  GREATER_THAN: (order: number) => order > 0,
  GREATER_THAN_OR_EQUAL: (order: number) => order >= 0,
} as const;

const matchesScalar = (
  stored: StorageValue,
  { operator, value }: FilterPredicate,
): boolean => {
  if (value === null) return false;
  const expected: readonly FilterValue[] =
    isFilterValueList(value) ? value : [value];
  switch (operator) {
    case "EQUAL":
    case "IN":
      return expected.some((candidate) =>
        storageValuesEqual(stored, candidate),
      );
    case "NOT_EQUAL":
      return expected.every(
        (candidate) => !storageValuesEqual(stored, candidate),
      );
    default: {
      if (expected.length !== 1) return false;
      const result = compareScalars(stored, expected[0]);
      return result !== undefined && ORDER_TESTS[operator](result);
    }
  }
};

/**
 * Whether `entity` satisfies one filter term. A list property matches when
 * any of its elements does; an absent property only matches `EQUAL null`.
 */
export const matchesFilter = (
  entity: Entity,
  predicate: FilterPredicate,
): boolean => {
  const stored = entity.getProperty(predicate.propertyName);
  if (predicate.value === null) {
    if (predicate.operator === "EQUAL") return stored === null;
    if (predicate.operator === "NOT_EQUAL") return stored !== null;
    return false;
  }
  if (stored === null) return false;
  return candidatesOf(stored).some(
    (element) => element !== null && matchesScalar(element, predicate),
  );
};

const sortKey = (
  stored: StorageValue,
  direction: SortPredicate["direction"],
): StorageValue => {
  const elements = listElements(stored);
  if (elements === null) return stored;
  // a list sorts by its smallest element ascending, its largest descending
  let key: StorageValue = null;
  for (const element of elements) {
    if (element === null) continue;
    const order = key === null ? undefined : compareScalars(element, key);
    if (
      key === null ||
      (order !== undefined &&
        (direction === "ASCENDING" ? order < 0 : order > 0))
    ) {
      key = element;
    }
  }
  return key;
};

const compareEntities =
  (sorts: readonly SortPredicate[]) =>
  (a: Entity, b: Entity): number => {
    for (const { propertyName, direction } of sorts) {
      const left = sortKey(a.getProperty(propertyName), direction);
      const right = sortKey(b.getProperty(propertyName), direction);
      // absent values order before every value
      const order =
        left === null ?
          right === null ? 0
          : -1
        : right === null ? 1
        : (compareScalars(left, right) ?? 0);
      if (order !== 0) {
        return direction === "DESCENDING" ? -order : order;
      }
    }
    return 0;
  };

const copyEntity = (entity: Entity, key: string | null): Entity => {
  const copy = new Entity(entity.kind, key);
  for (const [name, value] of entity.getProperties()) {
    copy.setProperty(name, value);
  }
  return copy;
};

/**
 * Entity store keyed by kind and key. Stored entities are copies; callers
 * never share state with the store.
 */
export class InMemoryDatastore {
  private readonly kinds = new Map<string, Map<string, Entity>>();
  private nextId = 1;

  private entities(kind: string): Map<string, Entity> {
    let entities = this.kinds.get(kind);
    if (entities === undefined) {
      entities = new Map();
      this.kinds.set(kind, entities);
    }
    return entities;
  }

  /**
   * Stores the entity, assigning a key when it has none, and returns the key.
   */
  async put(entity: Entity): Promise<string> {
    const key = entity.key ?? String(this.nextId++);
    entity.key = key;
    this.entities(entity.kind).set(key, copyEntity(entity, key));
    return key;
  }

  async get(kind: string, key: string): Promise<Entity | null> {
    const entity = this.kinds.get(kind)?.get(key);
    return entity === undefined ? null : copyEntity(entity, key);
  }

  async delete(kind: string, key: string): Promise<boolean> {
    return this.kinds.get(kind)?.delete(key) ?? false;
  }

  /**
   * Runs `query`: every filter term must match, then sort terms apply in
   * order. Ties keep insertion order.
   */
  async execute(
    query: Query,
    options: QueryOptions = {},
  ): Promise<QueryResult<Entity>> {
    const filters = query.getFilterPredicates();
    const sorts = query.getSortPredicates();
    const matched = [...(this.kinds.get(query.kind)?.values() ?? [])].filter(
      (entity) => filters.every((predicate) => matchesFilter(entity, predicate)),
    );
    if (sorts.length > 0) {
      matched.sort(compareEntities(sorts));
    }

    const offset = options.offset ?? 0;
    const end =
      options.limit === undefined ? matched.length : offset + options.limit;
    const data = matched
      .slice(offset, end)
      .map((entity) => copyEntity(entity, entity.key));

    mapperLog(
      "Query executed",
      {
        kind: query.kind,
        filters: filters.length,
        sorts: sorts.length,
        matched: matched.length,
      },
      "debug",
    );
    return { data, count: matched.length, hasMore: end < matched.length };
  }

  async putModel<M extends object>(
    meta: ModelMeta<M>,
    model: M,
    key: string | null = null,
  ): Promise<string> {
    return this.put(meta.modelToEntity(model, key));
  }

  async getModel<M extends object>(
    meta: ModelMeta<M>,
    key: string,
  ): Promise<M | null> {
    const entity = await this.get(meta.kind, key);
    return entity === null ? null : meta.entityToModel(entity);
  }

  /**
   * Starts a typed query over the meta's kind.
   */
  query<M extends object>(meta: ModelMeta<M>): ModelQuery<M> {
    return new ModelQuery(this, meta);
  }
}

/**
 * Query builder returning models of one meta.
 */
export class ModelQuery<M extends object> {
  private readonly query: Query;
  private limitValue: number | undefined;
  private offsetValue = 0;

  constructor(
    private readonly datastore: InMemoryDatastore,
    private readonly meta: ModelMeta<M>,
  ) {
    this.query = meta.query();
  }

  filter(...criteria: FilterCriterion[]): this {
    this.query.filter(...criteria);
    return this;
  }

  sort(...criteria: SortCriterion[]): this {
    this.query.sort(...criteria);
    return this;
  }

  limit(count: number): this {
    this.limitValue = count;
    return this;
  }

  offset(count: number): this {
    this.offsetValue = count;
    return this;
  }

  /** The underlying entity query. */
  getQuery(): Query {
    return this.query;
  }

  async execute(): Promise<QueryResult<M>> {
    return this.run({ limit: this.limitValue, offset: this.offsetValue });
  }

  private async run(options: QueryOptions): Promise<QueryResult<M>> {
    const result = await this.datastore.execute(this.query, options);
    return {
      ...result,
      data: result.data.map((entity) => this.meta.entityToModel(entity)),
    };
  }

  async asList(): Promise<M[]> {
    return (await this.execute()).data;
  }

  /** First match, or null. Leaves the builder's limit untouched. */
  async asSingle(): Promise<M | null> {
    const result = await this.run({ limit: 1, offset: this.offsetValue });
    return result.data[0] ?? null;
  }

  async count(): Promise<number> {
    return (await this.execute()).count;
  }
}
