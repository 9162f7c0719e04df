export * from "./commons";
export * from "./errors";

export * from "./datastore/values";
export * from "./datastore/entity";
export * from "./datastore/query";
export {
  InMemoryDatastore,
  ModelQuery,
  compareScalars,
  matchesFilter,
} from "./datastore/memoryDatastore";
export type { QueryOptions, QueryResult } from "./datastore/memoryDatastore";

export * from "./conversion/elements";
export * from "./conversion/collections";
export * from "./conversion/scalars";
export * from "./conversion/serialization";
export { SortedSet } from "./conversion/sortedSet";

export * from "./meta/attributeTypes";
export * from "./meta/attributeMeta";
export * from "./meta/modelMeta";

export * from "./criteria/criterion";

export * from "./config/configFile";
