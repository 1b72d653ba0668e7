export type TableCallOptions = {
  signal?: AbortSignal;
};

/**
 * Key-value table over one entity type. Keys are the values of the entity's
 * partition-key field and, when declared, its sort-key field.
 */
export interface Table<T extends object> {
  /** Returns `undefined` when no item has the key. A sort key is ignored on a table without one. */
  get(partitionKey: string, sortKey?: string, options?: TableCallOptions): Promise<T | undefined>;
  put(entity: T, options?: TableCallOptions): Promise<void>;
  /** Without a sort key, removes every item sharing the partition key. */
  delete(partitionKey: string, sortKey?: string, options?: TableCallOptions): Promise<void>;
  query(partitionKey: string, options?: TableCallOptions): Promise<T[]>;
  scan(options?: TableCallOptions): Promise<T[]>;
}
