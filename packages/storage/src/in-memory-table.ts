import type { Table, TableCallOptions } from "@nimbus-fn/types";
import { copyEntity, readKey, type TableSchema } from "./schema";

const NO_SORT_KEY = "";

/**
 * Process-local table for the local runtime and tests. Items live in a map of
 * partition key to (sort key to item); every read and write works on copies.
 */
export class InMemoryTable<T extends object> implements Table<T> {
  private readonly partitions = new Map<string, Map<string, T>>();

  constructor(private readonly schema: TableSchema<T>) {}

  async get(partitionKey: string, sortKey?: string, options?: TableCallOptions): Promise<T | undefined> {
    options?.signal?.throwIfAborted();
    const item = this.partitions.get(partitionKey)?.get(this.itemKey(sortKey) ?? NO_SORT_KEY);
    return item ? this.copy(item) : undefined;
  }

  async put(entity: T, options?: TableCallOptions): Promise<void> {
    options?.signal?.throwIfAborted();
    const name = this.schema.entityType.name;
    const partitionKey = readKey(entity, this.schema.partitionKey, name);
    const sortKey = this.schema.sortKey ? readKey(entity, this.schema.sortKey, name) : NO_SORT_KEY;

    let partition = this.partitions.get(partitionKey);
    if (!partition) {
      partition = new Map();
      this.partitions.set(partitionKey, partition);
    }
    partition.set(sortKey, this.copy(entity));
  }

  async delete(partitionKey: string, sortKey?: string, options?: TableCallOptions): Promise<void> {
    options?.signal?.throwIfAborted();
    const itemKey = this.itemKey(sortKey);
    if (itemKey === undefined) {
      this.partitions.delete(partitionKey);
      return;
    }

    const partition = this.partitions.get(partitionKey);
    partition?.delete(itemKey);
    if (partition?.size === 0) this.partitions.delete(partitionKey);
  }

  /** Items sharing the partition key, in ascending sort-key order. */
  async query(partitionKey: string, options?: TableCallOptions): Promise<T[]> {
    options?.signal?.throwIfAborted();
    const partition = this.partitions.get(partitionKey);
    if (!partition) return [];
    return [...partition.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([, item]) => this.copy(item));
  }

  async scan(options?: TableCallOptions): Promise<T[]> {
    options?.signal?.throwIfAborted();
    const items: T[] = [];
    for (const partition of this.partitions.values()) {
      for (const item of partition.values()) items.push(this.copy(item));
    }
    return items;
  }

  get size(): number {
    let count = 0;
    for (const partition of this.partitions.values()) count += partition.size;
    return count;
  }

  /** The sort key is ignored on a table that declares none. */
  private itemKey(sortKey: string | undefined): string | undefined {
    return this.schema.sortKey ? sortKey : undefined;
  }

  private copy(item: T): T {
    return copyEntity(this.schema.entityType, item);
  }
}
