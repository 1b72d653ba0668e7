import createDebug from "debug";
import type { Table, TableCallOptions } from "@nimbus-fn/types";
import { NimbusEnv } from "@nimbus-fn/config";
import { copyEntity, readKey, type TableSchema } from "./schema";
import type { DocumentStore } from "./document-store";

const debug = createDebug("nimbus:storage:dynamodb");

type ItemKey = Record<string, string>;

/**
 * `Table<T>` over a DynamoDB table. The physical name comes from the
 * `TABLE_<ENTITY>` variable the deploy template sets, falling back to the
 * registered table name.
 */
export class DynamoDbTable<T extends object> implements Table<T> {
  readonly tableName: string;

  constructor(
    private readonly schema: TableSchema<T>,
    private readonly store: DocumentStore,
  ) {
    this.tableName = NimbusEnv.getTableName(schema.entityType.name) ?? schema.tableName;
  }

  async get(partitionKey: string, sortKey?: string, options?: TableCallOptions): Promise<T | undefined> {
    if (this.schema.sortKey && sortKey === undefined) return undefined;

    const { Item } = await this.store.get(
      { TableName: this.tableName, Key: this.key(partitionKey, sortKey) },
      options?.signal,
    );
    return Item ? copyEntity(this.schema.entityType, Item) : undefined;
  }

  async put(entity: T, options?: TableCallOptions): Promise<void> {
    const name = this.schema.entityType.name;
    readKey(entity, this.schema.partitionKey, name);
    if (this.schema.sortKey) readKey(entity, this.schema.sortKey, name);

    await this.store.put(
      { TableName: this.tableName, Item: Object.fromEntries(Object.entries(entity)) },
      options?.signal,
    );
  }

  async delete(partitionKey: string, sortKey?: string, options?: TableCallOptions): Promise<void> {
    const sortKeyField = this.schema.sortKey;
    if (!sortKeyField || sortKey !== undefined) {
      await this.store.delete(
        { TableName: this.tableName, Key: this.key(partitionKey, sortKey) },
        options?.signal,
      );
      return;
    }

    const items = await this.query(partitionKey, options);
    debug("delete %s: removing %d items under %s", this.tableName, items.length, partitionKey);
    for (const item of items) {
      await this.store.delete(
        {
          TableName: this.tableName,
          Key: this.key(partitionKey, readKey(item, sortKeyField, this.schema.entityType.name)),
        },
        options?.signal,
      );
    }
  }

  async query(partitionKey: string, options?: TableCallOptions): Promise<T[]> {
    const items: T[] = [];
    let startKey: Record<string, unknown> | undefined;
    do {
      const page = await this.store.query(
        {
          TableName: this.tableName,
          KeyConditionExpression: "#pk = :pk",
          ExpressionAttributeNames: { "#pk": this.schema.partitionKey },
          ExpressionAttributeValues: { ":pk": partitionKey },
          ExclusiveStartKey: startKey,
        },
        options?.signal,
      );
      for (const item of page.Items ?? []) items.push(copyEntity(this.schema.entityType, item));
      startKey = page.LastEvaluatedKey;
    } while (startKey);
    return items;
  }

  async scan(options?: TableCallOptions): Promise<T[]> {
    const items: T[] = [];
    let startKey: Record<string, unknown> | undefined;
    do {
      const page = await this.store.scan(
        { TableName: this.tableName, ExclusiveStartKey: startKey },
        options?.signal,
      );
      for (const item of page.Items ?? []) items.push(copyEntity(this.schema.entityType, item));
      startKey = page.LastEvaluatedKey;
    } while (startKey);
    debug("scan %s: %d items", this.tableName, items.length);
    return items;
  }

  private key(partitionKey: string, sortKey?: string): ItemKey {
    const key: ItemKey = { [this.schema.partitionKey]: partitionKey };
    if (this.schema.sortKey && sortKey !== undefined) key[this.schema.sortKey] = sortKey;
    return key;
  }
}
