import type { TableFactory } from "@nimbus-fn/core";
import { InMemoryTable } from "./in-memory-table";
import { DynamoDbTable } from "./dynamodb-table";
import { createDocumentStore, type DocumentStore } from "./document-store";

/** One in-memory table per registered entity. */
export function inMemoryTables(): TableFactory {
  return (registration) => new InMemoryTable(registration);
}

/** One DynamoDB table per registered entity, all sharing a document store. */
export function dynamoDbTables(store: DocumentStore = createDocumentStore()): TableFactory {
  return (registration) => new DynamoDbTable(registration, store);
}
