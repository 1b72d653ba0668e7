export { InMemoryTable } from "./in-memory-table";
export { DynamoDbTable } from "./dynamodb-table";
export { createDocumentStore } from "./document-store";
export type { DocumentStore } from "./document-store";
export { inMemoryTables, dynamoDbTables } from "./table-factories";
export { readKey, copyEntity } from "./schema";
export type { TableSchema } from "./schema";
