import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import {
  DeleteCommand,
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  QueryCommand,
  ScanCommand,
  type DeleteCommandInput,
  type DeleteCommandOutput,
  type GetCommandInput,
  type GetCommandOutput,
  type PutCommandInput,
  type PutCommandOutput,
  type QueryCommandInput,
  type QueryCommandOutput,
  type ScanCommandInput,
  type ScanCommandOutput,
} from "@aws-sdk/lib-dynamodb";

/** The document-client operations `DynamoDbTable` issues. */
export interface DocumentStore {
  get(input: GetCommandInput, abortSignal?: AbortSignal): Promise<GetCommandOutput>;
  put(input: PutCommandInput, abortSignal?: AbortSignal): Promise<PutCommandOutput>;
  delete(input: DeleteCommandInput, abortSignal?: AbortSignal): Promise<DeleteCommandOutput>;
  query(input: QueryCommandInput, abortSignal?: AbortSignal): Promise<QueryCommandOutput>;
  scan(input: ScanCommandInput, abortSignal?: AbortSignal): Promise<ScanCommandOutput>;
}

/**
 * Sends each operation through a DynamoDB document client. Without a client,
 * one is created from the default AWS configuration of the host.
 */
export function createDocumentStore(
  client: DynamoDBDocumentClient = DynamoDBDocumentClient.from(new DynamoDBClient({})),
): DocumentStore {
  return {
    get: (input, abortSignal) => client.send(new GetCommand(input), { abortSignal }),
    put: (input, abortSignal) => client.send(new PutCommand(input), { abortSignal }),
    delete: (input, abortSignal) => client.send(new DeleteCommand(input), { abortSignal }),
    query: (input, abortSignal) => client.send(new QueryCommand(input), { abortSignal }),
    scan: (input, abortSignal) => client.send(new ScanCommand(input), { abortSignal }),
  };
}
