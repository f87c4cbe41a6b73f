import { CosmosClient, ErrorResponse } from "@azure/cosmos";
import type { TokenCredential } from "@azure/identity";
import type { CosmosSettings } from "./env";
import { StoreWriteError } from "./errors";
import type { FileRecord } from "./fileRecord";

export interface FileRecordStore {
  /** Container name, for log lines. */
  readonly name: string;
  /** Insert or replace the whole document with the record's id. */
  upsert(record: FileRecord): Promise<void>;
}

/** The part of a Cosmos Container the store writes through. */
export type UpsertContainer = {
  id: string;
  items: { upsert(body: FileRecord): Promise<unknown> };
};

// Single shared client per account (important for Azure Functions)
const clients = new Map<string, CosmosClient>();

function getClient(endpoint: string, credential: TokenCredential): CosmosClient {
  let client = clients.get(endpoint);
  if (!client) {
    client = new CosmosClient({ endpoint, aadCredentials: credential });
    clients.set(endpoint, client);
  }
  return client;
}

export class CosmosFileRecordStore implements FileRecordStore {
  constructor(private readonly container: UpsertContainer) {}

  get name(): string {
    return this.container.id;
  }

  async upsert(record: FileRecord): Promise<void> {
    try {
      await this.container.items.upsert(record);
    } catch (err) {
      if (err instanceof ErrorResponse) {
        throw new StoreWriteError(`CosmosDB error: ${err.code ?? "unknown"} - ${err.message}`, err.code, {
          cause: err,
        });
      }
      throw err;
    }
  }
}

export function createFileRecordStore(settings: CosmosSettings, credential: TokenCredential): FileRecordStore {
  const container = getClient(settings.endpoint, credential)
    .database(settings.databaseId)
    .container(settings.containerId);
  return new CosmosFileRecordStore(container);
}
