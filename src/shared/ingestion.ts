import type { BlobReader } from "./blob";
import { parseBlobCreatedEvent } from "./blobEvent";
import type { BlobCreated } from "./blobEvent";
import type { FileRecordStore } from "./cosmos";
import { describeError, ReceiptAnalysisError } from "./errors";
import { buildFileRecord } from "./fileRecord";
import type { FileRecord } from "./fileRecord";
import type { ReceiptAnalyzer, ReceiptFields } from "./receipt";

/** Satisfied by the Functions InvocationContext. */
export interface Logger {
  log(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export type ReceiptEnrichment = {
  reader: BlobReader;
  analyzer: ReceiptAnalyzer;
  required: boolean;
};

export type IngestionDeps = {
  store: FileRecordStore;
  /** Undefined skips receipt analysis. */
  receipts?: ReceiptEnrichment;
  logger: Logger;
  now?: () => Date;
};

const NO_RECEIPT: ReceiptFields = {
  purchaseDate: null,
  merchantName: null,
  totalAmount: null,
};

async function analyzeReceipt(
  blob: BlobCreated,
  receipts: ReceiptEnrichment | undefined,
  logger: Logger
): Promise<ReceiptFields | undefined> {
  if (!receipts) {
    logger.log("DOCUMENT_INTELLIGENCE_ENDPOINT not configured, skipping receipt analysis");
    return undefined;
  }

  logger.log("Analyzing receipt with Document Intelligence");
  try {
    const content = await receipts.reader.read(blob.blobUrl);
    const fields = await receipts.analyzer.analyze(content);
    if (!fields) {
      logger.warn("No receipt documents found in the analysis result");
      return NO_RECEIPT;
    }
    logger.log(`Extracted receipt data: ${JSON.stringify(fields)}`);
    return fields;
  } catch (err) {
    if (receipts.required) {
      throw new ReceiptAnalysisError(`Receipt analysis failed for blob ${blob.blobUrl}: ${describeError(err)}`, {
        cause: err,
      });
    }
    logger.warn(`Receipt analysis failed for blob ${blob.blobUrl}, writing metadata only: ${describeError(err)}`);
    return undefined;
  }
}

/**
 * Handle one BlobCreated notification: validate it, optionally read the
 * receipt fields, then upsert the file record keyed by file name.
 * Errors propagate so the host can retry or dead-letter the event.
 */
export async function processBlobCreated(event: unknown, deps: IngestionDeps): Promise<FileRecord> {
  const { store, logger } = deps;

  const blob = parseBlobCreatedEvent(event);
  logger.log(
    `Event Type: ${blob.eventType}, Subject: ${blob.subject}, Blob URL: ${blob.blobUrl}, Blob Size: ${blob.blobSize} bytes`
  );

  const receipt = await analyzeReceipt(blob, deps.receipts, logger);
  const now = deps.now ? deps.now() : new Date();
  const record = buildFileRecord(blob, receipt, now);

  await store.upsert(record);
  logger.log(`Successfully wrote file '${record.fileName}' to CosmosDB container '${store.name}'`);

  return record;
}
