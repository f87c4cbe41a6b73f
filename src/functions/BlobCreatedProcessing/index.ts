import { app } from "@azure/functions";
import type { InvocationContext } from "@azure/functions";
import { createBlobReader } from "../../shared/blob";
import { createFileRecordStore } from "../../shared/cosmos";
import { loadSettings } from "../../shared/env";
import type { Settings } from "../../shared/env";
import { describeError } from "../../shared/errors";
import { getCredential } from "../../shared/identity";
import { processBlobCreated } from "../../shared/ingestion";
import type { IngestionDeps } from "../../shared/ingestion";
import { createReceiptAnalyzer } from "../../shared/receipt";

function createIngestionDeps(settings: Settings, context: InvocationContext): IngestionDeps {
  const credential = getCredential();
  const { receipts } = settings;

  return {
    store: createFileRecordStore(settings.cosmos, credential),
    receipts: receipts && {
      reader: createBlobReader(credential),
      analyzer: createReceiptAnalyzer(receipts.endpoint, receipts.modelId, credential),
      required: receipts.required,
    },
    logger: context,
  };
}

/**
 * Event Grid trigger for Microsoft.Storage.BlobCreated.
 * The event payload is validated inside processBlobCreated.
 */
export async function blobCreatedProcessing(event: unknown, context: InvocationContext): Promise<void> {
  try {
    const deps = createIngestionDeps(loadSettings(), context);
    await processBlobCreated(event, deps);
  } catch (err) {
    context.error(`Error processing Event Grid event: ${describeError(err)}`);
    throw err;
  }
}

app.eventGrid("blob-created-processing", {
  handler: blobCreatedProcessing,
});
