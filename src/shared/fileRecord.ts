import type { BlobCreated } from "./blobEvent";
import type { ReceiptFields } from "./receipt";

/**
 * Document stored in the files container, one per file name.
 * Receipt fields are only present when receipt analysis ran and succeeded.
 */
export type FileRecord = {
  id: string;
  fileName: string;
  blobPath: string;
  blobUrl: string;
  blobSize: number;
  timestamp: string;
  eventType: string;
  purchaseDate?: string | null;
  merchantName?: string | null;
  totalAmount?: number | null;
};

export function buildFileRecord(blob: BlobCreated, receipt: ReceiptFields | undefined, now: Date): FileRecord {
  return {
    id: blob.fileName,
    fileName: blob.fileName,
    blobPath: blob.blobPath,
    blobUrl: blob.blobUrl,
    blobSize: blob.blobSize,
    timestamp: now.toISOString(),
    eventType: blob.eventType,
    ...receipt,
  };
}
