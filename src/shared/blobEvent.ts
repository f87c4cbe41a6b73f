import { z } from "zod";
import { InvalidEventError } from "./errors";

/**
 * Event Grid event payload shape for Microsoft.Storage.BlobCreated.
 * Only the fields the record needs are required.
 */
const blobCreatedEventSchema = z.object({
  id: z.string().optional(),
  eventType: z.string().min(1, "eventType is required"),
  subject: z.string().min(1, "subject is required"),
  eventTime: z.string().optional(),
  data: z.object({
    url: z.string().url(),
    contentLength: z.number().int().nonnegative(),
    contentType: z.string().optional(),
    api: z.string().optional(),
    blobType: z.string().optional(),
  }),
});

export type BlobCreated = {
  eventType: string;
  subject: string;
  /** Path inside the container. */
  blobPath: string;
  /** Last segment of blobPath. */
  fileName: string;
  blobUrl: string;
  blobSize: number;
};

const BLOBS_MARKER = "/blobs/";

// Cosmos DB rejects these in an item id, and the file name is the id.
const INVALID_ID_CHARS = /[\\?#]/;

export function parseBlobCreatedEvent(event: unknown): BlobCreated {
  const parsed = blobCreatedEventSchema.safeParse(event);
  if (!parsed.success) {
    throw new InvalidEventError(
      parsed.error.issues.map((e) => `${e.path.join(".") || "event"}: ${e.message}`)
    );
  }

  const { eventType, subject, data } = parsed.data;

  // subject: /blobServices/default/containers/{container}/blobs/{path}
  const idx = subject.indexOf(BLOBS_MARKER);
  if (idx === -1) {
    throw new InvalidEventError([`subject: Invalid subject format: ${subject}`]);
  }
  const blobPath = subject.substring(idx + BLOBS_MARKER.length);
  const fileName = blobPath.split("/").pop() ?? "";
  if (!fileName) {
    throw new InvalidEventError([`subject: No blob name in subject: ${subject}`]);
  }
  if (INVALID_ID_CHARS.test(fileName)) {
    throw new InvalidEventError([`subject: Blob name cannot be used as a document id: ${fileName}`]);
  }

  return {
    eventType,
    subject,
    blobPath,
    fileName,
    blobUrl: data.url,
    blobSize: data.contentLength,
  };
}
