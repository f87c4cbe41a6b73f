import { BlobClient } from "@azure/storage-blob";
import type { TokenCredential } from "@azure/identity";

export interface BlobReader {
  read(blobUrl: string): Promise<Buffer>;
}

export function parseBlobUrl(blobUrl: string): {
  container: string;
  blobName: string;
} {
  const u = new URL(blobUrl);
  // pathname: /<container>/<blobName...>
  const parts = u.pathname.replace(/^\/+/, "").split("/");
  const container = parts.shift() || "";
  const blobName = parts.join("/");
  return { container, blobName };
}

/**
 * Downloads blobs with the function's identity, which needs the
 * Storage Blob Data Reader role on the account.
 */
export function createBlobReader(credential: TokenCredential): BlobReader {
  return {
    async read(blobUrl: string): Promise<Buffer> {
      const { container, blobName } = parseBlobUrl(blobUrl);
      if (!container || !blobName) {
        throw new Error(`Invalid blobUrl (missing container/blobName): ${blobUrl}`);
      }

      const blobClient = new BlobClient(blobUrl, credential);
      return blobClient.downloadToBuffer();
    },
  };
}
