import { InvocationContext } from "@azure/functions";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ConfigurationError, InvalidEventError } from "../../shared/errors";
import { blobCreatedProcessing } from "./index";

const mocks = vi.hoisted(() => ({
  eventGrid: vi.fn(),
  http: vi.fn(),
  createStore: vi.fn(),
  upsert: vi.fn(),
  createAnalyzer: vi.fn(),
  analyze: vi.fn(),
  read: vi.fn(),
}));

vi.mock("@azure/functions", async (importOriginal) => ({
  ...(await importOriginal<typeof import("@azure/functions")>()),
  app: { eventGrid: mocks.eventGrid, http: mocks.http },
}));

vi.mock("../../shared/identity", () => ({
  getCredential: () => ({ getToken: async () => null }),
}));

vi.mock("../../shared/cosmos", () => ({
  createFileRecordStore: (...args: unknown[]) => {
    mocks.createStore(...args);
    return { name: "files", upsert: mocks.upsert };
  },
}));

vi.mock("../../shared/blob", () => ({
  createBlobReader: () => ({ read: mocks.read }),
}));

vi.mock("../../shared/receipt", () => ({
  createReceiptAnalyzer: (...args: unknown[]) => {
    mocks.createAnalyzer(...args);
    return { analyze: mocks.analyze };
  },
}));

const COSMOS_ENDPOINT = "https://test-cosmos.documents.azure.com:443/";
const DI_ENDPOINT = "https://test-docintel.cognitiveservices.azure.com/";
const BLOB_URL = "https://teststorage.blob.core.windows.net/receipts/receipt-001.jpg";

const event = {
  id: "evt-1",
  topic: "/subscriptions/test/resourceGroups/test/providers/Microsoft.Storage/storageAccounts/teststorage",
  eventType: "Microsoft.Storage.BlobCreated",
  subject: "/blobServices/default/containers/receipts/blobs/receipt-001.jpg",
  eventTime: "2026-03-01T09:29:58.000Z",
  data: { api: "PutBlob", contentType: "image/jpeg", contentLength: 1024, url: BLOB_URL },
  dataVersion: "",
  metadataVersion: "1",
};

const record = {
  id: "receipt-001.jpg",
  fileName: "receipt-001.jpg",
  blobPath: "receipt-001.jpg",
  blobUrl: BLOB_URL,
  blobSize: 1024,
  timestamp: "2026-03-01T09:30:00.000Z",
  eventType: "Microsoft.Storage.BlobCreated",
};

describe("blob-created-processing", () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2026-03-01T09:30:00.000Z"));
    vi.stubEnv("COSMOS_ENDPOINT", COSMOS_ENDPOINT);
    vi.stubEnv("COSMOS_DATABASE", "");
    vi.stubEnv("COSMOS_FILES_CONTAINER", "");
    vi.stubEnv("DOCUMENT_INTELLIGENCE_ENDPOINT", "");
    vi.stubEnv("RECEIPT_ANALYSIS_REQUIRED", "");

    mocks.createStore.mockClear();
    mocks.createAnalyzer.mockClear();
    mocks.upsert.mockReset().mockResolvedValue(undefined);
    mocks.analyze.mockReset();
    mocks.read.mockReset();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.unstubAllEnvs();
  });

  it("registers the Event Grid trigger", () => {
    expect(mocks.eventGrid).toHaveBeenCalledWith("blob-created-processing", {
      handler: blobCreatedProcessing,
    });
  });

  it("exposes no HTTP route", () => {
    expect(mocks.eventGrid).toHaveBeenCalledTimes(1);
    expect(mocks.http).not.toHaveBeenCalled();
  });

  it("upserts the file record into the configured container", async () => {
    const context = new InvocationContext({ functionName: "blob-created-processing" });

    await blobCreatedProcessing(event, context);

    expect(mocks.createStore).toHaveBeenCalledWith(
      { endpoint: COSMOS_ENDPOINT, databaseId: "serverless-demo", containerId: "files" },
      expect.anything()
    );
    expect(mocks.createAnalyzer).not.toHaveBeenCalled();
    expect(mocks.upsert).toHaveBeenCalledWith(record);
  });

  it("enriches the record when Document Intelligence is configured", async () => {
    vi.stubEnv("DOCUMENT_INTELLIGENCE_ENDPOINT", DI_ENDPOINT);
    mocks.read.mockResolvedValue(Buffer.from("receipt-bytes"));
    mocks.analyze.mockResolvedValue({ purchaseDate: "2026-02-28", merchantName: "Test Market", totalAmount: 12.5 });
    const context = new InvocationContext({ functionName: "blob-created-processing" });

    await blobCreatedProcessing(event, context);

    expect(mocks.createAnalyzer).toHaveBeenCalledWith(DI_ENDPOINT, "prebuilt-receipt", expect.anything());
    expect(mocks.read).toHaveBeenCalledWith(BLOB_URL);
    expect(mocks.upsert).toHaveBeenCalledWith({
      ...record,
      purchaseDate: "2026-02-28",
      merchantName: "Test Market",
      totalAmount: 12.5,
    });
  });

  it("fails the invocation on a malformed event", async () => {
    const context = new InvocationContext({ functionName: "blob-created-processing" });
    const logError = vi.spyOn(context, "error").mockImplementation(() => undefined);

    await expect(blobCreatedProcessing({ ...event, data: {} }, context)).rejects.toBeInstanceOf(InvalidEventError);
    expect(mocks.upsert).not.toHaveBeenCalled();
    expect(logError).toHaveBeenCalledTimes(1);
  });

  it("fails the invocation when the Cosmos endpoint is not set", async () => {
    vi.stubEnv("COSMOS_ENDPOINT", "");
    const context = new InvocationContext({ functionName: "blob-created-processing" });
    const logError = vi.spyOn(context, "error").mockImplementation(() => undefined);

    await expect(blobCreatedProcessing(event, context)).rejects.toBeInstanceOf(ConfigurationError);
    expect(logError).toHaveBeenCalledWith(
      "Error processing Event Grid event: Invalid app settings: COSMOS_ENDPOINT: Required"
    );
    expect(mocks.upsert).not.toHaveBeenCalled();
  });

  it("surfaces store failures to the host", async () => {
    const failure = new Error("CosmosDB error: 503 - Service Unavailable");
    mocks.upsert.mockRejectedValueOnce(failure);
    const context = new InvocationContext({ functionName: "blob-created-processing" });
    vi.spyOn(context, "error").mockImplementation(() => undefined);

    await expect(blobCreatedProcessing(event, context)).rejects.toBe(failure);
  });
});
