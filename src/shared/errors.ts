/**
 * Base class for failures raised while ingesting a blob notification.
 * Anything thrown out of the function fails the invocation, which hands the
 * event back to Event Grid's retry / dead-letter policy.
 */
export class IngestionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The notification payload is missing a required field or is malformed. */
export class InvalidEventError extends IngestionError {
  constructor(readonly issues: string[]) {
    super(`Invalid BlobCreated event: ${issues.join(", ")}`);
  }
}

/** An app setting is missing or invalid. */
export class ConfigurationError extends IngestionError {}

/** Receipt analysis failed while RECEIPT_ANALYSIS_REQUIRED is on. */
export class ReceiptAnalysisError extends IngestionError {}

/** The Cosmos DB upsert was rejected. */
export class StoreWriteError extends IngestionError {
  constructor(message: string, readonly statusCode: number | string | undefined, options?: ErrorOptions) {
    super(message, options);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
