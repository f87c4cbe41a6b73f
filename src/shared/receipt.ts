import { DocumentAnalysisClient } from "@azure/ai-form-recognizer";
import type { TokenCredential } from "@azure/identity";

export type ReceiptFields = {
  /** Transaction date as YYYY-MM-DD. */
  purchaseDate: string | null;
  merchantName: string | null;
  totalAmount: number | null;
};

/**
 * Lightweight view of a Document Intelligence field.
 * `value` is a string, number, Date or { amount } depending on `kind`.
 */
export type AnalyzedField = {
  kind: string;
  value?: unknown;
  content?: string;
};

export interface ReceiptAnalyzer {
  /** Resolves null when the model found no receipt in the content. */
  analyze(content: Buffer): Promise<ReceiptFields | null>;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

function toIsoDate(d: Date): string {
  return `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())}`;
}

function readDate(field: AnalyzedField | undefined): string | null {
  const v = field?.value;
  if (v instanceof Date) return Number.isNaN(v.getTime()) ? null : toIsoDate(v);
  if (typeof v === "string" && v) return v;
  return null;
}

function readString(field: AnalyzedField | undefined): string | null {
  const v = field?.value;
  if (typeof v === "string" && v.trim()) return v.trim();
  return null;
}

function readAmount(field: AnalyzedField | undefined): number | null {
  const v = field?.value;
  if (typeof v === "number" && Number.isFinite(v)) return v;
  // currency fields carry { amount, currencySymbol, code }
  if (typeof v === "object" && v !== null && "amount" in v && typeof v.amount === "number") {
    return v.amount;
  }
  return null;
}

/** Map the prebuilt-receipt fields onto the three stored receipt fields. */
export function mapReceiptFields(fields: Readonly<Record<string, AnalyzedField | undefined>>): ReceiptFields {
  return {
    purchaseDate: readDate(fields.TransactionDate),
    merchantName: readString(fields.MerchantName),
    totalAmount: readAmount(fields.Total),
  };
}

export function createReceiptAnalyzer(
  endpoint: string,
  modelId: string,
  credential: TokenCredential
): ReceiptAnalyzer {
  const client = new DocumentAnalysisClient(endpoint, credential);

  return {
    async analyze(content: Buffer): Promise<ReceiptFields | null> {
      const poller = await client.beginAnalyzeDocument(modelId, content);
      const result = await poller.pollUntilDone();

      const receipt = result.documents?.[0];
      if (!receipt) return null;
      return mapReceiptFields(receipt.fields);
    },
  };
}
