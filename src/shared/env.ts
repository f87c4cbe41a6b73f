import { z } from "zod";
import { ConfigurationError } from "./errors";

const settingsSchema = z.object({
  COSMOS_ENDPOINT: z.string().url(),
  COSMOS_DATABASE: z.string().default("serverless-demo"),
  COSMOS_FILES_CONTAINER: z.string().default("files"),
  DOCUMENT_INTELLIGENCE_ENDPOINT: z.string().url().optional(),
  DOCUMENT_INTELLIGENCE_MODEL_ID: z.string().default("prebuilt-receipt"),
  RECEIPT_ANALYSIS_REQUIRED: z
    .string()
    .default("false")
    .transform((v) => v.toLowerCase())
    .pipe(z.enum(["true", "false"]))
    .transform((v) => v === "true"),
});

export type CosmosSettings = {
  endpoint: string;
  databaseId: string;
  containerId: string;
};

export type ReceiptSettings = {
  endpoint: string;
  modelId: string;
  /** When true a failed analysis fails the invocation instead of degrading. */
  required: boolean;
};

export type Settings = {
  cosmos: CosmosSettings;
  /** Undefined when no Document Intelligence endpoint is configured. */
  receipts?: ReceiptSettings;
};

// App settings left blank in the portal arrive as "", treat those as unset.
function present(source: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [name, value] of Object.entries(source)) {
    const v = value?.trim();
    if (v) out[name] = v;
  }
  return out;
}

/**
 * Read and validate the function app settings.
 * Throws ConfigurationError naming every offending setting.
 */
export function loadSettings(source: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = settingsSchema.safeParse(present(source));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((e) => `${e.path.join(".")}: ${e.message}`);
    throw new ConfigurationError(`Invalid app settings: ${issues.join(", ")}`);
  }

  const s = parsed.data;
  return {
    cosmos: {
      endpoint: s.COSMOS_ENDPOINT,
      databaseId: s.COSMOS_DATABASE,
      containerId: s.COSMOS_FILES_CONTAINER,
    },
    receipts: s.DOCUMENT_INTELLIGENCE_ENDPOINT
      ? {
          endpoint: s.DOCUMENT_INTELLIGENCE_ENDPOINT,
          modelId: s.DOCUMENT_INTELLIGENCE_MODEL_ID,
          required: s.RECEIPT_ANALYSIS_REQUIRED,
        }
      : undefined,
  };
}
