export type ApiConfig = {
  port: number;
  maxDocumentBytes: number;
  batchConcurrency: number;
  rowSinkUrl: string | null;
  rowSinkToken: string | null;
};

const DEFAULT_MAX_DOCUMENT_BYTES = 10 * 1024 * 1024;

export function readApiConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  return {
    port: readPositiveInt(env, "RECEIPT_LEDGER_API_PORT", 8790),
    maxDocumentBytes: readPositiveInt(
      env,
      "RECEIPT_LEDGER_MAX_DOCUMENT_BYTES",
      DEFAULT_MAX_DOCUMENT_BYTES,
    ),
    batchConcurrency: readPositiveInt(env, "RECEIPT_LEDGER_BATCH_CONCURRENCY", 4),
    rowSinkUrl: readUrl(env, "RECEIPT_LEDGER_ROW_SINK_URL"),
    rowSinkToken: env.RECEIPT_LEDGER_ROW_SINK_TOKEN?.trim() || null,
  };
}

function readPositiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }

  const value = Number.parseInt(raw, 10);
  if (!/^\d+$/.test(raw) || !Number.isFinite(value) || value <= 0) {
    throw new Error(`invalid ${name}: ${raw}`);
  }
  return value;
}

function readUrl(env: NodeJS.ProcessEnv, name: string): string | null {
  const raw = env[name]?.trim();
  if (!raw) {
    return null;
  }
  if (!URL.canParse(raw)) {
    throw new Error(`invalid ${name}: ${raw}`);
  }
  return raw;
}
