export type ApiLogger = {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

export const LOG_PREFIX = "[receipt-ledger-api]";

export const consoleLogger: ApiLogger = {
  info: (message) => console.log(`${LOG_PREFIX} ${message}`),
  warn: (message) => console.warn(`${LOG_PREFIX} ${message}`),
  error: (message) => console.error(`${LOG_PREFIX} ${message}`),
};

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
