/**
 * Minimal logging surface the reconciliation stages write to.
 * The CLI passes its structured logger; library callers may pass nothing.
 */
export interface ReconLogger {
  debug(message: string, fields?: Record<string, unknown>): void;
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
}

export const noopLogger: ReconLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
