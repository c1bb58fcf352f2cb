export interface ReconcileLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
}

export const NOOP_LOGGER: ReconcileLogger = Object.freeze({
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
});
