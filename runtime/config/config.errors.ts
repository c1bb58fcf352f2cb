export class ConfigurationError extends Error {
  readonly kind = "ConfigurationError";
  readonly cause?: unknown;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = "ConfigurationError";
    this.cause = options?.cause;
  }
}
