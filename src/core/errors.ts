export class RegistryNotFoundError extends Error {
  readonly kind = "RegistryNotFound";
  readonly cause?: unknown;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = "RegistryNotFoundError";
    this.cause = options?.cause;
  }
}

export class RegistryAuthError extends Error {
  readonly kind = "RegistryAuth";
  readonly cause?: unknown;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = "RegistryAuthError";
    this.cause = options?.cause;
  }
}

export class RegistryTransientError extends Error {
  readonly kind = "RegistryTransient";
  readonly cause?: unknown;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = "RegistryTransientError";
    this.cause = options?.cause;
  }
}

/** Registry failure outside the recoverable set; ends the run. */
export class RegistryError extends Error {
  readonly kind = "Registry";
  readonly cause?: unknown;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = "RegistryError";
    this.cause = options?.cause;
  }
}

export class SourceControlError extends Error {
  readonly kind = "SourceControl";
  readonly status?: number;
  readonly cause?: unknown;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message);
    this.name = "SourceControlError";
    this.status = options?.status;
    this.cause = options?.cause;
  }
}

export function asMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
