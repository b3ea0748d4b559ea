import type { StoreRecord } from "./types/records";

export class HelpdeskError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Disk or permission failure while touching the store root. */
export class IOError extends HelpdeskError {
  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * A persisted line could not be parsed or disagrees with the store's
 * dimensionality. `partial` holds every record read before the bad line.
 */
export class CorruptStoreError extends HelpdeskError {
  constructor(
    message: string,
    readonly line: number,
    readonly partial: StoreRecord[] = [],
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class DimensionMismatchError extends HelpdeskError {
  constructor(
    readonly expected: number,
    readonly actual: number,
    context = "vector"
  ) {
    super(
      `Dimension mismatch for ${context}: expected ${expected}, got ${actual}`
    );
  }
}

export type ProviderErrorKind =
  | "quota"
  | "network"
  | "auth"
  | "timeout"
  | "invalid_response"
  | "unknown";

export class ProviderError extends HelpdeskError {
  constructor(
    message: string,
    readonly kind: ProviderErrorKind,
    readonly provider: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class ConfigError extends HelpdeskError {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length ? `${message}: ${issues.join("; ")}` : message);
  }
}

/** Wraps the failure of one document (and batch, when known) during ingest. */
export class IngestError extends HelpdeskError {
  constructor(
    readonly documentId: string,
    readonly batchIndex: number | null,
    cause: unknown
  ) {
    const where =
      batchIndex === null ? documentId : `${documentId} (batch ${batchIndex})`;
    super(`Failed to ingest ${where}: ${describeError(cause)}`, { cause });
  }
}

export class AbortError extends HelpdeskError {
  constructor(message = "Operation aborted") {
    super(message);
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const throwIfAborted = (signal?: AbortSignal) => {
  if (signal?.aborted) {
    throw new AbortError();
  }
};
