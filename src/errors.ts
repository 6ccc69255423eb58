export type IngestErrorKind =
  | "fetch"
  | "decode"
  | "unsupported-input"
  | "store-write"
  | "store-read";

export class IngestError extends Error {
  readonly kind: IngestErrorKind;

  constructor(kind: IngestErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

export class SourceFetchError extends IngestError {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, message: string, options?: { cause?: unknown; status?: number }) {
    super("fetch", message, options);
    this.url = url;
    this.status = options?.status;
  }
}

export class SourceDecodeError extends IngestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("decode", message, options);
  }
}

export class UnsupportedInputError extends IngestError {
  constructor(message: string) {
    super("unsupported-input", message);
  }
}

export class StoreWriteError extends IngestError {
  readonly title: string;

  constructor(title: string, message: string, options?: { cause?: unknown }) {
    super("store-write", message, options);
    this.title = title;
  }
}

export class StoreReadError extends IngestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("store-read", message, options);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
