/**
 * Error taxonomy shared by the search pipeline and the cache layer.
 * Every error carries a stable machine readable code, the same codes the
 * routes put in their JSON error bodies.
 */

export class SearchServiceError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Network failure talking to a search engine or a metadata provider. */
export class TransportError extends SearchServiceError {
  readonly target: string;
  readonly status: number | null;

  constructor(target: string, message: string, options: { status?: number | null; cause?: unknown } = {}) {
    super(`${target}: ${message}`, "TRANSPORT_ERROR", { cause: options.cause });
    this.target = target;
    this.status = options.status ?? null;
  }
}

/** A single upstream record that could not be interpreted. */
export class MalformedUpstreamRecordError extends SearchServiceError {
  constructor(source: string, detail: string) {
    super(`${source}: malformed record (${detail})`, "MALFORMED_UPSTREAM_RECORD");
  }
}

/**
 * Structural cache errors. These point at a programming error or at corrupted
 * data and are never retried.
 */
export class CacheError extends SearchServiceError {}

export class InvalidKeyFormatError extends CacheError {
  constructor(key: string) {
    super(`Invalid key format '${key}', correct format is 'ris:[data_type]:[key]'`, "INVALID_KEY_FORMAT");
  }
}

export class UnsupportedTypeError extends CacheError {
  constructor(kind: string) {
    super(`Values of type '${kind}' cannot be stored`, "UNSUPPORTED_TYPE");
  }
}

export class TypeMismatchError extends CacheError {
  constructor(key: string, detail: string) {
    super(`Type mismatch for '${key}': ${detail}`, "TYPE_MISMATCH");
  }
}

export class KeyNotFoundError extends CacheError {
  constructor(key: string) {
    super(`Key '${key}' not found`, "KEY_NOT_FOUND");
  }
}

export class AmbiguousKeyError extends CacheError {
  readonly candidates: string[];

  constructor(key: string, candidates: string[]) {
    super(`Key '${key}' matches ${candidates.length} typed keys: ${candidates.join(", ")}`, "AMBIGUOUS_KEY");
    this.candidates = candidates;
  }
}

/** The cache backend cannot be reached. Callers degrade to uncached operation. */
export class CacheUnavailableError extends SearchServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "CACHE_UNAVAILABLE", options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
