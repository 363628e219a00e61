export class ServiceError extends Error {
  constructor(
    message: string,
    readonly status: number,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

// Upstream unreachable, timed out, or answered with something that is not an ERDDAP table
export class UpstreamError extends ServiceError {
  constructor(message: string, status = 502) {
    super(message, status);
  }
}

// Data table cannot form a point series (no time axis or no position columns)
export class TableShapeError extends ServiceError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class MetadataTableError extends ServiceError {
  constructor(message: string) {
    super(message, 502);
  }
}

export class CatalogListingError extends ServiceError {
  constructor(message: string) {
    super(message, 502);
  }
}

/** Per-variable problem; reported, never surfaced to the client. */
export class VocabularyCodeError extends Error {
  constructor(
    readonly variable: string,
    readonly code: string,
  ) {
    super(`malformed vocabulary code for ${variable}: "${code}"`);
    this.name = 'VocabularyCodeError';
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message || e.name;
  return String(e);
}
