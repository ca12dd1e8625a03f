// ── Error taxonomy ──────────────────────────────────────────
// A missing optional element is not an error: the resolver returns
// `{ found: false }` and the caller walks its fallback chain.

export type PortalSyncErrorKind =
  | 'authentication'
  | 'extraction'
  | 'row_validation'
  | 'store_connectivity'
  | 'navigation';

export class PortalSyncError extends Error {
  readonly kind: PortalSyncErrorKind;

  constructor(kind: PortalSyncErrorKind, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'PortalSyncError';
    this.kind = kind;
  }
}

/** Login could not be completed. Terminal for the run. */
export class AuthenticationFailure extends PortalSyncError {
  constructor(message: string, cause?: unknown) {
    super('authentication', message, cause);
    this.name = 'AuthenticationFailure';
  }
}

/** The report table or its rows are missing entirely. Terminal for the run. */
export class ExtractionFailure extends PortalSyncError {
  constructor(message: string, cause?: unknown) {
    super('extraction', message, cause);
    this.name = 'ExtractionFailure';
  }
}

/** A single row was rejected. The run continues without it. */
export class RowValidationError extends PortalSyncError {
  readonly field: string | undefined;

  constructor(message: string, field?: string) {
    super('row_validation', message);
    this.name = 'RowValidationError';
    this.field = field;
  }
}

/** The document store is unreachable. Terminal, no writes possible. */
export class StoreConnectivityError extends PortalSyncError {
  constructor(message: string, cause?: unknown) {
    super('store_connectivity', message, cause);
    this.name = 'StoreConnectivityError';
  }
}

/** Report navigation failed even after the direct-URL fallback. */
export class NavigationFailure extends PortalSyncError {
  readonly url: string;

  constructor(url: string, message: string, cause?: unknown) {
    super('navigation', message, cause);
    this.name = 'NavigationFailure';
    this.url = url;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
