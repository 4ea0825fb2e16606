// ═══════════════════════════════════════════════════════════════════════════════
// SEARCH ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * The backend could not be reached, or the handle was closed.
 */
export class BackendUnavailableError extends Error {
  readonly name = 'BackendUnavailableError';
  readonly host: string;

  constructor(host: string, message?: string, options?: { cause?: unknown }) {
    super(message ?? `Search backend '${host}' is unavailable`, options);
    this.host = host;
  }
}

/**
 * No connector serves the configured host.
 */
export class UnsupportedHostError extends Error {
  readonly name = 'UnsupportedHostError';
  readonly host: string;

  constructor(host: string) {
    super(`No connector for host '${host}'`);
    this.host = host;
  }
}

/**
 * An operation targeted an index that does not exist.
 */
export class IndexNotFoundError extends Error {
  readonly name = 'IndexNotFoundError';
  readonly index: string;

  constructor(index: string) {
    super(`Index '${index}' does not exist`);
    this.index = index;
  }
}

export class IndexAlreadyExistsError extends Error {
  readonly name = 'IndexAlreadyExistsError';
  readonly index: string;

  constructor(index: string) {
    super(`Index '${index}' already exists`);
    this.index = index;
  }
}
