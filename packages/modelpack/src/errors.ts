/**
 * Error taxonomy for modelpack.
 *
 * Every failure raised by the core is a ModelPackError with a stable `code`
 * and a `category` that front ends map to exit codes.
 */

/** Coarse error category used for exit-code mapping */
export type ErrorCategory =
  | 'configuration'
  | 'download'
  | 'verification'
  | 'lock'
  | 'permission'
  | 'cancelled';

export type ErrorCode =
  | 'ERR_PARSE'
  | 'ERR_SOURCE_NOT_FOUND'
  | 'ERR_AUTHENTICATION'
  | 'ERR_NOT_FOUND'
  | 'ERR_SIZE_MISMATCH'
  | 'ERR_HASH_MISMATCH'
  | 'ERR_LOCK_TIMEOUT'
  | 'ERR_DOWNLOAD'
  | 'ERR_PERMISSION'
  | 'ERR_CANCELLED';

// ─── Base class ─────────────────────────────────────────────────────

export abstract class ModelPackError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly category: ErrorCategory;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ─── Configuration ──────────────────────────────────────────────────

/** A manifest or source-config document is missing required fields or malformed */
export class ParseError extends ModelPackError {
  readonly code = 'ERR_PARSE';
  readonly category = 'configuration';
  public readonly problems: string[];

  constructor(message: string, problems: string[] = [], options?: { cause?: unknown }) {
    super(problems.length > 0 ? `${message}: ${problems.join('; ')}` : message, options);
    this.problems = problems;
  }
}

export class SourceNotFoundError extends ModelPackError {
  readonly code = 'ERR_SOURCE_NOT_FOUND';
  readonly category = 'configuration';
  public readonly sourceName: string;
  public readonly availableSources: string[];

  constructor(sourceName: string, availableSources: string[], message?: string) {
    super(
      message ??
        `Source '${sourceName}' not found in model-sources config or manifest. ` +
          `Available manifest sources: [${availableSources.join(', ')}]. ` +
          'Set MODELPACK_SOURCE or add a model-sources.json.',
    );
    this.sourceName = sourceName;
    this.availableSources = availableSources;
  }
}

// ─── Download ───────────────────────────────────────────────────────

export class AuthenticationError extends ModelPackError {
  readonly code = 'ERR_AUTHENTICATION';
  readonly category = 'download';
  public readonly status: number;

  constructor(status: number, url: string) {
    super(
      `HTTP ${status}: authentication failed for ${url}. ` +
        'Set HF_TOKEN (or pass a token) for private repositories, or switch to another source.',
    );
    this.status = status;
  }
}

/**
 * Raised for a remote 404 (`url` set) and for a cached file that is
 * missing on disk (`path` set).
 */
export class NotFoundError extends ModelPackError {
  readonly code = 'ERR_NOT_FOUND';
  readonly category: ErrorCategory;
  public readonly url?: string;
  public readonly path?: string;

  constructor(message: string, location: { url: string } | { path: string }, options?: { cause?: unknown }) {
    super(message, options);
    if ('url' in location) {
      this.url = location.url;
      this.category = 'download';
    } else {
      this.path = location.path;
      this.category = 'verification';
    }
  }
}

export class DownloadError extends ModelPackError {
  readonly code = 'ERR_DOWNLOAD';
  readonly category = 'download';
  /** HTTP status, absent for connection-level failures */
  public readonly status?: number;
  /** Whether a retry may succeed (429, 5xx, connection failure) */
  public readonly transient: boolean;

  constructor(message: string, details: { status?: number; transient: boolean; cause?: unknown }) {
    super(message, { cause: details.cause });
    this.status = details.status;
    this.transient = details.transient;
  }
}

// ─── Verification ───────────────────────────────────────────────────

export class SizeMismatchError extends ModelPackError {
  readonly code = 'ERR_SIZE_MISMATCH';
  readonly category = 'verification';

  constructor(
    public readonly path: string,
    public readonly expectedSize: number,
    public readonly actualSize: number,
  ) {
    super(
      `Size mismatch for ${path}: expected ${expectedSize} bytes, got ${actualSize} bytes. ` +
        'The file has been deleted. Force a redownload or fix the source configuration.',
    );
  }
}

export class HashMismatchError extends ModelPackError {
  readonly code = 'ERR_HASH_MISMATCH';
  readonly category = 'verification';

  constructor(
    public readonly path: string,
    public readonly expectedSha256: string,
    public readonly actualSha256: string,
  ) {
    super(
      `SHA-256 mismatch for ${path}: expected ${expectedSha256}, got ${actualSha256}. ` +
        'The file has been deleted. Force a redownload or fix the source configuration.',
    );
  }
}

// ─── Locking, permissions, cancellation ─────────────────────────────

export class LockTimeoutError extends ModelPackError {
  readonly code = 'ERR_LOCK_TIMEOUT';
  readonly category = 'lock';

  constructor(
    public readonly lockPath: string,
    public readonly timeoutMs: number,
  ) {
    super(
      `Timed out after ${timeoutMs} ms waiting for lock ${lockPath}. ` +
        'Another process may still be downloading; remove the lock file if it is stale.',
    );
  }
}

export class PermissionError extends ModelPackError {
  readonly code = 'ERR_PERMISSION';
  readonly category = 'permission';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class CancelledError extends ModelPackError {
  readonly code = 'ERR_CANCELLED';
  readonly category = 'cancelled';

  constructor(message = 'Operation cancelled', options?: { cause?: unknown }) {
    super(message, options);
  }
}

// ─── Helpers ────────────────────────────────────────────────────────

const PERMISSION_CODES = new Set(['EACCES', 'EPERM', 'EROFS']);

/** Read the `code` of a Node.js system error, if there is one */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === 'AbortError' || errnoCode(err) === 'ABORT_ERR');
}

/**
 * Map a foreign failure onto the taxonomy.
 * Aborts become CancelledError, filesystem permission failures become
 * PermissionError; anything else is returned untouched.
 */
export function normalizeError(err: unknown): unknown {
  if (err instanceof ModelPackError) {
    return err;
  }
  if (isAbortError(err)) {
    return new CancelledError(undefined, { cause: err });
  }
  const code = errnoCode(err);
  if (code !== undefined && PERMISSION_CODES.has(code)) {
    const message = err instanceof Error ? err.message : String(err);
    return new PermissionError(`Permission denied: ${message}`, { cause: err });
  }
  return err;
}

/** Throw a CancelledError if the signal has already been aborted */
export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError(undefined, { cause: signal.reason });
  }
}

// ─── Result type ────────────────────────────────────────────────────

export type OperationResult<T> =
  | { success: true; value: T }
  | { success: false; error: ModelPackError };

/**
 * Run an operation and capture taxonomy failures as a result value.
 * Failures outside the taxonomy are rethrown.
 */
export async function settle<T>(operation: () => Promise<T>): Promise<OperationResult<T>> {
  try {
    return { success: true, value: await operation() };
  } catch (err) {
    const normalized = normalizeError(err);
    if (normalized instanceof ModelPackError) {
      return { success: false, error: normalized };
    }
    throw normalized;
  }
}
