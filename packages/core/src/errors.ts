export type AdrErrorCode =
  | 'NOT_FOUND'
  | 'AMBIGUOUS'
  | 'FORMAT'
  | 'IO'
  | 'CONFIG'
  | 'DIR_EXISTS';

/**
 * Base class for every error raised by `@adrs/core`.
 * Switch on `code` rather than on the class when crossing package boundaries.
 */
export abstract class AdrError extends Error {
  abstract readonly code: AdrErrorCode;

  protected constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class AdrNotFoundError extends AdrError {
  readonly code = 'NOT_FOUND';

  constructor(readonly query: string) {
    super(`ADR not found: ${query}`);
  }
}

export class AdrAmbiguousError extends AdrError {
  readonly code = 'AMBIGUOUS';

  /**
   * @param matches - candidate titles, best match first
   */
  constructor(
    readonly query: string,
    readonly matches: readonly string[],
  ) {
    super(`Multiple ADRs match '${query}': ${matches.map((m) => `'${m}'`).join(', ')}`);
  }
}

export class AdrFormatError extends AdrError {
  readonly code = 'FORMAT';

  constructor(
    readonly reason: string,
    readonly path?: string,
  ) {
    super(path ? `Invalid ADR format in ${path}: ${reason}` : `Invalid ADR format: ${reason}`);
  }
}

export class AdrIoError extends AdrError {
  readonly code = 'IO';

  constructor(
    message: string,
    readonly path: string,
    cause?: unknown,
  ) {
    super(message, { cause });
  }
}

export class AdrConfigError extends AdrError {
  readonly code = 'CONFIG';

  constructor(
    message: string,
    readonly configPath: string,
    cause?: unknown,
  ) {
    super(`Invalid configuration (${configPath}): ${message}`, { cause });
  }
}

export class AdrDirExistsError extends AdrError {
  readonly code = 'DIR_EXISTS';

  constructor(readonly path: string) {
    super(`ADR directory already exists: ${path}`);
  }
}

export function isAdrError(err: unknown): err is AdrError {
  return err instanceof AdrError;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
