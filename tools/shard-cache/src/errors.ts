/**
 * Error thrown when the bytes for a URL cannot be fetched into the cache.
 */
export class FetchError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'FetchError';
  }
}

/**
 * Error thrown when a freshly downloaded file is not a recognized archive,
 * or when checking it failed. The file never reaches its cache path.
 */
export class ValidationError extends Error {
  constructor(
    public readonly url: string,
    public readonly path: string,
    public readonly fileType: string,
    public readonly preview: Buffer,
    options?: { cause?: unknown },
  ) {
    super(
      `${path} (${url}) is not an archive, but ${fileType}, contains ${JSON.stringify(preview.toString('latin1'))}`,
      options,
    );
    this.name = 'ValidationError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** True for the ENOENT errors node:fs raises when a path is missing. */
export function isNotFoundError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
