import * as fsPromises from 'node:fs/promises';
import { fileTypeFromFile } from 'file-type';

/** Archive containers and compressed streams accepted into the cache. */
export const DEFAULT_ARCHIVE_TYPES: readonly string[] = ['tar', 'gz', 'bz2', 'xz', 'zst', 'zip'];

const PREVIEW_BYTES = 200;

export type Validator = (filePath: string) => Promise<boolean>;

/**
 * Build a validator that accepts files whose magic bytes identify one of
 * `acceptedTypes` (file-type extensions).
 */
export function createArchiveValidator(
  acceptedTypes: readonly string[] = DEFAULT_ARCHIVE_TYPES,
): Validator {
  return async (filePath: string): Promise<boolean> => {
    const result = await fileTypeFromFile(filePath);
    return result !== undefined && acceptedTypes.includes(result.ext);
  };
}

export const isValidArchive: Validator = createArchiveValidator();

/** Best guess at what a file is, for error messages. */
export async function describeFileType(filePath: string): Promise<string> {
  const result = await fileTypeFromFile(filePath);
  return result === undefined ? 'unknown' : `${result.mime} (${result.ext})`;
}

/** First bytes of a file, for error messages. */
export async function readPreview(filePath: string, length: number = PREVIEW_BYTES): Promise<Buffer> {
  const handle = await fsPromises.open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await handle.read(buffer, 0, length, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}
