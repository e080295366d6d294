import * as fs from 'node:fs';
import * as fsPromises from 'node:fs/promises';
import { pipeline } from 'node:stream/promises';
import { FetchError, ValidationError, errorMessage } from '../errors.js';
import { DEFAULT_CHUNK_SIZE } from '../transport.js';
import type { Transport } from '../types.js';

export interface DownloadOptions {
  transport: Transport;
  chunkSize?: number;
  /** Suffix token for the temporary file; unique per call when omitted. */
  tempToken?: string | number;
  /** Runs on the complete temporary file; a throw cancels the publish. */
  verify?: (tempPath: string) => Promise<void>;
}

let tempCounter = 0;

/** Process id plus a per-process counter, so concurrent downloads never share a file. */
export function nextTempToken(): string {
  tempCounter += 1;
  return `${process.pid}-${tempCounter}`;
}

/** Temporary path a download is written to before it is published at `dest`. */
export function tempPathFor(dest: string, token: string | number): string {
  return `${dest}.temp${token}`;
}

/**
 * Download `url` to `dest`.
 *
 * Bytes go to a temporary file beside `dest`, which is renamed onto `dest`
 * only after the source is exhausted and `verify` has passed. A failure
 * removes the temporary file and never creates `dest`.
 */
export async function download(url: string, dest: string, options: DownloadOptions): Promise<void> {
  const temp = tempPathFor(dest, options.tempToken ?? nextTempToken());
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;

  try {
    const source = await options.transport.openStream(url);
    await pipeline(source, fs.createWriteStream(temp, { highWaterMark: chunkSize }));
    if (options.verify !== undefined) {
      await options.verify(temp);
    }
    await fsPromises.rename(temp, dest);
  } catch (err) {
    await fsPromises.rm(temp, { force: true });
    if (err instanceof FetchError || err instanceof ValidationError) {
      throw err;
    }
    throw new FetchError(`Download of ${url} failed: ${errorMessage(err)}`, url, { cause: err });
  }
}
