import * as fsPromises from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { Readable } from 'node:stream';
import { vi } from 'vitest';
import { FetchError } from '../src/errors.js';
import type { Logger } from '../src/logger.js';
import type { Transport } from '../src/types.js';

export async function makeTempDir(prefix = 'shard-cache-test-'): Promise<string> {
  return fsPromises.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fsPromises.rm(dir, { recursive: true, force: true });
}

/** Bytes that start with the gzip magic number, padded with zeros to `size`. */
export function gzipBytes(size: number): Buffer {
  const buffer = Buffer.alloc(size);
  buffer.set([0x1f, 0x8b, 0x08]);
  return buffer;
}

/** A one-member ustar archive holding `content` as "sample.txt". */
export function tarBytes(content: string): Buffer {
  const body = Buffer.from(content, 'utf8');
  const header = Buffer.alloc(512);
  header.write('sample.txt', 0, 'ascii');
  header.write('0000644\0', 100, 'ascii');
  header.write('0000000\0', 108, 'ascii');
  header.write('0000000\0', 116, 'ascii');
  header.write(body.length.toString(8).padStart(11, '0') + '\0', 124, 'ascii');
  header.write('00000000000\0', 136, 'ascii');
  header.write('0', 156, 'ascii');
  header.write('ustar\0', 257, 'ascii');
  header.write('00', 263, 'ascii');

  header.fill(0x20, 148, 156);
  let sum = 0;
  for (const byte of header) sum += byte;
  header.write(sum.toString(8).padStart(6, '0') + '\0 ', 148, 'ascii');

  const padded = Buffer.alloc(Math.ceil(body.length / 512) * 512);
  body.copy(padded);
  return Buffer.concat([header, padded, Buffer.alloc(1024)]);
}

export async function readAll(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

export interface FakeTransport extends Transport {
  calls: string[];
}

/**
 * In-process transport serving fixed bodies by URL. Unknown URLs reject
 * with FetchError, Error values are thrown from openStream.
 */
export function makeTransport(bodies: Record<string, Buffer | Error>): FakeTransport {
  const calls: string[] = [];
  return {
    calls,
    async openStream(url: string): Promise<Readable> {
      calls.push(url);
      const body = bodies[url];
      if (body === undefined) {
        throw new FetchError(`404 Not Found for ${url}`, url);
      }
      if (body instanceof Error) {
        throw body;
      }
      return Readable.from([body]);
    },
  };
}

/** Stream that yields `partial` and then fails, like a dropped connection. */
export function failingStream(partial: string, message: string): Readable {
  return Readable.from((async function* () {
    yield Buffer.from(partial);
    throw new Error(message);
  })());
}

export function makeLogger(): Logger & {
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
  debug: ReturnType<typeof vi.fn>;
} {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

export async function exists(filePath: string): Promise<boolean> {
  try {
    await fsPromises.stat(filePath);
    return true;
  } catch {
    return false;
  }
}
