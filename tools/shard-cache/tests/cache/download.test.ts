import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fsPromises from 'node:fs/promises';
import * as path from 'node:path';
import { download, nextTempToken, tempPathFor } from '../../src/cache/download.js';
import { FetchError, ValidationError } from '../../src/errors.js';
import type { Transport } from '../../src/types.js';
import { exists, failingStream, gzipBytes, makeTempDir, makeTransport, removeDir } from '../helpers.js';

describe('tempPathFor', () => {
  it('suffixes the destination with the token', () => {
    expect(tempPathFor('/cache/a.tar', 'abc')).toBe('/cache/a.tar.tempabc');
  });

});

describe('nextTempToken', () => {
  it('starts with the process id and never repeats', () => {
    const first = nextTempToken();
    const second = nextTempToken();

    expect(first.startsWith(`${process.pid}-`)).toBe(true);
    expect(second).not.toBe(first);
  });
});

describe('download', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('publishes the downloaded bytes at the destination', async () => {
    const body = gzipBytes(64);
    const transport = makeTransport({ 'http://host/a.tar.gz': body });
    const dest = path.join(dir, 'a.tar.gz');

    await download('http://host/a.tar.gz', dest, { transport });

    expect(await fsPromises.readFile(dest)).toEqual(body);
    expect(await fsPromises.readdir(dir)).toEqual(['a.tar.gz']);
  });

  it('never leaves a file at the destination when the transfer fails mid-stream', async () => {
    const transport: Transport = {
      openStream: async () => failingStream('partial bytes', 'connection reset'),
    };
    const dest = path.join(dir, 'a.tar');

    await expect(download('http://host/a.tar', dest, { transport, tempToken: 'test' }))
      .rejects.toThrow('Download of http://host/a.tar failed: connection reset');

    expect(await exists(dest)).toBe(false);
    expect(await exists(tempPathFor(dest, 'test'))).toBe(false);
  });

  it('passes transport FetchErrors through unchanged', async () => {
    const transport = makeTransport({});
    const dest = path.join(dir, 'missing.tar');

    const error = await download('http://host/missing.tar', dest, { transport }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ message: '404 Not Found for http://host/missing.tar', url: 'http://host/missing.tar' });
    expect(await exists(dest)).toBe(false);
  });

  it('wraps other transport errors in FetchError with the cause', async () => {
    const cause = new Error('socket hang up');
    const transport = makeTransport({ 'http://host/a.tar': cause });

    const error = await download('http://host/a.tar', path.join(dir, 'a.tar'), { transport })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ url: 'http://host/a.tar', cause });
  });

  it('runs verify on the finished temporary file before publishing', async () => {
    const body = gzipBytes(16);
    const transport = makeTransport({ 'http://host/a.tar.gz': body });
    const dest = path.join(dir, 'a.tar.gz');
    const seen: Buffer[] = [];

    await download('http://host/a.tar.gz', dest, {
      transport,
      tempToken: 'check',
      verify: async (tempPath) => {
        expect(tempPath).toBe(tempPathFor(dest, 'check'));
        expect(await exists(dest)).toBe(false);
        seen.push(await fsPromises.readFile(tempPath));
      },
    });

    expect(seen).toEqual([body]);
    expect(await fsPromises.readFile(dest)).toEqual(body);
  });

  it('publishes nothing when verify throws and passes ValidationError through', async () => {
    const transport = makeTransport({ 'http://host/a.tar': Buffer.from('<html></html>') });
    const dest = path.join(dir, 'a.tar');
    const rejection = new ValidationError('http://host/a.tar', dest, 'unknown', Buffer.from('<html></html>'));

    const error = await download('http://host/a.tar', dest, {
      transport,
      verify: async () => {
        throw rejection;
      },
    }).catch((err: unknown) => err);

    expect(error).toBe(rejection);
    expect(await fsPromises.readdir(dir)).toEqual([]);
  });

  it('lets concurrent downloads of one URL each publish a complete file', async () => {
    const body = gzipBytes(256 * 1024);
    const transport = makeTransport({ 'http://host/b.tar.gz': body });
    const dest = path.join(dir, 'b.tar.gz');

    const results = await Promise.allSettled([
      download('http://host/b.tar.gz', dest, { transport, chunkSize: 1024 }),
      download('http://host/b.tar.gz', dest, { transport, chunkSize: 1024 }),
    ]);

    expect(results.map((result) => result.status)).toEqual(['fulfilled', 'fulfilled']);
    expect(await fsPromises.readFile(dest)).toEqual(body);
    expect(await fsPromises.readdir(dir)).toEqual(['b.tar.gz']);
  });
});
