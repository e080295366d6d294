import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fsPromises from 'node:fs/promises';
import * as path from 'node:path';
import { fetchCommand } from '../../src/cli/commands/fetch.js';
import { nameCommand } from '../../src/cli/commands/name.js';
import { sweepCommand } from '../../src/cli/commands/sweep.js';
import { makeTempDir, removeDir } from '../helpers.js';

/**
 * The commands are thin wrappers over the library; these tests drive them
 * through commander and capture stdout.
 */

describe('cli commands', () => {
  let dir: string;
  let stdout: string[];

  beforeEach(async () => {
    dir = await makeTempDir();
    stdout = [];
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stdout.push(String(chunk));
      return true;
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await removeDir(dir);
  });

  it('name prints the cache name of a URL', async () => {
    await nameCommand.parseAsync(['http://host/train/shard-7.tar', '--ndir', '1'], { from: 'user' });

    expect(stdout).toEqual(['train/shard-7.tar\n']);
  });

  it('fetch prints the local path of each URL', async () => {
    const local = path.join(dir, 'local.tar');
    await fsPromises.writeFile(local, 'bytes');

    await fetchCommand.parseAsync([local, '--cache-dir', path.join(dir, 'cache')], { from: 'user' });

    expect(stdout).toEqual([`${local}\t${local}\n`]);
    expect(process.exitCode).toBeUndefined();
  });

  it('sweep prints the sweep report as JSON', async () => {
    const cacheDir = path.join(dir, 'cache');
    await fsPromises.mkdir(cacheDir);
    await fsPromises.writeFile(path.join(cacheDir, 'a.tar'), Buffer.alloc(10));

    await sweepCommand.parseAsync(['--cache-dir', cacheDir, '--cache-size', '100'], { from: 'user' });

    expect(stdout).toEqual(['{"ran":true,"totalBytes":10,"remainingBytes":10,"deleted":[]}\n']);
  });
});
