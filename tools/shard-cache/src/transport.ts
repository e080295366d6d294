import * as fs from 'node:fs';
import { spawn, type ChildProcessByStdio } from 'node:child_process';
import { PassThrough, Readable } from 'node:stream';
import { splitUrl } from './cache/cache-name.js';
import { FetchError, errorMessage } from './errors.js';
import type { Transport } from './types.js';

export const DEFAULT_CHUNK_SIZE = 1024 ** 2;
export const DEFAULT_TIMEOUT_MS = 300_000;

export interface TransportOptions {
  /** Read size for local files. */
  chunkSize?: number;
  /** Upper bound for one HTTP request, body included. */
  timeoutMs?: number;
}

/**
 * Injectable dependencies for createTransport.
 * Defaults to real implementations; tests can override.
 */
export interface TransportDeps {
  fetch: typeof fetch;
  createReadStream: (filePath: string, options: { highWaterMark: number }) => Readable;
  runShell: (command: string) => ChildProcessByStdio<null, Readable, null>;
}

const defaultDeps: TransportDeps = {
  fetch: (input, init) => fetch(input, init),
  createReadStream: (filePath, options) => fs.createReadStream(filePath, options),
  runShell: (command) => spawn('sh', ['-c', command], { stdio: ['ignore', 'pipe', 'inherit'] }),
};

/**
 * Create the default transport: local paths and `file:` URLs, `http(s):`
 * through fetch, and `pipe:<command>` through the shell.
 */
export function createTransport(
  options: TransportOptions = {},
  deps: Partial<TransportDeps> = {},
): Transport {
  const { fetch: fetchFn, createReadStream, runShell } = { ...defaultDeps, ...deps };
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  async function openHttp(url: string): Promise<Readable> {
    let response: Response;
    try {
      response = await fetchFn(url, { signal: AbortSignal.timeout(timeoutMs) });
    } catch (err) {
      throw new FetchError(`Request failed for ${url}: ${errorMessage(err)}`, url, { cause: err });
    }
    if (!response.ok) {
      throw new FetchError(`${response.status} ${response.statusText} for ${url}`, url);
    }
    if (response.body === null) {
      throw new FetchError(`Empty response body for ${url}`, url);
    }
    return Readable.fromWeb(response.body);
  }

  function openPipe(url: string): Readable {
    const command = url.slice('pipe:'.length);
    const child = runShell(command);
    const out = new PassThrough();

    // stdout is ended by hand so a failing command surfaces as a stream error
    child.stdout.pipe(out, { end: false });
    child.on('error', (err) => {
      out.destroy(new FetchError(`Cannot run ${command}: ${err.message}`, url, { cause: err }));
    });
    child.on('close', (code) => {
      if (code === 0) {
        out.end();
      } else {
        out.destroy(new FetchError(`Command exited with status ${code}: ${command}`, url));
      }
    });
    out.on('close', () => {
      if (child.exitCode === null) {
        child.kill();
      }
    });
    return out;
  }

  return {
    async openStream(url: string): Promise<Readable> {
      const { scheme, path } = splitUrl(url);

      switch (scheme) {
        case '':
        case 'file':
          return createReadStream(path, { highWaterMark: chunkSize });
        case 'http':
        case 'https':
          return openHttp(url);
        case 'pipe':
          return openPipe(url);
        default:
          throw new FetchError(`Unsupported URL scheme "${scheme}": ${url}`, url);
      }
    },
  };
}
