/**
 * URL to cache-name mapping.
 *
 * Names are derived from the URL alone so that the same URL lands on the same
 * cache path in every process and every run.
 */

/** Schemes whose URL path is meaningful enough to name a cache entry after. */
export const PATH_NAMED_SCHEMES: readonly string[] = [
  '',
  'file',
  'http',
  'https',
  'ftp',
  'ftps',
  'gs',
  's3',
  'ais',
];

const MAX_ENCODED_LENGTH = 128;
const SCHEME_RE = /^([a-zA-Z][a-zA-Z0-9+.-]*):/;
const PIPE_URL_RE = /^(https?|hdfs|gs|ais|s3):/;
const SAFE_CHARS = new Set(
  'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789_.-~+{}*,'.split(''),
);

export interface SplitUrl {
  /** Lower-cased scheme, empty for a plain path. */
  scheme: string;
  /** Path component, without authority, query or fragment. */
  path: string;
}

/**
 * Split a URL into scheme and path. Plain filesystem paths have an empty
 * scheme and are returned as the path.
 */
export function splitUrl(url: string): SplitUrl {
  const match = SCHEME_RE.exec(url);
  const scheme = match ? match[1].toLowerCase() : '';
  let rest = match ? url.slice(match[0].length) : url;

  if (rest.startsWith('//')) {
    const authorityEnd = rest.slice(2).search(/[/?#]/);
    rest = authorityEnd === -1 ? '' : rest.slice(2 + authorityEnd);
  }

  const pathEnd = rest.search(/[?#]/);
  return { scheme, path: pathEnd === -1 ? rest : rest.slice(0, pathEnd) };
}

/** True when the URL names a file on the local filesystem. */
export function isLocalUrl(url: string): boolean {
  const { scheme } = splitUrl(url);
  return scheme === '' || scheme === 'file';
}

/**
 * Percent-encode every UTF-8 byte outside the safe set and keep the last
 * 128 characters.
 */
function encodeWholeUrl(url: string): string {
  let encoded = '';
  for (const byte of Buffer.from(url, 'utf8')) {
    const ch = String.fromCharCode(byte);
    encoded += byte < 0x80 && SAFE_CHARS.has(ch)
      ? ch
      : `%${byte.toString(16).toUpperCase().padStart(2, '0')}`;
  }
  return encoded.slice(-MAX_ENCODED_LENGTH);
}

/**
 * Derive a cache-relative path from a URL.
 *
 * For allow-listed schemes the name is the last `ndir + 1` path segments;
 * `ndir = 0` keeps just the basename. Other schemes are percent-encoded whole.
 */
export function urlToCacheName(url: string, ndir: number = 0): string {
  const { scheme, path } = splitUrl(url);

  if (PATH_NAMED_SCHEMES.includes(scheme)) {
    // Empty, '.' and '..' segments never reach the name, so it stays under the cache root
    const segments = path.split('/').filter((s) => s !== '' && s !== '.' && s !== '..');
    const name = segments.slice(-1 - ndir).join('/');
    if (name !== '' && !path.endsWith('/')) {
      return name;
    }
  }

  return encodeWholeUrl(url);
}

/**
 * Guess the actual URL inside a "pipe:" specification, e.g.
 * `pipe:curl -s -L https://host/shard-000.tar` → `https://host/shard-000.tar`.
 * Anything else, including a pipe spec without a recognizable URL, is
 * returned unchanged.
 */
export function pipeCleaner(spec: string): string {
  if (!spec.startsWith('pipe:')) {
    return spec;
  }
  const words = spec.slice('pipe:'.length).split(' ');
  return words.find((word) => PIPE_URL_RE.test(word)) ?? spec;
}

/** Cache name for a URL that may be wrapped in a "pipe:" command. */
export function pipeUrlToCacheName(url: string, ndir: number = 0): string {
  return urlToCacheName(pipeCleaner(url), ndir);
}
