import type { Readable } from 'node:stream';

/**
 * A URL to fetch, either bare or carried in a record with pass-through
 * metadata (e.g. the key of the sample the shard belongs to).
 */
export type UrlRecord = { url: string } & Record<string, unknown>;
export type UrlRequest = string | UrlRecord;

/** Capability that opens a readable byte stream for a URL. */
export interface Transport {
  openStream(url: string): Promise<Readable>;
}

/** Decides whether to keep going (true) or stop the whole sequence (false). */
export type ErrorHandler = (error: unknown) => boolean;

/** Maps a URL to a path relative to the cache root. */
export type UrlToName = (url: string) => string;

export interface OpenedFile {
  stream: Readable;
  /** Local file backing the stream; null when it was opened straight from the transport. */
  localPath: string | null;
}

/** Anything that can turn a URL into an opened stream. */
export interface FileOpener {
  openFile(url: string): Promise<OpenedFile>;
}

/** An opened stream plus the metadata of the request it came from. */
export interface OpenStreamResult {
  [key: string]: unknown;
  url: string;
  stream: Readable;
  localPath: string | null;
}

/**
 * A file discovered under the cache root. Timestamps are in ms since epoch.
 */
export interface CacheEntry {
  path: string;
  relativePath: string;
  size: number;
  atimeMs: number;
  mtimeMs: number;
  ctimeMs: number;
}

/** Orders cache entries for eviction; larger means more recent. */
export type RecencyKey = (entry: CacheEntry) => number;

export interface SweepReport {
  /** False when the sweep was skipped (interval not elapsed or no cache dir). */
  ran: boolean;
  totalBytes: number;
  remainingBytes: number;
  deleted: string[];
}
