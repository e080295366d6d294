import { z } from 'zod';

const BYTE_UNITS: Record<string, number> = {
  '': 1,
  k: 1024,
  m: 1024 ** 2,
  g: 1024 ** 3,
  t: 1024 ** 4,
};

/**
 * Parse a byte count such as `1e18`, `500000` or `10G` (binary units,
 * optional `iB`/`B` suffix). Returns null for anything else.
 */
export function parseByteSize(value: string | number): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? value : null;
  }
  const match = /^\s*(\d+(?:\.\d+)?(?:e\d+)?)\s*([kmgt]?)(?:i?b)?\s*$/i.exec(value);
  if (!match) {
    return null;
  }
  return Math.floor(Number(match[1]) * BYTE_UNITS[match[2].toLowerCase()]);
}

const byteSizeSchema = z
  .union([z.number(), z.string()])
  .transform((value, ctx) => {
    const parsed = parseByteSize(value);
    if (parsed === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid cache size: "${value}"` });
      return z.NEVER;
    }
    return parsed;
  });

const flagSchema = z.preprocess(
  (value) => (typeof value === 'string' ? ['1', 'true', 'yes'].includes(value.trim().toLowerCase()) : value),
  z.boolean(),
);

export const DEFAULT_CACHE_DIR = './_cache';
export const DEFAULT_CACHE_SIZE = 1e18;

export const cacheConfigSchema = z
  .object({
    cacheDir: z.string().min(1).default(DEFAULT_CACHE_DIR),
    cacheSize: byteSizeSchema.default(DEFAULT_CACHE_SIZE),
    verbose: flagSchema.default(false),
    cleanupIntervalSeconds: z.coerce.number().nonnegative().default(30),
    timeoutSeconds: z.coerce.number().positive().default(300),
    maxAttempts: z.coerce.number().int().positive().default(10),
  })
  .strict();

export type CacheConfig = z.infer<typeof cacheConfigSchema>;
