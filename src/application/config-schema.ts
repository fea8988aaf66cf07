import { z } from 'zod';

/** Positive integer; numeric strings such as `"25"` are accepted. */
export const maxEntriesSchema = z.preprocess(
  (v) => (typeof v === 'string' && v.trim() !== '' ? Number(v) : v),
  z.number().int().positive(),
);

/** UI sub-path below the console root; a missing leading `/` is added. */
export const uiPathSchema = z.string()
  .trim()
  .min(1)
  .transform((v) => (v.startsWith('/') ? v : `/${v}`))
  .pipe(z.string().min(2));
