import pino from 'pino';
import { z } from 'zod';
import { formatTimestamp, renderValue } from '../../application/index.js';

const pinoRecordSchema = z.object({
  level: z.number(),
  time: z.number(),
  msg: z.string().optional(),
  component: z.string().optional(),
  err: z.object({ message: z.string() }).passthrough().optional(),
}).passthrough();

/** Keys printed in fixed positions or dropped from the line. */
const FIXED_KEYS = new Set(['level', 'time', 'msg', 'component', 'err', 'pid', 'hostname', 'v']);

/**
 * Formats one pino JSON record as a console line:
 *
 *     2026-10-18 14:03:07 INFO  [DevConsoleService] Dev console started url="/dev-console/ui"
 *
 * Throws on anything that is not a pino record.
 */
export function formatLogRecord(record: unknown): string {
  const parsed = pinoRecordSchema.parse(record);

  const label = (pino.levels.labels[parsed.level] ?? String(parsed.level)).toUpperCase();
  const parts = [
    formatTimestamp(new Date(parsed.time)),
    label.padEnd(5),
    `[${parsed.component ?? 'app'}]`,
  ];
  if (parsed.msg !== undefined && parsed.msg !== '') parts.push(parsed.msg);

  for (const [key, value] of Object.entries(parsed)) {
    if (FIXED_KEYS.has(key)) continue;
    parts.push(`${key}=${typeof value === 'string' ? JSON.stringify(value) : renderValue(value)}`);
  }

  if (parsed.err !== undefined) parts.push(`err=${JSON.stringify(parsed.err.message)}`);

  return parts.join(' ');
}
