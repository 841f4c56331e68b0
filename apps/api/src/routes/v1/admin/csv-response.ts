import type { Context } from 'hono';
import { bodyLimit } from 'hono/body-limit';

const MAX_UPLOAD_BYTES = 5 * 1024 * 1024;

export const uploadLimit = bodyLimit({
  maxSize: MAX_UPLOAD_BYTES,
  onError: (c) => c.json({ error: 'Upload exceeds the 5 MB limit' }, 413),
});

export function csvAttachment(c: Context, csv: string, filename: string) {
  c.header('Content-Type', 'text/csv; charset=utf-8');
  c.header('Content-Disposition', `attachment; filename="${filename.replace(/["\\\r\n]/g, '_')}"`);
  return c.body(csv);
}
