import type { Context } from 'hono';
import type { ZodError } from 'zod';

/**
 * zValidator hook: 400 with the zod issues when the request does not match its schema
 */
export function validationFailed(result: { success: boolean; error?: ZodError }, c: Context) {
  if (!result.success && result.error) {
    return c.json({ error: 'Validation failed', issues: result.error.issues }, 400);
  }
}
