import type { Context } from 'hono';
import { BadRequestError } from './errors';

/**
 * JSON request body, or an empty object when the body is empty
 */
export async function readJsonBody(c: Context): Promise<unknown> {
  const text = await c.req.text();
  if (!text.trim()) return {};

  try {
    return JSON.parse(text);
  } catch {
    throw new BadRequestError('Request body must be valid JSON');
  }
}
