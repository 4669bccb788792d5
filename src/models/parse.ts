import type { z } from 'zod/v4';

import { CameDomoticError } from '../errors.js';

export function parsePayload<T extends z.ZodType>(schema: T, payload: unknown, what: string): z.output<T> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    const fields = result.error.issues.map((issue) => issue.path.map(String).join('.') || '(root)');
    throw new CameDomoticError('PROTOCOL', `Unexpected ${what} payload (${fields.join(', ')})`, {
      cause: result.error,
      details: { fields }
    });
  }
  return result.data;
}

/** The `array` list that every `*_list_resp` carries. */
export function listItems(payload: Record<string, unknown>, what: string): unknown[] {
  const items = payload.array;
  if (!Array.isArray(items)) {
    throw new CameDomoticError('PROTOCOL', `Unexpected ${what} payload (array)`, { details: { fields: ['array'] } });
  }
  return items;
}
