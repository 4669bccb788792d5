import { z } from 'zod/v4';

import { parsePayload } from './parse.js';

export interface User {
  name: string;
}

const usersListSchema = z.looseObject({
  sl_users_list: z.array(z.looseObject({ name: z.string() }))
});

export function parseUsers(payload: unknown): User[] {
  const data = parsePayload(usersListSchema, payload, 'sl_users_list_resp');
  return data.sl_users_list.map((user) => ({ name: user.name }));
}
