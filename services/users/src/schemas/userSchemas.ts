import { z } from 'zod';
import { text } from '@geav/shared';

export const UserPayloadSchema = z.object({
  username: text(),
  password: text(),
  role: text(),
});

export type UserPayload = z.infer<typeof UserPayloadSchema>;
