import { z } from 'zod';

export const sessionCreateSchema = z.object({
  requestToken: z.string().trim().min(1, 'requestToken is required')
});

export type SessionCreate = z.infer<typeof sessionCreateSchema>;
