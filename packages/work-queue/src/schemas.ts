import { z } from 'zod/v4';

export const workItemSchema = z.object({
  id: z.string().min(1),
  refs: z.array(z.string()),
  createdAt: z.string(),
});

export const leaseSchema = z.object({
  workItemId: z.string().min(1),
  ownerId: z.string().min(1),
  acquiredAt: z.number(),
  expiresAt: z.number(),
  attempt: z.number().int().min(1),
});

