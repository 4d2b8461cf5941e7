import { z } from 'zod';

export const CreateSessionSchema = z.object({
  customerId: z.string().trim().min(1),
  tags: z.array(z.string().trim().min(1)).default([])
});

export const SendMessageSchema = z.object({
  message: z.string().trim().min(1).max(4000)
});

export type CreateSessionRequest = z.infer<typeof CreateSessionSchema>;
export type SendMessageRequest = z.infer<typeof SendMessageSchema>;
