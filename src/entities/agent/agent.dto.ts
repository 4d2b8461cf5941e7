import { z } from 'zod';

export const UpsertGlossaryTermSchema = z.object({
  description: z.string().trim().min(1),
  synonyms: z.array(z.string().trim().min(1)).default([])
});

export const DescribeAgentQuerySchema = z.object({
  tag: z.string().trim().min(1).optional()
});

export type DescribeAgentQuery = z.infer<typeof DescribeAgentQuerySchema>;

export type UpsertGlossaryTermRequest = z.infer<typeof UpsertGlossaryTermSchema>;
