import { z } from 'zod';

export const GlossaryTermSchema = z.object({
  name: z.string().min(1),
  description: z.string().min(1),
  synonyms: z.array(z.string().min(1)).default([])
});

export type GlossaryTermInput = z.input<typeof GlossaryTermSchema>;
export type GlossaryTerm = Readonly<z.infer<typeof GlossaryTermSchema>>;
