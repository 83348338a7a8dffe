import { z } from "zod";

export const gapCategorySchema = z.object({
  id: z.string().min(1),
  priority: z.number().int(),
  keywords: z.array(z.string().min(1)).min(1),
  question: z.string().min(1)
});

export const lexiconSchema = z.object({
  symptoms: z.array(z.string().min(1)),
  tongue: z.array(z.string().min(1)),
  pulse: z.array(z.string().min(1)),
  zangfu: z.record(z.array(z.string().min(1))),
  organs: z.array(z.string().min(1)).min(1),
  compoundMarkers: z.array(z.string().min(1)),
  negations: z.array(z.string().min(1)),
  domains: z.object({
    digestive: z.array(z.string().min(1)),
    gynecological: z.array(z.string().min(1))
  }),
  gapCategories: z.array(gapCategorySchema)
});

export type Lexicon = z.infer<typeof lexiconSchema>;
export type GapCategory = z.infer<typeof gapCategorySchema>;
