import { z } from 'zod';

export const modeEnum = z.enum(['auto', 'heuristic', 'metadata']);

export const unterminatedEnum = z.enum(['unterminated', 'proved']);

/** Where a graph comes from: a fresh analysis of `path`, or a previous export given by `from`. */
export const GraphSourceSchema = z.object({
  path: z.string().default('.'),
  mode: modeEnum.default('auto'),
  globDir: z.string().optional(),
  from: z.string().optional(),
  workers: z.coerce.number().int().positive().optional(),
  batchSize: z.coerce.number().int().positive().optional(),
  unterminated: unterminatedEnum.optional(),
  maxStatementLength: z.coerce.number().int().positive().optional(),
});

export type GraphSourceInput = z.infer<typeof GraphSourceSchema>;

export const AnalyzeSchema = GraphSourceSchema.extend({
  out: z.string().optional(),
  symbols: z.boolean().default(false),
});

export type AnalyzeInput = z.infer<typeof AnalyzeSchema>;
