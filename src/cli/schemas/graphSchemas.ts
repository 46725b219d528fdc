import { z } from 'zod';
import { GraphSourceSchema } from './analyzeSchemas';

export const GraphSymbolSchema = GraphSourceSchema.extend({
  name: z.string().min(1, 'Symbol name is required'),
});

export type GraphSymbolInput = z.infer<typeof GraphSymbolSchema>;

export const GraphDependentsSchema = GraphSymbolSchema.extend({
  transitive: z.boolean().default(false),
});

export type GraphDependentsInput = z.infer<typeof GraphDependentsSchema>;

export const GraphBlastSchema = GraphSourceSchema.extend({
  name: z.string().min(1).optional(),
  limit: z.coerce.number().int().positive().default(50),
});

export type GraphBlastInput = z.infer<typeof GraphBlastSchema>;

export const GraphListSchema = GraphSourceSchema.extend({
  limit: z.coerce.number().int().positive().default(500),
});

export type GraphListInput = z.infer<typeof GraphListSchema>;
