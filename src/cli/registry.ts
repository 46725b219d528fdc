import { registerHandler, type HandlerRegistration } from './types';
import { AnalyzeSchema } from './schemas/analyzeSchemas';
import {
  GraphBlastSchema,
  GraphDependentsSchema,
  GraphListSchema,
  GraphSymbolSchema,
} from './schemas/graphSchemas';
import { handleAnalyze } from './handlers/analyzeHandlers';
import {
  handleGraphBlast,
  handleGraphDependents,
  handleGraphDeps,
  handleGraphShow,
  handleGraphTainted,
  handleGraphUnused,
} from './handlers/graphHandlers';

/**
 * Registry of all CLI command handlers
 *
 * Command keys follow the pattern:
 * - Top-level commands: 'analyze'
 * - Subcommands: 'graph:deps', 'graph:blast'
 */
export const cliHandlers: Record<string, HandlerRegistration> = {
  'analyze': registerHandler(AnalyzeSchema, handleAnalyze),
  'graph:show': registerHandler(GraphSymbolSchema, handleGraphShow),
  'graph:deps': registerHandler(GraphSymbolSchema, handleGraphDeps),
  'graph:dependents': registerHandler(GraphDependentsSchema, handleGraphDependents),
  'graph:blast': registerHandler(GraphBlastSchema, handleGraphBlast),
  'graph:unused': registerHandler(GraphListSchema, handleGraphUnused),
  'graph:tainted': registerHandler(GraphListSchema, handleGraphTainted),
};
