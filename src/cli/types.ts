import { z, type ZodType, type ZodTypeDef } from 'zod';
import { createLogger } from '../core/log';

/**
 * Standard CLI result interface for successful operations
 *
 * Agent-readable output format:
 * - ok: boolean indicating success/failure
 * - command: the command that was executed
 * - timestamp: ISO 8601 timestamp
 * - duration_ms: execution time in milliseconds
 * - everything else: command-specific result data
 */
export interface CLIResult {
  ok: true;
  command?: string;
  timestamp?: string;
  duration_ms?: number;
  [key: string]: unknown;
}

/**
 * Standard CLI error interface
 *
 * - ok: always false
 * - reason: machine-readable error code
 * - message: human-readable error description
 * - hint: optional suggestion for resolution
 */
export interface CLIError {
  ok: false;
  reason: string;
  message?: string;
  command?: string;
  timestamp?: string;
  hint?: string;
  [key: string]: unknown;
}

/**
 * CLI handler function signature
 * @template TInput - Validated input type (from Zod schema)
 */
export type CLIHandler<TInput> = (input: TInput) => Promise<CLIResult | CLIError>;

/** Schema + handler, with the input type erased so registrations can share one map. */
export interface HandlerRegistration {
  run(rawInput: unknown): Promise<CLIResult | CLIError>;
}

/** Bind a handler to the schema that validates its raw Commander input. Throws ZodError on bad input. */
export function registerHandler<TInput>(
  schema: ZodType<TInput, ZodTypeDef, unknown>,
  handler: CLIHandler<TInput>,
): HandlerRegistration {
  return {
    run: async (rawInput) => handler(schema.parse(rawInput)),
  };
}

/**
 * Common error reasons for consistent agent handling
 */
export const ErrorReasons = {
  NO_INPUT: 'no_input',
  ANALYSIS_FAILED: 'analysis_failed',
  SYMBOL_NOT_FOUND: 'symbol_not_found',
  LOAD_FAILED: 'load_failed',
  EXPORT_FAILED: 'export_failed',
  VALIDATION_ERROR: 'validation_error',
  INTERNAL_ERROR: 'internal_error',
  UNKNOWN_COMMAND: 'unknown_command',
} as const;

/**
 * Common hints for error resolution
 */
export const ErrorHints = {
  NO_INPUT: 'Point --path at a directory containing .v files (compile them first for --mode metadata)',
  ANALYSIS_FAILED: 'Every file failed to scan; see diagnostics for the per-file errors',
  SYMBOL_NOT_FOUND: 'Use a qualified name, or run "proof-deps analyze --symbols" to list names',
  LOAD_FAILED: 'Re-create the export with "proof-deps analyze --out <file>"',
  VALIDATION_ERROR: 'Check command syntax with --help',
} as const;

// Reasons caused by the invocation itself rather than by the project being analyzed.
const USAGE_REASONS: ReadonlySet<string> = new Set([
  ErrorReasons.VALIDATION_ERROR,
  ErrorReasons.INTERNAL_ERROR,
  ErrorReasons.UNKNOWN_COMMAND,
]);

/**
 * Validate raw input and run the registered handler. Never throws: failures
 * come back as error envelopes.
 */
export async function runHandler(commandKey: string, rawInput: unknown): Promise<CLIResult | CLIError> {
  const { cliHandlers } = await import('./registry');
  const registration = cliHandlers[commandKey];
  if (!registration) {
    return error(ErrorReasons.UNKNOWN_COMMAND, {
      message: `Unknown command: ${commandKey}`,
      hint: 'Run "proof-deps --help" to see available commands',
    });
  }

  try {
    return await registration.run(rawInput);
  } catch (e) {
    if (e instanceof z.ZodError) {
      const errors = e.issues.map((err: z.ZodIssue) => ({
        path: err.path.join('.'),
        message: err.message,
        code: err.code,
      }));
      return error(ErrorReasons.VALIDATION_ERROR, {
        message: 'Invalid command arguments',
        errors,
        hint: ErrorHints.VALIDATION_ERROR,
      });
    }

    const errorDetails = e instanceof Error
      ? { name: e.name, message: e.message, stack: e.stack }
      : { message: String(e) };
    createLogger({ component: 'cli', cmd: commandKey }).error(commandKey, { ok: false, err: errorDetails });

    return error(ErrorReasons.INTERNAL_ERROR, {
      message: e instanceof Error ? e.message : String(e),
      hint: 'An unexpected error occurred. Check logs for details.',
    });
  }
}

/** 0 on success, 1 for usage and internal errors, 2 when the command ran but reported a failure. */
export function exitCodeFor(result: CLIResult | CLIError): number {
  if (result.ok) return 0;
  return USAGE_REASONS.has(result.reason) ? 1 : 2;
}

/**
 * Execute a CLI handler, print its envelope and exit.
 *
 * @example
 * ```typescript
 * .action(async (name, options) => {
 *   await executeHandler('graph:deps', { name, ...options });
 * })
 * ```
 */
export async function executeHandler(commandKey: string, rawInput: unknown): Promise<void> {
  const startedAt = Date.now();
  const timestamp = new Date().toISOString();
  const result = await runHandler(commandKey, rawInput);
  const envelope = {
    ...result,
    command: commandKey,
    timestamp,
    duration_ms: Date.now() - startedAt,
  };

  if (result.ok) {
    console.log(formatCLIResult(envelope));
  } else {
    process.stderr.write(formatCLIResult(envelope) + '\n');
  }
  process.exit(exitCodeFor(result));
}

export function formatCLIResult(result: CLIResult | CLIError): string {
  return JSON.stringify(result, null, 2);
}

/**
 * Create a success result
 */
export function success(data: Record<string, unknown>): CLIResult {
  return {
    ok: true,
    ...data,
  };
}

/**
 * Create an error result
 */
export function error(reason: string, details?: Record<string, unknown>): CLIError {
  return {
    ok: false,
    reason,
    ...details,
  };
}
