export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** A configured threshold; `silent` drops every record. */
export type LogThreshold = LogLevel | 'silent';

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/** Receives one serialized record, without the trailing newline. */
export type LogSink = (line: string) => void;

export interface LoggerOptions {
  /** Defaults to `PROOF_DEPS_LOG_LEVEL`, then `LOG_LEVEL`, then `info`. */
  level?: LogThreshold;
  /** Defaults to stderr. */
  sink?: LogSink;
}

export function parseLogThreshold(raw: string | undefined): LogThreshold {
  const value = String(raw ?? '').trim().toLowerCase();
  if (value === 'silent' || value === 'off' || value === 'none' || value === '0') return 'silent';
  if (value === 'debug' || value === 'info' || value === 'warn' || value === 'error') return value;
  return 'info';
}

function thresholdFromEnv(): LogThreshold {
  return parseLogThreshold(process.env.PROOF_DEPS_LOG_LEVEL ?? process.env.LOG_LEVEL);
}

const stderrSink: LogSink = (line) => {
  process.stderr.write(line + '\n');
};

export function serializeError(e: unknown): { name?: string; message?: string; stack?: string } | undefined {
  if (!e) return undefined;
  if (e instanceof Error) return { name: e.name, message: e.message, stack: e.stack };
  return { message: String(e) };
}

export interface Logger {
  debug(msg: string, fields?: Record<string, unknown>): void;
  info(msg: string, fields?: Record<string, unknown>): void;
  warn(msg: string, fields?: Record<string, unknown>): void;
  error(msg: string, fields?: Record<string, unknown>): void;
  child(fields: Record<string, unknown>): Logger;
  /**
   * Run `fn` and log one record named `name` with its duration. `summarize`
   * adds fields derived from the result.
   */
  span<T>(
    name: string,
    fields: Record<string, unknown>,
    fn: () => Promise<T>,
    summarize?: (out: T) => Record<string, unknown>,
  ): Promise<T>;
}

export function createLogger(baseFields: Record<string, unknown> = {}, options: LoggerOptions = {}): Logger {
  const configured = options.level ?? thresholdFromEnv();
  const threshold = configured === 'silent' ? Infinity : levelOrder[configured];
  const sink = options.sink ?? stderrSink;

  const write = (level: LogLevel, msg: string, fields?: Record<string, unknown>): void => {
    if (levelOrder[level] < threshold) return;
    sink(JSON.stringify({ ts: new Date().toISOString(), level, msg, ...baseFields, ...(fields ?? {}) }));
  };

  const span = async <T>(
    name: string,
    fields: Record<string, unknown>,
    fn: () => Promise<T>,
    summarize?: (out: T) => Record<string, unknown>,
  ): Promise<T> => {
    const startedAt = Date.now();
    const out = await fn().catch((e: unknown) => {
      write('error', name, { ...fields, ok: false, duration_ms: Date.now() - startedAt, err: serializeError(e) });
      throw e;
    });
    write('info', name, { ...fields, ...(summarize ? summarize(out) : {}), ok: true, duration_ms: Date.now() - startedAt });
    return out;
  };

  return {
    debug: (msg, fields) => write('debug', msg, fields),
    info: (msg, fields) => write('info', msg, fields),
    warn: (msg, fields) => write('warn', msg, fields),
    error: (msg, fields) => write('error', msg, fields),
    child: (fields) => createLogger({ ...baseFields, ...fields }, { level: configured, sink }),
    span,
  };
}
