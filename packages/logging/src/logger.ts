/**
 * Tagged line logger. Every line goes to stderr as `[tag] message key=value`,
 * prefixed with the level for anything other than info, so stdout stays free
 * for command output.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, string | number | boolean | null | undefined>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  /** Logger for a sub-component, tagged `parent:child`. */
  child(tag: string): Logger;
}

export interface LoggerOptions {
  /** Minimum level written. Defaults to LOG_LEVEL, then 'info'. */
  level?: LogLevel;
  /** Line sink; defaults to process.stderr. */
  write?: (line: string) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/** Reads LOG_LEVEL; unknown values fall back to 'info'. */
export function resolveLogLevel(raw: string | undefined = process.env.LOG_LEVEL): LogLevel {
  const normalized = (raw ?? '').trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : 'info';
}

function formatFields(fields: LogFields | undefined): string {
  if (fields === undefined) return '';
  const parts: string[] = [];
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    const text = String(value);
    parts.push(/\s/.test(text) ? `${key}=${JSON.stringify(text)}` : `${key}=${text}`);
  }
  return parts.length > 0 ? ` ${parts.join(' ')}` : '';
}

export function createLogger(tag: string, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? resolveLogLevel()];
  const write = options.write ?? ((line: string) => void process.stderr.write(line));

  function emit(level: LogLevel, message: string, fields?: LogFields): void {
    if (LEVEL_ORDER[level] < threshold) return;
    const prefix = level === 'info' ? '' : `${level.toUpperCase()} `;
    write(`${prefix}[${tag}] ${message}${formatFields(fields)}\n`);
  }

  return {
    debug: (message, fields) => emit('debug', message, fields),
    info: (message, fields) => emit('info', message, fields),
    warn: (message, fields) => emit('warn', message, fields),
    error: (message, fields) => emit('error', message, fields),
    child: (childTag) => createLogger(`${tag}:${childTag}`, options),
  };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
