/**
 * Shared logger for the mailroom MCP servers.
 * Every level goes to stderr: stdout carries the MCP JSON-RPC stream.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * JSON replacer for Error values, whose own properties are not enumerable.
 */
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    const obj: Record<string, unknown> = { name: value.name, message: value.message };
    if ('code' in value) obj.code = value.code;
    if (value.stack) obj.stack = value.stack;
    return obj;
  }
  return value;
}

export class Logger {
  private level: LogLevel;
  private context: string;

  constructor(context: string = 'mailroom', level?: LogLevel) {
    this.context = context;
    const envLevel = process.env.LOG_LEVEL;
    this.level = level ?? (isLogLevel(envLevel) ? envLevel : 'info');
  }

  private write(level: LogLevel, message: string, data?: unknown): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.level]) return;

    let line = `[${new Date().toISOString()}] [${level.toUpperCase()}] [${this.context}] ${message}`;
    if (data !== undefined) {
      line += ` ${JSON.stringify(data, errorReplacer)}`;
    }
    console.error(line);
  }

  debug(message: string, data?: unknown): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.write('error', message, data);
  }

  /**
   * Logger for a sub-component, e.g. `foi:triage`. Inherits the current level.
   */
  child(context: string): Logger {
    return new Logger(`${this.context}:${context}`, this.level);
  }

  setContext(context: string): void {
    this.context = context;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

/** Default logger instance */
export const logger = new Logger();
