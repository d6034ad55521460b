export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  /** Where formatted lines go. Defaults to stderr so stdout stays free for findings and patches. */
  sink?: (line: string) => void;
  /** Fixed clock for reproducible output. */
  now?: () => Date;
  scope?: string;
}

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export class Logger {
  constructor(private opts: LoggerOptions = {}) {}

  get level(): LogLevel {
    return this.opts.level ?? 'info';
  }

  debug(message: string, data?: unknown) {
    this.log('debug', message, data);
  }
  info(message: string, data?: unknown) {
    this.log('info', message, data);
  }
  warn(message: string, data?: unknown) {
    this.log('warn', message, data);
  }
  error(message: string, data?: unknown) {
    this.log('error', message, data);
  }

  /** Logger sharing this one's settings that prefixes every message with `[scope]`. */
  child(scope: string): Logger {
    const prefix = this.opts.scope ? `${this.opts.scope}:${scope}` : scope;
    return new Logger({ ...this.opts, scope: prefix });
  }

  private log(level: LogLevel, message: string, data?: unknown) {
    if (levelRank[level] < levelRank[this.level]) return;

    const timestamp = (this.opts.now?.() ?? new Date()).toISOString();
    if (this.opts.scope) message = `[${this.opts.scope}] ${message}`;
    const write = this.opts.sink ?? ((line: string) => process.stderr.write(`${line}\n`));

    if (this.opts.json) {
      write(JSON.stringify({ timestamp, level, message, data }));
      return;
    }

    const line = data === undefined ? `${timestamp} ${level} ${message}` : `${timestamp} ${level} ${message} ${safeJson(data)}`;
    write(line);
  }
}

/** Logger that drops everything; the default for library callers that pass none. */
export const silentLogger = new Logger({ level: 'error', sink: () => {} });

function safeJson(v: unknown): string {
  try {
    return JSON.stringify(v);
  } catch {
    return '"[unserializable]"';
  }
}
