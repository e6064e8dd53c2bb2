export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFields = Record<string, unknown>;

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * JSON-lines logger. Fields bound with `child()` are merged into every
 * entry; Error values are flattened to their name and message.
 */
export class Logger {
  constructor(
    private readonly level: LogLevel = 'info',
    private readonly bound: LogFields = {},
    private readonly write: (line: string) => void = (line) => process.stdout.write(line)
  ) {}

  child(fields: LogFields): Logger {
    return new Logger(this.level, { ...this.bound, ...fields }, this.write);
  }

  debug(msg: string, data?: LogFields): void {
    this.log('debug', msg, data);
  }

  info(msg: string, data?: LogFields): void {
    this.log('info', msg, data);
  }

  warn(msg: string, data?: LogFields): void {
    this.log('warn', msg, data);
  }

  error(msg: string, data?: LogFields): void {
    this.log('error', msg, data);
  }

  private log(level: LogLevel, msg: string, data?: LogFields): void {
    if (LEVELS[level] < LEVELS[this.level]) return;
    const entry = {
      timestamp: new Date().toISOString(),
      level,
      msg,
      ...this.bound,
      ...serialize(data),
    };
    this.write(JSON.stringify(entry) + '\n');
  }
}

function serialize(data: LogFields | undefined): LogFields {
  if (!data) return {};
  const out: LogFields = {};
  for (const [key, value] of Object.entries(data)) {
    out[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return out;
}
