import { ENV_LOG_LEVEL } from './constants';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export type LogSink = (line: string) => void;

export class Logger {
  private static level: LogLevel = 'info';
  private static sink: LogSink = (line) => process.stderr.write(line + '\n');

  public static activate(options: { level?: LogLevel; sink?: LogSink; env?: NodeJS.ProcessEnv } = {}): void {
    const fromEnv = Logger.parseLevel(options.env?.[ENV_LOG_LEVEL]);
    this.level = options.level ?? fromEnv ?? 'info';
    if (options.sink) {
      this.sink = options.sink;
    }
  }

  public static setLevel(level: LogLevel): void {
    this.level = level;
  }

  public static get currentLevel(): LogLevel {
    return this.level;
  }

  public static parseLevel(value: string | undefined): LogLevel | undefined {
    if (!value) return undefined;
    const normalized = value.trim().toLowerCase();
    if (normalized === 'trace') return 'debug';
    if (normalized === 'warning') return 'warn';
    return isLogLevel(normalized) ? normalized : undefined;
  }

  public static debug(message: string): void {
    this.log('debug', message);
  }

  public static info(message: string): void {
    this.log('info', message);
  }

  public static warn(message: string): void {
    this.log('warn', message);
  }

  public static error(message: string, error?: unknown): void {
    this.log('error', message);
    if (error && this.enabled('error')) {
      if (error instanceof Error) {
        // Stacks only at debug level; the message line already carries the cause
        const detail = this.enabled('debug') ? error.stack || error.message : error.message;
        this.sink(`      Detail: ${detail}`);
      } else {
        this.sink(`      Detail: ${String(error)}`);
      }
    }
  }

  private static enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private static log(level: Exclude<LogLevel, 'silent'>, message: string): void {
    if (!this.enabled(level)) return;
    const time = new Date().toLocaleTimeString();
    this.sink(`[${time}] [${level.toUpperCase()}] ${message}`);
  }
}
