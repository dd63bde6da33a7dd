import { LogLevel, type Logger } from '../types/index.js';

const RANK: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3
};

function renderMeta(meta: unknown): string {
  if (meta instanceof Error) {
    return meta.stack ?? `${meta.name}: ${meta.message}`;
  }
  return typeof meta === 'object' && meta !== null ? JSON.stringify(meta) : String(meta);
}

/**
 * Leveled logger. Every line goes to stderr so command output on stdout
 * stays machine-readable.
 */
export class ConsoleLogger implements Logger {
  constructor(
    private level: LogLevel = LogLevel.INFO,
    private readonly clock: () => Date = () => new Date()
  ) {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  debug(message: string, meta?: unknown): void {
    this.write(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write(LogLevel.WARN, message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write(LogLevel.ERROR, message, meta);
  }

  private write(level: LogLevel, message: string, meta: unknown): void {
    if (RANK[level] < RANK[this.level]) return;
    const line = `${this.clock().toISOString()} [${level.toUpperCase()}] ${message}`;
    console.error(meta === undefined ? line : `${line} ${renderMeta(meta)}`);
  }
}

export const logger = new ConsoleLogger(
  process.env.MONOVERSION_VERBOSE === '1'
    ? LogLevel.DEBUG
    : process.env.NODE_ENV === 'development'
      ? LogLevel.INFO
      : LogLevel.ERROR
);
