enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  info: LogLevel.INFO,
  debug: LogLevel.DEBUG,
};

const MASK = '********';

/**
 * LOG_VERBOSITY takes a number (0-3) or a level name; anything else falls
 * back to errors and warnings.
 */
export function parseVerbosity(raw: string | undefined): number {
  if (!raw) {
    return LogLevel.WARN;
  }
  const name = raw.trim().toLowerCase();
  if (Object.hasOwn(LEVEL_NAMES, name)) {
    return LEVEL_NAMES[name];
  }
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? LogLevel.WARN : parsed;
}

export class Logger {
  private static dayHeaderPrinted = false;
  private static secrets = new Set<string>();

  private static get verbosity(): number {
    return parseVerbosity(process.env.LOG_VERBOSITY);
  }

  private static printDayHeaderIfNeeded(): void {
    if (!this.dayHeaderPrinted) {
      const day = new Date().toISOString().split('T')[0];
      console.log(`\n===== bgscreen ${day} =====`);
      this.dayHeaderPrinted = true;
    }
  }

  private static formatTime(): string {
    return new Date().toTimeString().split(' ')[0]; // HH:MM:SS
  }

  /**
   * Registers a value that must never appear in a log line, such as a
   * vendor password echoed back in an error body.
   */
  static addSecret(value: string): void {
    if (value.length > 0) {
      this.secrets.add(value);
    }
  }

  static mask(text: string): string {
    let masked = text;
    for (const secret of this.secrets) {
      masked = masked.split(secret).join(MASK);
    }
    return masked;
  }

  static isDebugEnabled(): boolean {
    return this.verbosity >= LogLevel.DEBUG;
  }

  private static emit(write: (...data: unknown[]) => void, tag: string, message: string, args: unknown[]): void {
    this.printDayHeaderIfNeeded();
    const safeArgs = args.map(arg => (typeof arg === 'string' ? this.mask(arg) : arg));
    write(`${this.formatTime()} [${tag}] ${this.mask(message)}`, ...safeArgs);
  }

  static info(message: string, ...args: unknown[]): void {
    if (this.verbosity >= LogLevel.INFO) {
      this.emit(console.log, 'INFO', message, args);
    }
  }

  static warn(message: string, ...args: unknown[]): void {
    if (this.verbosity >= LogLevel.WARN) {
      this.emit(console.warn, 'WARN', message, args);
    }
  }

  static error(message: string, ...args: unknown[]): void {
    this.emit(console.error, 'ERROR', message, args);
  }

  static debug(message: string, ...args: unknown[]): void {
    if (this.verbosity >= LogLevel.DEBUG) {
      this.emit(console.log, 'DEBUG', message, args);
    }
  }
}
