/**
 * Leveled diagnostics on stderr. stdout belongs to the image stream, so
 * nothing here ever writes there.
 */

export const LogLevel = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  ERROR: 3,
  SILENT: 4,
} as const;

export type LogLevel = typeof LogLevel[keyof typeof LogLevel];

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARNING,
  warning: LogLevel.WARNING,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

export function parseLogLevel(name: string): LogLevel | undefined {
  return LEVEL_NAMES[name.toLowerCase()];
}

export type LineWriter = (line: string) => void;

export class Logger {
  private static instance: Logger | undefined;
  private logLevel: LogLevel = LogLevel.INFO;

  constructor(private writeLine: LineWriter = (line) => console.error(line)) {}

  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  public get level(): LogLevel {
    return this.logLevel;
  }

  public setLogLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  private log(level: LogLevel, line: string): void {
    if (level < this.logLevel) return;
    this.writeLine(line);
  }

  // ===== LEVELS =====

  public debug(message: string): void {
    this.log(LogLevel.DEBUG, `[debug] ${message}`);
  }

  public info(message: string): void {
    this.log(LogLevel.INFO, message);
  }

  public warning(message: string): void {
    this.log(LogLevel.WARNING, `warning: ${message}`);
  }

  public error(message: string): void {
    this.log(LogLevel.ERROR, `error: ${message}`);
  }

  // ===== RENDER PROGRESS =====

  public scanlinesRemaining(remaining: number): void {
    this.info(`Scanlines remaining: ${remaining}`);
  }

  public done(elapsedMs: number): void {
    this.info(`Done. (${(elapsedMs / 1000).toFixed(1)}s)`);
  }
}
