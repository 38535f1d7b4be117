export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let currentLevel: LogLevel = 'info';

/** Set the minimum level written by every logger. */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Leveled logger writing single lines to stderr:
 *   [PhishScope] WARN [scan-cache] message: cause
 */
export class Logger {
  constructor(private readonly scope: string) {}

  debug(message: string, error?: unknown): void {
    this.write('debug', message, error);
  }

  info(message: string, error?: unknown): void {
    this.write('info', message, error);
  }

  warn(message: string, error?: unknown): void {
    this.write('warn', message, error);
  }

  error(message: string, error?: unknown): void {
    this.write('error', message, error);
  }

  private write(level: LogLevel, message: string, error?: unknown): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;

    const cause = error === undefined ? '' : `: ${errorMessage(error)}`;
    process.stderr.write(`[PhishScope] ${level.toUpperCase()} [${this.scope}] ${message}${cause}\n`);
  }
}

export function createLogger(scope: string): Logger {
  return new Logger(scope);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
