export type LogLevel = 'info' | 'warn' | 'error' | 'success';

const PREFIXES: Record<LogLevel, string> = {
  info: 'ℹ️',
  warn: '⚠️',
  error: '❌',
  success: '✅',
};

/**
 * Logger utility for structured logging.
 * Writes to stderr so stdout only carries command output.
 */
export class Logger {
  constructor(private jsonMode = false) {}

  get json(): boolean {
    return this.jsonMode;
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  success(message: string, data?: Record<string, unknown>): void {
    this.log('success', message, data);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    const timestamp = new Date().toISOString();

    if (this.jsonMode) {
      const logEntry = {
        timestamp,
        level,
        message,
        ...data,
      };
      console.error(JSON.stringify(logEntry));
    } else {
      const formattedData = data ? ` ${JSON.stringify(data, null, 2)}` : '';
      console.error(`${PREFIXES[level]} ${message}${formattedData}`);
    }
  }
}
