export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/* Console logger with timestamps; messages below the configured level are dropped */
class Logger {
  private threshold: number = LOG_LEVELS.indexOf('info');

  setLevel(level: LogLevel) {
    this.threshold = LOG_LEVELS.indexOf(level);
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= this.threshold;
  }

  debug(message: string, meta?: Record<string, unknown>) {
    if (!this.isEnabled('debug')) return;
    console.debug(`[DEBUG] ${new Date().toISOString()} - ${message}`, meta ?? '');
  }

  info(message: string, meta?: Record<string, unknown>) {
    if (!this.isEnabled('info')) return;
    console.log(`[INFO] ${new Date().toISOString()} - ${message}`, meta ?? '');
  }

  warn(message: string, meta?: Record<string, unknown>) {
    if (!this.isEnabled('warn')) return;
    console.warn(`[WARN] ${new Date().toISOString()} - ${message}`, meta ?? '');
  }

  error(message: string, meta?: unknown) {
    console.error(`[ERROR] ${new Date().toISOString()} - ${message}`, meta ?? '');
  }
}

export const logger = new Logger();
