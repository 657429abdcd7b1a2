/**
 * Logger for qemucfg
 *
 * Progress messages from library code. Human mode prints to the console;
 * JSON mode records the messages so the CLI can emit them in its single
 * JSON result instead of interleaving text with it.
 */

/**
 * Output mode for the logger
 */
export type OutputMode = 'human' | 'json';

/**
 * Log level for messages
 */
export type LogLevel = 'info' | 'success' | 'warning' | 'error';

/**
 * A message recorded in JSON mode
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
}

/**
 * Logger class supporting human-readable and JSON output modes.
 */
export class Logger {
  private mode: OutputMode;
  private entries: LogEntry[] = [];

  constructor(mode: OutputMode = 'human') {
    this.mode = mode;
  }

  /**
   * Get the current output mode.
   */
  getMode(): OutputMode {
    return this.mode;
  }

  success(message: string): void {
    this.log('success', message);
  }

  info(message: string): void {
    this.log('info', message);
  }

  warning(message: string): void {
    this.log('warning', message);
  }

  error(message: string): void {
    this.log('error', message);
  }

  /**
   * Messages recorded so far in JSON mode.
   */
  getEntries(): readonly LogEntry[] {
    return this.entries;
  }

  private log(level: LogLevel, message: string): void {
    if (this.mode === 'json') {
      this.entries.push({ level, message });
      return;
    }

    switch (level) {
      case 'success':
        console.log(`✓ ${message}`);
        break;
      case 'info':
        console.log(message);
        break;
      case 'warning':
        console.warn(`⚠ ${message}`);
        break;
      case 'error':
        console.error(`✗ ${message}`);
        break;
    }
  }
}

/**
 * Global logger instance.
 *
 * Can be replaced with a configured instance for different output modes.
 */
export let logger = new Logger();

/**
 * Set the global logger instance.
 */
export function setLogger(newLogger: Logger): void {
  logger = newLogger;
}

/**
 * Create and set a new logger with the specified mode.
 */
export function configureLogger(mode: OutputMode): Logger {
  logger = new Logger(mode);
  return logger;
}
