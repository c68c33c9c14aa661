/**
 * Minimal structured logging.
 *
 * Library code takes a Logger parameter and never writes to the console
 * directly. The console logger writes every level to stderr so command output
 * on stdout stays machine-readable.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export type LogMetadata = Readonly<Record<string, unknown>>;

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;
}

export interface ConsoleLoggerOptions {
  /** Minimum level written (default: 'info') */
  level?: LogLevel;
  /** One JSON object per line instead of text (default: false) */
  json?: boolean;
}

/**
 * Discards everything. Default for library calls.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Creates a logger writing to `console.error`.
 *
 * @example
 * const logger = createConsoleLogger({ level: 'debug' });
 * logger.info('Wrote pack', { tiles: 42 });
 * // INFO  Wrote pack tiles=42
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const { level = 'info', json = false } = options;
  const threshold = LOG_LEVELS.indexOf(level);

  const write = (entryLevel: LogLevel, message: string, metadata: LogMetadata = {}) => {
    if (LOG_LEVELS.indexOf(entryLevel) < threshold) return;
    console.error(
      json
        ? JSON.stringify({ timestamp: new Date().toISOString(), level: entryLevel, message, ...metadata })
        : formatText(entryLevel, message, metadata)
    );
  };

  return {
    debug: (message, metadata) => write('debug', message, metadata),
    info: (message, metadata) => write('info', message, metadata),
    warn: (message, metadata) => write('warn', message, metadata),
    error: (message, metadata) => write('error', message, metadata),
  };
}

/**
 * `LEVEL message key=value ...`, with the level padded to five characters.
 */
export function formatText(level: LogLevel, message: string, metadata: LogMetadata): string {
  const fields = Object.entries(metadata).map(
    ([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`
  );
  return [level.toUpperCase().padEnd(5), message, ...fields].join(' ');
}
