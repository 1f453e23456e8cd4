/**
 * Leveled diagnostic logger.
 * Writes to stderr so that diagnostics never mix with the diff on stdout.
 */

/** Log level type */
export type LogLevel = 'DEBUG' | 'WARN' | 'ERROR';

export type Logger = {
  debug(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, error?: unknown): void;
};

export type LoggerOptions = {
  /**
   * Emit `debug` entries. Other levels are always written.
   */
  verbose: boolean;
  /**
   * Destination of log lines.
   * @default process.stderr
   */
  stream?: Pick<NodeJS.WritableStream, 'write'>;
  /**
   * Clock used for timestamps.
   */
  now?: () => Date;
};

/**
 * Serializes error objects for logging.
 * @param error - The error to serialize
 * @returns Serialized error object
 */
export function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
      cause: error.cause
    };
  }
  return { value: String(error) };
}

/**
 * Formats one log entry: `[timestamp] [LEVEL ] message`, followed by the
 * JSON-encoded data on its own line when present.
 */
export function formatLogEntry(
  timestamp: Date,
  level: LogLevel,
  message: string,
  data?: unknown
): string {
  let content = `[${timestamp.toISOString()}] [${level.padEnd(6)}] ${message}`;

  if (data !== undefined) {
    try {
      content += `\nDATA: ${JSON.stringify(data, (_key, value: unknown) =>
        typeof value === 'bigint' ? value.toString() : value
      )}`;
    } catch {
      content += '\nDATA: [Unserializable Object]';
    }
  }

  return `${content}\n`;
}

/**
 * Creates a logger bound to a destination stream.
 *
 * @param options - Verbosity, destination and clock.
 * @returns The logger.
 */
export function createLogger(options: LoggerOptions): Logger {
  const stream = options.stream ?? process.stderr;
  const now = options.now ?? (() => new Date());

  const write = (level: LogLevel, message: string, data?: unknown) => {
    stream.write(formatLogEntry(now(), level, message, data));
  };

  return {
    debug(message, data) {
      if (options.verbose) write('DEBUG', message, data);
    },
    warn(message, data) {
      write('WARN', message, data);
    },
    error(message, error) {
      write('ERROR', message, error === undefined ? undefined : serializeError(error));
    }
  };
}

/**
 * Logger that discards everything. Default for library calls.
 */
export const silentLogger: Logger = {
  debug() {},
  warn() {},
  error() {}
};
