export type LogContext = Record<string, unknown>;

export interface Logger {
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
}

/**
 * Injectable dependencies for createLogger.
 * Defaults to real implementations; tests can override.
 */
export interface LoggerDeps {
  writeStderr: (data: string) => void;
  now: () => Date;
}

const defaultDeps: LoggerDeps = {
  writeStderr: (data: string) => {
    process.stderr.write(data);
  },
  now: () => new Date(),
};

/**
 * Format a log line for console output.
 * Format: [ISO-timestamp] [LEVEL] message { context }
 */
function formatLogLine(
  timestamp: string,
  level: string,
  message: string,
  context?: LogContext,
): string {
  let line = `[${timestamp}] [${level}] ${message}`;
  if (context !== undefined && Object.keys(context).length > 0) {
    line += ` ${JSON.stringify(context)}`;
  }
  return line + '\n';
}

/**
 * Create a structured logger that writes to stderr.
 *
 * - info, warn, error: always shown
 * - debug: only shown when verbose=true
 * - All output goes to stderr (stdout is reserved for the moved block)
 */
export function createLogger(verbose: boolean, deps: Partial<LoggerDeps> = {}): Logger {
  const { writeStderr, now } = { ...defaultDeps, ...deps };

  function log(level: string, message: string, context?: LogContext): void {
    writeStderr(formatLogLine(now().toISOString(), level, message, context));
  }

  return {
    info(message, context) {
      log('INFO', message, context);
    },
    warn(message, context) {
      log('WARN', message, context);
    },
    error(message, context) {
      log('ERROR', message, context);
    },
    debug(message, context) {
      if (verbose) {
        log('DEBUG', message, context);
      }
    },
  };
}
