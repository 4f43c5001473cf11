/**
 * ThreatLedger — Logger
 *
 * Structured logging for the monitor, engine and API.
 * Production entries are one JSON object per line tagged with the
 * service name; development entries are single readable lines.
 */

const SERVICE = 'threatledger';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: unknown;
}

interface LogEntry {
  service: string;
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

// Get log level from environment, default to 'info'
let currentLevelNum = isLogLevel(process.env.LOG_LEVEL)
  ? LOG_LEVELS[process.env.LOG_LEVEL]
  : LOG_LEVELS.info;

/**
 * Override the level picked up from LOG_LEVEL (used once config is loaded).
 */
export function configureLogger(options: { level: LogLevel }): void {
  currentLevelNum = LOG_LEVELS[options.level];
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= currentLevelNum;
}

function formatEntry(entry: LogEntry): string {
  if (process.env.NODE_ENV === 'production') {
    return JSON.stringify(entry);
  }

  // Human-readable format for development
  const { timestamp, level, message, context } = entry;
  const levelStr = level.toUpperCase().padEnd(5);
  const time = timestamp.split('T')[1]?.split('.')[0] ?? timestamp;

  let output = `${time} ${levelStr} ${message}`;

  if (context && Object.keys(context).length > 0) {
    output += ` ${JSON.stringify(context)}`;
  }

  return output;
}

function log(level: LogLevel, message: string, context?: LogContext): void {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    service: SERVICE,
    timestamp: new Date().toISOString(),
    level,
    message,
    context,
  };

  const formatted = formatEntry(entry);

  switch (level) {
    case 'error':
      console.error(formatted);
      break;
    case 'warn':
      console.warn(formatted);
      break;
    default:
      console.log(formatted);
  }
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

function childLogger(defaultContext: LogContext): Logger {
  return {
    debug: (message, context) => log('debug', message, { ...defaultContext, ...context }),
    info: (message, context) => log('info', message, { ...defaultContext, ...context }),
    warn: (message, context) => log('warn', message, { ...defaultContext, ...context }),
    error: (message, context) => log('error', message, { ...defaultContext, ...context }),
  };
}

/**
 * Logger interface.
 */
export const logger = {
  debug: (message: string, context?: LogContext) => log('debug', message, context),
  info: (message: string, context?: LogContext) => log('info', message, context),
  warn: (message: string, context?: LogContext) => log('warn', message, context),
  error: (message: string, context?: LogContext) => log('error', message, context),

  /**
   * Create a child logger with default context.
   */
  child: (defaultContext: LogContext): Logger => childLogger(defaultContext),
};

/**
 * Performance timing utility.
 */
export async function timeOperation<T>(
  name: string,
  operation: () => Promise<T>,
  context?: LogContext
): Promise<T> {
  const start = performance.now();

  try {
    return await operation();
  } finally {
    logger.debug(`${name} completed`, {
      ...context,
      durationMs: Math.round(performance.now() - start),
    });
  }
}
