import { pino, destination, type Logger as PinoLogger, type LoggerOptions as PinoLoggerOptions } from 'pino';
import { createRedactRules } from './logger-redact.js';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';
export type LogFormat = 'json' | 'pretty';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  format?: LogFormat;
  bindings?: Record<string, unknown>;
  redactPaths?: string[];
}

export type Logger = PinoLogger;

function serializeError(err: unknown): unknown {
  if (!err || typeof err !== 'object') {
    return err;
  }

  if ('toJSON' in err && typeof err.toJSON === 'function') {
    return err.toJSON();
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      message: err.message,
      stack: err.stack
    };
  }

  return err;
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Logs always go to stderr: stdout is reserved for rendered reports.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    level = 'info',
    name,
    format = 'pretty',
    bindings = {},
    redactPaths = []
  } = options;

  const config: PinoLoggerOptions = {
    name,
    level,
    redact: createRedactRules(redactPaths),
    serializers: {
      err: serializeError,
      error: serializeError
    }
  };

  let logger: Logger;
  if (format === 'pretty') {
    logger = pino({
      ...config,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          destination: 2,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname'
        }
      }
    });
  } else {
    logger = pino(config, destination(2));
  }

  return Object.keys(bindings).length > 0 ? logger.child(bindings) : logger;
}

export function getLoggerOptionsFromEnv(
  configOptions: LoggerOptions = {},
  env: NodeJS.ProcessEnv = process.env
): LoggerOptions {
  const options: LoggerOptions = { ...configOptions };

  const level = env.OSINT_LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) {
    options.level = level;
  }

  const format = env.OSINT_LOG_FORMAT?.toLowerCase();
  if (format === 'json' || format === 'pretty') {
    options.format = format;
  }

  return options;
}

let rootLogger: Logger | null = null;

/**
 * Process-wide logger configured from the environment. Components accept an
 * explicit logger and only fall back to this one.
 */
export function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = createLogger(getLoggerOptionsFromEnv({ name: 'osint-conductor' }));
  }
  return rootLogger;
}

export default createLogger;
