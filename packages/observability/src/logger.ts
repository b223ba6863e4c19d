import pino from 'pino';

/**
 * Redact credentials that may arrive with requests
 * - Authorization and Cookie headers
 * - Anything named like a secret
 */
const REDACTION_PATHS = [
  'req.headers.authorization',
  'req.headers.cookie',
  'headers.authorization',
  'headers.cookie',
  'authorization',
  'password',
  'token',
  'secret',
  'apiKey',
];

export type Logger = pino.Logger;

export type LogLevel = pino.LevelWithSilent;

export interface CreateLoggerOptions {
  /**
   * Minimum level to emit; falls back to LOG_LEVEL, then info
   */
  level?: LogLevel;
  /**
   * Static fields added to every line, e.g. the service name
   */
  base?: Record<string, unknown>;
  /**
   * Destination stream; defaults to stdout
   */
  destination?: pino.DestinationStream;
}

/**
 * Create a structured logger instance with Pino
 *
 * Features:
 * - Environment-based log levels
 * - Automatic redaction of credentials
 * - Standard serializers for errors, requests and responses
 * - ISO 8601 timestamps
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const loggerOptions: pino.LoggerOptions = {
    level: options.level ?? process.env.LOG_LEVEL ?? 'info',
    redact: {
      paths: REDACTION_PATHS,
      censor: '[REDACTED]',
    },
    serializers: {
      req: pino.stdSerializers.req,
      res: pino.stdSerializers.res,
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(options.base && { base: options.base }),
  };

  return options.destination ? pino(loggerOptions, options.destination) : pino(loggerOptions);
}
