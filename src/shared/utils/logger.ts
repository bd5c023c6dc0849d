/**
 * Logger using Pino
 *
 * - JSON structured logging (production) / Pretty printing (development)
 * - Environment-based log levels (debug in dev, info in prod)
 * - Optional file transports
 * - Redaction of storage credentials and signed URIs
 * - Child loggers per service
 *
 * Usage:
 * ```typescript
 * const serviceLogger = createChildLogger({ service: 'GlossaryService' });
 * serviceLogger.info({ containerName }, 'Glossary container ready');
 *
 * try {
 *   await operation();
 * } catch (err) {
 *   serviceLogger.error({ err }, 'Operation failed');
 * }
 * ```
 */

import pino from 'pino';
import type { Logger, TransportTargetOptions } from 'pino';

const isDevelopment = process.env.NODE_ENV !== 'production';
const logLevel = process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info');

// Service filtering for diagnostics (LOG_SERVICES=Service1,Service2,...)
const allowedServices = process.env.LOG_SERVICES?.split(',').map(s => s.trim()).filter(Boolean) ?? [];

const targets: TransportTargetOptions[] = [];

if (isDevelopment) {
  targets.push({
    level: logLevel,
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname,env',
      singleLine: false,
      messageFormat: '[{service}] {msg}',
    },
  });
} else {
  targets.push({
    level: logLevel,
    target: 'pino/file',
    options: {
      destination: 1, // stdout
    },
  });
}

if (process.env.ENABLE_FILE_LOGGING === 'true') {
  targets.push({
    level: 'info',
    target: 'pino/file',
    options: {
      destination: process.env.LOG_FILE_PATH || './logs/app.log',
      mkdir: true,
    },
  });

  targets.push({
    level: 'error',
    target: 'pino/file',
    options: {
      destination: process.env.ERROR_LOG_FILE_PATH || './logs/error.log',
      mkdir: true,
    },
  });
}

const transport = pino.transport({ targets });

export const logger: Logger = pino(
  {
    level: logLevel,

    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },

    base: {
      env: process.env.NODE_ENV,
      service: 'glossary-staging',
    },

    timestamp: pino.stdTimeFunctions.isoTime,

    // Signed URIs embed a SAS credential; connection strings embed the account key
    redact: {
      paths: [
        'connectionString',
        '*.connectionString',
        'accountKey',
        'signedUri',
        '*.signedUri',
      ],
      remove: true,
    },
  },
  transport
);

/**
 * Create a child logger with additional context
 *
 * When LOG_SERVICES is set, only the listed services log; every other
 * service receives a silent logger.
 *
 * @example
 * const serviceLogger = createChildLogger({ service: 'BoundedUploader' });
 * serviceLogger.debug({ sourcePath }, 'Upload issued');
 */
export const createChildLogger = (context: Record<string, unknown>): Logger => {
  const serviceName = typeof context.service === 'string' ? context.service : undefined;

  if (allowedServices.length > 0 && serviceName && !allowedServices.includes(serviceName)) {
    return pino({ level: 'silent' });
  }

  return logger.child(context);
};
