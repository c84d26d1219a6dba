/**
 * Assessment logger
 *
 * Pino with PHI redaction on by default. Symptoms, vitals, demographics and
 * risk factors are censored wherever they appear in a log object, so a
 * service can log its input or a stored record without picking fields.
 * Output is JSON with ISO timestamps, or pino-pretty during development.
 */

import pino, { type Logger, type LoggerOptions } from 'pino';

import { defaultLogLevel } from '../env.js';
import { createCensor, REDACTION_PATHS } from './redaction.js';

export { REDACTION_PATHS, PHI_FIELDS } from './redaction.js';

export interface LoggerConfig {
  /** Component name, e.g. 'cardiac-risk-service' */
  name?: string;
  /** Defaults to LOG_LEVEL, then to the level for NODE_ENV */
  level?: string;
  /** Bound as `service` on every line (default: SERVICE_NAME or 'cardiorisk') */
  serviceName?: string;
  /** Defaults to true outside production and test */
  pretty?: boolean;
  /** Local debugging only */
  disableRedaction?: boolean;
  additionalRedactionPaths?: string[];
  /** Write JSON lines to this stream instead of stdout; ignored when pretty printing */
  destination?: pino.DestinationStream;
}

/**
 * Fields bound to a child logger
 */
export interface LogContext {
  correlationId?: string;
  assessmentId?: string;
  [key: string]: unknown;
}

function resolveLevel(): string {
  const envLevel = process.env.LOG_LEVEL;
  return envLevel ? envLevel : defaultLogLevel(process.env.NODE_ENV);
}

function shouldPrettyPrint(): boolean {
  const env = process.env.NODE_ENV;
  return env !== 'production' && env !== 'test';
}

function buildOptions(config: LoggerConfig): LoggerOptions {
  const serviceName = config.serviceName ?? process.env.SERVICE_NAME ?? 'cardiorisk';

  const options: LoggerOptions = {
    level: config.level ?? resolveLevel(),
    name: config.name ?? serviceName,
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: serviceName,
      env: process.env.NODE_ENV ?? 'development',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    messageKey: 'msg',
  };

  // exactOptionalPropertyTypes: leave `redact` unset rather than undefined
  if (config.disableRedaction !== true) {
    options.redact = {
      paths: [...REDACTION_PATHS, ...(config.additionalRedactionPaths ?? [])],
      censor: createCensor,
    };
  }

  return options;
}

export function createLogger(config: LoggerConfig = {}): Logger {
  const options = buildOptions(config);

  if (config.pretty ?? shouldPrettyPrint()) {
    const transport = pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        messageFormat: '{msg}',
      },
    }) as pino.DestinationStream;
    return pino(options, transport);
  }

  return config.destination ? pino(options, config.destination) : pino(options);
}

export function createChildLogger(parent: Logger, context: LogContext): Logger {
  return parent.child(context);
}

/**
 * Child logger for one assessment request
 */
export function withCorrelation(
  parent: Logger,
  correlationId: string,
  context: Omit<LogContext, 'correlationId'> = {}
): Logger {
  return createChildLogger(parent, { correlationId, ...context });
}

export type { Logger, LoggerOptions } from 'pino';
