// packages/conversion-backend/src/infrastructure/logger.ts
//
// Service logger. Records are JSON lines on stdout tagged with
// `service: conversion-backend`; NODE_ENV=development renders them through
// pino-pretty instead. Job loggers bind `jobId` so a job's records can be
// followed across queue, pipeline and publisher.
import pino from 'pino';

export interface LogFields {
  jobId?: string;
  component?: string;
  event?: string;
  [key: string]: unknown;
}

export interface Logger {
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string | Error, fields?: LogFields): void;
  debug(msg: string, fields?: LogFields): void;
  child(bindings: LogFields): Logger;
}

export interface LoggerOptions {
  level?: string;
  pretty?: boolean;
}

const SERVICE_NAME = 'conversion-backend';

export function createLogger(options: LoggerOptions = {}): Logger {
  return wrapPino(
    pino({
      level: options.level ?? 'info',
      base: { service: SERVICE_NAME },
      timestamp: pino.stdTimeFunctions.isoTime,
      transport: options.pretty
        ? {
            target: 'pino-pretty',
            options: { colorize: true, translateTime: 'SYS:HH:MM:ss.l', ignore: 'service' },
          }
        : undefined,
    }),
  );
}

// logger.declaration()
export const logger: Logger = createLogger({
  level: process.env.LOG_LEVEL || 'info',
  pretty: process.env.NODE_ENV === 'development',
});

/**
 * Adapts pino's `(fields, msg)` call order. Errors passed as the message go
 * through pino's `err` serializer, which keeps type, message and stack.
 */
export function wrapPino(instance: pino.Logger): Logger {
  return {
    info: (msg, fields) => instance.info(fields ?? {}, msg),
    warn: (msg, fields) => instance.warn(fields ?? {}, msg),
    debug: (msg, fields) => instance.debug(fields ?? {}, msg),
    error(msg, fields) {
      if (msg instanceof Error) {
        instance.error({ ...fields, err: msg }, msg.message);
        return;
      }
      instance.error(fields ?? {}, msg);
    },
    child: (bindings) => wrapPino(instance.child(bindings)),
  };
}

export function createJobLogger(jobId: string): Logger {
  return logger.child({ jobId });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
