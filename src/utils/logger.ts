/**
 * @file src/utils/logger.ts
 * @description Winston logger with JSON output
 * @context Structured logging for every component; request_id ties lines to a run
 */

import winston from 'winston';
import path from 'path';
import fs from 'fs';
import config from '../config';

const { combine, timestamp, json, printf, colorize } = winston.format;

const devFormat = printf(({ level, message, timestamp: ts, ...meta }) => {
  const metaStr = Object.keys(meta).length > 0 ? JSON.stringify(meta) : '';
  return `${ts} [${level}]: ${message} ${metaStr}`;
});

const transports: winston.transport[] = [];

transports.push(
  new winston.transports.Console({
    silent: config.isTest,
    format: config.isDev
      ? combine(colorize(), timestamp({ format: 'HH:mm:ss' }), devFormat)
      : combine(timestamp(), json()),
  })
);

if (!config.isTest && (!config.isDev || config.logToFile)) {
  const appLogsPath = path.join(config.logsPath, 'app');
  const errorLogsPath = path.join(config.logsPath, 'error');

  [config.logsPath, appLogsPath, errorLogsPath].forEach(dir => {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  });

  const dateStr = new Date().toISOString().split('T')[0];

  transports.push(
    new winston.transports.File({
      filename: path.join(appLogsPath, `app-${dateStr}.log`),
      format: combine(timestamp(), json()),
      level: 'info',
    })
  );

  transports.push(
    new winston.transports.File({
      filename: path.join(errorLogsPath, `error-${dateStr}.log`),
      format: combine(timestamp(), json()),
      level: 'error',
    })
  );
}

export const logger = winston.createLogger({
  level: config.logLevel,
  defaultMeta: {
    service: config.service.name,
    service_version: config.service.version,
  },
  transports,
});

// Binds request_id (the run's trace id) to every line
export function createRequestLogger(requestId: string, callerId?: string) {
  return {
    info: (message: string, meta?: Record<string, unknown>) => {
      logger.info(message, { request_id: requestId, caller_id: callerId, ...meta });
    },
    error: (message: string, meta?: Record<string, unknown>) => {
      logger.error(message, { request_id: requestId, caller_id: callerId, ...meta });
    },
    warn: (message: string, meta?: Record<string, unknown>) => {
      logger.warn(message, { request_id: requestId, caller_id: callerId, ...meta });
    },
    debug: (message: string, meta?: Record<string, unknown>) => {
      logger.debug(message, { request_id: requestId, caller_id: callerId, ...meta });
    },
  };
}

export function logAiCall(
  requestId: string,
  provider: string,
  model: string,
  action: string,
  details: Record<string, unknown>
) {
  logger.info(`AI call: ${provider}/${model} - ${action}`, {
    request_id: requestId,
    provider,
    model,
    action,
    ...details,
  });
}

export default logger;
