/**
 * Logger Configuration
 * Winston-based logging for the bridge service
 */

import winston from 'winston';
import path from 'path';

export interface LoggerOptions {
  level: string;
  format: 'json' | 'pretty';
  logDir?: string;
  service?: string;
}

// Custom format for pretty printing
const prettyFormat = winston.format.printf(({ level, message, timestamp, component, service, ...metadata }) => {
  const prefix = component ? `[${component}] ` : '';
  let msg = `${timestamp} [${level.toUpperCase()}]: ${prefix}${message}`;

  if (Object.keys(metadata).length > 0) {
    msg += ` ${JSON.stringify(metadata)}`;
  }

  return msg;
});

export function createLogger(options: LoggerOptions): winston.Logger {
  const lineFormat = options.format === 'pretty' ? prettyFormat : winston.format.json();

  const transports: winston.transport[] = [
    new winston.transports.Console({ format: lineFormat })
  ];

  if (options.logDir) {
    transports.push(
      new winston.transports.File({
        filename: path.join(options.logDir, 'error.log'),
        level: 'error',
        format: winston.format.json(),
        maxsize: 10485760, // 10MB
        maxFiles: 5,
      }),
      new winston.transports.File({
        filename: path.join(options.logDir, 'combined.log'),
        format: winston.format.json(),
        maxsize: 10485760,
        maxFiles: 10,
      })
    );
  }

  return winston.createLogger({
    level: options.level,
    format: winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      winston.format.errors({ stack: true }),
      winston.format.splat()
    ),
    defaultMeta: { service: options.service ?? 'fieldbus-bridge' },
    transports,
  });
}
