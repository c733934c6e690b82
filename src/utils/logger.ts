import winston from 'winston';
import { ConfigSchema, type Config } from '../config/schema.js';

const { combine, timestamp, printf, colorize, json } = winston.format;

/**
 * Custom format for development (human-readable)
 */
const devFormat = combine(
  colorize(),
  timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  printf(({ level, message, timestamp, ...meta }) => {
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} [${level}]: ${String(message)}${metaStr}`;
  })
);

/**
 * Custom format for production (JSON for log aggregation)
 */
const prodFormat = combine(timestamp(), json());

/**
 * Logging settings from environment, validated by the config schema.
 * An invalid LOG_LEVEL falls back to the defaults here; loadConfig()
 * reports it.
 */
function getLoggingSettings(): Config['logging'] {
  const parsed = ConfigSchema.shape.logging.safeParse({
    level: process.env.LOG_LEVEL?.toLowerCase(),
    logFile: process.env.TOOLCHECK_LOG_FILE || undefined,
  });
  return parsed.success ? parsed.data : { level: 'info' };
}

/**
 * Create transports based on environment.
 * Console output goes to stderr so stdout stays free for reports and MCP traffic.
 */
function getTransports(logFile: string | undefined): winston.transport[] {
  const transports: winston.transport[] = [
    new winston.transports.Console({ stderrLevels: ['error', 'warn', 'info', 'debug'] }),
  ];

  // Add file transport for suite runs if configured
  if (logFile) {
    transports.push(
      new winston.transports.File({
        filename: logFile,
        level: 'info',
      })
    );
  }

  return transports;
}

const settings = getLoggingSettings();

/**
 * Toolchain logger
 */
export const logger = winston.createLogger({
  level: settings.level,
  format: process.env.NODE_ENV === 'production' ? prodFormat : devFormat,
  transports: getTransports(settings.logFile),
  defaultMeta: { service: 'tool-conformance' },
});
