import winston from 'winston';
import { env } from '../config/env';

const isProduction = env.NODE_ENV === 'production';

const devFormat = winston.format.printf(({ level, message, timestamp, service: _service, ...meta }) => {
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${String(timestamp)} ${level}: ${String(message)}${extra}`;
});

export const logger = winston.createLogger({
  level: env.LOG_LEVEL ?? (isProduction ? 'info' : 'debug'),
  silent: env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    isProduction ? winston.format.json() : winston.format.combine(winston.format.colorize(), devFormat)
  ),
  defaultMeta: { service: 'resort-concierge-agent' },
  transports: [new winston.transports.Console()],
});
