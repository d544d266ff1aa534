import winston from 'winston';

const logLevel = process.env.LOG_LEVEL || 'info';
const nodeEnv = process.env.NODE_ENV || 'development';

const devFormat = winston.format.printf(({ level, message, timestamp, service: _service, ...meta }) => {
  const extra = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
  return `${timestamp} [${level}]: ${message}${extra}`;
});

/**
 * JSON lines in production, one readable line per entry elsewhere.
 * Jest runs are quiet unless LOG_LEVEL is set explicitly.
 */
export const logger = winston.createLogger({
  level: logLevel,
  silent: nodeEnv === 'test' && !process.env.LOG_LEVEL,
  defaultMeta: { service: 'league-analytics' },
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    nodeEnv === 'production' ? winston.format.json() : devFormat
  ),
  transports: [new winston.transports.Console()],
});
