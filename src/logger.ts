import winston from 'winston';

const { combine, timestamp, errors, printf, colorize } = winston.format;

const line = printf(({ level, message, timestamp: ts, err, stack }) => {
  const detail = err instanceof Error ? ` ${err.stack ?? err.message}` : err ? ` ${String(err)}` : '';
  const trace = typeof stack === 'string' ? ` ${stack}` : '';
  return `${String(ts)} ${level}: ${String(message)}${detail}${trace}`;
});

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? 'info',
  silent: process.env.VITEST === 'true' && !process.env.LOG_LEVEL,
  format: combine(errors({ stack: true }), colorize(), timestamp(), line),
  transports: [new winston.transports.Console()],
});
