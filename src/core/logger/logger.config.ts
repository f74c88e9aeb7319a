import pino from 'pino';

const LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function resolveLevel(): string {
  const logLevel = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return LEVELS.includes(logLevel) ? logLevel : 'info';
}

export const logger = () => {
  const pinoLogger = pino(
    {
      level: resolveLevel(),
      base: { service: process.env.SERVICE_NAME || 'esim-sync-service' },
      formatters: {
        level: (label) => {
          return { level: label };
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    process.stdout,
  );

  return pinoLogger;
};
