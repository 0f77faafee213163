import pino from 'pino';

// Independent of config.ts: level and mode come straight from the environment.
const nodeEnv = process.env.NODE_ENV ?? 'development';

export const logger = pino({
  level: process.env.LOG_LEVEL?.toLowerCase() ?? 'info',
  transport:
    nodeEnv === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss',
            singleLine: true,
          },
        }
      : undefined,
});

export function createLogger(module: string) {
  return logger.child({ module });
}

export default logger;
