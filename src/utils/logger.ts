import pino from 'pino';

let logger: pino.Logger | undefined;

function underTestRunner(): boolean {
  return process.env.VITEST !== undefined || process.env.NODE_ENV === 'test';
}

export function createLogger(level?: string): pino.Logger {
  if (logger) {
    if (level) logger.level = level;
    return logger;
  }

  if (underTestRunner()) {
    logger = pino({ level: level ?? process.env.LOG_LEVEL ?? 'silent' });
    return logger;
  }

  logger = pino({
    level: level ?? process.env.LOG_LEVEL ?? 'info',
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname',
      },
    },
  });

  return logger;
}

export function getLogger(): pino.Logger {
  return logger ?? createLogger();
}
