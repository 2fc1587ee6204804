import pino from 'pino';

const LOG_LEVELS: readonly pino.LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function resolveLevel(raw: string | undefined): pino.LevelWithSilent {
  return LOG_LEVELS.find((level) => level === raw) ?? 'info';
}

const baseLogger = pino({
  level: resolveLevel(process.env.LOG_LEVEL),
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
  base: {
    service: 'xss-defender',
  },
});

export type Logger = pino.Logger;

export function createLogger(name: string): Logger {
  return baseLogger.child({ module: name });
}

export function generateRequestId(): string {
  return crypto.randomUUID();
}
