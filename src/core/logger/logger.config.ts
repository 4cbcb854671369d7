import pino from 'pino';

const LOG_LEVELS: readonly pino.LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

const resolveLevel = (value: string | undefined): pino.LevelWithSilent => {
  const level = LOG_LEVELS.find((candidate) => candidate === value);
  return level ?? 'info';
};

export type Logger = pino.Logger;

export const logger = (): Logger => {
  const logLevel = resolveLevel(process.env.LOG_LEVEL);

  return pino({
    level: logLevel,
    base: { service: 'gym-manager-api' },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
  });
};
