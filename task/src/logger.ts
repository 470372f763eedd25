import { pino, destination, type Logger } from 'pino';

export type { Logger };

const rootLogger = pino({
  level: process.env.LOG_LEVEL ?? 'info',
  base: { service: 'taskescrow' }
});

export const createLogger = (module: string): Logger => rootLogger.child({ module });

/** Logger writing to stderr, for processes whose stdout carries a protocol. */
export const createStderrLogger = (module: string, level = process.env.LOG_LEVEL ?? 'info'): Logger =>
  pino({ level, base: { service: 'taskescrow' } }, destination(2)).child({ module });

export const silentLogger = (): Logger => pino({ level: 'silent' });
