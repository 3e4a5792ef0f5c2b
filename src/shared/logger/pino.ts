import { pino, type Logger } from 'pino';

export const logger: Logger = pino({
  name: 'scanimate',
  level: process.env.LOG_LEVEL ?? 'info',
  base: undefined,
});

export function createChildLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}
