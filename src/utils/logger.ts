import { type Logger, pino } from 'pino';

/**
 * Package root logger. Level comes from `CHAINQUERY_LOG_LEVEL` and defaults to `warn`,
 * so only retries and problems are visible unless asked for.
 */
export const logger: Logger = pino({
  name: 'chainquery',
  level: process.env.CHAINQUERY_LOG_LEVEL ?? 'warn',
  redact: ['apiKey', 'headers.authorization', 'headers.Authorization'],
});

/**
 * Child logger with fixed bindings, derived from `parent` when the caller supplied their own logger.
 */
export function createLogger(bindings: Record<string, unknown>, parent: Logger = logger): Logger {
  return parent.child(bindings);
}
