import type { BaseLogger } from 'pino';
import type { Logger } from './types.js';

/**
 * Adapt a pino logger to the {@link Logger} interface. Metadata becomes the
 * merging object of the log line and the message its `msg`.
 *
 * @example
 * ```typescript
 * import { pino } from 'pino';
 *
 * const orchestrator = new SagaOrchestrator({
 *   definition,
 *   repository,
 *   channel,
 *   logger: createPinoLogger(pino({ name: 'orders' })),
 * });
 * ```
 */
export function createPinoLogger(logger: BaseLogger): Logger {
  return {
    debug: (message, meta) => logger.debug(meta ?? {}, message),
    info: (message, meta) => logger.info(meta ?? {}, message),
    warn: (message, meta) => logger.warn(meta ?? {}, message),
    error: (message, meta) => logger.error(meta ?? {}, message),
  };
}
