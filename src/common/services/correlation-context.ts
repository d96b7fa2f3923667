import { AsyncLocalStorage } from 'node:async_hooks';
import { v4 as uuidv4 } from 'uuid';

/**
 * Module-level AsyncLocalStorage for correlation IDs.
 * This is NOT a NestJS service - it's a standalone module with singleton storage.
 */
const correlationStorage = new AsyncLocalStorage<string>();

/**
 * Runs `fn` inside a correlation context. Every log line and event raised
 * from `fn` (across awaits) carries the same id.
 *
 * @param fn The async function to execute within the correlation context
 * @param correlationId Reuse an id handed in by the transport layer; a UUID v4 is generated otherwise
 *
 * @example
 * await withCorrelationId(() => calculationService.calculate(request));
 */
export function withCorrelationId<T>(
  fn: () => Promise<T>,
  correlationId: string = uuidv4(),
): Promise<T> {
  return correlationStorage.run(correlationId, fn);
}

/**
 * Gets the current correlation ID, or undefined outside any correlation context.
 */
export function getCorrelationId(): string | undefined {
  return correlationStorage.getStore();
}
