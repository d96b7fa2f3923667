import { getCorrelationId } from '../services/correlation-context.js';

/**
 * Base class for all domain events.
 * Provides common fields: timestamp and correlationId.
 *
 * If no correlationId is passed, the one from the surrounding async context
 * (see withCorrelationId) is used, so events raised inside a calculation can
 * be tied back to it.
 */
export abstract class BaseEvent {
  public readonly timestamp: Date;
  public readonly correlationId: string | undefined;

  protected constructor(correlationId?: string, timestamp?: Date) {
    this.timestamp = timestamp ?? new Date();
    this.correlationId = correlationId ?? getCorrelationId();
  }
}
