import { BaseEvent } from './base.event.js';
import type { SerializedError } from '../../modules/calculation/calculation.types.js';

/**
 * Emitted when a calculation succeeds on the caller's own input.
 */
export class CalculationCompletedEvent extends BaseEvent {
  constructor(
    public readonly calculationId: string,
    public readonly operation: string,
    public readonly result: string,
    public readonly currencyFrom: string,
    public readonly currencyTo: string,
    public readonly processingTimeMs: number,
    correlationId?: string,
  ) {
    super(correlationId);
  }
}

/**
 * Emitted when a calculation fails. `healingId` is null for cancelled
 * calculations, which are never healed.
 */
export class CalculationFailedEvent extends BaseEvent {
  constructor(
    public readonly calculationId: string,
    public readonly operation: string,
    public readonly error: SerializedError,
    public readonly healingId: string | null,
    public readonly retried: boolean,
    correlationId?: string,
  ) {
    super(correlationId);
  }
}
