import { BaseEvent } from './base.event.js';

/**
 * Emitted when a provider returns a rate that is written to the cache.
 */
export class RateFetchedEvent extends BaseEvent {
  constructor(
    public readonly from: string,
    public readonly to: string,
    public readonly rate: string,
    public readonly source: string,
    public readonly responseTimeMs: number | undefined,
    correlationId?: string,
  ) {
    super(correlationId);
  }
}

/**
 * Emitted for every provider failure during a lookup.
 * `attempt` is the provider's 1-based position in the ordered list.
 */
export class RateProviderFailedEvent extends BaseEvent {
  constructor(
    public readonly provider: string,
    public readonly from: string,
    public readonly to: string,
    public readonly reason: string,
    public readonly attempt: number,
    correlationId?: string,
  ) {
    super(correlationId);
  }
}

export class RateCacheClearedEvent extends BaseEvent {
  constructor(
    public readonly entriesRemoved: number,
    correlationId?: string,
  ) {
    super(correlationId);
  }
}
