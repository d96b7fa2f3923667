import type { ProviderRate, ProviderStats } from '../types/index.js';

/**
 * Rate provider interface — the abstraction boundary between upstream
 * exchange-rate sources and the aggregator.
 *
 * Implementations are stateless per call apart from their own counters.
 * A provider asked for (A, A) answers 1 without any network traffic.
 */
export interface IRateProvider {
  /** Stable provider name, used as the `source` of the rates it returns. */
  readonly name: string;

  /**
   * Fetch one rate. Throws RateProviderError on any failure; an aborted
   * signal aborts the in-flight request.
   */
  fetch(from: string, to: string, signal?: AbortSignal): Promise<ProviderRate>;

  /** Request/error counters and timing. */
  getStats(): ProviderStats;
}
