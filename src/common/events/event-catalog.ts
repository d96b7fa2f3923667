/**
 * Centralized catalog of all domain event names.
 * Use these constants when emitting or subscribing to events.
 *
 * Naming Convention:
 * - Event names: dot.notation.lowercase
 * - Constants: UPPER_SNAKE_CASE
 * - Event classes: PascalCase matching the action (e.g., RateFetchedEvent)
 *
 * The event bus is the core's structured diagnostic sink: the transport
 * layer subscribes and decides where the payloads end up.
 */
export const EVENT_NAMES = {
  // ============================================================================
  // EXCHANGE RATES
  // ============================================================================

  /** Emitted when a provider returns a rate that is written to the cache */
  RATE_FETCHED: 'rate.fetched',

  /** Emitted for every provider failure during a lookup (the lookup may still succeed) */
  RATE_PROVIDER_FAILED: 'rate.provider.failed',

  /** Emitted when the rate cache is cleared on request */
  RATE_CACHE_CLEARED: 'rate.cache.cleared',

  // ============================================================================
  // HEALING
  // ============================================================================

  /** Emitted after each of the five healing stages with that stage's outcome */
  HEALING_STAGE_COMPLETED: 'healing.stage.completed',

  /** Emitted once per healing attempt with the complete HealingResult */
  HEALING_COMPLETED: 'healing.completed',

  /** Emitted when detection synthesizes a pattern for an unseen error */
  HEALING_PATTERN_LEARNED: 'healing.pattern.learned',

  // ============================================================================
  // CALCULATION
  // ============================================================================

  /** Emitted when a calculation succeeds on the caller's own input */
  CALCULATION_COMPLETED: 'calculation.completed',

  /** Emitted when a calculation fails, with the healing result when healing ran */
  CALCULATION_FAILED: 'calculation.failed',
} as const;

export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];
