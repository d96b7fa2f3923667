import { BaseEvent } from './base.event.js';
import type {
  ErrorCategory,
  HealingResult,
  HealingStage,
  PatternSeverity,
} from '../../modules/healing/healing.types.js';

/**
 * Emitted after each healing stage. `outcome` is the stage's result, or
 * null when the stage threw (see `error`).
 */
export class HealingStageCompletedEvent extends BaseEvent {
  constructor(
    public readonly healingId: string,
    public readonly stage: HealingStage,
    public readonly succeeded: boolean,
    public readonly durationMs: number,
    public readonly outcome: unknown,
    public readonly error: string | null,
    correlationId?: string,
  ) {
    super(correlationId);
  }
}

/**
 * Emitted once per healing attempt, including disabled ones.
 */
export class HealingCompletedEvent extends BaseEvent {
  constructor(
    public readonly result: HealingResult,
    correlationId?: string,
  ) {
    super(correlationId);
  }
}

export class HealingPatternLearnedEvent extends BaseEvent {
  constructor(
    public readonly patternId: string,
    public readonly category: ErrorCategory,
    public readonly severity: PatternSeverity,
    public readonly errorType: string,
    correlationId?: string,
  ) {
    super(correlationId);
  }
}
