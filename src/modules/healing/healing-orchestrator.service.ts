import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { v4 as uuidv4 } from 'uuid';

import { toError } from '../../common/errors/index.js';
import { deepFreeze } from '../../common/utils/index.js';
import { EVENT_NAMES } from '../../common/events/event-catalog.js';
import {
  HealingCompletedEvent,
  HealingStageCompletedEvent,
} from '../../common/events/healing.events.js';
import {
  ErrorPatternRegistryService,
  describeError,
} from './error-pattern-registry.service.js';
import { MitigatorService } from './mitigator.service.js';
import { ProcessorService } from './processor.service.js';
import { CorrectorService } from './corrector.service.js';
import type {
  CorrectionOutcome,
  ErrorPattern,
  FinalRecommendation,
  HealingContext,
  HealingHistoryEntry,
  HealingResult,
  HealingStage,
  HealingStages,
  HealingStatistics,
  HealingStatus,
  LearningOutcome,
  MitigationOutcome,
  ProcessingOutcome,
} from './healing.types.js';

const RECENT_ACTIVITY_SIZE = 10;

export interface HealOptions {
  /** Cancels the mitigation backoff wait. */
  signal?: AbortSignal;
}

/**
 * Runs detect → mitigate → process → correct → learn, strictly in order.
 *
 * Every stage is isolated: a stage that throws is recorded in `stageErrors`
 * and later stages run on empty input. `heal` itself never rejects.
 */
@Injectable()
export class HealingOrchestratorService {
  private readonly logger = new Logger(HealingOrchestratorService.name);
  private readonly history: HealingHistoryEntry[] = [];
  private readonly historySize: number;
  private active = true;

  private readonly statistics: HealingStatistics = {
    totalErrorsProcessed: 0,
    successfulHealings: 0,
    failedHealings: 0,
    avgHealingTimeMs: 0,
    selfLearningImprovements: 0,
  };

  constructor(
    private readonly registry: ErrorPatternRegistryService,
    private readonly mitigator: MitigatorService,
    private readonly processor: ProcessorService,
    private readonly corrector: CorrectorService,
    private readonly configService: ConfigService,
    private readonly eventEmitter: EventEmitter2,
  ) {
    this.historySize = Number(
      this.configService.get<string | number>('HEALING_HISTORY_SIZE', 1000),
    );
  }

  async heal(
    error: unknown,
    context: HealingContext = {},
    options: HealOptions = {},
  ): Promise<HealingResult> {
    const startedAt = performance.now();
    const healingId = uuidv4();
    const timestamp = new Date();
    const { type, message } = describeError(error);

    if (!this.active) {
      const disabled = deepFreeze<HealingResult>({
        healingId,
        timestamp,
        errorType: type,
        errorMessage: message,
        success: false,
        reason: 'healing_disabled',
        correctionApplied: false,
        stages: {},
        finalRecommendation: null,
        elapsedMs: performance.now() - startedAt,
        stageErrors: {},
      });
      this.eventEmitter.emit(
        EVENT_NAMES.HEALING_COMPLETED,
        new HealingCompletedEvent(disabled),
      );
      return disabled;
    }

    const stageErrors: Partial<Record<HealingStage, string>> = {};
    const run = async <T>(
      stage: HealingStage,
      fn: () => T | Promise<T>,
      succeeded: (value: T) => boolean,
    ): Promise<T | null> => {
      const stageStart = performance.now();
      try {
        const value = await fn();
        this.emitStage(healingId, stage, succeeded(value), stageStart, value, null);
        return value;
      } catch (stageError) {
        const reason = toError(stageError).message;
        stageErrors[stage] = reason;
        this.logger.error({
          message: 'Healing stage failed',
          module: 'healing',
          healingId,
          stage,
          error: reason,
        });
        this.emitStage(healingId, stage, false, stageStart, null, reason);
        return null;
      }
    };

    const patterns =
      (await run(
        'detection',
        () => this.registry.detect(error, context),
        (found) => found.length > 0,
      )) ?? [];

    const mitigation = await run(
      'mitigation',
      () => this.mitigator.mitigate(patterns, context, options.signal),
      (result) => result.success,
    );

    const processing = await run(
      'processing',
      () => this.processor.process(error, context, patterns),
      () => true,
    );

    const correction = await run(
      'correction',
      () => this.corrector.correct(patterns, context),
      (result) => result.success,
    );

    const learning = await run(
      'learning',
      () => this.learn(patterns, mitigation, correction),
      () => true,
    );

    const correctionSucceeded = correction?.success ?? false;
    const mitigationSucceeded = mitigation?.success ?? false;
    const success = correctionSucceeded || mitigationSucceeded;

    const stages: Partial<HealingStages> = {
      detection: {
        patternsFound: patterns.length,
        patterns: patterns.map((p) => p.id),
      },
    };
    if (mitigation) stages.mitigation = mitigation;
    if (processing) stages.processing = processing;
    if (correction) stages.correction = correction;
    if (learning) stages.learning = learning;

    const elapsedMs = performance.now() - startedAt;
    const result = deepFreeze<HealingResult>({
      healingId,
      timestamp,
      errorType: type,
      errorMessage: message,
      success,
      correctionApplied: correctionSucceeded,
      ...(correctionSucceeded &&
        correction?.correctedData && { correctedData: correction.correctedData }),
      stages,
      finalRecommendation: this.recommend(mitigation, correction, processing),
      elapsedMs,
      stageErrors,
    });

    this.recordHistory(result, patterns, learning);

    this.logger.log({
      message: success ? 'Error healed' : 'Healing unsuccessful',
      module: 'healing',
      healingId,
      errorType: type,
      patterns: patterns.map((p) => p.id),
      correctionApplied: correctionSucceeded,
      elapsedMs,
    });
    this.eventEmitter.emit(
      EVENT_NAMES.HEALING_COMPLETED,
      new HealingCompletedEvent(result),
    );
    return result;
  }

  setActive(active: boolean): void {
    this.active = active;
    this.logger.log({
      message: active ? 'Healing activated' : 'Healing deactivated',
      module: 'healing',
    });
  }

  isActive(): boolean {
    return this.active;
  }

  getHistory(): HealingHistoryEntry[] {
    return [...this.history];
  }

  getStatus(): HealingStatus {
    const registry = this.registry.getStats();
    return {
      active: this.active,
      statistics: { ...this.statistics },
      recentActivity: this.history.slice(-RECENT_ACTIVITY_SIZE),
      patternsLearned: registry.patterns,
      categoriesTracked: registry.categoriesTracked,
      successRatio:
        this.statistics.successfulHealings /
        Math.max(this.statistics.totalErrorsProcessed, 1),
      registry,
    };
  }

  /**
   * The pattern whose correction worked is credited first, then every
   * detected pattern rises on a successful correction and falls when
   * neither correction nor mitigation worked. Mitigation-only results
   * leave rates unchanged.
   */
  private learn(
    patterns: ErrorPattern[],
    mitigation: MitigationOutcome | null,
    correction: CorrectionOutcome | null,
  ): LearningOutcome {
    const corrected = correction?.success ?? false;
    const mitigated = mitigation?.success ?? false;
    let successRatesAdjusted = 0;

    for (const { patternId } of correction?.succeeded ?? []) {
      this.registry.recordCorrection(patternId);
    }
    for (const pattern of patterns) {
      if (corrected) {
        this.registry.recordOutcome(pattern.id, true);
        successRatesAdjusted++;
      } else if (!mitigated) {
        this.registry.recordOutcome(pattern.id, false);
        successRatesAdjusted++;
      }
    }

    const newStrategiesLearned = mitigated
      ? (mitigation?.strategiesApplied.filter((s) => s.result.success).length ?? 0)
      : 0;

    return { successRatesAdjusted, newStrategiesLearned };
  }

  private recommend(
    mitigation: MitigationOutcome | null,
    correction: CorrectionOutcome | null,
    processing: ProcessingOutcome | null,
  ): FinalRecommendation {
    if (correction?.success) {
      return {
        action: 'auto_fix_applied',
        description: 'Error was automatically corrected',
        correctedData: correction.correctedData,
        confidence: 0.9,
      };
    }

    if (mitigation?.success) {
      const applied = mitigation.strategiesApplied.find((s) => s.result.success);
      return {
        action: 'mitigation_applied',
        description: 'Error was mitigated with fallback strategy',
        strategy: applied?.result.strategy,
        confidence: 0.7,
      };
    }

    const best = processing?.recommendations.reduce<
      ProcessingOutcome['recommendations'][number] | undefined
    >(
      (top, rec) => (top === undefined || rec.successRate > top.successRate ? rec : top),
      undefined,
    );
    if (best) {
      return {
        action: 'manual_intervention_required',
        description: best.action,
        priority: best.priority,
        confidence: best.successRate,
      };
    }

    return {
      action: 'escalate',
      description: 'Unable to heal error automatically - escalation required',
      priority: 'high',
      confidence: 0.1,
    };
  }

  private recordHistory(
    result: HealingResult,
    patterns: ErrorPattern[],
    learning: LearningOutcome | null,
  ): void {
    const stats = this.statistics;
    stats.totalErrorsProcessed++;
    if (result.success) {
      stats.successfulHealings++;
    } else {
      stats.failedHealings++;
    }
    stats.avgHealingTimeMs +=
      (result.elapsedMs - stats.avgHealingTimeMs) / stats.totalErrorsProcessed;
    stats.selfLearningImprovements += learning?.newStrategiesLearned ?? 0;

    this.history.push({
      healingId: result.healingId,
      timestamp: result.timestamp,
      success: result.success,
      errorType: result.errorType,
      patterns: patterns.map((p) => p.id),
      correctionApplied: result.correctionApplied,
    });
    if (this.history.length > this.historySize) {
      this.history.splice(0, this.history.length - this.historySize);
    }
  }

  private emitStage(
    healingId: string,
    stage: HealingStage,
    succeeded: boolean,
    stageStart: number,
    outcome: unknown,
    error: string | null,
  ): void {
    this.eventEmitter.emit(
      EVENT_NAMES.HEALING_STAGE_COMPLETED,
      new HealingStageCompletedEvent(
        healingId,
        stage,
        succeeded,
        performance.now() - stageStart,
        outcome,
        error,
      ),
    );
  }
}
