import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';

import { CalculationError } from '../../common/errors/index.js';
import { EVENT_NAMES } from '../../common/events/event-catalog.js';
import { HealingPatternLearnedEvent } from '../../common/events/healing.events.js';
import { DEFAULT_PATTERNS } from './default-patterns.js';
import type {
  ErrorCategory,
  ErrorPattern,
  ErrorPatternDefinition,
  HealingContext,
  PatternRegistryStats,
  PatternSeverity,
  RecentError,
} from './healing.types.js';

interface PatternRecord extends ErrorPatternDefinition {
  occurrences: number;
  lastSeen: Date | null;
  successRate: number;
}

const MIN_SUCCESS_RATE = 0.1;
const MAX_SUCCESS_RATE = 1.0;
const INITIAL_CORRECTION_RATE = 0.9;
const SYNTHESIZED_MATCHER_LENGTH = 50;

/** Name and message of any thrown value; matchers run over `"<name>: <message>"`. */
export function describeError(error: unknown): { type: string; message: string } {
  if (error instanceof Error) {
    return { type: error.name, message: error.message };
  }
  return { type: typeof error, message: String(error) };
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Pattern id -> classification rule. Matching scans a snapshot of the
 * entries; counters and success rates change only inside the synchronous
 * update helpers below, so concurrent healings never interleave an update.
 */
@Injectable()
export class ErrorPatternRegistryService {
  private readonly logger = new Logger(ErrorPatternRegistryService.name);
  private readonly patterns = new Map<string, PatternRecord>();
  private readonly recentErrors: RecentError[] = [];
  private readonly errorsByType = new Map<string, number>();
  private readonly recentErrorsSize: number;
  private totalErrors = 0;

  constructor(
    private readonly configService: ConfigService,
    private readonly eventEmitter: EventEmitter2,
  ) {
    this.recentErrorsSize = Number(
      this.configService.get<string | number>('HEALING_RECENT_ERRORS_SIZE', 1000),
    );
    this.seed();
  }

  /** Registers the default patterns that are not already present. */
  seed(): void {
    for (const definition of DEFAULT_PATTERNS) {
      if (!this.patterns.has(definition.id)) {
        this.learn(definition);
      }
    }
  }

  /** Adds or replaces a pattern; counters start fresh. */
  learn(definition: ErrorPatternDefinition): ErrorPattern {
    const record: PatternRecord = {
      ...definition,
      matcher: new RegExp(definition.matcher.source, 'i'),
      occurrences: 0,
      lastSeen: null,
      successRate: 0,
    };
    this.patterns.set(record.id, record);
    return snapshot(record);
  }

  get(id: string): ErrorPattern | undefined {
    const record = this.patterns.get(id);
    return record && snapshot(record);
  }

  list(): ErrorPattern[] {
    return [...this.patterns.values()].map(snapshot);
  }

  /**
   * Returns every pattern matching the error, bumping each one's counters.
   * An unmatched error gets a synthesized pattern so recurrences match.
   */
  detect(error: unknown, context: HealingContext = {}): ErrorPattern[] {
    const { type, message } = describeError(error);
    const text = `${type}: ${message}`;
    this.record(type, message, context);

    const candidates = [...this.patterns.values()];
    const matched = candidates.filter((p) => p.matcher.test(text));

    if (matched.length === 0) {
      const synthesized = this.synthesize(error, type, message);
      matched.push(synthesized);
    }

    const now = new Date();
    for (const record of matched) {
      record.occurrences++;
      record.lastSeen = now;
    }
    return matched.map(snapshot);
  }

  /**
   * ×1.1 on success, ×0.9 on failure, clamped to [0.1, 1]. A pattern with
   * no history (rate 0) is left alone on success; its first correction
   * starts the rate. Returns the new rate, or undefined for an unknown id.
   */
  recordOutcome(id: string, succeeded: boolean): number | undefined {
    const record = this.patterns.get(id);
    if (!record) return undefined;
    if (succeeded && record.successRate === 0) return 0;
    const factor = succeeded ? 1.1 : 0.9;
    record.successRate = Math.min(
      MAX_SUCCESS_RATE,
      Math.max(MIN_SUCCESS_RATE, record.successRate * factor),
    );
    return record.successRate;
  }

  /** A correction that worked moves the rate halfway to 1, or to 0.9 from no history. */
  recordCorrection(id: string): number | undefined {
    const record = this.patterns.get(id);
    if (!record) return undefined;
    record.successRate =
      record.successRate > 0
        ? (record.successRate + 1) / 2
        : INITIAL_CORRECTION_RATE;
    return record.successRate;
  }

  getRecentErrors(): RecentError[] {
    return [...this.recentErrors];
  }

  getStats(): PatternRegistryStats {
    const categories = new Set(
      [...this.patterns.values()].map((p) => p.category),
    );
    return {
      totalErrors: this.totalErrors,
      errorsByType: Object.fromEntries(this.errorsByType),
      recentErrors: this.recentErrors.length,
      patterns: this.patterns.size,
      categoriesTracked: categories.size,
    };
  }

  private record(type: string, message: string, context: HealingContext): void {
    this.totalErrors++;
    this.errorsByType.set(type, (this.errorsByType.get(type) ?? 0) + 1);
    this.recentErrors.push({
      timestamp: new Date(),
      type,
      message,
      context: { ...context },
    });
    if (this.recentErrors.length > this.recentErrorsSize) {
      this.recentErrors.splice(0, this.recentErrors.length - this.recentErrorsSize);
    }
  }

  private synthesize(error: unknown, type: string, message: string): PatternRecord {
    const { category, severity, autoFixAvailable, fixStrategy } = classify(
      error,
      message,
    );
    const head = message.slice(0, SYNTHESIZED_MATCHER_LENGTH);
    let suffix = this.patterns.size;
    while (this.patterns.has(`auto_${type.toLowerCase()}_${suffix}`)) suffix++;
    const id = `auto_${type.toLowerCase()}_${suffix}`;

    this.learn({
      id,
      matcher: new RegExp(escapeRegExp(head.length > 0 ? head : type), 'i'),
      errorType: type,
      category,
      severity,
      autoFixAvailable,
      fixStrategy,
    });
    const record = this.patterns.get(id);
    if (!record) {
      throw new Error(`Pattern ${id} was not registered`);
    }

    this.logger.log({
      message: 'Error pattern synthesized',
      module: 'healing',
      patternId: id,
      category,
      severity,
    });
    this.eventEmitter.emit(
      EVENT_NAMES.HEALING_PATTERN_LEARNED,
      new HealingPatternLearnedEvent(id, category, severity, type),
    );
    return record;
  }
}

function classify(
  error: unknown,
  message: string,
): {
  category: ErrorCategory;
  severity: PatternSeverity;
  autoFixAvailable: boolean;
  fixStrategy: string;
} {
  const lower = message.toLowerCase();
  if (
    error instanceof CalculationError ||
    error instanceof RangeError ||
    error instanceof TypeError ||
    lower.includes('calculation')
  ) {
    return {
      category: 'calculation',
      severity: 'high',
      autoFixAvailable: true,
      fixStrategy: 'Validate inputs and adjust calculation',
    };
  }
  if (lower.includes('network') || lower.includes('connection')) {
    return {
      category: 'network',
      severity: 'medium',
      autoFixAvailable: false,
      fixStrategy: 'Retry with backoff strategy',
    };
  }
  if (lower.includes('database') || lower.includes('sql')) {
    return {
      category: 'database',
      severity: 'high',
      autoFixAvailable: false,
      fixStrategy: 'Check database connection and retry',
    };
  }
  return {
    category: 'system',
    severity: 'medium',
    autoFixAvailable: false,
    fixStrategy: 'Manual investigation required',
  };
}

function snapshot(record: PatternRecord): ErrorPattern {
  return Object.freeze({ ...record });
}
