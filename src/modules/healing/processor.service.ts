import { Injectable } from '@nestjs/common';
import { createHash } from 'node:crypto';
import * as os from 'node:os';
import { v4 as uuidv4 } from 'uuid';

import { describeError } from './error-pattern-registry.service.js';
import {
  SEVERITY_RANK,
  type DiagnosticBundle,
  type ErrorCategory,
  type ErrorPattern,
  type HealingContext,
  type ImpactAssessment,
  type PatternSeverity,
  type ProcessingOutcome,
  type Recommendation,
} from './healing.types.js';

const SEVERITY_WEIGHTS: Readonly<Record<PatternSeverity, number>> = {
  critical: 10,
  high: 5,
  medium: 2,
  low: 1,
};

const AFFECTED_COMPONENTS: Partial<Record<ErrorCategory, string>> = {
  calculation: 'calculation_engine',
  precision: 'calculation_engine',
  network: 'external_apis',
  currency: 'rate_aggregator',
  cache: 'rate_cache',
  database: 'persistence_layer',
};

const DEBUGGING_HINTS: Partial<Record<ErrorCategory, string>> = {
  calculation: 'Check input validation for calculation parameters',
  validation: 'Check operand formatting at the request boundary',
  precision: 'Compare the requested precision with operand magnitudes',
  network: 'Verify network connectivity to external services',
  currency: 'Check provider health and the age of cached rates',
  cache: 'Check the rate cache backing store',
  database: 'Validate database connection pool status',
};

/**
 * Triage: impact score, ranked recommendations and a diagnostic bundle.
 * Pure apart from the resource snapshot; never throws for any input.
 */
@Injectable()
export class ProcessorService {
  private totalProcessed = 0;
  private avgProcessingTimeMs = 0;

  process(
    error: unknown,
    context: HealingContext,
    patterns: ErrorPattern[],
  ): ProcessingOutcome {
    const startedAt = performance.now();
    const { type, message } = describeError(error);

    const impact = this.assessImpact(patterns);
    const outcome: ProcessingOutcome = {
      errorId: uuidv4(),
      errorType: type,
      errorMessage: message,
      patternsMatched: patterns.map((p) => p.id),
      severity: highestSeverity(patterns),
      autoFixAvailable: patterns.some((p) => p.autoFixAvailable),
      impact,
      recommendations: this.recommend(patterns, impact),
      diagnostics: this.diagnose(error, type, message, context, patterns),
      processingTimeMs: 0,
    };

    outcome.processingTimeMs = performance.now() - startedAt;
    this.totalProcessed++;
    this.avgProcessingTimeMs +=
      (outcome.processingTimeMs - this.avgProcessingTimeMs) / this.totalProcessed;
    return outcome;
  }

  getStats(): { totalProcessed: number; avgProcessingTimeMs: number } {
    return {
      totalProcessed: this.totalProcessed,
      avgProcessingTimeMs: this.avgProcessingTimeMs,
    };
  }

  assessImpact(patterns: ErrorPattern[]): ImpactAssessment {
    let impactScore = 0;
    let userImpact: ImpactAssessment['userImpact'] = 'low';
    const components = new Set<string>();

    for (const pattern of patterns) {
      impactScore += SEVERITY_WEIGHTS[pattern.severity];
      if (pattern.severity === 'critical') {
        userImpact = 'high';
      } else if (pattern.severity === 'high' && userImpact === 'low') {
        userImpact = 'medium';
      }
      const component = AFFECTED_COMPONENTS[pattern.category];
      if (component) components.add(component);
    }

    return {
      impactScore,
      userImpact,
      affectedComponents: [...components],
      estimatedDowntime:
        impactScore < 5 ? 'none' : impactScore < 10 ? 'minimal' : 'significant',
      priority: impactScore >= 10 ? 'critical' : impactScore >= 5 ? 'high' : 'medium',
    };
  }

  /** One per pattern, plus a system-level entry at critical impact. */
  recommend(patterns: ErrorPattern[], impact: ImpactAssessment): Recommendation[] {
    const recommendations: Recommendation[] = patterns.map((pattern) => ({
      patternId: pattern.id,
      priority: impact.priority,
      action: pattern.fixStrategy,
      autoApplicable: pattern.autoFixAvailable,
      effortEstimate: pattern.autoFixAvailable ? 'low' : 'medium',
      successRate: pattern.successRate > 0 ? pattern.successRate : 0.8,
    }));

    if (impact.impactScore >= 10) {
      recommendations.push({
        patternId: 'system_level',
        priority: 'critical',
        action: 'Implement circuit breaker and fallback mechanisms',
        autoApplicable: false,
        effortEstimate: 'high',
        successRate: 0.9,
      });
    }
    return recommendations;
  }

  private diagnose(
    error: unknown,
    type: string,
    message: string,
    context: HealingContext,
    patterns: ErrorPattern[],
  ): DiagnosticBundle {
    const memory = process.memoryUsage();
    const hints = new Set<string>();
    for (const pattern of patterns) {
      const hint = DEBUGGING_HINTS[pattern.category];
      if (hint) hints.add(hint);
    }
    hints.add('Review recent system resource usage patterns');

    return {
      fingerprint: createHash('sha256')
        .update(`${type}:${message.slice(0, 100)}`)
        .digest('hex'),
      stack: error instanceof Error ? (error.stack ?? '') : '',
      context: { ...context },
      environment: {
        heapUsedBytes: memory.heapUsed,
        rssBytes: memory.rss,
        loadAverage: os.loadavg(),
        timestamp: new Date().toISOString(),
      },
      debuggingHints: [...hints],
      searchKeywords: [...new Set([...patterns.map((p) => p.errorType), type])],
    };
  }
}

function highestSeverity(patterns: ErrorPattern[]): PatternSeverity {
  return patterns.reduce<PatternSeverity>(
    (highest, p) =>
      SEVERITY_RANK[p.severity] > SEVERITY_RANK[highest] ? p.severity : highest,
    'low',
  );
}
