export type ErrorCategory =
  | 'calculation'
  | 'validation'
  | 'network'
  | 'system'
  | 'database'
  | 'cache'
  | 'currency'
  | 'precision';

export type PatternSeverity = 'low' | 'medium' | 'high' | 'critical';

export const SEVERITY_RANK: Readonly<Record<PatternSeverity, number>> = {
  low: 0,
  medium: 1,
  high: 2,
  critical: 3,
};

/** Read-only view of a registry entry; the registry owns the counters. */
export interface ErrorPattern {
  readonly id: string;
  readonly matcher: RegExp;
  readonly errorType: string;
  readonly category: ErrorCategory;
  readonly severity: PatternSeverity;
  readonly autoFixAvailable: boolean;
  readonly fixStrategy: string;
  readonly occurrences: number;
  readonly lastSeen: Date | null;
  /** 0 until the first recorded outcome, then within [0.1, 1]. */
  readonly successRate: number;
}

export type ErrorPatternDefinition = Pick<
  ErrorPattern,
  | 'id'
  | 'matcher'
  | 'errorType'
  | 'category'
  | 'severity'
  | 'autoFixAvailable'
  | 'fixStrategy'
>;

/** What the caller was doing when the error surfaced. */
export interface HealingContext {
  operation?: string;
  operand1?: string;
  operand2?: string | null;
  currencyFrom?: string;
  currencyTo?: string;
  precision?: number;
  /** Retry-counter key for network mitigation. */
  endpoint?: string;
  component?: string;
}

export interface RecentError {
  timestamp: Date;
  type: string;
  message: string;
  context: HealingContext;
}

export interface PatternRegistryStats {
  totalErrors: number;
  errorsByType: Record<string, number>;
  recentErrors: number;
  patterns: number;
  categoriesTracked: number;
}

// ---------------------------------------------------------------------------
// Stage outcomes
// ---------------------------------------------------------------------------

export interface DetectionOutcome {
  patternsFound: number;
  patterns: string[];
}

export interface StrategyResult {
  success: boolean;
  strategy?: string;
  suggestion?: string;
  reason?: string;
  fallbackUsed?: boolean;
  attempt?: number;
  delayMs?: number;
}

export interface MitigationOutcome {
  success: boolean;
  fallbackUsed: boolean;
  strategiesApplied: Array<{
    patternId: string;
    fixStrategy: string;
    result: StrategyResult;
  }>;
  errors: string[];
}

export type ImpactPriority = 'critical' | 'high' | 'medium';

export interface ImpactAssessment {
  impactScore: number;
  userImpact: 'high' | 'medium' | 'low';
  affectedComponents: string[];
  estimatedDowntime: 'none' | 'minimal' | 'significant';
  priority: ImpactPriority;
}

export interface Recommendation {
  patternId: string;
  priority: ImpactPriority;
  action: string;
  autoApplicable: boolean;
  effortEstimate: 'low' | 'medium' | 'high';
  successRate: number;
}

export interface DiagnosticBundle {
  fingerprint: string;
  stack: string;
  context: HealingContext;
  environment: {
    heapUsedBytes: number;
    rssBytes: number;
    loadAverage: number[];
    timestamp: string;
  };
  debuggingHints: string[];
  searchKeywords: string[];
}

export interface ProcessingOutcome {
  errorId: string;
  errorType: string;
  errorMessage: string;
  patternsMatched: string[];
  severity: PatternSeverity;
  autoFixAvailable: boolean;
  impact: ImpactAssessment;
  recommendations: Recommendation[];
  diagnostics: DiagnosticBundle;
  processingTimeMs: number;
}

/** Replacement inputs for the single retry after healing. */
export interface CorrectedData {
  operand1?: string;
  operand2?: string;
  precisionOverride?: number;
  useCache?: boolean;
  cacheMaxAgeSeconds?: number;
}

export interface CorrectionResult {
  success: boolean;
  correctionType?: string;
  originalValue?: string;
  correctedData?: CorrectedData;
  explanation?: string;
  reason?: string;
}

export interface CorrectionOutcome {
  success: boolean;
  attempted: string[];
  succeeded: Array<{ patternId: string; correction: CorrectionResult }>;
  failed: Array<{ patternId: string; reason: string }>;
  correctedData?: CorrectedData;
}

export interface LearningOutcome {
  successRatesAdjusted: number;
  newStrategiesLearned: number;
}

export interface HealingStages {
  detection: DetectionOutcome;
  mitigation: MitigationOutcome;
  processing: ProcessingOutcome;
  correction: CorrectionOutcome;
  learning: LearningOutcome;
}

export type HealingStage = keyof HealingStages;

export const HEALING_STAGES: readonly HealingStage[] = [
  'detection',
  'mitigation',
  'processing',
  'correction',
  'learning',
];

export type FinalRecommendation =
  | {
      action: 'auto_fix_applied';
      description: string;
      correctedData: CorrectedData | undefined;
      confidence: number;
    }
  | {
      action: 'mitigation_applied';
      description: string;
      strategy: string | undefined;
      confidence: number;
    }
  | {
      action: 'manual_intervention_required';
      description: string;
      priority: ImpactPriority;
      confidence: number;
    }
  | {
      action: 'escalate';
      description: string;
      priority: 'high';
      confidence: number;
    };

export interface HealingResult {
  readonly healingId: string;
  readonly timestamp: Date;
  readonly errorType: string;
  readonly errorMessage: string;
  readonly success: boolean;
  /** Set only when no stage ran. */
  readonly reason?: 'healing_disabled';
  readonly correctionApplied: boolean;
  readonly correctedData?: CorrectedData;
  readonly stages: Readonly<Partial<HealingStages>>;
  readonly finalRecommendation: FinalRecommendation | null;
  readonly elapsedMs: number;
  readonly stageErrors: Readonly<Partial<Record<HealingStage, string>>>;
}

export interface HealingHistoryEntry {
  healingId: string;
  timestamp: Date;
  success: boolean;
  errorType: string;
  patterns: string[];
  correctionApplied: boolean;
}

export interface HealingStatistics {
  totalErrorsProcessed: number;
  successfulHealings: number;
  failedHealings: number;
  avgHealingTimeMs: number;
  selfLearningImprovements: number;
}

export interface HealingStatus {
  active: boolean;
  statistics: HealingStatistics;
  recentActivity: HealingHistoryEntry[];
  patternsLearned: number;
  categoriesTracked: number;
  successRatio: number;
  registry: PatternRegistryStats;
}
