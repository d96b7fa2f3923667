import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EventEmitter2 } from '@nestjs/event-emitter';

import { ErrorPatternRegistryService } from './error-pattern-registry.service.js';
import {
  AllProvidersExhaustedError,
  DivisionByZeroError,
  InvalidNumericLiteralError,
  UnsupportedCurrencyError,
} from '../../common/errors/index.js';
import { EVENT_NAMES } from '../../common/events/event-catalog.js';
import { createConfigService } from '../../test/mock-factories.js';

describe('ErrorPatternRegistryService', () => {
  let registry: ErrorPatternRegistryService;
  let emitter: EventEmitter2;

  beforeEach(() => {
    emitter = new EventEmitter2();
    vi.spyOn(emitter, 'emit');
    registry = new ErrorPatternRegistryService(
      createConfigService({ HEALING_RECENT_ERRORS_SIZE: 3 }),
      emitter,
    );
  });

  it('should seed the default patterns with zero counters', () => {
    const patterns = registry.list();

    expect(patterns.map((p) => p.id)).toEqual([
      'div_by_zero',
      'invalid_decimal',
      'overflow',
      'network_timeout',
      'cache_unavailable',
      'providers_exhausted',
      'unsupported_currency',
    ]);
    expect(patterns.every((p) => p.successRate === 0 && p.occurrences === 0)).toBe(true);
    expect(registry.get('unsupported_currency')?.autoFixAvailable).toBe(false);
  });

  it('should not duplicate patterns when seeded twice', () => {
    registry.seed();
    expect(registry.list()).toHaveLength(7);
  });

  describe('detect', () => {
    it('should match engine errors to their seeded pattern', () => {
      expect(registry.detect(new DivisionByZeroError('10')).map((p) => p.id)).toEqual([
        'div_by_zero',
      ]);
      expect(
        registry
          .detect(new InvalidNumericLiteralError('operand1', '12a'))
          .map((p) => p.id),
      ).toEqual(['invalid_decimal']);
      expect(
        registry.detect(new UnsupportedCurrencyError('USD', 'XYZ')).map((p) => p.id),
      ).toEqual(['unsupported_currency']);
    });

    it('should return every matching pattern in registry order', () => {
      const error = new AllProvidersExhaustedError('USD', 'EUR', [
        'ExchangeRates-API: connect ECONNREFUSED 10.0.0.1:443',
      ]);

      expect(registry.detect(error).map((p) => p.id)).toEqual([
        'network_timeout',
        'providers_exhausted',
      ]);
    });

    it('should bump occurrences and lastSeen on every match', () => {
      registry.detect(new DivisionByZeroError('1'));
      const [second] = registry.detect(new DivisionByZeroError('2'));

      expect(second?.occurrences).toBe(2);
      expect(second?.lastSeen).toBeInstanceOf(Date);
      expect(registry.get('div_by_zero')?.occurrences).toBe(2);
    });

    it('should synthesize a pattern for an unmatched error', () => {
      const [pattern] = registry.detect(new Error('Something odd happened'));

      expect(pattern).toMatchObject({
        id: 'auto_error_7',
        errorType: 'Error',
        category: 'system',
        severity: 'medium',
        autoFixAvailable: false,
        occurrences: 1,
      });
      expect(emitter.emit).toHaveBeenCalledWith(
        EVENT_NAMES.HEALING_PATTERN_LEARNED,
        expect.objectContaining({ patternId: 'auto_error_7', category: 'system' }),
      );
    });

    it('should match recurrences with the synthesized pattern', () => {
      registry.detect(new Error('Something odd happened'));
      const [again] = registry.detect(new Error('Something odd happened again'));

      expect(again?.id).toBe('auto_error_7');
      expect(again?.occurrences).toBe(2);
      expect(registry.list()).toHaveLength(8);
    });

    it('should not overwrite a learned pattern that holds the next synthesized id', () => {
      registry.learn({
        id: 'auto_error_8',
        matcher: /ledger locked/,
        errorType: 'Error',
        category: 'system',
        severity: 'low',
        autoFixAvailable: false,
        fixStrategy: 'Wait for the ledger',
      });
      registry.detect(new Error('ledger locked'));

      const [pattern] = registry.detect(new Error('Something odd happened'));

      expect(pattern?.id).toBe('auto_error_9');
      expect(registry.get('auto_error_8')).toMatchObject({
        fixStrategy: 'Wait for the ledger',
        occurrences: 1,
      });
    });

    it('should classify arithmetic errors as auto-fixable calculation errors', () => {
      const [pattern] = registry.detect(new RangeError('Invalid array length'));

      expect(pattern).toMatchObject({
        id: 'auto_rangeerror_7',
        category: 'calculation',
        severity: 'high',
        autoFixAvailable: true,
      });
    });

    it('should classify SQL failures as database errors', () => {
      const [pattern] = registry.detect(new Error('SQL syntax error near FROM'));

      expect(pattern).toMatchObject({ category: 'database', severity: 'high' });
    });

    it('should accept thrown non-Error values', () => {
      const [pattern] = registry.detect('plain failure');

      expect(pattern?.id).toBe('auto_string_7');
    });

    it('should escape the message when building a matcher', () => {
      const [pattern] = registry.detect(new Error('cost (USD) is 1.5+tax'));

      expect(pattern?.matcher.test('Error: cost (USD) is 1.5+tax')).toBe(true);
      expect(pattern?.matcher.test('Error: cost USD is 1x5tax')).toBe(false);
    });
  });

  describe('recordOutcome', () => {
    it('should scale the success rate and clamp it to [0.1, 1]', () => {
      registry.recordCorrection('overflow');
      expect(registry.recordOutcome('overflow', true)).toBeCloseTo(0.99);
      expect(registry.recordOutcome('overflow', false)).toBeCloseTo(0.891);

      expect(registry.recordOutcome('network_timeout', false)).toBe(0.1);
      expect(registry.recordOutcome('network_timeout', false)).toBe(0.1);
    });

    it('should leave an untracked rate alone on success', () => {
      expect(registry.recordOutcome('overflow', true)).toBe(0);
      expect(registry.get('overflow')?.successRate).toBe(0);
    });

    it('should never exceed 1', () => {
      registry.learn({
        id: 'custom',
        matcher: /custom/,
        errorType: 'Error',
        category: 'system',
        severity: 'low',
        autoFixAvailable: false,
        fixStrategy: 'none',
      });
      registry.recordCorrection('custom');
      for (let i = 0; i < 40; i++) registry.recordOutcome('custom', true);

      expect(registry.get('custom')?.successRate).toBe(1);
    });

    it('should ignore unknown ids', () => {
      expect(registry.recordOutcome('missing', true)).toBeUndefined();
      expect(registry.recordCorrection('missing')).toBeUndefined();
    });
  });

  describe('recordCorrection', () => {
    it('should start at 0.9 and then move halfway to 1', () => {
      expect(registry.recordCorrection('div_by_zero')).toBe(0.9);
      expect(registry.recordCorrection('div_by_zero')).toBeCloseTo(0.95);
    });
  });

  it('should keep a bounded window of recent errors', () => {
    for (let i = 1; i <= 5; i++) {
      registry.detect(new DivisionByZeroError(String(i)));
    }

    const recent = registry.getRecentErrors();
    expect(recent).toHaveLength(3);
    expect(recent[2]?.type).toBe('DivisionByZeroError');
    expect(registry.getStats()).toMatchObject({
      totalErrors: 5,
      errorsByType: { DivisionByZeroError: 5 },
      recentErrors: 3,
      patterns: 7,
      categoriesTracked: 6,
    });
  });

  it('should make learned patterns matchable case-insensitively', () => {
    registry.learn({
      id: 'quota',
      matcher: /quota exceeded/,
      errorType: 'Error',
      category: 'network',
      severity: 'low',
      autoFixAvailable: false,
      fixStrategy: 'Wait for the quota window',
    });

    expect(registry.detect(new Error('QUOTA EXCEEDED')).map((p) => p.id)).toEqual([
      'quota',
    ]);
  });

  it('should hand out frozen snapshots', () => {
    expect(Object.isFrozen(registry.get('div_by_zero'))).toBe(true);
  });
});
