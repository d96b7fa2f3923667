import { describe, it, expect, afterEach, vi } from 'vitest';

import { MitigatorService } from './mitigator.service.js';
import { createConfigService } from '../../test/mock-factories.js';
import { makePattern } from '../../test/pattern.fixture.js';

const network = makePattern({
  id: 'network_timeout',
  category: 'network',
  autoFixAvailable: true,
  fixStrategy: 'Retry with exponential backoff',
});

describe('MitigatorService', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  function createMitigator(values: Record<string, unknown> = {}) {
    return new MitigatorService(
      createConfigService({ HEALING_BACKOFF_BASE_MS: 1, ...values }),
    );
  }

  describe('network', () => {
    it('should back off per endpoint, then switch to fallback', async () => {
      const mitigator = createMitigator();
      const results = [];
      for (let i = 0; i < 4; i++) {
        const outcome = await mitigator.mitigate([network], { endpoint: 'rates' });
        results.push(outcome.strategiesApplied[0]?.result);
      }

      expect(results.map((r) => r?.strategy)).toEqual([
        'exponential_backoff_retry',
        'exponential_backoff_retry',
        'exponential_backoff_retry',
        'fallback_mechanism',
      ]);
      expect(results.map((r) => r?.delayMs)).toEqual([2, 4, 8, undefined]);
      expect(results[2]?.suggestion).toBe('Retry 3/3 with backoff');
      expect(results[3]?.fallbackUsed).toBe(true);
      expect(mitigator.getRetryCount('rates')).toBe(3);
      expect(mitigator.getRetryCount('other')).toBe(0);
    });

    it('should wait 2^attempt seconds with the default base', async () => {
      vi.useFakeTimers();
      const mitigator = new MitigatorService(createConfigService());

      const pending = mitigator.mitigate([network], { endpoint: 'rates' });
      await vi.advanceTimersByTimeAsync(2000);
      const outcome = await pending;

      expect(outcome.success).toBe(true);
      expect(outcome.strategiesApplied[0]?.result.delayMs).toBe(2000);
    });

    it('should abort the backoff wait when the signal fires', async () => {
      const mitigator = createMitigator({ HEALING_BACKOFF_BASE_MS: 60_000 });
      const controller = new AbortController();

      const pending = mitigator.mitigate([network], { endpoint: 'rates' }, controller.signal);
      controller.abort(new Error('deadline exceeded'));
      const outcome = await pending;

      expect(outcome.success).toBe(false);
      expect(outcome.strategiesApplied).toEqual([]);
      expect(outcome.errors).toEqual(['network_timeout: deadline exceeded']);
    });
  });

  it('should stop at the first successful strategy', async () => {
    const mitigator = createMitigator();

    const outcome = await mitigator.mitigate(
      [
        makePattern({ id: 'invalid_decimal', category: 'validation' }),
        makePattern({ id: 'cache_unavailable', category: 'cache' }),
      ],
      {},
    );

    expect(outcome.success).toBe(true);
    expect(outcome.fallbackUsed).toBe(false);
    expect(outcome.strategiesApplied).toHaveLength(1);
    expect(outcome.strategiesApplied[0]?.result.strategy).toBe('input_sanitization');
  });

  it('should continue past strategies that report failure', async () => {
    const mitigator = createMitigator();

    const outcome = await mitigator.mitigate(
      [
        makePattern({ id: 'auto_error_7', category: 'system' }),
        makePattern({ id: 'cache_unavailable', category: 'cache' }),
      ],
      {},
    );

    expect(outcome.strategiesApplied.map((s) => s.result.success)).toEqual([false, true]);
    expect(outcome.fallbackUsed).toBe(true);
  });

  it('should suggest epsilon substitution only for division by zero', async () => {
    const mitigator = createMitigator();

    const divide = await mitigator.mitigate(
      [makePattern({ id: 'div_by_zero', category: 'calculation' })],
      {},
    );
    const other = await mitigator.mitigate(
      [makePattern({ id: 'auto_rangeerror_7', category: 'calculation' })],
      {},
    );

    expect(divide.strategiesApplied[0]?.result.strategy).toBe('epsilon_replacement');
    expect(other.success).toBe(false);
    expect(other.strategiesApplied[0]?.result.reason).toBe(
      'No specific mitigation available',
    );
  });

  it('should fall back to stale rates only for recoverable currency errors', async () => {
    const mitigator = createMitigator();

    const exhausted = await mitigator.mitigate(
      [makePattern({ id: 'providers_exhausted', category: 'currency', autoFixAvailable: true })],
      {},
    );
    const unsupported = await mitigator.mitigate(
      [makePattern({ id: 'unsupported_currency', category: 'currency' })],
      {},
    );

    expect(exhausted.strategiesApplied[0]?.result).toMatchObject({
      success: true,
      strategy: 'stale_rate_fallback',
      fallbackUsed: true,
    });
    expect(unsupported.success).toBe(false);
  });

  it('should report failure for an empty pattern list', async () => {
    const outcome = await createMitigator().mitigate([], {});

    expect(outcome).toEqual({
      success: false,
      fallbackUsed: false,
      strategiesApplied: [],
      errors: [],
    });
  });
});
