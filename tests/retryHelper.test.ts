import fc from 'fast-check';
import {
  computeBackoffDelay,
  createRetryPolicy,
  DEFAULT_RETRY_POLICY,
  initialRetryState,
  nextRetry,
  RetryPolicy,
  RetryState,
} from '../src/utils/retryHelper';

function schedule(policy: RetryPolicy): { delays: number[]; attempts: number } {
  const delays: number[] = [];
  let state: RetryState = initialRetryState();
  for (;;) {
    const next = nextRetry(policy, state, new Error('connection reset'));
    state = next.state;
    if (next.decision.action === 'give-up') {
      return { delays, attempts: next.decision.attempts };
    }
    delays.push(next.decision.delay);
  }
}

describe('retryHelper', () => {
  describe('createRetryPolicy', () => {
    it('should fill in defaults', () => {
      expect(createRetryPolicy({ maxRetries: 5 })).toEqual({ ...DEFAULT_RETRY_POLICY, maxRetries: 5 });
    });

    it.each([{ maxRetries: -1 }, { maxRetries: 1.5 }, { baseDelay: -10 }, { factor: 0.5 }])(
      'should reject %p',
      (overrides) => {
        expect(() => createRetryPolicy(overrides)).toThrow(RangeError);
      },
    );
  });

  describe('computeBackoffDelay', () => {
    it('should grow exponentially up to the cap', () => {
      const policy = createRetryPolicy({ baseDelay: 1000, maxDelay: 3000 });
      expect([1, 2, 3, 4].map((attempt) => computeBackoffDelay(policy, attempt))).toEqual([
        1000, 2000, 3000, 3000,
      ]);
    });
  });

  describe('nextRetry', () => {
    it('should retry maxRetries times and then give up', () => {
      const policy = createRetryPolicy({ maxRetries: 2, baseDelay: 100 });

      expect(schedule(policy)).toEqual({ delays: [100, 200], attempts: 3 });
    });

    it('should give up immediately without retries', () => {
      expect(schedule(createRetryPolicy({ maxRetries: 0 }))).toEqual({ delays: [], attempts: 1 });
    });

    it('should remember the last error', () => {
      const error = new Error('timeout');
      const next = nextRetry(DEFAULT_RETRY_POLICY, initialRetryState(), error);

      expect(next.state).toEqual({ attempt: 2, lastError: error });
      expect(next.decision).toEqual({ action: 'retry', attempt: 2, delay: 1000 });
    });

    it('should produce a bounded, non-decreasing schedule for any policy', () => {
      fc.assert(
        fc.property(
          fc.integer({ min: 0, max: 10 }),
          fc.integer({ min: 0, max: 5000 }),
          fc.integer({ min: 0, max: 60_000 }),
          fc.double({ min: 1, max: 4, noNaN: true }),
          (maxRetries, baseDelay, maxDelay, factor) => {
            const policy = createRetryPolicy({ maxRetries, baseDelay, maxDelay, factor });
            const { delays, attempts } = schedule(policy);

            expect(delays).toHaveLength(maxRetries);
            expect(attempts).toBe(maxRetries + 1);
            for (let i = 0; i < delays.length; i++) {
              expect(delays[i]).toBeLessThanOrEqual(maxDelay);
              if (i > 0) {
                expect(delays[i]).toBeGreaterThanOrEqual(delays[i - 1]);
              }
            }
          },
        ),
        { numRuns: 100 },
      );
    });
  });
});
