import { describe, it, expect } from 'vitest';
import { calculateCost, UsageTracker, type TokenUsage, type PricingConfig } from '../src/types/token-usage';

describe('calculateCost', () => {
  it('prices input and output per million tokens', () => {
    const usage: TokenUsage = { inputTokens: 500_000, outputTokens: 100_000 };
    const pricing: PricingConfig = { inputPricePerMillion: 10, outputPricePerMillion: 30 };
    expect(calculateCost(usage, pricing)).toBe(8);
  });

  it('returns undefined without complete pricing', () => {
    const usage: TokenUsage = { inputTokens: 100, outputTokens: 100 };
    expect(calculateCost(usage, undefined)).toBeUndefined();
    expect(calculateCost(usage, { outputPricePerMillion: 10 })).toBeUndefined();
    expect(calculateCost(usage, { inputPricePerMillion: 10 })).toBeUndefined();
  });

  it('handles zero tokens', () => {
    expect(calculateCost({ inputTokens: 0, outputTokens: 0 }, { inputPricePerMillion: 1, outputPricePerMillion: 1 })).toBe(0);
  });
});

describe('UsageTracker', () => {
  it('sums usage across calls and counts calls without usage', () => {
    const tracker = new UsageTracker();
    tracker.record({ inputTokens: 1_000_000, outputTokens: 200_000 });
    tracker.record();
    tracker.record({ inputTokens: 1_000_000, outputTokens: 300_000 });

    expect(tracker.stats()).toEqual({ totalInputTokens: 2_000_000, totalOutputTokens: 500_000, calls: 3 });
  });

  it('adds the total cost when pricing is complete', () => {
    const tracker = new UsageTracker();
    tracker.record({ inputTokens: 1_000_000, outputTokens: 1_000_000 });

    expect(tracker.stats({ inputPricePerMillion: 5, outputPricePerMillion: 15 }).totalCost).toBe(20);
  });
});
