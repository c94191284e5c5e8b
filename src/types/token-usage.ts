export interface TokenUsage {
    inputTokens: number;
    outputTokens: number;
}

export interface TokenUsageStats {
    totalInputTokens: number;
    totalOutputTokens: number;
    calls: number;
    totalCost?: number; // Only set if pricing configured
}

export interface PricingConfig {
    inputPricePerMillion?: number | undefined;
    outputPricePerMillion?: number | undefined;
}

/**
 * Calculates the cost for a given token usage and pricing configuration.
 * Returns undefined if pricing is insufficient (missing input/output prices).
 */
export function calculateCost(usage: TokenUsage, pricing?: PricingConfig): number | undefined {
    if (!pricing || pricing.inputPricePerMillion === undefined || pricing.outputPricePerMillion === undefined) {
        return undefined;
    }

    const inputCost = (usage.inputTokens / 1_000_000) * pricing.inputPricePerMillion;
    const outputCost = (usage.outputTokens / 1_000_000) * pricing.outputPricePerMillion;

    return inputCost + outputCost;
}

/*
 * Accumulates usage across model calls. Owned by whoever runs a research
 * session (the CLI creates one per invocation).
 */
export class UsageTracker {
    private inputTokens = 0;
    private outputTokens = 0;
    private calls = 0;

    record(usage?: TokenUsage): void {
        this.calls += 1;
        if (!usage) return;
        this.inputTokens += usage.inputTokens;
        this.outputTokens += usage.outputTokens;
    }

    stats(pricing?: PricingConfig): TokenUsageStats {
        const stats: TokenUsageStats = {
            totalInputTokens: this.inputTokens,
            totalOutputTokens: this.outputTokens,
            calls: this.calls,
        };
        const cost = calculateCost({ inputTokens: this.inputTokens, outputTokens: this.outputTokens }, pricing);
        if (cost !== undefined) {
            stats.totalCost = cost;
        }
        return stats;
    }
}
