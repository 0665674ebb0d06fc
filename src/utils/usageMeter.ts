import type { RunMetrics, TokenUsage } from '../types/analysis.js';

/** Run-level counters shared by every agent dispatched in one run. */
export class UsageMeter {
  private calls = 0;
  private promptTokens = 0;
  private completionTokens = 0;
  private cacheHits = 0;
  private cacheMisses = 0;

  recordCall(): void {
    this.calls++;
  }

  recordUsage(usage: TokenUsage): void {
    this.promptTokens += usage.promptTokens;
    this.completionTokens += usage.completionTokens;
  }

  recordCacheLookup(hit: boolean): void {
    if (hit) this.cacheHits++;
    else this.cacheMisses++;
  }

  snapshot(): Omit<RunMetrics, 'durationMs'> {
    return {
      externalCalls: this.calls,
      promptTokens: this.promptTokens,
      completionTokens: this.completionTokens,
      cache: { hits: this.cacheHits, misses: this.cacheMisses },
    };
  }
}
