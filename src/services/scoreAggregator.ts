import {
  DIMENSIONS,
  type AgentResult,
  type AgentResults,
  type CEPSResult,
  type Dimension,
  type DimensionScore,
  type Grade,
  type RunMetrics,
} from '../types/analysis.js';

export const BASE_WEIGHTS: Readonly<Record<Dimension, number>> = Object.freeze({
  TEXT: 0.25,
  UX: 0.25,
  TECH: 0.15,
  TRUST: 0.2,
  VISUAL: 0.15,
});

const GRADE_THRESHOLDS: ReadonlyArray<[number, Grade]> = [
  [90, 'A'],
  [80, 'B'],
  [70, 'C'],
  [60, 'D'],
];

export function gradeFor(score: number): Grade {
  for (const [threshold, grade] of GRADE_THRESHOLDS) {
    if (score >= threshold) return grade;
  }
  return 'F';
}

function roundOne(value: number): number {
  return Math.round(value * 10) / 10;
}

function totalsFromResults(results: AgentResult[]): Omit<RunMetrics, 'cache'> {
  return results.reduce(
    (acc, r) => ({
      externalCalls: acc.externalCalls + r.calls,
      promptTokens: acc.promptTokens + r.usage.promptTokens,
      completionTokens: acc.completionTokens + r.usage.completionTokens,
      durationMs: Math.max(acc.durationMs, r.durationMs),
    }),
    { externalCalls: 0, promptTokens: 0, completionTokens: 0, durationMs: 0 }
  );
}

/**
 * Combines per-dimension results into the overall CEPS score. Weights of
 * dimensions that did not succeed (or are absent) are dropped and the rest
 * renormalized so the applied weights always sum to 1.
 */
export function aggregate(results: AgentResults, metrics?: Omit<RunMetrics, 'cache'>): CEPSResult {
  const present = DIMENSIONS.flatMap((d) => {
    const result = results[d];
    return result ? [result] : [];
  });
  const successful = present.filter((r) => r.status === 'SUCCESS');
  const successWeight = successful.reduce((sum, r) => sum + BASE_WEIGHTS[r.dimension], 0);
  const noData = successful.length === 0 || successWeight <= 0;

  const dimensions: Partial<Record<Dimension, DimensionScore>> = {};
  let overall = 0;

  for (const result of present) {
    const baseWeight = BASE_WEIGHTS[result.dimension];
    const ok = result.status === 'SUCCESS' && !noData;
    const appliedWeight = ok ? baseWeight / successWeight : 0;
    if (ok) overall += result.score * appliedWeight;

    dimensions[result.dimension] = {
      status: result.status,
      score: result.status === 'SUCCESS' ? result.score : null,
      baseWeight,
      appliedWeight,
      summary: result.summary,
      findings: result.findings.map((f) => ({ ...f })),
      ...(result.error !== undefined ? { error: result.error } : {}),
    };
  }

  const overallScore = noData ? 0 : roundOne(Math.min(100, Math.max(0, overall)));
  const totals = metrics ?? totalsFromResults(present);

  return {
    overallScore,
    grade: noData ? 'F' : gradeFor(overallScore),
    noData,
    dimensions,
    failedDimensions: present.filter((r) => r.status !== 'SUCCESS').map((r) => r.dimension),
    externalCalls: totals.externalCalls,
    usage: {
      promptTokens: totals.promptTokens,
      completionTokens: totals.completionTokens,
      totalTokens: totals.promptTokens + totals.completionTokens,
    },
    durationMs: totals.durationMs,
  };
}
