import type {
  AgentRequest,
  AgentResult,
  AgentStatus,
  Dimension,
  Finding,
  PageData,
  TokenUsage,
} from '../types/analysis.js';
import type { InferenceOutput } from '../services/inferenceClient.js';
import { errorMessage, MalformedOutputError, TimeoutError } from '../utils/errors.js';
import { fingerprint } from '../utils/fingerprint.js';
import { parseVerdict, type ModelVerdict } from '../utils/modelJson.js';
import { withTimeout } from '../utils/timeout.js';
import type { Agent, AgentDeps, AnalyzeOptions, ModelCall } from './types.js';

const MAX_ATTEMPTS_PER_CALL = 2;
const DEFAULT_CALL_TIMEOUT_MS = 20_000;

interface Tally {
  calls: number;
  usage: TokenUsage;
}

type CallOutcome =
  | { ok: true; call: ModelCall; verdict: ModelVerdict }
  | { ok: false; call: ModelCall; error: unknown };

export function clampScore(score: number): number {
  return Math.min(100, Math.max(0, score));
}

function roundOne(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Shared agent behaviour: cache lookup, per-call timeouts, one retry on
 * malformed output, score normalization and cache population. Variants only
 * choose their input slice and the model calls to make.
 */
export abstract class BaseAgent<TInput> implements Agent<TInput> {
  abstract readonly dimension: Dimension;
  abstract readonly name: string;
  protected readonly promptVersion: number = 1;

  constructor(protected readonly deps: AgentDeps) {}

  protected abstract selectInput(page: PageData): TInput;

  protected abstract planCalls(input: TInput): ModelCall[];

  /** Agent kind used in the fingerprint; bump promptVersion when prompts change. */
  get kind(): string {
    return `${this.dimension}@v${this.promptVersion}`;
  }

  createRequest(page: PageData): AgentRequest<TInput> {
    const input = this.selectInput(page);
    return {
      dimension: this.dimension,
      input,
      fingerprint: fingerprint(this.kind, input),
    };
  }

  async analyze(request: AgentRequest<TInput>, options: AnalyzeOptions = {}): Promise<AgentResult> {
    const start = Date.now();
    const tally: Tally = { calls: 0, usage: { promptTokens: 0, completionTokens: 0 } };

    try {
      const cached = await this.deps.cache.get(request.fingerprint);
      options.meter?.recordCacheLookup(cached !== undefined);
      if (cached) {
        console.log(`[agent:${this.dimension}] cache hit — score=${cached.score}`);
        return {
          ...cached,
          fromCache: true,
          calls: 0,
          usage: { promptTokens: 0, completionTokens: 0 },
          durationMs: Date.now() - start,
        };
      }

      const plan = this.planCalls(request.input);
      if (plan.length === 0) {
        return this.failure('FAILED', 'No model calls planned', tally, start);
      }

      console.log(`[agent:${this.dimension}] starting analysis (${plan.length} call(s))`);
      const outcomes = await Promise.all(
        plan.map((call) =>
          this.execute(call, options, tally).then(
            (verdict): CallOutcome => ({ ok: true, call, verdict }),
            (error: unknown): CallOutcome => ({ ok: false, call, error })
          )
        )
      );

      if (options.signal?.aborted) {
        return this.failure('FAILED', 'Aborted by caller', tally, start);
      }

      const successes = outcomes.filter((o): o is Extract<CallOutcome, { ok: true }> => o.ok);
      const failures = outcomes.filter((o): o is Extract<CallOutcome, { ok: false }> => !o.ok);

      if (successes.length === 0) {
        const primary = failures[0].error;
        const status: AgentStatus = primary instanceof TimeoutError ? 'TIMED_OUT' : 'FAILED';
        console.warn(`[agent:${this.dimension}] ${status}: ${errorMessage(primary)}`);
        return this.failure(status, errorMessage(primary), tally, start);
      }

      const result = this.combine(successes, failures, tally, start);
      const ttl = options.cacheTtlMs;
      try {
        await this.deps.cache.put(request.fingerprint, result, ttl);
      } catch (error) {
        console.warn(`[agent:${this.dimension}] cache write failed:`, errorMessage(error));
      }
      console.log(`[agent:${this.dimension}] ✓ completed — score=${result.score}`);
      return result;
    } catch (error) {
      console.error(`[agent:${this.dimension}] unexpected error:`, error);
      return this.failure('FAILED', errorMessage(error), tally, start);
    }
  }

  private async execute(call: ModelCall, options: AnalyzeOptions, tally: Tally): Promise<ModelVerdict> {
    const timeoutMs = options.callTimeoutMs ?? this.deps.defaultCallTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;

    for (let attempt = 1; ; attempt++) {
      tally.calls++;
      options.meter?.recordCall();

      try {
        const output = await withTimeout((signal) => this.invoke(call, signal), timeoutMs, {
          parent: options.signal,
          label: `${this.dimension} ${call.label}`,
        });
        tally.usage.promptTokens += output.usage.promptTokens;
        tally.usage.completionTokens += output.usage.completionTokens;
        options.meter?.recordUsage(output.usage);
        return parseVerdict(output.text);
      } catch (error) {
        if (error instanceof MalformedOutputError && attempt < MAX_ATTEMPTS_PER_CALL) {
          console.warn(`[agent:${this.dimension}] malformed output from ${call.label}, retrying`);
          continue;
        }
        throw error;
      }
    }
  }

  private invoke(call: ModelCall, signal: AbortSignal): Promise<InferenceOutput> {
    if (call.kind === 'vision') {
      return this.deps.client.callVision(call.images, call.prompt, { signal, label: call.label });
    }
    return this.deps.client.callText(call.prompt, { signal, label: call.label });
  }

  private combine(
    successes: Array<Extract<CallOutcome, { ok: true }>>,
    failures: Array<Extract<CallOutcome, { ok: false }>>,
    tally: Tally,
    start: number
  ): AgentResult {
    const findings: Finding[] = [];
    const summaries: string[] = [];
    let weighted = 0;
    let totalWeight = 0;

    for (const { call, verdict } of successes) {
      const score = clampScore(verdict.score);
      findings.push(...verdict.findings);
      if (score !== verdict.score) {
        findings.push({
          severity: 'WARNING',
          message: `Model score ${verdict.score} was outside 0-100 and was clamped to ${score}`,
          evidence: call.label,
        });
      }
      if (verdict.summary) summaries.push(verdict.summary);
      weighted += score * call.weight;
      totalWeight += call.weight;
    }

    if (failures.length > 0) {
      findings.push({
        severity: 'WARNING',
        message: `Only ${successes.length} of ${successes.length + failures.length} model calls succeeded`,
        evidence: failures.map((f) => `${f.call.label}: ${errorMessage(f.error)}`).join('; '),
      });
    }

    const score = totalWeight > 0 ? roundOne(weighted / totalWeight) : 0;

    return {
      dimension: this.dimension,
      agentName: this.name,
      score: clampScore(score),
      findings,
      summary: summaries.join(' '),
      usage: { ...tally.usage },
      calls: tally.calls,
      status: 'SUCCESS',
      fromCache: false,
      durationMs: Date.now() - start,
    };
  }

  protected failure(status: AgentStatus, error: string, tally: Tally, start: number): AgentResult {
    return {
      dimension: this.dimension,
      agentName: this.name,
      score: 0,
      findings: [],
      summary: '',
      usage: { ...tally.usage },
      calls: tally.calls,
      status,
      error,
      fromCache: false,
      durationMs: Date.now() - start,
    };
  }
}
