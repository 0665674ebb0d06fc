import type { Agent } from '../agents/types.js';
import {
  DIMENSIONS,
  isDimension,
  type AgentResult,
  type AgentResults,
  type AgentStatus,
  type AnalysisConfig,
  type Dimension,
  type PageData,
  type RunReport,
} from '../types/analysis.js';
import { DeadlineExceededError, errorMessage, TimeoutError, ValidationError } from '../utils/errors.js';
import { MAX_TIMER_DELAY_MS, withTimeout } from '../utils/timeout.js';
import { UsageMeter } from '../utils/usageMeter.js';

export type AgentRegistry = Partial<Record<Dimension, Agent>>;

function positive(name: string, value: number | undefined): void {
  if (value === undefined) return;
  if (!Number.isFinite(value) || value <= 0) {
    throw new ValidationError(`${name} must be a positive number of milliseconds`);
  }
  if (value > MAX_TIMER_DELAY_MS) {
    throw new ValidationError(`${name} must be at most ${MAX_TIMER_DELAY_MS} milliseconds`);
  }
}

/** Throws ValidationError on configuration that cannot produce a run. */
export function validateAnalysisConfig(config: AnalysisConfig, agents: AgentRegistry): void {
  if (!Array.isArray(config.dimensions) || config.dimensions.length === 0) {
    throw new ValidationError('At least one dimension must be requested');
  }
  for (const dimension of config.dimensions) {
    if (!isDimension(dimension)) {
      throw new ValidationError(`Unknown dimension: ${String(dimension)}`);
    }
    if (!agents[dimension]) {
      throw new ValidationError(`No agent registered for dimension ${dimension}`);
    }
  }
  if (new Set(config.dimensions).size !== config.dimensions.length) {
    throw new ValidationError('Dimensions must not repeat');
  }
  positive('perAgentTimeoutMs', config.perAgentTimeoutMs);
  positive('overallDeadlineMs', config.overallDeadlineMs);
  positive('callTimeoutMs', config.callTimeoutMs);
  if (!Number.isFinite(config.cacheTtlMs) || config.cacheTtlMs < 0) {
    throw new ValidationError('cacheTtlMs must be zero or a positive number of milliseconds');
  }
  for (const [dimension, ttl] of Object.entries(config.cacheTtlByDimension ?? {})) {
    if (!isDimension(dimension) || ttl === undefined || !Number.isFinite(ttl) || ttl < 0) {
      throw new ValidationError(`Invalid cache TTL override for ${dimension}`);
    }
  }
  if (config.maxConcurrency !== undefined && (!Number.isInteger(config.maxConcurrency) || config.maxConcurrency < 1)) {
    throw new ValidationError('maxConcurrency must be a positive integer');
  }
}

function placeholder(agent: Agent, status: AgentStatus, error: string, durationMs: number): AgentResult {
  return {
    dimension: agent.dimension,
    agentName: agent.name,
    score: 0,
    findings: [],
    summary: '',
    usage: { promptTokens: 0, completionTokens: 0 },
    calls: 0,
    status,
    error,
    fromCache: false,
    durationMs,
  };
}

/**
 * Runs the requested agents against one page. Each agent gets its own
 * timeout, the whole run gets a deadline, and no agent failure escapes:
 * every requested dimension ends up with exactly one result.
 */
export class Orchestrator {
  constructor(private readonly agents: AgentRegistry) {}

  validate(config: AnalysisConfig): void {
    validateAnalysisConfig(config, this.agents);
  }

  async run(page: PageData, config: AnalysisConfig): Promise<RunReport> {
    this.validate(config);

    const start = Date.now();
    const dimensions = DIMENSIONS.filter((d) => config.dimensions.includes(d));
    const maxConcurrency = Math.min(config.maxConcurrency ?? dimensions.length, dimensions.length);
    const meter = new UsageMeter();
    const runController = new AbortController();
    const frozen = Object.freeze({ ...page });

    const results = new Map<Dimension, AgentResult>();
    const queue = [...dimensions];
    let active = 0;
    let closed = false;

    console.log(`[orchestrator] run started for ${page.url}`, {
      dimensions,
      maxConcurrency,
      perAgentTimeoutMs: config.perAgentTimeoutMs,
      overallDeadlineMs: config.overallDeadlineMs,
    });

    return new Promise<RunReport>((resolve) => {
      const finish = (reason: string) => {
        if (closed) return;
        closed = true;
        clearTimeout(deadline);

        const pending = dimensions.filter((d) => !results.has(d));
        if (pending.length > 0) {
          runController.abort(new DeadlineExceededError());
          for (const dimension of pending) {
            const agent = this.requireAgent(dimension);
            results.set(dimension, placeholder(agent, 'SKIPPED', 'Run deadline exceeded before completion', Date.now() - start));
          }
          console.warn(`[orchestrator] ${reason}: skipped ${pending.join(', ')}`);
        }

        const ordered: AgentResults = {};
        for (const dimension of dimensions) {
          ordered[dimension] = results.get(dimension);
        }
        const report: RunReport = {
          results: ordered,
          metrics: {
            ...meter.snapshot(),
            durationMs: Date.now() - start,
          },
        };
        console.log(`[orchestrator] run finished in ${report.metrics.durationMs}ms`, {
          statuses: Object.fromEntries(dimensions.map((d) => [d, results.get(d)?.status])),
          externalCalls: report.metrics.externalCalls,
          cache: report.metrics.cache,
        });
        resolve(report);
      };

      const deadline = setTimeout(() => finish('run deadline exceeded'), config.overallDeadlineMs);

      const record = (dimension: Dimension, result: AgentResult) => {
        if (closed) return;
        results.set(dimension, result);
        if (results.size === dimensions.length) finish('all agents settled');
      };

      const dispatch = (dimension: Dimension) => {
        const agent = this.requireAgent(dimension);
        const dispatchedAt = Date.now();
        active++;

        this.runAgent(agent, frozen, config, meter, runController.signal)
          .catch((error: unknown): AgentResult => {
            if (error instanceof TimeoutError) {
              return placeholder(agent, 'TIMED_OUT', errorMessage(error), Date.now() - dispatchedAt);
            }
            return placeholder(agent, 'FAILED', errorMessage(error), Date.now() - dispatchedAt);
          })
          .then((result) => {
            active--;
            record(dimension, result);
            pump();
          })
          .catch((error: unknown) => {
            console.error(`[orchestrator] bookkeeping failed for ${dimension}:`, error);
          });
      };

      const pump = () => {
        while (!closed && active < maxConcurrency && queue.length > 0) {
          const next = queue.shift();
          if (next) dispatch(next);
        }
      };

      pump();
    });
  }

  private runAgent(
    agent: Agent,
    page: PageData,
    config: AnalysisConfig,
    meter: UsageMeter,
    runSignal: AbortSignal
  ): Promise<AgentResult> {
    const cacheTtlMs = config.cacheTtlByDimension?.[agent.dimension] ?? config.cacheTtlMs;
    return withTimeout(
      async (signal) => {
        const request = agent.createRequest(page);
        return agent.analyze(request, {
          signal,
          callTimeoutMs: config.callTimeoutMs ?? config.perAgentTimeoutMs,
          cacheTtlMs,
          meter,
        });
      },
      config.perAgentTimeoutMs,
      { parent: runSignal, label: `agent ${agent.dimension}` }
    );
  }

  private requireAgent(dimension: Dimension): Agent {
    const agent = this.agents[dimension];
    if (!agent) {
      throw new ValidationError(`No agent registered for dimension ${dimension}`);
    }
    return agent;
  }
}
