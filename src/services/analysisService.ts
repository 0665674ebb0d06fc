import crypto from 'crypto';
import type { AnalysisConfig, CEPSResult, PageAnalysis, PageData } from '../types/analysis.js';
import { errorMessage } from '../utils/errors.js';
import { withTimeout } from '../utils/timeout.js';
import type { Fetcher } from './fetcher.js';
import type { Orchestrator } from './orchestrator.js';
import type { PageParser } from './pageParser.js';
import type { CacheStats, ResponseCache } from './responseCache.js';
import { aggregate } from './scoreAggregator.js';

export type AnalysisOverrides = Partial<
    Pick<AnalysisConfig, 'dimensions' | 'perAgentTimeoutMs' | 'overallDeadlineMs' | 'cacheTtlMs'>
>;

export type JobStatus = 'QUEUED' | 'PROCESSING' | 'COMPLETED' | 'FAILED';

export interface AnalysisRequest {
    jobId: string;
    url: string;
    options?: AnalysisOverrides;
}

export interface AnalysisJobResult {
    jobId: string;
    status: 'COMPLETED' | 'FAILED';
    analysis?: PageAnalysis;
    error?: string;
}

export interface CallbackSettings {
    url: string;
    secret: string;
    apiKey: string;
    timeoutMs?: number;
}

export interface AnalysisServiceDeps {
    orchestrator: Orchestrator;
    fetcher: Fetcher;
    parser: PageParser;
    cache: ResponseCache;
    defaults: AnalysisConfig;
    maxConcurrentJobs?: number;
    /** Watchdog for one queued job, fetch included. */
    jobTimeoutMs?: number;
    callback?: CallbackSettings;
    /** Finished jobs are forgotten after this long. */
    jobRetentionMs?: number;
    /** Oldest finished jobs are forgotten beyond this many. */
    maxRetainedJobs?: number;
    now?: () => number;
}

export interface CacheReport extends CacheStats {
    entries: number;
}

export class AnalysisService {
    private jobStatuses = new Map<string, JobStatus>();
    private jobResults = new Map<string, AnalysisJobResult>();
    // Finish times, oldest first
    private jobFinishedAt = new Map<string, number>();
    private activeJobs = 0;
    private readonly maxConcurrentJobs: number;
    private readonly jobTimeoutMs: number;
    private readonly jobRetentionMs: number;
    private readonly maxRetainedJobs: number;
    private readonly now: () => number;

    private queue: AnalysisRequest[] = [];
    private pumping = false;

    constructor(private readonly deps: AnalysisServiceDeps) {
        this.maxConcurrentJobs = Math.max(1, deps.maxConcurrentJobs ?? 1);
        this.jobTimeoutMs = deps.jobTimeoutMs ?? 120_000;
        this.jobRetentionMs = deps.jobRetentionMs ?? 60 * 60 * 1000;
        this.maxRetainedJobs = Math.max(1, deps.maxRetainedJobs ?? 1000);
        this.now = deps.now ?? Date.now;
        // Misconfigured defaults would otherwise fail every request
        deps.orchestrator.validate(deps.defaults);
    }

    // ---------- Synchronous analysis ----------

    resolveConfig(overrides: AnalysisOverrides = {}): AnalysisConfig {
        const { defaults } = this.deps;
        return {
            ...defaults,
            dimensions: overrides.dimensions ? [...overrides.dimensions] : [...defaults.dimensions],
            perAgentTimeoutMs: overrides.perAgentTimeoutMs ?? defaults.perAgentTimeoutMs,
            overallDeadlineMs: overrides.overallDeadlineMs ?? defaults.overallDeadlineMs,
            cacheTtlMs: overrides.cacheTtlMs ?? defaults.cacheTtlMs,
        };
    }

    async analyzePage(page: PageData, overrides: AnalysisOverrides = {}): Promise<CEPSResult> {
        const runConfig = this.resolveConfig(overrides);
        const report = await this.deps.orchestrator.run(page, runConfig);
        const result = aggregate(report.results, report.metrics);

        console.log(`[analysis] ${page.url} scored ${result.overallScore} (${result.grade})`, {
            noData: result.noData,
            failed: result.failedDimensions,
            calls: result.externalCalls,
            tokens: result.usage.totalTokens,
            cache: report.metrics.cache,
            durationMs: result.durationMs,
        });
        return result;
    }

    async analyzeUrl(url: string, overrides: AnalysisOverrides = {}): Promise<PageAnalysis> {
        const fetched = await this.deps.fetcher.fetchPage(url);
        const page = this.deps.parser.parse(fetched.html, {
            url: fetched.finalUrl,
            statusCode: fetched.statusCode,
            responseTimeMs: fetched.elapsedMs,
            byteSize: fetched.byteSize,
        });
        const result = await this.analyzePage(page, overrides);
        return {
            url: fetched.finalUrl,
            statusCode: fetched.statusCode,
            analyzedAt: new Date().toISOString(),
            result,
        };
    }

    // ---------- Jobs ----------

    async startAnalysis(request: AnalysisRequest): Promise<void> {
        this.deps.orchestrator.validate(this.resolveConfig(request.options));
        this.jobStatuses.set(request.jobId, 'QUEUED');
        this.jobResults.delete(request.jobId);
        this.jobFinishedAt.delete(request.jobId);
        this.queue.push(request);
        this.pumpQueue();
    }

    private pumpQueue(): void {
        if (this.pumping) return;
        this.pumping = true;
        try {
            while (this.activeJobs < this.maxConcurrentJobs && this.queue.length) {
                const next = this.queue.shift();
                if (!next) break;
                this.activeJobs++;
                this.jobStatuses.set(next.jobId, 'PROCESSING');

                this.processAnalysis(next)
                    .catch((err: unknown) => console.error(`[analysis] job ${next.jobId} bookkeeping failed:`, err))
                    .finally(() => {
                        this.activeJobs--;
                        this.pumpQueue();
                    });
            }
        } finally {
            this.pumping = false;
        }
    }

    async getAnalysisStatus(jobId: string): Promise<JobStatus | null> {
        return this.jobStatuses.get(jobId) ?? null;
    }

    async getAnalysisDetails(jobId: string): Promise<AnalysisJobResult | null> {
        return this.jobResults.get(jobId) ?? null;
    }

    /** Forgets finished jobs past their retention; returns how many were dropped. */
    pruneJobs(): number {
        const cutoff = this.now() - this.jobRetentionMs;
        let removed = 0;
        for (const [jobId, finishedAt] of this.jobFinishedAt) {
            if (finishedAt > cutoff && this.jobFinishedAt.size <= this.maxRetainedJobs) break;
            this.jobFinishedAt.delete(jobId);
            this.jobStatuses.delete(jobId);
            this.jobResults.delete(jobId);
            removed++;
        }
        if (removed > 0) console.log(`[analysis] pruned ${removed} finished job(s)`);
        return removed;
    }

    private async processAnalysis(request: AnalysisRequest): Promise<void> {
        console.log(`[analysis] job ${request.jobId} started: ${request.url}`);
        let outcome: AnalysisJobResult;

        try {
            const analysis = await withTimeout(
                () => this.analyzeUrl(request.url, request.options),
                this.jobTimeoutMs,
                { label: `job ${request.jobId}` }
            );
            outcome = { jobId: request.jobId, status: 'COMPLETED', analysis };
            console.log(`[analysis] job ${request.jobId} completed`, {
                score: analysis.result.overallScore,
                grade: analysis.result.grade,
            });
        } catch (error) {
            const errText = errorMessage(error);
            console.error(`[analysis] job ${request.jobId} failed:`, errText);
            outcome = { jobId: request.jobId, status: 'FAILED', error: errText };
        }

        this.jobStatuses.set(request.jobId, outcome.status);
        this.jobResults.set(request.jobId, outcome);
        this.jobFinishedAt.delete(request.jobId);
        this.jobFinishedAt.set(request.jobId, this.now());
        this.pruneJobs();
        this.sendCallback(outcome).catch((err: unknown) => console.warn('[callback] error (ignored):', err));
    }

    // ---------- Cache ----------

    async cacheReport(): Promise<CacheReport> {
        return { ...this.deps.cache.stats(), entries: await this.deps.cache.size() };
    }

    async purgeCache(): Promise<void> {
        await this.deps.cache.purge();
        this.deps.cache.resetStats();
        console.log('[cache] purged');
    }

    // ---------- Callback ----------

    private async sendCallback(result: AnalysisJobResult): Promise<void> {
        const callback = this.deps.callback;
        if (!callback?.url) {
            console.log('[callback] no callbackUrl configured – skipping');
            return;
        }

        const body = JSON.stringify(result);
        const signature = crypto.createHmac('sha256', callback.secret).update(body).digest('hex');

        const controller = new AbortController();
        const t = setTimeout(() => controller.abort(), callback.timeoutMs ?? 15_000);

        try {
            const resp = await fetch(callback.url, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    'X-Signature': `sha256=${signature}`,
                    'X-API-Key': callback.apiKey,
                },
                body,
                signal: controller.signal,
            });

            if (!resp.ok) {
                console.error('[callback] failed:', resp.status, resp.statusText);
                const text = await resp.text().catch(() => '');
                if (text) console.error('[callback] body:', text);
            } else {
                console.log('[callback] ok');
            }
        } catch (e) {
            if (controller.signal.aborted) {
                console.error('[callback] timeout');
            } else {
                console.error('[callback] error:', errorMessage(e));
            }
        } finally {
            clearTimeout(t);
        }
    }
}
