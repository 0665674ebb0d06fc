import type { AgentRequest, AgentResult, Dimension, ImageRef, PageData } from '../types/analysis.js';
import type { InferenceClient } from '../services/inferenceClient.js';
import type { ResponseCache } from '../services/responseCache.js';
import type { UsageMeter } from '../utils/usageMeter.js';

export type ModelCall =
  | { kind: 'text'; label: string; prompt: string; weight: number }
  | { kind: 'vision'; label: string; prompt: string; images: ImageRef[]; weight: number };

export interface AnalyzeOptions {
  /** Cancels in-flight model calls when aborted. */
  signal?: AbortSignal;
  callTimeoutMs?: number;
  cacheTtlMs?: number;
  meter?: UsageMeter;
}

export interface Agent<TInput = unknown> {
  readonly dimension: Dimension;
  readonly name: string;
  createRequest(page: PageData): AgentRequest<TInput>;
  analyze(request: AgentRequest<TInput>, options?: AnalyzeOptions): Promise<AgentResult>;
}

export interface AgentDeps {
  client: InferenceClient;
  cache: ResponseCache;
  /** Used when analyze() is called without callTimeoutMs. */
  defaultCallTimeoutMs?: number;
}
