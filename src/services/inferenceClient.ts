import OpenAI from 'openai';
import type { ImageRef, TokenUsage } from '../types/analysis.js';
import { MalformedOutputError, TransportError } from '../utils/errors.js';

export interface InferenceOutput {
  text: string;
  usage: TokenUsage;
}

export interface InferenceCallOptions {
  signal?: AbortSignal;
  label?: string;
}

export interface InferenceClient {
  callText(prompt: string, options?: InferenceCallOptions): Promise<InferenceOutput>;
  callVision(images: ImageRef[], prompt: string, options?: InferenceCallOptions): Promise<InferenceOutput>;
}

export interface OpenAIInferenceOptions {
  apiKey: string;
  baseURL: string;
  model: string;
  visionModel?: string;
  temperature?: number;
  maxTokens?: number;
  maxRetries?: number;
  imageTimeoutMs?: number;
  maxImageBytes?: number;
}

function abortReason(signal: AbortSignal, fallback?: unknown): unknown {
  if (signal.reason instanceof Error) return signal.reason;
  return fallback ?? new TransportError('Inference request aborted');
}

/**
 * InferenceClient over any OpenAI-compatible chat completions endpoint
 * (Gemini's compatibility layer by default).
 */
export class OpenAIInferenceClient implements InferenceClient {
  private readonly client: OpenAI;
  private readonly options: Required<Omit<OpenAIInferenceOptions, 'apiKey' | 'baseURL'>>;

  constructor(options: OpenAIInferenceOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      maxRetries: options.maxRetries ?? 0,
    });
    this.options = {
      model: options.model,
      visionModel: options.visionModel ?? options.model,
      temperature: options.temperature ?? 0.2,
      maxTokens: options.maxTokens ?? 1024,
      maxRetries: options.maxRetries ?? 0,
      imageTimeoutMs: options.imageTimeoutMs ?? 10_000,
      maxImageBytes: options.maxImageBytes ?? 4 * 1024 * 1024,
    };
    console.log(`[inference] client ready: model=${this.options.model} baseURL=${options.baseURL}`);
  }

  async callText(prompt: string, options: InferenceCallOptions = {}): Promise<InferenceOutput> {
    return this.complete(this.options.model, [{ role: 'user', content: prompt }], options);
  }

  async callVision(images: ImageRef[], prompt: string, options: InferenceCallOptions = {}): Promise<InferenceOutput> {
    const parts: OpenAI.Chat.ChatCompletionContentPart[] = [{ type: 'text', text: prompt }];

    for (const image of images) {
      if (options.signal?.aborted) {
        throw abortReason(options.signal);
      }
      const dataUrl = await this.downloadImage(image.url, options.signal);
      if (dataUrl) {
        parts.push({ type: 'image_url', image_url: { url: dataUrl } });
        console.log(`[inference]    ✓ downloaded image: ${image.url.slice(0, 80)}`);
      } else {
        console.warn(`[inference]    ✗ failed to download: ${image.url.slice(0, 80)}`);
      }
    }

    if (parts.length === 1) {
      throw new TransportError('No images could be downloaded');
    }

    return this.complete(this.options.visionModel, [{ role: 'user', content: parts }], options);
  }

  private async complete(
    model: string,
    messages: OpenAI.Chat.ChatCompletionMessageParam[],
    options: InferenceCallOptions
  ): Promise<InferenceOutput> {
    const label = options.label ?? 'inference';
    const start = Date.now();
    console.log(`[inference] >> sending request (${label})`);

    let response: OpenAI.Chat.ChatCompletion;
    try {
      response = await this.client.chat.completions.create(
        {
          model,
          messages,
          temperature: this.options.temperature,
          max_tokens: this.options.maxTokens,
        },
        { signal: options.signal }
      );
    } catch (error) {
      if (options.signal?.aborted) {
        throw abortReason(options.signal, error);
      }
      if (error instanceof OpenAI.APIError) {
        throw new TransportError(`Provider error: ${error.message}`, { status: error.status, cause: error });
      }
      const detail = error instanceof Error ? error.message : String(error);
      throw new TransportError(`Inference request failed: ${detail}`, { cause: error });
    }

    const usage: TokenUsage = {
      promptTokens: response.usage?.prompt_tokens ?? 0,
      completionTokens: response.usage?.completion_tokens ?? 0,
    };
    console.log(`[inference] << response received (${label}) in ${Date.now() - start}ms`, usage);

    const text = response.choices[0]?.message?.content?.trim();
    if (!text) {
      throw new MalformedOutputError('Empty response content from model');
    }
    return { text, usage };
  }

  private async downloadImage(url: string, signal?: AbortSignal): Promise<string | null> {
    const controller = new AbortController();
    const t = setTimeout(() => controller.abort(), this.options.imageTimeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await fetch(url, { signal: controller.signal });
      if (!response.ok) return null;

      const contentType = response.headers.get('content-type') ?? '';
      if (!contentType.startsWith('image/')) return null;

      const bytes = Buffer.from(await response.arrayBuffer());
      if (bytes.byteLength > this.options.maxImageBytes) return null;

      return `data:${contentType.split(';')[0]};base64,${bytes.toString('base64')}`;
    } catch (error) {
      console.warn('[inference] image download error:', error instanceof Error ? error.message : error);
      return null;
    } finally {
      clearTimeout(t);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
