import { FetchError, ValidationError } from '../utils/errors.js';
import { MAX_TIMER_DELAY_MS } from '../utils/timeout.js';

export interface FetchedPage {
    html: string;
    finalUrl: string;
    statusCode: number;
    elapsedMs: number;
    byteSize: number;
}

export interface FetcherOptions {
    timeoutMs: number;
    maxBytes: number;
    userAgent: string;
}

export interface Fetcher {
    fetchPage(url: string): Promise<FetchedPage>;
}

const BLOCKED_HOSTS = ['localhost', '127.0.0.1', '::1', '[::1]', '0.0.0.0'];

// undici hides the system error code (ENOTFOUND, ECONNREFUSED) in `cause`.
function describeFailure(error: unknown): string {
    if (!(error instanceof Error)) return String(error);
    const cause: unknown = error.cause;
    if (cause && typeof cause === 'object' && 'code' in cause) {
        return `${error.message} (${String(cause.code)})`;
    }
    return error.message;
}

// ---------- URL validation ----------

export function normalizeAndValidateUrl(raw: string): string {
    const trimmed = raw.trim();
    if (!trimmed) throw new ValidationError('URL is required');

    const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;

    let u: URL;
    try {
        u = new URL(withScheme);
    } catch {
        throw new ValidationError(`Invalid URL: ${raw}`);
    }
    if (!['http:', 'https:'].includes(u.protocol)) throw new ValidationError('Only http/https allowed');
    const host = u.hostname.toLowerCase();
    if (BLOCKED_HOSTS.includes(host)) throw new ValidationError('Local addresses not allowed');
    return u.toString();
}

/**
 * Fetches a page's HTML with a hard timeout and a body size cap. Redirects
 * are followed; the final URL is reported so links resolve against it.
 */
export class HttpFetcher implements Fetcher {
    constructor(private readonly options: FetcherOptions) {}

    async fetchPage(rawUrl: string): Promise<FetchedPage> {
        const url = normalizeAndValidateUrl(rawUrl);
        const { timeoutMs, maxBytes, userAgent } = this.options;

        const controller = new AbortController();
        const t = setTimeout(() => controller.abort(), Math.min(timeoutMs, MAX_TIMER_DELAY_MS));
        const start = Date.now();

        try {
            const resp = await fetch(url, {
                signal: controller.signal,
                redirect: 'follow',
                headers: {
                    'User-Agent': userAgent,
                    Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
                    'Accept-Language': 'en-US,en;q=0.5',
                },
            });

            if (!resp.ok) {
                throw new FetchError(`Page responded with ${resp.status} ${resp.statusText}`.trim(), resp.status);
            }

            const declared = Number(resp.headers.get('content-length') ?? NaN);
            if (Number.isFinite(declared) && declared > maxBytes) {
                throw new FetchError(`Page too large: ${declared} bytes (max ${maxBytes})`, resp.status);
            }

            const body = await this.readCapped(resp, maxBytes);
            const elapsedMs = Date.now() - start;
            console.log(`[fetcher] ${resp.status} ${resp.url || url} (${body.byteLength} bytes, ${elapsedMs}ms)`);

            return {
                html: new TextDecoder('utf-8').decode(body),
                finalUrl: resp.url || url,
                statusCode: resp.status,
                elapsedMs,
                byteSize: body.byteLength,
            };
        } catch (error) {
            if (error instanceof FetchError) throw error;
            if (controller.signal.aborted) {
                throw new FetchError(`Timed out fetching ${url} after ${timeoutMs}ms`);
            }
            throw new FetchError(`Failed to fetch ${url}: ${describeFailure(error)}`);
        } finally {
            clearTimeout(t);
        }
    }

    private async readCapped(resp: Response, maxBytes: number): Promise<Uint8Array> {
        if (!resp.body) return new Uint8Array(0);

        const reader = resp.body.getReader();
        const chunks: Uint8Array[] = [];
        let total = 0;

        for (;;) {
            const { done, value } = await reader.read();
            if (done) break;
            total += value.byteLength;
            if (total > maxBytes) {
                await reader.cancel();
                throw new FetchError(`Page too large: more than ${maxBytes} bytes (max ${maxBytes})`, resp.status);
            }
            chunks.push(value);
        }

        const out = new Uint8Array(total);
        let offset = 0;
        for (const chunk of chunks) {
            out.set(chunk, offset);
            offset += chunk.byteLength;
        }
        return out;
    }
}
