/**
 * GRIB Run Fetcher — WCS Transport
 *
 * Every request to the coverage service goes through here: a single GET per
 * attempt with an idle timeout and the API key header. The timeout bounds the
 * wait for the response headers and every gap between body chunks, never the
 * whole transfer, so a large file that keeps streaming always completes.
 *
 * Timeouts are retried after a fixed backoff, by default forever. Anything
 * else (refused connection, DNS, TLS, non-2xx status) fails on the spot.
 */

import { TransportError, TransportTimeoutError } from '../errors';
import { WCS_SERVICE, type DownloaderConfig, type Logger } from '../types';

// =============================================================================
// Retry Policy
// =============================================================================

export interface RetryPolicy {
    /** Longest wait for the headers or for the next body chunk */
    timeoutMs: number;
    /** Fixed wait between a timed-out attempt and the next one */
    backoffMs: number;
    /** Give up after this many attempts (unset: unlimited) */
    maxAttempts?: number;
    /** Give up once this much time has passed since the first attempt (unset: unlimited) */
    maxDurationMs?: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
    timeoutMs: 5_000,
    backoffMs: 2_000
};

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;
export type SleepFn = (ms: number) => Promise<void>;

export type QueryParams = Record<string, string>;

export interface TransportOptions {
    retry?: Partial<RetryPolicy>;
    fetch?: FetchFn;
    sleep?: SleepFn;
    now?: () => number;
    log?: Logger;
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

// Idle aborts reject with an error named TimeoutError; fetch may wrap an abort as AbortError.
function isTimeout(error: unknown): boolean {
    if (typeof error !== 'object' || error === null || !('name' in error)) return false;
    return error.name === 'TimeoutError' || error.name === 'AbortError';
}

function timeoutReason(ms: number): Error {
    const error = new Error(`No data from the service for ${ms}ms`);
    error.name = 'TimeoutError';
    return error;
}

// =============================================================================
// Idle Timer
// =============================================================================

/**
 * Aborts once `ms` pass without `arm()` being called again.
 */
class IdleTimer {
    private readonly controller = new AbortController();
    private timer: ReturnType<typeof setTimeout> | undefined;

    constructor(private readonly ms: number) {
        this.arm();
    }

    get signal(): AbortSignal {
        return this.controller.signal;
    }

    arm(): void {
        this.clear();
        this.timer = setTimeout(() => this.controller.abort(timeoutReason(this.ms)), this.ms);
    }

    clear(): void {
        if (this.timer !== undefined) clearTimeout(this.timer);
        this.timer = undefined;
    }

    /** Settle with `promise`, or reject with the abort reason if the timer fires first. */
    guard<T>(promise: Promise<T>): Promise<T> {
        const { signal } = this;
        return new Promise<T>((resolve, reject) => {
            if (signal.aborted) {
                reject(signal.reason);
                return;
            }
            const onAbort = () => reject(signal.reason);
            signal.addEventListener('abort', onAbort, { once: true });
            promise.then(
                (value) => {
                    signal.removeEventListener('abort', onAbort);
                    resolve(value);
                },
                (error: unknown) => {
                    signal.removeEventListener('abort', onAbort);
                    reject(error);
                }
            );
        });
    }
}

async function readBody(response: Response, idle: IdleTimer): Promise<Uint8Array> {
    if (!response.body) return new Uint8Array(0);

    const reader = response.body.getReader();
    const chunks: Uint8Array[] = [];
    let size = 0;
    for (;;) {
        const { done, value } = await idle.guard(reader.read());
        if (done) break;
        idle.arm();
        chunks.push(value);
        size += value.length;
    }

    const body = new Uint8Array(size);
    let offset = 0;
    for (const chunk of chunks) {
        body.set(chunk, offset);
        offset += chunk.length;
    }
    return body;
}

// =============================================================================
// Transport
// =============================================================================

export class WcsTransport {
    readonly policy: RetryPolicy;
    private readonly fetchImpl: FetchFn;
    private readonly sleep: SleepFn;
    private readonly now: () => number;
    private readonly log: Logger;

    constructor(private readonly config: DownloaderConfig, options: TransportOptions = {}) {
        this.policy = { ...DEFAULT_RETRY_POLICY, ...options.retry };
        this.fetchImpl = options.fetch ?? ((input, init) => globalThis.fetch(input, init));
        this.sleep = options.sleep ?? sleep;
        this.now = options.now ?? Date.now;
        this.log = options.log ?? console;
    }

    /**
     * Full request URL: server base + endpoint path, with `service` and
     * `version` ahead of the endpoint-specific parameters.
     */
    buildUrl(path: string, params: QueryParams): string {
        const { serverUrl, version } = this.config.settings;
        const query = new URLSearchParams({ service: WCS_SERVICE, version, ...params });
        return `${serverUrl}${path}?${query.toString()}`;
    }

    private headers(): Record<string, string> {
        return this.config.apiKey ? { apikey: this.config.apiKey } : {};
    }

    private async attempt(url: string, idle: IdleTimer): Promise<Response> {
        let response: Response;
        try {
            response = await idle.guard(this.fetchImpl(url, {
                headers: this.headers(),
                signal: idle.signal
            }));
        } catch (error) {
            if (isTimeout(error)) throw error;
            const reason = error instanceof Error ? error.message : String(error);
            throw new TransportError(url, reason, undefined, { cause: error });
        }

        if (!response.ok) {
            throw new TransportError(url, `${response.status} ${response.statusText}`, response.status);
        }
        return response;
    }

    private exhausted(attempts: number, startedAt: number): boolean {
        const { maxAttempts, maxDurationMs } = this.policy;
        if (maxAttempts !== undefined && attempts >= maxAttempts) return true;
        if (maxDurationMs !== undefined && this.now() - startedAt + this.policy.backoffMs > maxDurationMs) {
            return true;
        }
        return false;
    }

    /**
     * Body of a successful response, retrying the whole request when the
     * headers or the next body chunk do not arrive in time.
     */
    private async request(path: string, params: QueryParams): Promise<Uint8Array> {
        const url = this.buildUrl(path, params);
        const startedAt = this.now();
        let attempts = 0;

        for (;;) {
            attempts++;
            const idle = new IdleTimer(this.policy.timeoutMs);
            try {
                const response = await this.attempt(url, idle);
                return await readBody(response, idle);
            } catch (error) {
                idle.clear();
                if (!isTimeout(error)) {
                    if (error instanceof TransportError) throw error;
                    const reason = error instanceof Error ? error.message : String(error);
                    throw new TransportError(url, reason, undefined, { cause: error });
                }
                if (this.exhausted(attempts, startedAt)) {
                    throw new TransportTimeoutError(url, attempts);
                }
                this.log.warn(`[transport] Timed out (attempt ${attempts}), retrying in ${this.policy.backoffMs}ms: ${url}`);
                await this.sleep(this.policy.backoffMs);
            } finally {
                idle.clear();
            }
        }
    }

    /** Response body as bytes. */
    async get(path: string, params: QueryParams): Promise<Uint8Array> {
        return this.request(path, params);
    }

    /** Response body as text (capabilities and description documents). */
    async getText(path: string, params: QueryParams): Promise<string> {
        return new TextDecoder().decode(await this.request(path, params));
    }

    /**
     * Single attempt, no retry: true when the service answers 2xx in time.
     */
    async ping(path: string, params: QueryParams): Promise<boolean> {
        const idle = new IdleTimer(this.policy.timeoutMs);
        try {
            const response = await this.attempt(this.buildUrl(path, params), idle);
            idle.clear();
            await response.body?.cancel();
            return true;
        } catch (error) {
            this.log.warn(`[transport] Ping failed: ${error instanceof Error ? error.message : String(error)}`);
            return false;
        } finally {
            idle.clear();
        }
    }
}
