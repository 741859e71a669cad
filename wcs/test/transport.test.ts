import { describe, it, expect, vi } from 'vitest';
import { WcsTransport } from '../ingest/transport';
import { TransportError, TransportTimeoutError } from '../errors';
import { CAPABILITIES_PATH, SERVER, silentLogger, testConfig, timeoutError } from './fixtures';

function okResponse(body = 'ok'): Response {
    return new Response(body, { status: 200 });
}

/** Body that yields one chunk per `gapMs`, then ends; stalls forever after `stallAfter` chunks. */
function streamedResponse(chunks: number, gapMs: number, stallAfter = Infinity): Response {
    let sent = 0;
    const stream = new ReadableStream<Uint8Array>({
        async pull(controller) {
            if (sent >= stallAfter) {
                await new Promise<never>(() => undefined);
            }
            await new Promise((resolve) => setTimeout(resolve, gapMs));
            if (sent === chunks) {
                controller.close();
                return;
            }
            controller.enqueue(new Uint8Array(1024).fill(sent));
            sent++;
        }
    });
    return new Response(stream);
}

function setup(options: { apiKey?: string | null; maxAttempts?: number; maxDurationMs?: number } = {}) {
    const fetch = vi.fn(async (_url: string, _init?: RequestInit): Promise<Response> => okResponse());
    const sleep = vi.fn(async (_ms: number): Promise<void> => undefined);
    const transport = new WcsTransport(testConfig({}, options.apiKey === undefined ? 'test-secret' : options.apiKey), {
        fetch,
        sleep,
        log: silentLogger(),
        retry: { maxAttempts: options.maxAttempts, maxDurationMs: options.maxDurationMs }
    });
    return { fetch, sleep, transport };
}

describe('WcsTransport', () => {

    it('builds URLs with service and version ahead of endpoint parameters', () => {
        const { transport } = setup();
        expect(transport.buildUrl(CAPABILITIES_PATH, { language: 'eng' }))
            .toBe(`${SERVER}${CAPABILITIES_PATH}?service=WCS&version=2.0.1&language=eng`);
    });

    it('sends the API key header and a timeout signal', async () => {
        const { fetch, transport } = setup();
        await transport.getText(CAPABILITIES_PATH, { language: 'eng' });

        expect(fetch).toHaveBeenCalledTimes(1);
        const init = fetch.mock.calls[0][1];
        expect(init?.headers).toEqual({ apikey: 'test-secret' });
        expect(init?.signal).toBeInstanceOf(AbortSignal);
    });

    it('omits the header without an API key', async () => {
        const { fetch, transport } = setup({ apiKey: null });
        await transport.getText(CAPABILITIES_PATH, {});
        expect(fetch.mock.calls[0][1]?.headers).toEqual({});
    });

    it('returns the body as bytes', async () => {
        const { fetch, transport } = setup();
        fetch.mockImplementationOnce(async () => new Response(new Uint8Array([7, 8, 9])));

        const body = await transport.get('/wcs/GetCoverage', {});
        expect(Array.from(body)).toEqual([7, 8, 9]);
    });

    it('completes a body that streams longer than the timeout without stalling', async () => {
        const fetch = vi.fn(async (_url: string, _init?: RequestInit): Promise<Response> => streamedResponse(6, 20));
        const transport = new WcsTransport(testConfig(), {
            fetch,
            sleep: async () => undefined,
            log: silentLogger(),
            retry: { timeoutMs: 80, maxAttempts: 2 }
        });

        const body = await transport.get('/wcs/GetCoverage', {});

        expect(body.length).toBe(6 * 1024);
        expect(body[5 * 1024]).toBe(5);
        expect(fetch).toHaveBeenCalledTimes(1);
    });

    it('times out when the body stalls between chunks', async () => {
        const fetch = vi.fn(async (_url: string, _init?: RequestInit): Promise<Response> => streamedResponse(6, 5, 2));
        const sleep = vi.fn(async (_ms: number): Promise<void> => undefined);
        const transport = new WcsTransport(testConfig(), {
            fetch,
            sleep,
            log: silentLogger(),
            retry: { timeoutMs: 40, maxAttempts: 2 }
        });

        const error = await transport.get('/wcs/GetCoverage', {}).catch((e: unknown) => e);
        expect(error).toBeInstanceOf(TransportTimeoutError);
        expect(error).toMatchObject({ attempts: 2 });
        expect(sleep).toHaveBeenCalledTimes(1);
    });

    it('times out when the headers never arrive', async () => {
        const fetch = vi.fn((_url: string, _init?: RequestInit): Promise<Response> => new Promise<never>(() => undefined));
        const transport = new WcsTransport(testConfig(), {
            fetch,
            sleep: async () => undefined,
            log: silentLogger(),
            retry: { timeoutMs: 20, maxAttempts: 1 }
        });

        await expect(transport.getText(CAPABILITIES_PATH, {})).rejects.toThrow(TransportTimeoutError);
    });

    it('retries N timeouts with N backoff waits, then succeeds', async () => {
        const { fetch, sleep, transport } = setup();
        fetch
            .mockRejectedValueOnce(timeoutError())
            .mockRejectedValueOnce(timeoutError())
            .mockRejectedValueOnce(timeoutError())
            .mockImplementationOnce(async () => okResponse('capabilities'));

        await expect(transport.getText(CAPABILITIES_PATH, {})).resolves.toBe('capabilities');
        expect(fetch).toHaveBeenCalledTimes(4);
        expect(sleep).toHaveBeenCalledTimes(3);
        expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2000, 2000, 2000]);
    });

    it('keeps retrying by default', async () => {
        const { fetch, sleep, transport } = setup();
        for (let i = 0; i < 25; i++) fetch.mockRejectedValueOnce(timeoutError());

        await expect(transport.getText(CAPABILITIES_PATH, {})).resolves.toBe('ok');
        expect(sleep).toHaveBeenCalledTimes(25);
    });

    it('gives up after maxAttempts timeouts', async () => {
        const { fetch, sleep, transport } = setup({ maxAttempts: 3 });
        fetch.mockRejectedValue(timeoutError());

        const error = await transport.getText(CAPABILITIES_PATH, {}).catch((e: unknown) => e);
        expect(error).toBeInstanceOf(TransportTimeoutError);
        expect(error).toMatchObject({ attempts: 3 });
        expect(fetch).toHaveBeenCalledTimes(3);
        expect(sleep).toHaveBeenCalledTimes(2);
    });

    it('gives up once the next wait would pass maxDurationMs', async () => {
        let clock = 0;
        const fetch = vi.fn(async (_url: string, _init?: RequestInit): Promise<Response> => {
            clock += 5_000;
            throw timeoutError();
        });
        const transport = new WcsTransport(testConfig(), {
            fetch,
            sleep: async (ms) => {
                clock += ms;
            },
            now: () => clock,
            log: silentLogger(),
            retry: { maxDurationMs: 20_000 }
        });

        // 5s attempt, 2s wait, 5s attempt, 2s wait, 5s attempt = 19s; another wait would reach 21s.
        await expect(transport.getText(CAPABILITIES_PATH, {})).rejects.toThrow(TransportTimeoutError);
        expect(fetch).toHaveBeenCalledTimes(3);
    });

    it('fails fast on a non-2xx status', async () => {
        const { fetch, sleep, transport } = setup();
        fetch.mockImplementationOnce(async () => new Response('no key', { status: 401, statusText: 'Unauthorized' }));

        const error = await transport.getText(CAPABILITIES_PATH, {}).catch((e: unknown) => e);
        expect(error).toBeInstanceOf(TransportError);
        expect(error).toMatchObject({ status: 401 });
        expect(fetch).toHaveBeenCalledTimes(1);
        expect(sleep).not.toHaveBeenCalled();
    });

    it('fails fast on connection errors', async () => {
        const { fetch, sleep, transport } = setup();
        fetch.mockRejectedValueOnce(new TypeError('fetch failed'));

        await expect(transport.get('/wcs/GetCoverage', {})).rejects.toThrow(/failed: fetch failed/);
        expect(fetch).toHaveBeenCalledTimes(1);
        expect(sleep).not.toHaveBeenCalled();
    });

    it('ping reports reachability without retrying', async () => {
        const { fetch, sleep, transport } = setup();
        expect(await transport.ping(CAPABILITIES_PATH, {})).toBe(true);

        fetch.mockRejectedValueOnce(timeoutError());
        expect(await transport.ping(CAPABILITIES_PATH, {})).toBe(false);

        fetch.mockImplementationOnce(async () => new Response('', { status: 500 }));
        expect(await transport.ping(CAPABILITIES_PATH, {})).toBe(false);

        expect(fetch).toHaveBeenCalledTimes(3);
        expect(sleep).not.toHaveBeenCalled();
    });
});
