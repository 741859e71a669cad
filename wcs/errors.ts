/**
 * GRIB Run Fetcher — Error Types
 *
 * "No run discoverable yet" is not an error: the catalog returns null for it.
 */

/** Every attempt timed out and the retry policy gave up. */
export class TransportTimeoutError extends Error {
    constructor(public url: string, public attempts: number) {
        super(`Request to ${url} timed out after ${attempts} attempt(s)`);
        this.name = 'TransportTimeoutError';
    }
}

/** Connection, DNS or TLS failure, or a non-2xx answer. Never retried. */
export class TransportError extends Error {
    constructor(
        public url: string,
        message: string,
        public status?: number,
        options?: { cause?: unknown }
    ) {
        super(`Request to ${url} failed: ${message}`, options);
        this.name = 'TransportError';
    }
}

export class ConfigurationError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ConfigurationError';
    }
}

export class ParseError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ParseError';
    }
}

/** The service does not describe this coverage (run missing or expired). */
export class CoverageNotFoundError extends Error {
    constructor(public coverageId: string) {
        super(`Coverage ${coverageId} has no time period in its description`);
        this.name = 'CoverageNotFoundError';
    }
}
