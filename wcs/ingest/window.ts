/**
 * GRIB Run Fetcher — Coverage Window Resolution
 *
 * Two interchangeable ways to learn which forecast hours a run offers:
 *   - static:   run time + configured [start, end] hour offsets, no request
 *   - describe: DescribeCoverage, reading the EnvelopeWithTimePeriod bounds
 *
 * Data types with `time_offset_range` use the static resolver, all others
 * ask the service.
 */

import { getDataType } from '../config';
import { ConfigurationError, CoverageNotFoundError, ParseError } from '../errors';
import { formatCoverageId } from '../template';
import { addHours, formatSubsetTime, parseRunIdentifier, windowBounds } from '../time';
import type { CoverageWindow, DownloaderConfig, Logger, RunIdentifier } from '../types';
import type { WcsTransport } from './transport';
import { childText, findFirst, parseXml } from './xml';

export interface WindowResolver {
    resolve(dataType: string, run: RunIdentifier): Promise<CoverageWindow>;
}

function runDate(run: RunIdentifier): Date {
    const date = parseRunIdentifier(run);
    if (!date) {
        throw new ParseError(`Invalid run identifier: ${run}`);
    }
    return date;
}

// =============================================================================
// Static (configured offsets)
// =============================================================================

export class StaticWindowResolver implements WindowResolver {
    constructor(private readonly config: DownloaderConfig) { }

    async resolve(dataType: string, run: RunIdentifier): Promise<CoverageWindow> {
        const spec = getDataType(this.config, dataType);
        if (!spec.timeOffsetRange) {
            throw new ConfigurationError(`Data type "${dataType}" has no time_offset_range`);
        }

        const [startOffset, endOffset] = spec.timeOffsetRange;
        const base = runDate(run);
        const window = {
            start: formatSubsetTime(addHours(base, startOffset)),
            end: formatSubsetTime(addHours(base, endOffset))
        };
        windowBounds(window);
        return window;
    }
}

// =============================================================================
// Dynamic (DescribeCoverage)
// =============================================================================

/**
 * Begin/end of the first EnvelopeWithTimePeriod in a coverage description,
 * or null when the document has none.
 */
export function parseTimePeriod(xml: string): CoverageWindow | null {
    const doc = parseXml(xml);
    if (!doc) return null;

    const envelope = findFirst(doc, 'EnvelopeWithTimePeriod');
    const start = childText(envelope, 'beginPosition');
    const end = childText(envelope, 'endPosition');
    if (!start || !end) return null;
    return { start, end };
}

export class DescribeCoverageWindowResolver implements WindowResolver {
    constructor(
        private readonly config: DownloaderConfig,
        private readonly transport: WcsTransport,
        private readonly log: Logger = console
    ) { }

    async resolve(dataType: string, run: RunIdentifier): Promise<CoverageWindow> {
        const spec = getDataType(this.config, dataType);
        const path = this.config.settings.describeCoveragePath;
        if (!path) {
            throw new ConfigurationError(
                `Model ${this.config.model} has no describe_coverage_path; configure time_offset_range for "${dataType}"`
            );
        }

        const coverageId = formatCoverageId(spec.coverageIdTemplate, run);
        const xml = await this.transport.getText(path, { coverageID: coverageId });

        const window = parseTimePeriod(xml);
        if (!window) {
            throw new CoverageNotFoundError(coverageId);
        }

        // Drops a zero fractional second and checks hour alignment.
        const { start, end } = windowBounds(window);
        this.log.log(`[window] ${coverageId}: ${window.start} → ${window.end}`);
        return { start: formatSubsetTime(start), end: formatSubsetTime(end) };
    }
}

// =============================================================================
// Selection
// =============================================================================

/**
 * Picks the resolver per data type from configuration.
 */
export class ConfiguredWindowResolver implements WindowResolver {
    private readonly staticResolver: StaticWindowResolver;
    private readonly describeResolver: DescribeCoverageWindowResolver;

    constructor(private readonly config: DownloaderConfig, transport: WcsTransport, log: Logger = console) {
        this.staticResolver = new StaticWindowResolver(config);
        this.describeResolver = new DescribeCoverageWindowResolver(config, transport, log);
    }

    strategyFor(dataType: string): 'static' | 'describe' {
        return getDataType(this.config, dataType).timeOffsetRange ? 'static' : 'describe';
    }

    async resolve(dataType: string, run: RunIdentifier): Promise<CoverageWindow> {
        return this.strategyFor(dataType) === 'static'
            ? this.staticResolver.resolve(dataType, run)
            : this.describeResolver.resolve(dataType, run);
    }
}

export function createWindowResolver(
    config: DownloaderConfig,
    transport: WcsTransport,
    log: Logger = console
): ConfiguredWindowResolver {
    return new ConfiguredWindowResolver(config, transport, log);
}
