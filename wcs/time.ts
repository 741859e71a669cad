/**
 * GRIB Run Fetcher — Time Utilities
 *
 * Two fixed UTC formats are in play:
 *   run identifiers  2024-11-17T15.00.00Z  (embedded in coverage ids)
 *   subset times     2024-11-17T15:00:00Z  (time axis of a coverage)
 */

import { ParseError } from './errors';
import { HOUR_MS, type CoverageWindow, type RunIdentifier, type SubsetTime } from './types';

const RUN_ID_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2})\.(\d{2})\.(\d{2})Z$/;
// Services may write a zero fractional part (`15:00:00.000Z`); anything finer than a second is not a subset time.
const SUBSET_TIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.0+)?Z$/;

function parseUtcFields(match: RegExpMatchArray | null): Date | null {
    if (!match) return null;
    const [year, month, day, hour, minute, second] = match.slice(1).map((part) => Number(part));
    const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));

    // Date.UTC rolls over out-of-range fields (month 13, hour 25); reject those.
    if (
        date.getUTCFullYear() !== year ||
        date.getUTCMonth() !== month - 1 ||
        date.getUTCDate() !== day ||
        date.getUTCHours() !== hour ||
        date.getUTCMinutes() !== minute ||
        date.getUTCSeconds() !== second
    ) {
        return null;
    }
    return date;
}

/** Second-precision ISO string, e.g. `2024-11-17T15:00:00Z`. */
function isoSeconds(date: Date): string {
    return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function parseRunIdentifier(text: string): Date | null {
    return parseUtcFields(text.match(RUN_ID_PATTERN));
}

export function formatRunIdentifier(date: Date): RunIdentifier {
    return isoSeconds(date).replace(/:/g, '.');
}

export function parseSubsetTime(text: string): Date | null {
    return parseUtcFields(text.trim().match(SUBSET_TIME_PATTERN));
}

export function formatSubsetTime(date: Date): SubsetTime {
    return isoSeconds(date);
}

export function addHours(date: Date, hours: number): Date {
    return new Date(date.getTime() + hours * HOUR_MS);
}

/**
 * Bounds of a window as dates, after checking its invariants.
 */
export function windowBounds(window: CoverageWindow): { start: Date; end: Date } {
    const start = parseSubsetTime(window.start);
    const end = parseSubsetTime(window.end);
    if (!start || !end) {
        throw new ParseError(`Invalid coverage window ${window.start} / ${window.end}`);
    }

    const spanMs = end.getTime() - start.getTime();
    if (spanMs < 0) {
        throw new ParseError(`Coverage window starts after it ends: ${window.start} > ${window.end}`);
    }
    if (spanMs % HOUR_MS !== 0) {
        throw new ParseError(`Coverage window is not a whole number of hours: ${window.start} / ${window.end}`);
    }
    return { start, end };
}

/**
 * Every subset time of a window, start to end inclusive, one hour apart.
 */
export function hourlySteps(window: CoverageWindow): SubsetTime[] {
    const { start, end } = windowBounds(window);
    const steps: SubsetTime[] = [];
    for (let t = start.getTime(); t <= end.getTime(); t += HOUR_MS) {
        steps.push(formatSubsetTime(new Date(t)));
    }
    return steps;
}
