/**
 * GRIB Run Fetcher — OGC Document Helpers
 *
 * Capabilities and coverage descriptions are parsed with namespace prefixes
 * stripped, so `wcs:CoverageSummary` and `gml:beginPosition` are looked up by
 * their local names.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';

const parser = new XMLParser({
    ignoreAttributes: true,
    removeNSPrefix: true,
    parseTagValue: false,
    trimValues: true
});

/**
 * Parse an XML document; null when it is not well-formed.
 */
export function parseXml(xml: string): unknown {
    if (!xml.trim() || XMLValidator.validate(xml) !== true) return null;
    const parsed: unknown = parser.parse(xml);
    return parsed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Every element with the given local name, at any depth, in document order.
 */
export function findAll(node: unknown, name: string): unknown[] {
    const found: unknown[] = [];
    const visit = (value: unknown): void => {
        if (Array.isArray(value)) {
            value.forEach(visit);
            return;
        }
        if (!isRecord(value)) return;
        for (const [key, child] of Object.entries(value)) {
            if (key === name) {
                if (Array.isArray(child)) found.push(...child);
                else found.push(child);
            }
            visit(child);
        }
    };
    visit(node);
    return found;
}

/** First element with the given local name, at any depth. */
export function findFirst(node: unknown, name: string): unknown {
    const [first] = findAll(node, name);
    return first;
}

/**
 * Text content of a direct child element, or null when absent or empty.
 */
export function childText(node: unknown, name: string): string | null {
    if (!isRecord(node)) return null;
    const child = node[name];
    const value = Array.isArray(child) ? child[0] : child;
    if (typeof value === 'string') return value.trim() || null;
    if (typeof value === 'number') return String(value);
    return null;
}
