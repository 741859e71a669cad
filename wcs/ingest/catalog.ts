/**
 * GRIB Run Fetcher — Coverage Catalog
 *
 * Discovers the most recent run of a data type from the service's
 * GetCapabilities listing. Coverage ids embed the run time:
 *
 *   RAIN___2024-11-17T12.00.00Z   ← older run
 *   RAIN___2024-11-17T15.00.00Z   ← latest run
 *   TEMP___2024-11-17T15.00.00Z   ← other data type, ignored
 */

import { getDataType } from '../config';
import { extractRunIdentifier, splitTemplate } from '../template';
import { parseRunIdentifier } from '../time';
import type { DownloaderConfig, Logger, RunIdentifier } from '../types';
import type { WcsTransport } from './transport';
import { childText, findAll, parseXml } from './xml';

export type ServiceStatus = 'online' | 'offline';

/**
 * Coverage ids listed under CoverageSummary elements, in document order.
 * Malformed or unexpected documents yield an empty list.
 */
export function parseCoverageIds(xml: string): string[] {
    const doc = parseXml(xml);
    if (!doc) return [];

    const ids: string[] = [];
    for (const summary of findAll(doc, 'CoverageSummary')) {
        const id = childText(summary, 'CoverageId');
        if (id) ids.push(id);
    }
    return ids;
}

/**
 * Most recent run among the coverage ids matching a template, or null.
 * Ids whose embedded run time does not parse are skipped.
 */
export function selectLatestRun(coverageIds: readonly string[], template: string): RunIdentifier | null {
    splitTemplate(template);

    let latest: RunIdentifier | null = null;
    let latestMs = -Infinity;
    for (const id of coverageIds) {
        const candidate = extractRunIdentifier(template, id);
        if (candidate === null) continue;

        const runTime = parseRunIdentifier(candidate);
        if (!runTime) continue;

        if (runTime.getTime() > latestMs) {
            latest = candidate;
            latestMs = runTime.getTime();
        }
    }
    return latest;
}

export class CoverageCatalog {
    constructor(
        private readonly config: DownloaderConfig,
        private readonly transport: WcsTransport,
        private readonly log: Logger = console
    ) { }

    private capabilitiesParams(): Record<string, string> {
        return { language: this.config.settings.language };
    }

    /** Data types configured for this model. */
    listDataTypes(): string[] {
        return Object.keys(this.config.settings.dataTypes);
    }

    /**
     * One capabilities request, not retried.
     */
    async status(): Promise<ServiceStatus> {
        const ok = await this.transport.ping(this.config.settings.capabilitiesPath, this.capabilitiesParams());
        return ok ? 'online' : 'offline';
    }

    /**
     * Latest run currently advertised for a data type; null when the service
     * lists none (yet).
     */
    async latestRun(dataType: string): Promise<RunIdentifier | null> {
        const spec = getDataType(this.config, dataType);

        const xml = await this.transport.getText(this.config.settings.capabilitiesPath, this.capabilitiesParams());
        const ids = parseCoverageIds(xml);
        const latest = selectLatestRun(ids, spec.coverageIdTemplate);

        if (latest) {
            this.log.log(`[catalog] Latest ${dataType} run: ${latest} (${ids.length} coverages listed)`);
        } else {
            this.log.warn(`[catalog] No ${dataType} run found among ${ids.length} coverages`);
        }
        return latest;
    }
}
