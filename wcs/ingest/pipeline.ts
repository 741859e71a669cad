/**
 * GRIB Run Fetcher — Ingest Pipeline
 *
 * Wires the catalog, the window resolver and the run fetcher around one
 * shared transport, and runs discover → resolve → download for a data type.
 */

import type { CoverageWindow, DownloaderConfig, Logger, RunArtifact, RunIdentifier } from '../types';
import { CoverageCatalog } from './catalog';
import { RunFetcher } from './fetcher';
import type { OutputDirectory } from './storage';
import { WcsTransport, type TransportOptions } from './transport';
import { createWindowResolver, type WindowResolver } from './window';

// =============================================================================
// Downloader
// =============================================================================

export interface Downloader {
    config: DownloaderConfig;
    transport: WcsTransport;
    catalog: CoverageCatalog;
    resolver: WindowResolver;
    fetcher: RunFetcher;
}

export interface DownloaderOptions extends TransportOptions {
    /** Replace the configuration-selected window resolver */
    resolver?: WindowResolver;
}

export function createDownloader(config: DownloaderConfig, options: DownloaderOptions = {}): Downloader {
    const log = options.log ?? console;
    const transport = new WcsTransport(config, options);
    return {
        config,
        transport,
        catalog: new CoverageCatalog(config, transport, log),
        resolver: options.resolver ?? createWindowResolver(config, transport, log),
        fetcher: new RunFetcher(config, transport, log)
    };
}

// =============================================================================
// Ingest Runner
// =============================================================================

export interface IngestOptions {
    dataType: string;
    outputDir: OutputDirectory;
    /** Download this run instead of discovering the latest one */
    run?: RunIdentifier;
    log?: Logger;
}

export type IngestResult =
    | { status: 'no-run'; dataType: string }
    | { status: 'downloaded'; dataType: string; run: RunIdentifier; window: CoverageWindow; artifact: RunArtifact };

/**
 * Run a complete ingest cycle for one data type:
 * 1. Discover the latest run (unless one is given)
 * 2. Resolve its coverage window
 * 3. Download every hour and write run_info.json
 *
 * Nothing is downloaded when no run can be discovered.
 */
export async function runIngest(downloader: Downloader, options: IngestOptions): Promise<IngestResult> {
    const { dataType, outputDir } = options;
    const log = options.log ?? console;

    const run = options.run ?? (await downloader.catalog.latestRun(dataType));
    if (!run) {
        log.warn(`[ingest] No run available for ${dataType}; nothing to download`);
        return { status: 'no-run', dataType };
    }

    const window = await downloader.resolver.resolve(dataType, run);
    log.log(`[ingest] ${dataType} run ${run}: ${window.start} → ${window.end}`);

    const artifact = await downloader.fetcher.download(dataType, run, window, outputDir);
    log.log(`[ingest] ${dataType} run ${run}: ${artifact.files.length} file(s) written`);

    return { status: 'downloaded', dataType, run, window, artifact };
}
