/**
 * GRIB Run Fetcher — Run Download
 *
 * Downloads one GRIB file per forecast hour of a run's window, strictly in
 * time order, then writes `run_info.json`. The first failed hour aborts the
 * run; whatever was written before it stays in the directory without
 * metadata and must not be trusted.
 */

import { getDataType } from '../config';
import { artifactFileName, createFileEntry, createRunMetadata, serializeRunMetadata } from '../manifest';
import { formatCoverageId } from '../template';
import { ParseError } from '../errors';
import { hourlySteps, parseRunIdentifier } from '../time';
import {
    RUN_METADATA_FILE,
    type CoverageWindow,
    type DownloaderConfig,
    type Logger,
    type RunArtifact,
    type RunFileEntry,
    type RunIdentifier,
    type SubsetTime
} from '../types';
import type { OutputDirectory } from './storage';
import type { WcsTransport } from './transport';

/**
 * GetCoverage parameters for one hour of a coverage.
 */
export function coverageParams(coverageId: string, subsetTime: SubsetTime, format: string): Record<string, string> {
    return {
        coverageid: coverageId,
        subset: `time(${subsetTime})`,
        format
    };
}

export class RunFetcher {
    constructor(
        private readonly config: DownloaderConfig,
        private readonly transport: WcsTransport,
        private readonly log: Logger = console
    ) { }

    async download(
        dataType: string,
        run: RunIdentifier,
        window: CoverageWindow,
        outputDir: OutputDirectory
    ): Promise<RunArtifact> {
        const spec = getDataType(this.config, dataType);
        const { coveragePath, format } = this.config.settings;

        // Validate everything before touching the directory.
        if (!parseRunIdentifier(run)) {
            throw new ParseError(`Invalid run identifier: ${run}`);
        }
        const coverageId = formatCoverageId(spec.coverageIdTemplate, run);
        const steps = hourlySteps(window);

        await outputDir.reset();
        this.log.log(`[fetch] ${coverageId}: ${steps.length} hour(s) → ${outputDir.path}`);

        const files: RunFileEntry[] = [];
        for (const subsetTime of steps) {
            const data = await this.transport.get(coveragePath, coverageParams(coverageId, subsetTime, format));

            const name = artifactFileName(dataType, run, subsetTime);
            const written = await outputDir.write(name, data);
            files.push(createFileEntry(name, subsetTime, data));

            this.log.log(`[fetch] Downloaded ${written} (${data.length} bytes)`);
        }

        const metadata = createRunMetadata(run, window, files);
        const metadataPath = await outputDir.writeText(RUN_METADATA_FILE, serializeRunMetadata(metadata));
        this.log.log(`[fetch] Run info saved: ${metadataPath}`);

        return {
            dataType,
            runTime: run,
            window,
            outputDir: outputDir.path,
            files,
            metadataPath
        };
    }
}
