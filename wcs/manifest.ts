/**
 * GRIB Run Fetcher — Run Metadata
 *
 * `run_info.json` describes one downloaded run: its identifier, the window
 * that was fetched, and every GRIB file with its size and BLAKE3 hash.
 * It is written last, so a directory without it holds an incomplete run.
 */

import { z } from 'zod';
import { ParseError } from './errors';
import { hashHex, verifyHash } from './hash';
import type { OutputDirectory } from './ingest/storage';
import {
    ARTIFACT_EXTENSION,
    RUN_METADATA_FILE,
    type CoverageWindow,
    type RunFileEntry,
    type RunIdentifier,
    type RunMetadata,
    type SubsetTime
} from './types';

/**
 * `{dataType}_{run}_{subsetTime}.grib`; unique per data type, run and hour.
 */
export function artifactFileName(dataType: string, run: RunIdentifier, subsetTime: SubsetTime): string {
    return `${dataType}_${run}_${subsetTime}${ARTIFACT_EXTENSION}`;
}

export function createFileEntry(name: string, subsetTime: SubsetTime, data: Uint8Array): RunFileEntry {
    return {
        name,
        subsetTime,
        sizeBytes: data.length,
        blake3: hashHex(data)
    };
}

export function createRunMetadata(
    run: RunIdentifier,
    window: CoverageWindow,
    files: RunFileEntry[]
): RunMetadata {
    return {
        run_time: run,
        start_time: window.start,
        end_time: window.end,
        files
    };
}

export function serializeRunMetadata(metadata: RunMetadata): string {
    return JSON.stringify(metadata, null, 4);
}

const fileEntrySchema = z.object({
    name: z.string().min(1),
    subsetTime: z.string(),
    sizeBytes: z.number().int().nonnegative(),
    blake3: z.string().regex(/^[0-9a-f]{64}$/)
});

const runMetadataSchema = z.object({
    run_time: z.string(),
    start_time: z.string(),
    end_time: z.string(),
    files: z.array(fileEntrySchema).default([])
});

export function parseRunMetadata(text: string): RunMetadata {
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        throw new ParseError(`${RUN_METADATA_FILE} is not valid JSON`, { cause: error });
    }

    const result = runMetadataSchema.safeParse(raw);
    if (!result.success) {
        throw new ParseError(`${RUN_METADATA_FILE} is malformed: ${result.error.issues[0]?.message ?? 'unknown issue'}`);
    }
    return result.data;
}

export async function readRunMetadata(dir: OutputDirectory): Promise<RunMetadata | null> {
    const bytes = await dir.read(RUN_METADATA_FILE);
    if (!bytes) return null;
    return parseRunMetadata(new TextDecoder().decode(bytes));
}

export interface VerificationResult {
    ok: boolean;
    missing: string[];
    corrupted: string[];
}

/**
 * Re-hash every file listed in the metadata.
 */
export async function verifyRunArtifact(dir: OutputDirectory, metadata: RunMetadata): Promise<VerificationResult> {
    const missing: string[] = [];
    const corrupted: string[] = [];

    for (const entry of metadata.files) {
        const data = await dir.read(entry.name);
        if (!data) {
            missing.push(entry.name);
        } else if (data.length !== entry.sizeBytes || !verifyHash(data, entry.blake3)) {
            corrupted.push(entry.name);
        }
    }

    return { ok: missing.length === 0 && corrupted.length === 0, missing, corrupted };
}
