/**
 * GRIB Run Fetcher — Core Type Definitions
 *
 * Runs, coverage windows and run artifacts exchanged between the catalog,
 * the window resolvers and the run fetcher.
 */

// =============================================================================
// Protocol Constants
// =============================================================================

export const WCS_SERVICE = 'WCS';
export const DEFAULT_WCS_VERSION = '2.0.1';
export const DEFAULT_LANGUAGE = 'eng';
export const GRIB_FORMAT = 'application/wmo-grib';

/** Placeholder substituted with the run identifier in coverage-id templates. */
export const RUN_TIME_PLACEHOLDER = '{run_time}';

export const RUN_METADATA_FILE = 'run_info.json';
export const ARTIFACT_EXTENSION = '.grib';

export const HOUR_MS = 3_600_000;

// =============================================================================
// Runs & Windows
// =============================================================================

/**
 * One model execution, as embedded in coverage ids: `YYYY-MM-DDTHH.MM.SSZ`.
 * Lexicographic order matches chronological order.
 */
export type RunIdentifier = string;

/** One forecast hour, as the service writes it: `YYYY-MM-DDTHH:MM:SSZ`. */
export type SubsetTime = string;

/**
 * Inclusive range of forecast hours retrievable for a run.
 * Invariant: start <= end and end - start is a whole number of hours.
 */
export interface CoverageWindow {
    start: SubsetTime;
    end: SubsetTime;
}

// =============================================================================
// Settings
// =============================================================================

export interface DataTypeSpec {
    /** Coverage id with exactly one `{run_time}` placeholder */
    coverageIdTemplate: string;
    /** Static `[startOffsetHours, endOffsetHours]` relative to the run time */
    timeOffsetRange?: readonly [number, number];
}

export interface ModelSettings {
    /** Base URL of the coverage service, endpoint paths are appended verbatim */
    serverUrl: string;
    capabilitiesPath: string;
    describeCoveragePath?: string;
    coveragePath: string;
    version: string;
    language: string;
    format: string;
    dataTypes: Readonly<Record<string, DataTypeSpec>>;
}

/** Immutable configuration snapshot handed to every component. */
export interface DownloaderConfig {
    model: string;
    settings: ModelSettings;
    apiKey?: string;
}

// =============================================================================
// Run Artifacts
// =============================================================================

export interface RunFileEntry {
    name: string;
    subsetTime: SubsetTime;
    sizeBytes: number;
    /** BLAKE3 of the file contents, lowercase hex */
    blake3: string;
}

/**
 * Persisted next to the GRIB files as `run_info.json`.
 * Snake-case keys are part of the on-disk format.
 */
export interface RunMetadata {
    run_time: RunIdentifier;
    start_time: SubsetTime;
    end_time: SubsetTime;
    files: RunFileEntry[];
}

export interface RunArtifact {
    dataType: string;
    runTime: RunIdentifier;
    window: CoverageWindow;
    outputDir: string;
    files: RunFileEntry[];
    metadataPath: string;
}

/** Minimal logging surface; defaults to `console`. */
export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;
