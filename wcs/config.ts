/**
 * GRIB Run Fetcher — Settings
 *
 * Reads the model settings and user settings documents once and returns an
 * immutable snapshot. Components receive the snapshot explicitly.
 *
 * Model settings:
 *   {
 *     "arome001": {
 *       "server": "https://wcs.example.test",
 *       "get_capabilities_path": "/wcs/GetCapabilities",
 *       "describe_coverage_path": "/wcs/DescribeCoverage",
 *       "get_coverage_path": "/wcs/GetCoverage",
 *       "data_types": {
 *         "rain": { "coverage_id": "RAIN___{run_time}", "time_offset_range": [1, 51] }
 *       }
 *     }
 *   }
 *
 * User settings:
 *   { "api_keys": { "arome001": "..." } }
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigurationError } from './errors';
import { splitTemplate } from './template';
import {
    DEFAULT_LANGUAGE,
    DEFAULT_WCS_VERSION,
    GRIB_FORMAT,
    type DataTypeSpec,
    type DownloaderConfig,
    type ModelSettings
} from './types';

// =============================================================================
// Schemas
// =============================================================================

const hourOffset = z.number().int();

const dataTypeSchema = z.object({
    coverage_id: z.string().min(1),
    time_offset_range: z
        .tuple([hourOffset, hourOffset])
        .refine(([start, end]) => start <= end, { message: 'start offset must not exceed end offset' })
        .optional()
});

const modelSchema = z.object({
    server: z.string().url(),
    get_capabilities_path: z.string(),
    describe_coverage_path: z.string().optional(),
    get_coverage_path: z.string(),
    version: z.string().default(DEFAULT_WCS_VERSION),
    language: z.string().default(DEFAULT_LANGUAGE),
    format: z.string().default(GRIB_FORMAT),
    data_types: z.record(dataTypeSchema)
});

const modelSettingsSchema = z.record(modelSchema);

const userSettingsSchema = z.object({
    api_keys: z.record(z.string()).default({})
});

// =============================================================================
// Loading
// =============================================================================

export interface LoadSettingsOptions {
    modelSettingsPath: string;
    userSettingsPath: string;
    model: string;
}

function describeIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
}

async function readJson(path: string, label: string): Promise<unknown> {
    let text: string;
    try {
        text = await readFile(path, 'utf8');
    } catch (error) {
        throw new ConfigurationError(`${label} settings file not found: ${path}`, { cause: error });
    }

    try {
        const value: unknown = JSON.parse(text);
        return value;
    } catch (error) {
        throw new ConfigurationError(`Error parsing ${label} settings file ${path}`, { cause: error });
    }
}

/**
 * Validate already-parsed settings documents and build the snapshot for one model.
 */
export function parseSettings(modelDoc: unknown, userDoc: unknown, model: string): DownloaderConfig {
    const models = modelSettingsSchema.safeParse(modelDoc);
    if (!models.success) {
        throw new ConfigurationError(`Invalid model settings: ${describeIssues(models.error)}`);
    }
    const user = userSettingsSchema.safeParse(userDoc);
    if (!user.success) {
        throw new ConfigurationError(`Invalid user settings: ${describeIssues(user.error)}`);
    }

    const raw = models.data[model];
    if (!raw) {
        const known = Object.keys(models.data).join(', ') || 'none';
        throw new ConfigurationError(`Unknown model "${model}" (configured: ${known})`);
    }

    const dataTypes: Record<string, DataTypeSpec> = {};
    for (const [name, entry] of Object.entries(raw.data_types)) {
        // Fail at load time rather than on first use.
        splitTemplate(entry.coverage_id);
        dataTypes[name] = Object.freeze({
            coverageIdTemplate: entry.coverage_id,
            ...(entry.time_offset_range ? { timeOffsetRange: entry.time_offset_range } : {})
        });
    }

    const settings: ModelSettings = {
        serverUrl: raw.server,
        capabilitiesPath: raw.get_capabilities_path,
        describeCoveragePath: raw.describe_coverage_path,
        coveragePath: raw.get_coverage_path,
        version: raw.version,
        language: raw.language,
        format: raw.format,
        dataTypes: Object.freeze(dataTypes)
    };

    const apiKey = user.data.api_keys[model];
    return Object.freeze({
        model,
        settings: Object.freeze(settings),
        ...(apiKey ? { apiKey } : {})
    });
}

export async function loadSettings(options: LoadSettingsOptions): Promise<DownloaderConfig> {
    const modelDoc = await readJson(options.modelSettingsPath, 'Model');
    const userDoc = await readJson(options.userSettingsPath, 'User');
    return parseSettings(modelDoc, userDoc, options.model);
}

/**
 * Data type lookup; unknown names are a configuration error.
 */
export function getDataType(config: DownloaderConfig, dataType: string): DataTypeSpec {
    const spec = Object.prototype.hasOwnProperty.call(config.settings.dataTypes, dataType)
        ? config.settings.dataTypes[dataType]
        : undefined;
    if (!spec) {
        const known = Object.keys(config.settings.dataTypes).join(', ') || 'none';
        throw new ConfigurationError(
            `Unsupported data type "${dataType}" for ${config.model} (available: ${known})`
        );
    }
    return spec;
}
