/**
 * GRIB Run Fetcher — Coverage-Id Templates
 *
 * A template such as `TOTAL_PRECIPITATION__GROUND_OR_WATER_SURFACE___{run_time}_PT1H`
 * names one coverage per run; the text around the placeholder identifies the
 * data type in a capabilities listing.
 */

import { ConfigurationError } from './errors';
import { RUN_TIME_PLACEHOLDER, type RunIdentifier } from './types';

export interface TemplateParts {
    prefix: string;
    suffix: string;
}

export function splitTemplate(template: string): TemplateParts {
    const parts = template.split(RUN_TIME_PLACEHOLDER);
    if (parts.length !== 2) {
        throw new ConfigurationError(
            `Coverage id template must contain ${RUN_TIME_PLACEHOLDER} exactly once: ${template}`
        );
    }

    // An empty suffix is fine (`RAIN___{run_time}`); an empty prefix would match every id.
    const [prefix, suffix] = parts;
    if (!prefix) {
        throw new ConfigurationError(
            `Coverage id template needs text before ${RUN_TIME_PLACEHOLDER}: ${template}`
        );
    }
    return { prefix, suffix };
}

export function formatCoverageId(template: string, run: RunIdentifier): string {
    const { prefix, suffix } = splitTemplate(template);
    return `${prefix}${run}${suffix}`;
}

/**
 * Run identifier embedded in a coverage id, or null when the id belongs to
 * another data type. The returned text is not checked against the run format.
 */
export function extractRunIdentifier(template: string, coverageId: string): string | null {
    const { prefix, suffix } = splitTemplate(template);
    if (coverageId.length <= prefix.length + suffix.length) return null;
    if (!coverageId.startsWith(prefix) || !coverageId.endsWith(suffix)) return null;
    return coverageId.slice(prefix.length, coverageId.length - suffix.length);
}
