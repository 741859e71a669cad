/**
 * Download the latest run of one or more data types.
 *
 *   tsx scripts/fetch_latest_run.ts --model arome001 -d rain -d temp --output grib_files
 *
 * Each data type lands in `<output>/<dataType>/`.
 */
/* eslint-disable no-console */

import { join } from 'node:path';
import { parseArgs } from 'node:util';
import { LocalDirectory, createDownloader, loadSettings, runIngest } from '../wcs';

const { values } = parseArgs({
    options: {
        model: { type: 'string' },
        'data-type': { type: 'string', short: 'd', multiple: true },
        output: { type: 'string', short: 'o' },
        'model-settings': { type: 'string' },
        'user-settings': { type: 'string' }
    }
});

const model = values.model ?? 'arome001';
const outputRoot = values.output ?? 'grib_files';

async function main(): Promise<number> {
    const config = await loadSettings({
        modelSettingsPath: values['model-settings'] ?? 'settings/model_settings.json',
        userSettingsPath: values['user-settings'] ?? 'settings/user_settings.json',
        model
    });
    const downloader = createDownloader(config);

    console.log(`Status: ${await downloader.catalog.status()}`);

    const available = downloader.catalog.listDataTypes();
    console.log(`Available data types: ${available.join(', ')}`);

    const requested = values['data-type'] ?? available;
    let failures = 0;

    for (const dataType of requested) {
        const outputDir = new LocalDirectory(join(outputRoot, dataType));
        try {
            const result = await runIngest(downloader, { dataType, outputDir });
            if (result.status === 'no-run') {
                console.log(`Last run time for ${dataType}: none`);
                continue;
            }
            console.log(`Last run time for ${dataType}: ${result.run}`);
            console.log(`Saved ${result.artifact.files.length} file(s) and ${result.artifact.metadataPath}`);
        } catch (error) {
            failures++;
            console.error(`Download of ${dataType} failed:`, error instanceof Error ? error.message : error);
        }
    }

    return failures === 0 ? 0 : 1;
}

main().then(
    (code) => {
        process.exitCode = code;
    },
    (error: unknown) => {
        console.error(error instanceof Error ? error.message : error);
        process.exitCode = 1;
    }
);
