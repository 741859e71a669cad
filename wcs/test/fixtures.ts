import { vi } from 'vitest';
import { parseSettings } from '../config';
import type { DownloaderConfig, Logger } from '../types';

export const SERVER = 'https://wcs.example.test/api';
export const CAPABILITIES_PATH = '/wcs/GetCapabilities';
export const DESCRIBE_PATH = '/wcs/DescribeCoverage';
export const COVERAGE_PATH = '/wcs/GetCoverage';

export function modelDoc(overrides: Record<string, unknown> = {}): Record<string, unknown> {
    return {
        testmodel: {
            server: SERVER,
            get_capabilities_path: CAPABILITIES_PATH,
            describe_coverage_path: DESCRIBE_PATH,
            get_coverage_path: COVERAGE_PATH,
            data_types: {
                rain: { coverage_id: 'RAIN___{run_time}' },
                temp: { coverage_id: 'TEMP__2M___{run_time}_PT1H', time_offset_range: [0, 3] }
            },
            ...overrides
        }
    };
}

export function testConfig(overrides: Record<string, unknown> = {}, apiKey: string | null = 'test-secret'): DownloaderConfig {
    const userDoc = { api_keys: apiKey === null ? {} : { testmodel: apiKey } };
    return parseSettings(modelDoc(overrides), userDoc, 'testmodel');
}

export function silentLogger(): Logger {
    return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function timeoutError(): Error {
    const error = new Error('The operation was aborted due to timeout');
    error.name = 'TimeoutError';
    return error;
}

export function capabilitiesXml(coverageIds: string[]): string {
    const summaries = coverageIds
        .map((id) => `    <wcs:CoverageSummary>
      <wcs:CoverageId>${id}</wcs:CoverageId>
      <wcs:CoverageSubtype>ReferenceableGridCoverage</wcs:CoverageSubtype>
    </wcs:CoverageSummary>`)
        .join('\n');

    return `<?xml version="1.0" encoding="UTF-8"?>
<wcs:Capabilities xmlns:wcs="http://www.opengis.net/wcs/2.0" xmlns:ows="http://www.opengis.net/ows/2.0" version="2.0.1">
  <ows:ServiceIdentification>
    <ows:Title>Test coverage service</ows:Title>
  </ows:ServiceIdentification>
  <wcs:Contents>
${summaries}
  </wcs:Contents>
</wcs:Capabilities>`;
}

export function describeXml(begin: string, end: string): string {
    return `<?xml version="1.0" encoding="UTF-8"?>
<wcs:CoverageDescriptions xmlns:wcs="http://www.opengis.net/wcs/2.0" xmlns:gml="http://www.opengis.net/gml/3.2">
  <wcs:CoverageDescription gml:id="RAIN">
    <gml:boundedBy>
      <gml:EnvelopeWithTimePeriod srsName="http://www.opengis.net/def/crs/EPSG/0/4326" axisLabels="lat long time" srsDimension="3">
        <gml:lowerCorner>37.5 -12</gml:lowerCorner>
        <gml:upperCorner>55.4 16</gml:upperCorner>
        <gml:beginPosition>${begin}</gml:beginPosition>
        <gml:endPosition>${end}</gml:endPosition>
      </gml:EnvelopeWithTimePeriod>
    </gml:boundedBy>
  </wcs:CoverageDescription>
</wcs:CoverageDescriptions>`;
}

export function exceptionReportXml(): string {
    return `<?xml version="1.0" encoding="UTF-8"?>
<ows:ExceptionReport xmlns:ows="http://www.opengis.net/ows/2.0" version="2.0.1">
  <ows:Exception exceptionCode="NoSuchCoverage" locator="coverageId">
    <ows:ExceptionText>Coverage not found</ows:ExceptionText>
  </ows:Exception>
</ows:ExceptionReport>`;
}
