/**
 * GRIB Run Fetcher — Main Entry Point
 *
 * Re-exports all public APIs.
 */

// Core types and errors
export * from './types';
export * from './errors';

// Settings
export * from './config';

// Formats
export * from './time';
export * from './template';
export * from './hash';
export * from './manifest';

// Pipeline stages
export * from './ingest/transport';
export * from './ingest/catalog';
export * from './ingest/window';
export * from './ingest/storage';
export * from './ingest/fetcher';
export * from './ingest/pipeline';
