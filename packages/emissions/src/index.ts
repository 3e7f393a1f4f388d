export * from './errors';
export * from './table';
export * from './csv';
export * from './sql';
export * from './sources';
export * from './timeZone';
export * from './buckets';
export * from './cache';
export * from './fetcher';
export * from './aligner';
export * from './aggregator';
export * from './bulkLoader';
export * from './pipeline';
export * from './warehouse/types';
export * from './warehouse/scope';
export * from './warehouse/snowflake';
export * from './warehouse/inMemory';
