export * from './types';
export * from './errors';
export * from './config/serviceConfig';
export { assemble, buildSampleSheet, describeShape, inferColumnType } from './assembly/assembler';
export type { DatasetShape } from './assembly/assembler';
export { CatalogReader } from './catalog/catalogReader';
export { GdcArtifactCatalog } from './catalog/gdcArtifactCatalog';
export type { ArtifactCatalog } from './catalog/types';
export { applyFeatureFilter, loadFilterSet } from './features/featureFilter';
export { stripVersion } from './features/identifiers';
export { ClinicalLookup, flattenClinicalCases } from './metadata/clinical';
export { parseAge, parseSex } from './metadata/demographics';
export { GdcClient } from './metadata/gdcClient';
export { GeoSeriesSearch, buildSearchTerm } from './metadata/geoClient';
export type { ClinicalRecord, ClinicalTable, MetadataService } from './metadata/types';
export { DatasetOrchestrator } from './orchestrator/buildDataset';
export { createWorkerPool } from './orchestrator/workerPool';
export { SinkWriter, parseDestination } from './sink/sinkWriter';
export { LocalObjectStore } from './store/localObjectStore';
export { S3ObjectStore } from './store/s3ObjectStore';
export type { ObjectStore } from './store/types';
export { createTransformer } from './transform';
export type { FeatureMatrix, SampleTransformer } from './transform';
export { createIngestRuntime, discoverCohorts, geoSeriesFilter, runCohort, runPipeline } from './pipeline';
