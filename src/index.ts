/**
 * Library entry point. The `bibkg` CLI is a thin layer over these.
 */
export { buildGraph, type PipelineOptions, type PipelineResult, type PipelineStats } from './builder/pipeline.js';
export { GeoCache, MISS, isMiss, type GazetteerClient, type GeoCacheStats } from './cache/geo-cache.js';
export { EXPORT_FORMATS, exportGraph, renderGraph, type ExportFormat, type ExportOptions } from './exporters/export.js';
export { GraphBuilder } from './graph/graph-builder.js';
export { ScriptLanguageDetector } from './nlp/script-detector.js';
export { normalize, isSkip } from './normalize/record-normalizer.js';
export { resolveSheetSchemas, type SheetSchema } from './normalize/sheet-schema.js';
export { ReferenceTables, UNRESOLVED, isUnresolved } from './reference/reference-tables.js';
export { loadReferenceTables } from './reference/vocabulary-loader.js';
export { ReferenceResolver, type ResolvedRecord } from './resolve/reference-resolver.js';
export { ResolutionReport } from './resolve/resolution-report.js';
export { GeoNamesClient } from './sources/geonames.js';
export { WorkbookError, loadSheetRows, listSheets } from './sources/workbook.js';
export { GraphDatabase } from './storage/database.js';
export { resolveConfig } from './utils/config.js';
export { ConfigError, GraphConsistencyError, VocabularyError } from './utils/errors.js';
export { initLogger, getLogger } from './utils/logger.js';
export * from './types/index.js';
export { VERSION } from './version.js';
