import { existsSync, rmSync } from 'node:fs';
import type { BibKgConfig, BuiltGraph, LanguageDetector, SheetConfig } from '../types/index.js';
import { GeoCache, type GazetteerClient, type GeoCacheStats } from '../cache/geo-cache.js';
import { GraphBuilder } from '../graph/graph-builder.js';
import { ScriptLanguageDetector } from '../nlp/script-detector.js';
import { isSkip, normalize } from '../normalize/record-normalizer.js';
import { resolveSheetSchemas, type SheetSchema } from '../normalize/sheet-schema.js';
import { loadReferenceTables } from '../reference/vocabulary-loader.js';
import { ReferenceResolver } from '../resolve/reference-resolver.js';
import type { ResolutionReport } from '../resolve/resolution-report.js';
import { GeoNamesClient } from '../sources/geonames.js';
import { listSheets, loadSheetRows } from '../sources/workbook.js';
import { GraphDatabase } from '../storage/database.js';
import { getApiKey } from '../utils/config.js';
import { ConfigError } from '../utils/errors.js';
import { createHttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { writeTsvRecords } from '../utils/tsv.js';
import { VERSION } from '../version.js';

export interface PipelineStats {
    sheets: number;
    rows: number;
    records: number;
    skipped: number;
    duplicates: number;
    entities: number;
    edges: number;
    dangling: number;
    unresolvedPlaces: number;
    unresolvedCodes: number;
    cache: GeoCacheStats;
    elapsedMs: number;
}

export interface PipelineResult {
    graph: BuiltGraph;
    report: ResolutionReport;
    stats: PipelineStats;
}

/**
 * Collaborators that can be swapped, mainly for tests.
 */
export interface PipelineOptions {
    gazetteer?: GazetteerClient;
    detector?: LanguageDetector;

    /** Write the graph to `config.out` (default true) */
    persist?: boolean;
}

/**
 * Sheets to process: the configured ones, or every sheet of the workbook
 * when there is exactly one category to put them in.
 */
function sheetsToProcess(config: BibKgConfig): SheetConfig[] {
    if (config.sheets.length > 0) {
        return config.sheets;
    }

    const categories = Object.keys(config.categories);
    const [only] = categories;
    if (categories.length !== 1 || only === undefined) {
        throw new ConfigError('No sheets configured and no single category to discover them with');
    }

    const discovered = listSheets(config.workbook).map((name): SheetConfig => ({ name, category: only }));
    if (discovered.length === 0) {
        throw new ConfigError(`No sheets configured and none found in ${config.workbook}`);
    }
    getLogger().info({ sheets: discovered.map((sheet) => sheet.name), category: only }, 'Sheets discovered');
    return discovered;
}

function createGazetteer(config: BibKgConfig, options: PipelineOptions): GazetteerClient | undefined {
    if (!config.cache.fetch) {
        return undefined;
    }
    if (options.gazetteer) {
        return options.gazetteer;
    }
    const username = getApiKey('GEONAMES_USERNAME');
    if (!username) {
        throw new ConfigError('Fetching places needs GEONAMES_USERNAME in the environment');
    }
    return new GeoNamesClient(username, createHttpClient({ version: VERSION }));
}

/**
 * Full build:
 *
 * 1. Resolve sheet schemas and load the vocabularies
 * 2. Normalize, resolve and add every row, sheet by sheet, in source order
 * 3. Build the graph, flush the gazetteer cache, write the curation report
 * 4. Persist the graph and a run record to SQLite
 */
export async function buildGraph(config: BibKgConfig, options: PipelineOptions = {}): Promise<PipelineResult> {
    const logger = getLogger();
    const startTime = Date.now();

    const schemas: SheetSchema[] = resolveSheetSchemas(config.categories, sheetsToProcess(config));
    const tables = loadReferenceTables(config.vocabularies);

    const cache = GeoCache.load(config.cache.path, {
        fetch: config.cache.fetch,
        client: createGazetteer(config, options),
    });

    const detector = config.languageDetection.enabled
        ? options.detector ?? new ScriptLanguageDetector()
        : undefined;

    const resolver = new ReferenceResolver(tables, {
        detection: config.languageDetection,
        detector,
        cache,
    });
    const builder = new GraphBuilder();

    logger.info(
        { sheets: schemas.length, fetch: config.cache.fetch, detection: detector?.name ?? 'off' },
        'Starting graph build'
    );

    let rows = 0;
    let skipped = 0;
    let duplicates = 0;
    const seen = new Set<string>();

    for (const schema of schemas) {
        const sheetRows = loadSheetRows(config.workbook, schema.sheet);
        let sheetRecords = 0;

        for (const row of sheetRows) {
            rows++;
            const record = normalize(row, schema);
            if (isSkip(record)) {
                skipped++;
                continue;
            }
            if (seen.has(record.yid)) {
                duplicates++;
                logger.warn({ yid: record.yid, sheet: row.sheet, row: row.index }, 'Duplicate YID, keeping the first row');
                continue;
            }
            seen.add(record.yid);

            builder.addRecord(await resolver.resolve(record));
            sheetRecords++;
        }

        logger.info({ sheet: schema.sheet, rows: sheetRows.length, records: sheetRecords }, 'Sheet processed');
    }

    const graph = builder.build();
    cache.flush();

    const report = resolver.report;
    const unresolvedPlaces = report.unresolvedPlaces;
    if (unresolvedPlaces.length > 0) {
        writeTsvRecords(
            config.unresolvedPlacesReport,
            ['place', 'publisher'],
            unresolvedPlaces.map(({ place, publisher }) => ({ place, publisher }))
        );
        logger.warn(
            { count: unresolvedPlaces.length, path: config.unresolvedPlacesReport },
            'Places without gazetteer ids written for curation'
        );
    } else if (existsSync(config.unresolvedPlacesReport)) {
        rmSync(config.unresolvedPlacesReport, { force: true });
        logger.info({ path: config.unresolvedPlacesReport }, 'All places resolved, removed the previous curation report');
    }
    if (graph.dangling.length > 0) {
        logger.warn({ count: graph.dangling.length }, 'Edges to records missing from the input were left out');
    }

    const stats: PipelineStats = {
        sheets: schemas.length,
        rows,
        records: builder.recordCount,
        skipped,
        duplicates,
        entities: graph.entities.length,
        edges: graph.edges.length,
        dangling: graph.dangling.length,
        unresolvedPlaces: unresolvedPlaces.length,
        unresolvedCodes: report.unresolvedCodes.length,
        cache: cache.getStats(),
        elapsedMs: Date.now() - startTime,
    };

    if (options.persist !== false) {
        const db = new GraphDatabase(config.out);
        try {
            db.replaceGraph(graph, report.toJSON());
            db.insertRun({
                created_at: new Date().toISOString(),
                bibkg_version: VERSION,
                config_json: JSON.stringify(config),
                stats_json: JSON.stringify(stats),
            });
        } finally {
            db.close();
        }
    }

    logger.info(
        {
            records: stats.records,
            entities: stats.entities,
            edges: stats.edges,
            elapsed: `${(stats.elapsedMs / 1000).toFixed(1)}s`,
        },
        'Build complete'
    );

    return { graph, report, stats };
}
