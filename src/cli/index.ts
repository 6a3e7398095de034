#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { buildGraph } from '../builder/pipeline.js';
import { GeoCache, isMiss } from '../cache/geo-cache.js';
import { EXPORT_FORMATS, exportGraph, isExportFormat } from '../exporters/export.js';
import { GraphDatabase } from '../storage/database.js';
import type { LogLevel, SheetConfig } from '../types/index.js';
import { resolveConfig, type ConfigOverrides } from '../utils/config.js';
import { getLogger, initLogger } from '../utils/logger.js';
import { VERSION } from '../version.js';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

function parseLogLevel(value: string): LogLevel {
    const level = LOG_LEVELS.find((candidate) => candidate === value);
    if (!level) {
        throw new InvalidArgumentError(`Expected one of ${LOG_LEVELS.join(', ')}`);
    }
    return level;
}

function parseCodeList(value: string): string[] {
    return value
        .split(',')
        .map((code) => code.trim().toUpperCase())
        .filter((code) => code !== '');
}

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

const program = new Command();

program
    .name('bibkg')
    .description('Turn bibliographic spreadsheets into a CIDOC CRM / LRMoo knowledge graph.')
    .version(VERSION);

// ─── BUILD command ────────────────────────────────────────

interface BuildOptions {
    workbook?: string;
    sheets?: string[];
    category: string;
    types?: string;
    languages?: string;
    languageErrors?: string;
    places?: string;
    cache?: string;
    fetch?: boolean;
    detect?: boolean;
    candidates?: string[];
    out?: string;
    placesReport?: string;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

program
    .command('build')
    .description('Build the graph database from a workbook of tab-separated sheets')
    .option('-w, --workbook <dir>', 'Workbook directory holding one <sheet>.tsv per sheet')
    .option('-s, --sheets <names...>', 'Sheets to process (default: configured or all found)')
    .option('--category <name>', 'Category for sheets given with --sheets', 'nonfiction')
    .option('--types <path>', 'Types vocabulary file')
    .option('--languages <path>', 'Languages vocabulary file')
    .option('--language-errors <path>', 'Language code overrides file')
    .option('--places <path>', 'Places vocabulary file')
    .option('--cache <path>', 'Gazetteer cache file')
    .option('--fetch', 'Fetch missing places from GeoNames (needs GEONAMES_USERNAME)')
    .option('--detect', 'Detect languages that do not resolve')
    .option('--candidates <codes>', 'Comma-separated languages detection may answer with', parseCodeList)
    .option('-o, --out <path>', 'Output database path')
    .option('--places-report <path>', 'Where to write places without gazetteer ids')
    .option('--log-level <level>', 'Log level: debug | info | warn | error', parseLogLevel)
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts: BuildOptions) => {
        try {
            const config = await resolveConfig(toOverrides(opts));
            initLogger(config);

            const { stats } = await buildGraph(config);
            getLogger().info({ dbPath: config.out, unresolvedPlaces: stats.unresolvedPlaces }, 'Build complete!');
        } catch (error) {
            getLogger().error({ error: describeError(error) }, 'Build failed');
            process.exit(1);
        }
    });

/**
 * Only flags the user gave become overrides, so unset ones do not shadow
 * the config file.
 */
function toOverrides(opts: BuildOptions): ConfigOverrides {
    const vocabularies: ConfigOverrides['vocabularies'] = {
        ...(opts.types !== undefined ? { types: opts.types } : {}),
        ...(opts.languages !== undefined ? { languages: opts.languages } : {}),
        ...(opts.languageErrors !== undefined ? { languageErrors: opts.languageErrors } : {}),
        ...(opts.places !== undefined ? { places: opts.places } : {}),
    };

    return {
        ...(opts.workbook !== undefined ? { workbook: opts.workbook } : {}),
        ...(opts.sheets !== undefined
            ? { sheets: opts.sheets.map((name): SheetConfig => ({ name, category: opts.category })) }
            : {}),
        vocabularies,
        cache: {
            ...(opts.cache !== undefined ? { path: opts.cache } : {}),
            ...(opts.fetch !== undefined ? { fetch: opts.fetch } : {}),
        },
        languageDetection: {
            ...(opts.detect !== undefined ? { enabled: opts.detect } : {}),
            ...(opts.candidates !== undefined ? { candidates: opts.candidates } : {}),
        },
        ...(opts.out !== undefined ? { out: opts.out } : {}),
        ...(opts.placesReport !== undefined ? { unresolvedPlacesReport: opts.placesReport } : {}),
        ...(opts.logLevel !== undefined ? { logLevel: opts.logLevel } : {}),
        ...(opts.jsonLogs !== undefined ? { jsonLogs: opts.jsonLogs } : {}),
    };
}

// ─── EXPORT command ───────────────────────────────────────

interface ExportOptions {
    input: string;
    format: string;
    out?: string;
    baseIri?: string;
}

const EXTENSIONS = { json: '.json', graphml: '.graphml', ntriples: '.nt' } as const;

program
    .command('export')
    .description('Export the graph to JSON, GraphML or N-Triples')
    .requiredOption('-i, --input <dbPath>', 'Input database path')
    .requiredOption('-f, --format <format>', `Export format: ${EXPORT_FORMATS.join(' | ')}`)
    .option('-o, --out <path>', 'Output file path')
    .option('--base-iri <iri>', 'Base IRI for entity identifiers')
    .action(async (opts: ExportOptions) => {
        const format = opts.format.toLowerCase();
        if (!isExportFormat(format)) {
            console.error(`Invalid format: ${format}. Valid: ${EXPORT_FORMATS.join(', ')}`);
            process.exit(1);
        }

        const outputPath = opts.out ?? opts.input.replace(/\.db$/, '') + EXTENSIONS[format];

        try {
            const baseIri = opts.baseIri ?? (await resolveConfig({})).baseIri;
            exportGraph(opts.input, outputPath, format, { baseIri });
            console.log(`Exported to ${outputPath}`);
        } catch (error) {
            console.error('Export failed:', describeError(error));
            process.exit(1);
        }
    });

// ─── INSPECT command ──────────────────────────────────────

program
    .command('inspect')
    .description('Show database statistics')
    .requiredOption('-i, --input <dbPath>', 'Input database path')
    .action((opts: { input: string }) => {
        try {
            const db = new GraphDatabase(opts.input);
            const stats = db.getStats();
            const places = db.getUnresolvedPlaces();
            const codes = db.getUnresolvedCodes();
            const run = db.getLatestRun();
            db.close();

            console.log('\nGraph Database Statistics\n');
            console.log(`  Entities:          ${stats.entities}`);
            console.log(`  Edges:             ${stats.edges}`);
            console.log(`  Dangling edges:    ${stats.dangling}`);
            console.log(`  Unresolved places: ${stats.unresolvedPlaces}`);
            console.log(`  Unresolved codes:  ${stats.unresolvedCodes}`);
            console.log(`  Runs:              ${stats.runs}`);
            if (run) {
                console.log(`  Last run:          ${run.created_at} (v${run.bibkg_version})`);
            }

            if (Object.keys(stats.entitiesByClass).length > 0) {
                console.log('\n  Entity Classes:');
                for (const [entityClass, count] of Object.entries(stats.entitiesByClass)) {
                    console.log(`    ${entityClass}: ${count}`);
                }
            }

            if (Object.keys(stats.edgesByRelation).length > 0) {
                console.log('\n  Relations:');
                for (const [relation, count] of Object.entries(stats.edgesByRelation)) {
                    console.log(`    ${relation}: ${count}`);
                }
            }

            if (places.length > 0) {
                console.log('\n  Unresolved Places:');
                for (const place of places.slice(0, 20)) {
                    console.log(`    ${place.place} (${place.publisher || 'no publisher'}) ×${place.occurrences}`);
                }
            }

            if (codes.length > 0) {
                console.log('\n  Unresolved Codes:');
                for (const code of codes) {
                    console.log(`    ${code.vocabulary} "${code.code}": ${code.yids.length} record(s)`);
                }
            }

            console.log('');
        } catch (error) {
            console.error('Inspect failed:', describeError(error));
            process.exit(1);
        }
    });

// ─── CACHE command ────────────────────────────────────────

program
    .command('cache')
    .description('Manage the gazetteer cache')
    .argument('<action>', 'Action: clear | stats | show')
    .argument('[id]', 'GeoNames id, for show')
    .option('--cache <path>', 'Gazetteer cache file')
    .action(async (action: string, id: string | undefined, opts: { cache?: string }) => {
        try {
            const path = opts.cache ?? (await resolveConfig({})).cache.path;
            const cache = GeoCache.load(path);

            switch (action) {
                case 'clear':
                    cache.clear();
                    console.log('Cache cleared.');
                    break;
                case 'stats':
                    console.log(`Cache: ${cache.size} entries (${path})`);
                    break;
                case 'show': {
                    if (!id) {
                        console.error('Usage: bibkg cache show <id>');
                        process.exit(1);
                    }
                    const entry = cache.get(id);
                    console.log(isMiss(entry) ? `No entry for ${id}.` : JSON.stringify(entry, null, 2));
                    break;
                }
                default:
                    console.error(`Unknown action: ${action}. Valid: clear, stats, show`);
                    process.exit(1);
            }
        } catch (error) {
            console.error('Cache command failed:', describeError(error));
            process.exit(1);
        }
    });

await program.parseAsync();
