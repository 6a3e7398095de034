import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import {
    DEFAULT_CONFIG,
    type BibKgConfig,
    type CacheConfig,
    type LanguageDetectionConfig,
    type LogLevel,
    type VocabularyPaths,
} from '../types/index.js';
import { sheetCategorySchema, sheetConfigSchema } from '../normalize/sheet-schema.js';
import { ConfigError } from './errors.js';
import { getLogger } from './logger.js';

const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const satisfies readonly LogLevel[];

const vocabulariesSchema = z.object({
    types: z.string().min(1),
    languages: z.string().min(1),
    languageErrors: z.string().min(1),
    places: z.string().min(1),
});

const cacheSchema = z.object({
    path: z.string().min(1),
    fetch: z.boolean(),
});

const languageDetectionSchema = z.object({
    enabled: z.boolean(),
    candidates: z.array(z.string().min(1)),
});

export const configSchema = z.object({
    workbook: z.string().min(1),
    vocabularies: vocabulariesSchema,
    categories: z.record(z.string(), sheetCategorySchema),
    sheets: z.array(sheetConfigSchema),
    cache: cacheSchema,
    languageDetection: languageDetectionSchema,
    out: z.string().min(1),
    unresolvedPlacesReport: z.string().min(1),
    baseIri: z.string().url(),
    logLevel: z.enum(LOG_LEVELS),
    jsonLogs: z.boolean(),
}) satisfies z.ZodType<BibKgConfig>;

/**
 * Partial configuration as given by a config file, the environment or
 * CLI flags. Nested groups may be given in part.
 */
export interface ConfigOverrides extends Partial<Omit<BibKgConfig, 'vocabularies' | 'cache' | 'languageDetection'>> {
    vocabularies?: Partial<VocabularyPaths>;
    cache?: Partial<CacheConfig>;
    languageDetection?: Partial<LanguageDetectionConfig>;
}

const overridesSchema = configSchema
    .extend({
        vocabularies: vocabulariesSchema.partial(),
        cache: cacheSchema.partial(),
        languageDetection: languageDetectionSchema.partial(),
    })
    .partial()
    .strict() satisfies z.ZodType<ConfigOverrides>;

function formatIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Load configuration from bibkg.config.json using cosmiconfig.
 * Returns null if no config file is found (defaults are used).
 */
async function loadConfigFile(searchFrom?: string): Promise<ConfigOverrides | null> {
    const explorer = cosmiconfig('bibkg', {
        searchPlaces: ['bibkg.config.json'],
    });

    let result: Awaited<ReturnType<typeof explorer.search>>;
    try {
        result = await explorer.search(searchFrom);
    } catch (error) {
        throw new ConfigError(`Failed to read config file: ${error instanceof Error ? error.message : String(error)}`);
    }

    if (!result || result.isEmpty) {
        return null;
    }

    const parsed = overridesSchema.safeParse(result.config);
    if (!parsed.success) {
        throw new ConfigError(`Invalid config file ${result.filepath}`, formatIssues(parsed.error));
    }

    getLogger().debug({ path: result.filepath }, 'Loaded config file');
    return parsed.data;
}

function parseFlag(value: string): boolean {
    return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

/**
 * Read relevant environment variables.
 */
function loadEnvVars(env: NodeJS.ProcessEnv): ConfigOverrides {
    const overrides: ConfigOverrides = {};

    const fetch = env['BIBKG_FETCH_PLACES'];
    if (fetch !== undefined) {
        overrides.cache = { fetch: parseFlag(fetch) };
    }

    const detect = env['BIBKG_DETECT_LANGUAGE'];
    if (detect !== undefined) {
        overrides.languageDetection = { enabled: parseFlag(detect) };
    }

    const level = env['BIBKG_LOG_LEVEL'];
    const knownLevel = LOG_LEVELS.find((candidate) => candidate === level);
    if (knownLevel) {
        overrides.logLevel = knownLevel;
    }

    return overrides;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 *
 * @throws ConfigError when the file or the merged result is invalid
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides,
    options: { searchFrom?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<BibKgConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env ?? process.env);

    // Deep merge with precedence
    const merged: BibKgConfig = {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...envConfig,
        ...cliFlags,
        vocabularies: {
            ...DEFAULT_CONFIG.vocabularies,
            ...fileConfig?.vocabularies,
            ...cliFlags.vocabularies,
        },
        categories: {
            ...DEFAULT_CONFIG.categories,
            ...fileConfig?.categories,
            ...cliFlags.categories,
        },
        cache: {
            ...DEFAULT_CONFIG.cache,
            ...fileConfig?.cache,
            ...envConfig.cache,
            ...cliFlags.cache,
        },
        languageDetection: {
            ...DEFAULT_CONFIG.languageDetection,
            ...fileConfig?.languageDetection,
            ...envConfig.languageDetection,
            ...cliFlags.languageDetection,
        },
    };

    const parsed = configSchema.safeParse(merged);
    if (!parsed.success) {
        throw new ConfigError('Invalid configuration', formatIssues(parsed.error));
    }

    return parsed.data;
}

/**
 * Get a credential from the environment.
 * @param name - Environment variable name
 */
export function getApiKey(name: string, env: NodeJS.ProcessEnv = process.env): string | undefined {
    const value = env[name];
    return value && value.trim() !== '' ? value.trim() : undefined;
}
