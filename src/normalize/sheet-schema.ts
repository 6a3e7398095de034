import { z } from 'zod';
import {
    CANONICAL_FIELDS,
    type ColumnMapping,
    type DecompositionRule,
    type RowRange,
    type SheetCategoryConfig,
    type SheetConfig,
} from '../types/index.js';
import { ConfigError } from '../utils/errors.js';
import { compileDecomposition, type CompiledDecomposition } from './combined-field.js';

const canonicalField = z.enum(CANONICAL_FIELDS);

function compiles(source: string): boolean {
    try {
        new RegExp(source, 'u');
        return true;
    } catch {
        return false;
    }
}

export const columnMappingSchema = z.discriminatedUnion('kind', [
    z.object({
        kind: z.literal('labels'),
        labels: z.record(z.string(), canonicalField),
    }),
    z.object({
        kind: z.literal('positions'),
        startColumn: z.number().int().nonnegative(),
        fields: z.array(canonicalField.nullable()).min(1),
    }),
]) satisfies z.ZodType<ColumnMapping>;

export const rowRangeSchema = z
    .object({
        start: z.number().int().nonnegative(),
        end: z.number().int().nonnegative().nullable(),
    })
    .refine((range) => range.end === null || range.end >= range.start, {
        message: 'Row range end must not precede its start',
    }) satisfies z.ZodType<RowRange>;

export const decompositionRuleSchema = z.object({
    field: canonicalField,
    yearPattern: z
        .string()
        .refine(compiles, { message: 'Year pattern is not a valid regular expression' })
        .refine((source) => source.includes('(?<year>'), { message: 'Year pattern needs a named group "year"' }),
    pageMarks: z.array(z.string().min(1)),
}) satisfies z.ZodType<DecompositionRule>;

export const sheetCategorySchema = z.object({
    prefix: z.string().regex(/^[A-Za-z]+$/, 'Prefix must be letters only'),
    columns: columnMappingSchema,
    rows: rowRangeSchema,
    decomposition: decompositionRuleSchema.nullable(),
}) satisfies z.ZodType<SheetCategoryConfig>;

export const sheetConfigSchema = z.object({
    name: z.string().min(1),
    category: z.string().min(1),
    code: z.string().regex(/^[A-Za-z]+$/, 'Sheet code must be letters only').optional(),
    language: z.string().min(1).optional(),
    columns: columnMappingSchema.optional(),
    rows: z
        .object({
            start: z.number().int().nonnegative().optional(),
            end: z.number().int().nonnegative().nullable().optional(),
        })
        .optional(),
    decomposition: decompositionRuleSchema.nullable().optional(),
}) satisfies z.ZodType<SheetConfig>;

/**
 * Fully resolved, immutable schema of one sheet.
 */
export interface SheetSchema {
    sheet: string;

    /** Sheet code, e.g. `PL` */
    code: string;

    /** Category prefix, e.g. `NF` */
    categoryPrefix: string;

    /** YID prefix: category prefix + code */
    prefix: string;

    /** Default language code of the sheet's records */
    language: string;

    columns: ColumnMapping;
    rows: RowRange;
    decomposition: CompiledDecomposition | null;
}

/**
 * Resolve every configured sheet against its category, applying the
 * sheet's overrides, and compile the decomposition patterns.
 *
 * @throws ConfigError on an unknown category, an empty row range or two
 *   sheets sharing one YID prefix
 */
export function resolveSheetSchemas(
    categories: Record<string, SheetCategoryConfig>,
    sheets: SheetConfig[]
): SheetSchema[] {
    const issues: string[] = [];
    const schemas: SheetSchema[] = [];
    const prefixes = new Map<string, string>();

    for (const sheet of sheets) {
        const category = categories[sheet.category];
        if (!category) {
            issues.push(`sheet "${sheet.name}": unknown category "${sheet.category}"`);
            continue;
        }

        const code = sheet.code ?? sheet.name;
        const prefix = category.prefix + code;
        const rows: RowRange = {
            start: sheet.rows?.start ?? category.rows.start,
            end: sheet.rows?.end === undefined ? category.rows.end : sheet.rows.end,
        };
        if (rows.end !== null && rows.end < rows.start) {
            issues.push(`sheet "${sheet.name}": row range ${rows.start}..${rows.end} is empty`);
            continue;
        }

        const owner = prefixes.get(prefix);
        if (owner) {
            issues.push(`sheet "${sheet.name}": prefix "${prefix}" already used by sheet "${owner}"`);
            continue;
        }
        prefixes.set(prefix, sheet.name);

        const rule = sheet.decomposition === undefined ? category.decomposition : sheet.decomposition;

        schemas.push({
            sheet: sheet.name,
            code,
            categoryPrefix: category.prefix,
            prefix,
            language: sheet.language ?? code,
            columns: sheet.columns ?? category.columns,
            rows,
            decomposition: rule ? compileDecomposition(rule) : null,
        });
    }

    if (issues.length > 0) {
        throw new ConfigError('Invalid sheet configuration', issues);
    }

    return schemas;
}
