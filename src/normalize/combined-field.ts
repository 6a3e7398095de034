import type { CanonicalField, DecompositionRule } from '../types/index.js';

/**
 * A decomposition rule with its patterns compiled.
 */
export interface CompiledDecomposition {
    field: CanonicalField;
    year: RegExp;

    /** Page after mark (`s.12`), then count before mark (`250 s.`) */
    pagePatterns: RegExp[];
}

export interface DecomposedField {
    year: string;
    issue: string;
    page: string;
}

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Compile a decomposition rule. Marks are tried longest first so that
 * `pp.` is not read as `p.`.
 */
export function compileDecomposition(rule: DecompositionRule): CompiledDecomposition {
    const marks = [...new Set(rule.pageMarks)]
        .sort((a, b) => b.length - a.length)
        .map(escapeRegExp)
        .join('|');

    const pagePatterns =
        marks === ''
            ? []
            : [
                  new RegExp(`(?:^|,\\s*)(?:${marks})\\.\\s?(?<page>[\\p{L}\\p{N}][^,]*)`, 'u'),
                  new RegExp(`(?:^|,\\s*|\\s)(?<page>\\p{N}+)\\s(?:${marks})\\.`, 'u'),
              ];

    return {
        field: rule.field,
        year: new RegExp(rule.yearPattern, 'u'),
        pagePatterns,
    };
}

/**
 * Strip trailing punctuation and close parentheses left open by the cut.
 */
function cleanIssue(text: string): string {
    let issue = text.trim().replace(/[\s.,]+$/u, '');
    const missing = (issue.match(/\(/g)?.length ?? 0) - (issue.match(/\)/g)?.length ?? 0);
    if (missing > 0) {
        issue += ')'.repeat(missing);
    }
    return issue;
}

/**
 * Split a combined publication field into year, issue and page.
 *
 * The issue is whatever lies between the year and the page mark, so
 * unusual issue notations survive. Missing parts come back empty.
 */
export function decomposeCombinedField(value: string, rule: CompiledDecomposition): DecomposedField {
    const text = value.trim();

    let year = '';
    let rest = text;
    const yearMatch = rule.year.exec(text);
    if (yearMatch && yearMatch.index === 0) {
        year = yearMatch.groups?.['year'] ?? '';
        rest = text.slice(yearMatch[0].length);
    }

    let page = '';
    let issueEnd = rest.length;
    for (const pattern of rule.pagePatterns) {
        const match = pattern.exec(rest);
        if (match && match.index < issueEnd) {
            page = (match.groups?.['page'] ?? '').trim();
            issueEnd = match.index;
        }
    }

    // Without a year there is no anchor for the issue
    const issue = year === '' ? '' : cleanIssue(rest.slice(0, issueEnd));

    return { year, issue, page };
}
