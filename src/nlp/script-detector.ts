import type { LanguageDetector } from '../types/index.js';

const SCRIPTS = [
    'Latin', 'Cyrillic', 'Greek', 'Georgian', 'Armenian', 'Hebrew', 'Arabic',
    'Han', 'Hiragana', 'Katakana', 'Hangul',
] as const;

type Script = (typeof SCRIPTS)[number];

const SCRIPT_PATTERNS = SCRIPTS.map((script) => ({
    script,
    pattern: new RegExp(`\\p{Script=${script}}`, 'u'),
}));

/**
 * Writing systems a language is written in, and the marked letters of its
 * alphabet (lowercase, beyond the plain letters its script shares).
 */
interface ScriptSignature {
    scripts: readonly Script[];
    letters: string;
}

const SIGNATURES: Record<string, ScriptSignature> = {
    // Latin
    CS: { scripts: ['Latin'], letters: 'áčďéěíňóřšťúůýž' },
    DE: { scripts: ['Latin'], letters: 'äöüß' },
    EN: { scripts: ['Latin'], letters: '' },
    ES: { scripts: ['Latin'], letters: 'áéíñóúü' },
    ET: { scripts: ['Latin'], letters: 'äöõüšž' },
    FI: { scripts: ['Latin'], letters: 'äöå' },
    FR: { scripts: ['Latin'], letters: 'àâæçéèêëîïôœùûüÿ' },
    HR: { scripts: ['Latin'], letters: 'čćđšž' },
    HU: { scripts: ['Latin'], letters: 'áéíóöőúüű' },
    IT: { scripts: ['Latin'], letters: 'àèéìíîòóùú' },
    LT: { scripts: ['Latin'], letters: 'ąčęėįšųūž' },
    LV: { scripts: ['Latin'], letters: 'āčēģīķļņšūž' },
    NL: { scripts: ['Latin'], letters: 'éëï' },
    PL: { scripts: ['Latin'], letters: 'ąćęłńóśźż' },
    PT: { scripts: ['Latin'], letters: 'áâãàçéêíóôõú' },
    RO: { scripts: ['Latin'], letters: 'ăâîșțşţ' },
    SK: { scripts: ['Latin'], letters: 'áäčďéíĺľňóôŕšťúýž' },
    SL: { scripts: ['Latin'], letters: 'čšž' },
    SV: { scripts: ['Latin'], letters: 'åäö' },
    TR: { scripts: ['Latin'], letters: 'âçğıîöşûü' },
    // Cyrillic
    BE: { scripts: ['Cyrillic'], letters: 'ёыэіў' },
    BG: { scripts: ['Cyrillic'], letters: 'ъщ' },
    KY: { scripts: ['Cyrillic'], letters: 'ёыэңөү' },
    MK: { scripts: ['Cyrillic'], letters: 'ѓѕќјљњџ' },
    MN: { scripts: ['Cyrillic'], letters: 'ёыэөү' },
    RU: { scripts: ['Cyrillic'], letters: 'ёыэъщ' },
    SR: { scripts: ['Cyrillic', 'Latin'], letters: 'ђћјљњџčćđšž' },
    UK: { scripts: ['Cyrillic'], letters: 'іїєґщ' },
    // Others
    AR: { scripts: ['Arabic'], letters: '' },
    EL: { scripts: ['Greek'], letters: '' },
    HE: { scripts: ['Hebrew'], letters: '' },
    HY: { scripts: ['Armenian'], letters: '' },
    JA: { scripts: ['Han', 'Hiragana', 'Katakana'], letters: '' },
    KA: { scripts: ['Georgian'], letters: '' },
    KO: { scripts: ['Hangul', 'Han'], letters: '' },
    ZH: { scripts: ['Han'], letters: '' },
};

function owners<K>(pairs: Array<[K, string]>): Map<K, string[]> {
    const map = new Map<K, string[]>();
    for (const [key, code] of pairs) {
        map.set(key, [...(map.get(key) ?? []), code]);
    }
    return map;
}

const LETTER_OWNERS = owners(
    Object.entries(SIGNATURES).flatMap(([code, { letters }]) => [...letters].map((letter): [string, string] => [letter, code]))
);

const SCRIPT_OWNERS = owners(
    Object.entries(SIGNATURES).flatMap(([code, { scripts }]) => scripts.map((script): [Script, string] => [script, code]))
);

function ownedOnlyBy<K>(map: Map<K, string[]>, key: K, code: string): boolean {
    const found = map.get(key);
    return found !== undefined && found.length === 1 && found[0] === code;
}

/**
 * Detects a language from the writing system and the marked letters of
 * its alphabet. Meant for short texts such as titles and names.
 *
 * A candidate fits when it writes every script and every marked letter of
 * the text. The answer is the one fitting candidate with a script or
 * letter no other known language has; failing that, the only fitting
 * candidate, provided none of the text's marked letters also belongs to a
 * language outside the candidates. Anything else is null.
 */
export class ScriptLanguageDetector implements LanguageDetector {
    readonly name = 'script';

    detect(text: string, candidates: readonly string[]): string | null {
        const sample = text.toLowerCase();
        const present = SCRIPT_PATTERNS.filter(({ pattern }) => pattern.test(sample)).map(({ script }) => script);
        if (present.length === 0) {
            return null;
        }

        const marked = [...new Set([...sample].filter((char) => LETTER_OWNERS.has(char)))];
        const wanted = [...new Set(candidates.map((code) => code.trim().toUpperCase()))];

        const fitting = wanted.filter((code) => {
            const signature = SIGNATURES[code];
            return (
                signature !== undefined &&
                present.every((script) => signature.scripts.includes(script)) &&
                marked.every((letter) => signature.letters.includes(letter))
            );
        });

        const evidenced = fitting.filter(
            (code) =>
                present.some((script) => ownedOnlyBy(SCRIPT_OWNERS, script, code)) ||
                marked.some((letter) => ownedOnlyBy(LETTER_OWNERS, letter, code))
        );
        if (evidenced.length > 0) {
            return evidenced.length === 1 ? evidenced[0] ?? null : null;
        }

        const [only] = fitting;
        if (fitting.length !== 1 || only === undefined) {
            return null;
        }

        const foreign = marked.some((letter) => LETTER_OWNERS.get(letter)?.some((code) => !wanted.includes(code)));
        return foreign ? null : only;
    }
}
