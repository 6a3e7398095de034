/**
 * Pluggable language detection, consulted only as a fallback when a
 * language code does not resolve.
 */
export interface LanguageDetector {
    /** Detector name, for logs */
    readonly name: string;

    /**
     * Guess the language of a short text.
     * @param text - Title or name to inspect
     * @param candidates - ISO 639-1 codes the answer must come from
     * @returns One candidate code, or null unless exactly one candidate fits
     */
    detect(text: string, candidates: readonly string[]): string | null;
}
