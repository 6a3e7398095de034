/**
 * Invalid configuration: unknown category, malformed sheet schema,
 * a regular expression that does not compile.
 */
export class ConfigError extends Error {
    constructor(
        message: string,
        public readonly issues: string[] = []
    ) {
        super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message);
        this.name = 'ConfigError';
    }
}

/**
 * Missing, unreadable or inconsistent auxiliary vocabulary file.
 * The resolver cannot run without its vocabularies, so this is fatal.
 */
export class VocabularyError extends Error {
    constructor(
        message: string,
        public readonly path: string
    ) {
        super(`${message} (${path})`);
        this.name = 'VocabularyError';
    }
}

/**
 * Two different entity classes minted the same identifier.
 */
export class GraphConsistencyError extends Error {
    constructor(
        message: string,
        public readonly entityId: string
    ) {
        super(message);
        this.name = 'GraphConsistencyError';
    }
}
