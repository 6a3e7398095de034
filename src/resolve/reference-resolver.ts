import type {
    CacheEntry,
    CanonicalRecord,
    LanguageDetectionConfig,
    LanguageDetector,
    LanguageEntry,
    PersonName,
    PlaceMember,
    ReferenceEntry,
} from '../types/index.js';
import { isMiss, type GeoCache } from '../cache/geo-cache.js';
import { isUnresolved, type ReferenceTables } from '../reference/reference-tables.js';
import { getLogger } from '../utils/logger.js';
import { ResolutionReport } from './resolution-report.js';

export interface ResolvedPlace extends PlaceMember {
    /** Gazetteer facts, when cached */
    facts: CacheEntry | null;
}

export interface ResolvedPerson {
    name: string;

    /** Resolved languages, in tag order; empty when unknown */
    languages: LanguageEntry[];
}

/**
 * A canonical record with its vocabulary references resolved. Fields
 * that did not resolve are null or empty.
 */
export interface ResolvedRecord {
    record: CanonicalRecord;
    type: ReferenceEntry | null;
    language: LanguageEntry | null;
    places: ResolvedPlace[];
    authors: ResolvedPerson[];
    translators: ResolvedPerson[];
}

export interface ResolverOptions {
    detection: LanguageDetectionConfig;

    /** Consulted only when `detection.enabled` */
    detector?: LanguageDetector;

    /** Place facts; without it places carry no facts */
    cache?: GeoCache;
}

/**
 * Resolves the codes and place strings of canonical records against the
 * reference tables. Misses never fail a record: they are left unresolved
 * and collected in the report.
 */
export class ReferenceResolver {
    readonly report = new ResolutionReport();

    constructor(
        private readonly tables: ReferenceTables,
        private readonly options: ResolverOptions
    ) {}

    async resolve(record: CanonicalRecord): Promise<ResolvedRecord> {
        return {
            record,
            type: this.resolveType(record),
            language: this.resolveLanguage(record.language, record.title, record.yid),
            places: await this.resolvePlaces(record),
            authors: this.resolvePersons(record.authors, record.yid),
            translators: this.resolvePersons(record.translators, record.yid),
        };
    }

    private resolveType(record: CanonicalRecord): ReferenceEntry | null {
        if (record.type === '') return null;
        const entry = this.tables.lookup('type', record.type);
        if (isUnresolved(entry)) {
            this.report.recordCode('type', record.type, record.yid);
            return null;
        }
        return entry;
    }

    /**
     * Look a language code up; failing that, ask the detector about the
     * associated text. Only a detected code that itself resolves counts.
     */
    private resolveLanguage(code: string, text: string, yid: string): LanguageEntry | null {
        const entry = this.tables.lookup('language', code);
        if (!isUnresolved(entry)) {
            return entry;
        }

        const detected = this.detect(text);
        if (detected) {
            getLogger().debug({ yid, code, detected: detected.code }, 'Language detected');
            return detected;
        }

        if (code.trim() !== '') {
            this.report.recordCode('language', code.trim(), yid);
        }
        return null;
    }

    private detect(text: string): LanguageEntry | null {
        const { detector, detection } = this.options;
        if (!detection.enabled || !detector || text.trim() === '') {
            return null;
        }

        const code = detector.detect(text, detection.candidates);
        if (code === null || !detection.candidates.some((candidate) => candidate.toUpperCase() === code.toUpperCase())) {
            return null;
        }

        const entry = this.tables.lookup('language', code);
        return isUnresolved(entry) ? null : entry;
    }

    private resolvePersons(names: PersonName[], yid: string): ResolvedPerson[] {
        return names.map((person) => {
            if (person.languages.length === 0) {
                const detected = this.detect(person.name);
                return { name: person.name, languages: detected ? [detected] : [] };
            }

            const languages: LanguageEntry[] = [];
            for (const tag of person.languages) {
                const entry = this.resolveLanguage(tag, person.name, yid);
                if (entry && !languages.some((known) => known.id === entry.id)) {
                    languages.push(entry);
                }
            }
            return { name: person.name, languages };
        });
    }

    /**
     * Verbatim lookup first, then member by member. Any miss reports the
     * verbatim string against the record's publisher.
     */
    private async resolvePlaces(record: CanonicalRecord): Promise<ResolvedPlace[]> {
        if (record.place === '') return [];

        const members: PlaceMember[] = [];
        const whole = this.tables.lookup('place', record.place);
        if (!isUnresolved(whole)) {
            members.push(...whole.members);
        } else {
            let missed = false;
            for (const name of record.place.split(', ')) {
                const part = this.tables.lookup('place', name);
                if (isUnresolved(part)) {
                    missed = true;
                } else {
                    members.push(...part.members);
                }
            }
            if (missed) {
                this.report.recordPlace(record.place, record.publisher, record.yid);
            }
        }

        const places: ResolvedPlace[] = [];
        const seen = new Set<string>();
        for (const member of members) {
            if (seen.has(member.externalId)) continue;
            seen.add(member.externalId);
            places.push({ ...member, facts: await this.lookupFacts(member.externalId) });
        }
        return places;
    }

    private async lookupFacts(externalId: string): Promise<CacheEntry | null> {
        if (!this.options.cache) return null;
        const entry = await this.options.cache.lookup(externalId);
        return isMiss(entry) ? null : entry;
    }
}
