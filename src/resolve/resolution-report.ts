import { compareStrings } from '../utils/compare.js';

/**
 * A place string that could not be mapped to gazetteer ids, with the
 * publisher it was seen with for curation context.
 */
export interface UnresolvedPlace {
    place: string;
    publisher: string;
    occurrences: number;

    /** First record that used this pair */
    yid: string;
}

export interface UnresolvedCode {
    vocabulary: 'type' | 'language';
    code: string;

    /** Records that used the code, in the order they were seen */
    yids: string[];
}

/**
 * Accumulates everything the resolver could not resolve during one run.
 */
export class ResolutionReport {
    private readonly places = new Map<string, UnresolvedPlace>();
    private readonly codes = new Map<string, UnresolvedCode>();

    /**
     * Record an unresolved place string. Repeated (place, publisher) pairs
     * only bump the occurrence count.
     */
    recordPlace(place: string, publisher: string, yid: string): void {
        const key = `${place}\u001f${publisher}`;
        const existing = this.places.get(key);
        if (existing) {
            existing.occurrences++;
            return;
        }
        this.places.set(key, { place, publisher, occurrences: 1, yid });
    }

    recordCode(vocabulary: UnresolvedCode['vocabulary'], code: string, yid: string): void {
        const key = `${vocabulary}\u001f${code}`;
        const existing = this.codes.get(key);
        if (existing) {
            if (!existing.yids.includes(yid)) existing.yids.push(yid);
            return;
        }
        this.codes.set(key, { vocabulary, code, yids: [yid] });
    }

    /**
     * Unresolved places ordered by place, then publisher.
     */
    get unresolvedPlaces(): UnresolvedPlace[] {
        return [...this.places.values()].sort(
            (a, b) => compareStrings(a.place, b.place) || compareStrings(a.publisher, b.publisher)
        );
    }

    get unresolvedCodes(): UnresolvedCode[] {
        return [...this.codes.values()].sort(
            (a, b) => compareStrings(a.vocabulary, b.vocabulary) || compareStrings(a.code, b.code)
        );
    }

    /**
     * Unresolved places grouped by publisher.
     */
    byPublisher(): Map<string, UnresolvedPlace[]> {
        const groups = new Map<string, UnresolvedPlace[]>();
        for (const entry of this.unresolvedPlaces) {
            const group = groups.get(entry.publisher) ?? [];
            group.push(entry);
            groups.set(entry.publisher, group);
        }
        return groups;
    }

    get isEmpty(): boolean {
        return this.places.size === 0 && this.codes.size === 0;
    }

    toJSON(): { unresolvedPlaces: UnresolvedPlace[]; unresolvedCodes: UnresolvedCode[] } {
        return { unresolvedPlaces: this.unresolvedPlaces, unresolvedCodes: this.unresolvedCodes };
    }
}
