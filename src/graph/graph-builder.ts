import { MultiDirectedGraph } from 'graphology';
import {
    DERIVATION_RELATIONS,
    EntityClass,
    Relation,
    type BuiltGraph,
    type DanglingEdge,
    type GraphEdge,
    type GraphEntity,
    type LanguageEntry,
    type ReferenceEntry,
} from '../types/index.js';
import type { ResolvedPerson, ResolvedPlace, ResolvedRecord } from '../resolve/reference-resolver.js';
import { compareStrings } from '../utils/compare.js';
import { GraphConsistencyError } from '../utils/errors.js';
import {
    YID_TYPE_ID,
    expressionCreationId,
    expressionId,
    geoNamesResource,
    issueKey,
    languageId,
    manifestationCreationId,
    manifestationId,
    personId,
    placeId,
    publisherId,
    timeSpanId,
    titleId,
    wikidataResource,
    workCreationId,
    workId,
    yidIdentifierId,
} from './identifiers.js';

type EntityAttributes = {
    class: EntityClass;
    properties: Record<string, string>;
};

type EdgeAttributes = {
    relation: Relation;
};

const YEAR = /^\d{4}$/;

const DERIVATION_BY_KIND = {
    reduced: Relation.IS_REDUCED_FORM_OF,
    extended: Relation.IS_EXTENDED_FORM_OF,
    altered: Relation.IS_ALTERED_FORM_OF,
} as const;

/** Creation relations a work creation takes over from its expression's creation */
const AUTHORSHIP_RELATIONS: ReadonlySet<Relation> = new Set([Relation.WRITTEN_BY, Relation.TRANSLATED_BY]);

function edgeKey(edge: GraphEdge): string {
    return `${edge.source}|${edge.relation}|${edge.target}`;
}

function compareEdges(a: GraphEdge, b: GraphEdge): number {
    return compareStrings(a.source, b.source) || compareStrings(a.relation, b.relation) || compareStrings(a.target, b.target);
}

/**
 * Assembles resolved records into a typed entity graph.
 *
 * Entities live in a registry keyed by their stable identifier, so a
 * person, place or publisher named by many records is emitted once.
 * Edges to other records (derivations, parents) are held back until
 * `build()`, when every record has been added; those whose endpoint never
 * appeared are reported as dangling instead of emitted.
 *
 * Works are inferred at `build()` as well: every expression that derives
 * from no other is the first realisation of an F1 Work, which its
 * derivatives, direct or not, realise too.
 */
export class GraphBuilder {
    private readonly graph = new MultiDirectedGraph<EntityAttributes, EdgeAttributes>();
    private readonly pending: GraphEdge[] = [];
    private records = 0;

    get recordCount(): number {
        return this.records;
    }

    addRecord(resolved: ResolvedRecord): void {
        const { record } = resolved;
        this.records++;

        const f2 = expressionId(record.yid);
        this.ensureEntity(f2, EntityClass.EXPRESSION, {
            label: record.title || record.yid,
            title: record.title,
            yid: record.yid,
            page: record.page,
        });

        const f28 = expressionCreationId(record.yid);
        this.ensureEntity(f28, EntityClass.EXPRESSION_CREATION, {
            label: `Creation of ${record.title || record.yid}`,
        });
        this.addEdge(f28, Relation.CREATED_EXPRESSION, f2);

        for (const author of resolved.authors) {
            this.addEdge(f28, Relation.WRITTEN_BY, this.addPerson(author));
        }
        for (const translator of resolved.translators) {
            this.addEdge(f28, Relation.TRANSLATED_BY, this.addPerson(translator));
        }

        if (resolved.type) {
            this.addEdge(f2, Relation.HAS_TYPE, this.addType(resolved.type));
        }
        const language = resolved.language ? this.addLanguage(resolved.language) : null;
        if (language) {
            this.addEdge(f2, Relation.HAS_LANGUAGE, language);
        }
        this.addAppellations(record.yid, record.title, f2, language);

        if (record.partOf !== null) {
            this.pending.push({ source: expressionId(record.partOf), relation: Relation.HAS_COMPONENT, target: f2 });
        } else {
            this.addManifestation(resolved, f2);
        }

        for (const ref of record.refs) {
            const target = expressionId(ref.target);
            const relations: Relation[] = ref.kinds.map((kind) => DERIVATION_BY_KIND[kind]);
            if (ref.translation) relations.push(Relation.IS_TRANSLATION_OF);
            if (relations.length === 0) relations.push(Relation.IS_DERIVATIVE_OF);
            for (const relation of relations) {
                this.pending.push({ source: f2, relation, target });
            }
        }
    }

    /**
     * Finish the graph: settle held-back edges and return entities and
     * edges sorted by identifier.
     */
    build(): BuiltGraph {
        const dangling: DanglingEdge[] = [];
        for (const edge of this.pending) {
            const missing = [edge.source, edge.target].find((id) => !this.graph.hasNode(id));
            if (missing !== undefined) {
                dangling.push({ ...edge, missing });
            } else {
                this.addEdge(edge.source, edge.relation, edge.target);
            }
        }

        this.inferWorks(new Set(dangling.filter((edge) => DERIVATION_RELATIONS.has(edge.relation)).map((edge) => edge.source)));
        this.setFullTitles();

        const entities: GraphEntity[] = this.graph
            .nodes()
            .sort()
            .map((id) => {
                const attributes = this.graph.getNodeAttributes(id);
                return { id, class: attributes.class, properties: { ...attributes.properties } };
            });

        const edges: GraphEdge[] = this.graph
            .mapEdges((_key, attributes, source, target) => ({ source, relation: attributes.relation, target }))
            .sort(compareEdges);

        const seen = new Set<string>();
        const uniqueDangling = dangling
            .filter((edge) => {
                const key = edgeKey(edge);
                if (seen.has(key)) return false;
                seen.add(key);
                return true;
            })
            .sort(compareEdges);

        return { entities, edges, dangling: uniqueDangling };
    }

    // ─── Entities ───────────────────────────────────────

    /**
     * Add an entity or merge properties into the existing one. Existing
     * values win; empty values are dropped.
     *
     * @throws GraphConsistencyError when the id is taken by another class
     */
    private ensureEntity(id: string, entityClass: EntityClass, properties: Record<string, string>): string {
        const filled = Object.fromEntries(Object.entries(properties).filter(([, value]) => value !== ''));

        if (!this.graph.hasNode(id)) {
            this.graph.addNode(id, { class: entityClass, properties: filled });
            return id;
        }

        const existing = this.graph.getNodeAttributes(id);
        if (existing.class !== entityClass) {
            throw new GraphConsistencyError(
                `Entity ${id} is a ${existing.class}, cannot reuse it as a ${entityClass}`,
                id
            );
        }
        this.graph.setNodeAttribute(id, 'properties', { ...filled, ...existing.properties });
        return id;
    }

    private addPerson(person: ResolvedPerson): string {
        const primary = person.languages[0];
        const id = personId(person.name, primary?.iso6393 ?? '');
        return this.ensureEntity(id, EntityClass.PERSON, {
            label: person.name,
            name: person.name,
            languages: person.languages.map((language) => language.code).join(', '),
        });
    }

    private addType(type: ReferenceEntry): string {
        return this.ensureEntity(type.id, EntityClass.TYPE, { label: type.label });
    }

    private addLanguage(language: LanguageEntry): string {
        return this.ensureEntity(languageId(language.iso6393), EntityClass.LANGUAGE, {
            label: language.label,
            iso6391: language.iso6391,
            iso6393: language.iso6393,
        });
    }

    /**
     * E35 Title (in the record's language) and E42 Identifier holding the YID.
     */
    private addAppellations(yid: string, title: string, f2: string, language: string | null): void {
        if (title !== '') {
            const e35 = this.ensureEntity(titleId(yid), EntityClass.TITLE, { label: title, content: title });
            this.addEdge(f2, Relation.HAS_TITLE, e35);
            if (language) {
                this.addEdge(e35, Relation.HAS_LANGUAGE, language);
            }
        }

        const e42 = this.ensureEntity(yidIdentifierId(yid), EntityClass.IDENTIFIER, { label: yid, content: yid });
        this.addEdge(f2, Relation.IS_IDENTIFIED_BY, e42);
        this.addEdge(e42, Relation.HAS_TYPE, this.ensureEntity(YID_TYPE_ID, EntityClass.TYPE, { label: 'YID' }));
    }

    private addExternal(entity: string, resource: string, label: string): void {
        this.ensureEntity(resource, EntityClass.EXTERNAL, { label });
        this.addEdge(entity, Relation.SAME_AS, resource);
    }

    private addPlace(place: ResolvedPlace): string {
        const facts = place.facts;
        const e53 = this.ensureEntity(placeId(place.externalId), EntityClass.PLACE, {
            label: facts?.localName ?? facts?.name ?? place.name,
            name: facts?.name ?? place.name,
            geonameId: place.externalId,
            country: facts?.country ?? '',
            localName: facts?.localName ?? '',
            wikidataId: facts?.wikidataId ?? '',
        });

        this.addExternal(e53, geoNamesResource(place.externalId), `GeoNames ${place.externalId}`);
        if (facts?.wikidataId) {
            this.addExternal(e53, wikidataResource(facts.wikidataId), `Wikidata ${facts.wikidataId}`);
        }
        return e53;
    }

    private addTimeSpan(year: string): string {
        return this.ensureEntity(timeSpanId(year), EntityClass.TIME_SPAN, { label: year, begin: year, end: year });
    }

    /**
     * Monographs get their own manifestation; periodical appearances
     * share one per (publisher, year, issue).
     */
    private addManifestation(resolved: ResolvedRecord, f2: string): void {
        const { record } = resolved;
        const periodical = record.issue !== '';
        const key = periodical ? issueKey(record.publisher, record.year, record.issue) : record.yid;

        const label = periodical
            ? [record.publisher, record.year, record.issue].filter((part) => part !== '').join(', ')
            : [record.title || record.yid, record.publisher, record.year].filter((part) => part !== '').join(', ');

        const f3 = this.ensureEntity(manifestationId(key), EntityClass.MANIFESTATION, {
            label,
            publisher: record.publisher,
            year: record.year,
            issue: record.issue,
        });
        this.addEdge(f3, Relation.EMBODIES, f2);

        const f30 = this.ensureEntity(manifestationCreationId(key), EntityClass.MANIFESTATION_CREATION, {
            label: `Publication of ${label}`,
        });
        this.addEdge(f30, Relation.CREATED_MANIFESTATION, f3);

        if (YEAR.test(record.year)) {
            this.addEdge(f30, Relation.HAS_TIME_SPAN, this.addTimeSpan(record.year));
        }

        const publisher = record.publisher === ''
            ? null
            : this.ensureEntity(publisherId(record.publisher), EntityClass.CORPORATE_BODY, {
                  label: record.publisher,
                  name: record.publisher,
              });
        if (publisher) {
            this.addEdge(f30, Relation.PUBLISHED_BY, publisher);
        }

        for (const place of resolved.places) {
            const e53 = this.addPlace(place);
            this.addEdge(f30, Relation.TOOK_PLACE_AT, e53);
            if (publisher) {
                this.addEdge(publisher, Relation.HAS_RESIDENCE, e53);
            }
        }
    }

    // ─── Works ──────────────────────────────────────────

    /**
     * Mint F1 Work and F27 Work Creation for every expression that derives
     * from nothing, including references to records missing from the input.
     */
    private inferWorks(derivesFromMissing: ReadonlySet<string>): void {
        const sources = this.graph
            .filterNodes((id, attributes) => attributes.class === EntityClass.EXPRESSION && !derivesFromMissing.has(id))
            .filter((id) => !this.graph.someOutEdge(id, (_edge, attributes) => DERIVATION_RELATIONS.has(attributes.relation)))
            .sort();

        for (const f2 of sources) {
            const { properties } = this.graph.getNodeAttributes(f2);
            const yid = properties['yid'] ?? f2;
            const title = properties['title'] ?? '';

            const f1 = this.ensureEntity(workId(yid), EntityClass.WORK, { label: title || yid, title });
            const f27 = this.ensureEntity(workCreationId(yid), EntityClass.WORK_CREATION, {
                label: `Creation of work ${title || yid}`,
            });
            this.addEdge(f27, Relation.CREATED_WORK, f1);

            this.graph.forEachOutEdge(f2, (_edge, attributes, _source, target) => {
                if (attributes.relation === Relation.HAS_LANGUAGE) {
                    this.addEdge(f1, Relation.HAS_LANGUAGE, target);
                }
            });

            const f28 = this.creationOf(f2);
            if (f28 !== undefined) {
                this.graph.forEachOutEdge(f28, (_edge, attributes, _source, target) => {
                    if (AUTHORSHIP_RELATIONS.has(attributes.relation)) {
                        this.addEdge(f27, attributes.relation, target);
                    }
                });
            }

            for (const realisation of [f2, ...this.derivativesOf(f2)]) {
                this.addEdge(f1, Relation.REALISED_IN, realisation);
                const creation = this.creationOf(realisation);
                if (creation !== undefined) {
                    this.addEdge(creation, Relation.CREATED_REALISATION_OF, f1);
                }
            }
        }
    }

    private creationOf(f2: string): string | undefined {
        return this.graph.findInNeighbor(f2, (_neighbor, attributes) => attributes.class === EntityClass.EXPRESSION_CREATION);
    }

    /**
     * Expressions deriving from `source` through any chain of derivations.
     */
    private derivativesOf(source: string): string[] {
        const found = new Set<string>();
        const queue = [source];
        for (let current = queue.shift(); current !== undefined; current = queue.shift()) {
            this.graph.forEachInEdge(current, (_edge, attributes, derived) => {
                if (DERIVATION_RELATIONS.has(attributes.relation) && derived !== source && !found.has(derived)) {
                    found.add(derived);
                    queue.push(derived);
                }
            });
        }
        return [...found].sort();
    }

    // ─── Titles ─────────────────────────────────────────

    /**
     * Components get their title prefixed with their ancestors' titles
     * (`Book | Chapter | Section`) for searching.
     */
    private setFullTitles(): void {
        const fullTitle = (id: string, depth: number): string => {
            const title = this.graph.getNodeAttributes(id).properties['title'] ?? '';
            const parent = this.graph.findInNeighbor(
                id,
                (neighbor, attributes) =>
                    attributes.class === EntityClass.EXPRESSION &&
                    this.graph.someEdge(neighbor, id, (_edge, edge) => edge.relation === Relation.HAS_COMPONENT)
            );
            if (parent === undefined || depth > 32) return title;
            const prefix = fullTitle(parent, depth + 1);
            return prefix === '' ? title : `${prefix} | ${title}`;
        };

        this.graph.forEachNode((id, attributes) => {
            if (attributes.class !== EntityClass.EXPRESSION) return;
            const hasParent = this.graph.someInEdge(id, (_edge, edge) => edge.relation === Relation.HAS_COMPONENT);
            if (!hasParent) return;
            this.graph.setNodeAttribute(id, 'properties', {
                ...attributes.properties,
                fullTitle: fullTitle(id, 0),
            });
        });
    }

    // ─── Edges ──────────────────────────────────────────

    private addEdge(source: string, relation: Relation, target: string): void {
        const key = edgeKey({ source, relation, target });
        if (this.graph.hasEdge(key)) return;
        this.graph.addDirectedEdgeWithKey(key, source, target, { relation });
    }
}
