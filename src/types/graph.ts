/**
 * Ontology namespaces used by entity classes and relations.
 * Classes and relations are stored as prefixed names (`crm:E21_Person`)
 * and expanded to IRIs only at export time.
 */
export const NAMESPACES = {
    crm: 'http://www.cidoc-crm.org/cidoc-crm/',
    lrmoo: 'http://iflastandards.info/ns/lrm/lrmoo/',
    lkg: 'http://lkg.org.pl/ns/lkg-core/',
    owl: 'http://www.w3.org/2002/07/owl#',
    rdfs: 'http://www.w3.org/2000/01/rdf-schema#',
    skos: 'http://www.w3.org/2004/02/skos/core#',
    gn: 'https://sws.geonames.org/',
    wd: 'http://www.wikidata.org/entity/',
} as const;

export type NamespacePrefix = keyof typeof NAMESPACES;

/**
 * Entity classes emitted by the graph builder.
 *
 * CIDOC CRM: persons, places, types, languages, time spans, titles and
 * identifiers. LRMoo: works, expressions, manifestations and the events
 * that create them, corporate bodies (publishers). External resources
 * (GeoNames, Wikidata) are addressed by prefixed name.
 */
export enum EntityClass {
    TITLE = 'crm:E35_Title',
    IDENTIFIER = 'crm:E42_Identifier',
    PERSON = 'crm:E21_Person',
    TIME_SPAN = 'crm:E52_Time_Span',
    PLACE = 'crm:E53_Place',
    TYPE = 'crm:E55_Type',
    LANGUAGE = 'crm:E56_Language',
    WORK = 'lrmoo:F1_Work',
    EXPRESSION = 'lrmoo:F2_Expression',
    MANIFESTATION = 'lrmoo:F3_Manifestation',
    CORPORATE_BODY = 'lrmoo:F11_Corporate_Body',
    WORK_CREATION = 'lrmoo:F27_Work_Creation',
    EXPRESSION_CREATION = 'lrmoo:F28_Expression_Creation',
    MANIFESTATION_CREATION = 'lrmoo:F30_Manifestation_Creation',
    EXTERNAL = 'rdfs:Resource',
}

/**
 * Relations between entities. Only the forward direction is emitted;
 * inverses are left to whoever serializes the graph.
 */
export enum Relation {
    IS_IDENTIFIED_BY = 'crm:P1_is_identified_by',
    HAS_TYPE = 'crm:P2_has_type',
    HAS_TIME_SPAN = 'crm:P4_has_time_span',
    TOOK_PLACE_AT = 'crm:P7_took_place_at',
    HAS_LANGUAGE = 'crm:P72_has_language',
    HAS_RESIDENCE = 'crm:P74_has_current_or_former_residence',
    HAS_TITLE = 'crm:P102_has_title',
    REALISED_IN = 'lrmoo:R3_is_realised_in',
    EMBODIES = 'lrmoo:R4_embodies',
    HAS_COMPONENT = 'lrmoo:R5_has_component',
    CREATED_WORK = 'lrmoo:R16_created',
    CREATED_EXPRESSION = 'lrmoo:R17_created',
    CREATED_REALISATION_OF = 'lrmoo:R19_created_a_realisation_of',
    CREATED_MANIFESTATION = 'lrmoo:R24_created',
    IS_DERIVATIVE_OF = 'lrmoo:R76_is_derivative_of',
    WRITTEN_BY = 'lkg:S142_written_by',
    TRANSLATED_BY = 'lkg:S143_translated_by',
    PUBLISHED_BY = 'lkg:S145_published_by',
    IS_TRANSLATION_OF = 'lkg:S761_is_translation_of',
    IS_ALTERED_FORM_OF = 'lkg:S762_is_altered_form_of',
    IS_REDUCED_FORM_OF = 'lkg:S763_is_reduced_form_of',
    IS_EXTENDED_FORM_OF = 'lkg:S764_is_extended_form_of',
    SAME_AS = 'owl:sameAs',
}

/** Relations linking one expression to another it derives from */
export const DERIVATION_RELATIONS: ReadonlySet<Relation> = new Set([
    Relation.IS_DERIVATIVE_OF,
    Relation.IS_TRANSLATION_OF,
    Relation.IS_ALTERED_FORM_OF,
    Relation.IS_REDUCED_FORM_OF,
    Relation.IS_EXTENDED_FORM_OF,
]);

/**
 * A typed node of the output graph.
 */
export interface GraphEntity {
    /** Stable identifier, e.g. `F2_NFPL355` or `E53_GN756135` */
    id: string;

    class: EntityClass;

    /** Literal properties; `label` is always present */
    properties: Record<string, string>;
}

/**
 * A typed relation between two entities.
 */
export interface GraphEdge {
    source: string;
    relation: Relation;
    target: string;
}

/**
 * An edge withheld from the output because one of its endpoints was
 * never emitted (e.g. a reference to a record missing from the input).
 */
export interface DanglingEdge extends GraphEdge {
    missing: string;
}

/**
 * Finished graph handed to persistence and export.
 */
export interface BuiltGraph {
    entities: GraphEntity[];
    edges: GraphEdge[];
    dangling: DanglingEdge[];
}
