import { writeFileSync } from 'node:fs';
import { GraphDatabase } from '../storage/database.js';
import { EntityClass, NAMESPACES, type BuiltGraph, type NamespacePrefix } from '../types/index.js';
import { compareStrings } from '../utils/compare.js';
import { getLogger } from '../utils/logger.js';
import { VERSION } from '../version.js';

// ─── Types ───────────────────────────────────────────────

export const EXPORT_FORMATS = ['json', 'graphml', 'ntriples'] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export interface ExportOptions {
    /** Entity IRIs are minted under this base */
    baseIri: string;
}

const RDF_TYPE = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#type';

// ─── Main Export Function ────────────────────────────────

/**
 * Export a stored graph to a file.
 */
export function exportGraph(dbPath: string, outputPath: string, format: ExportFormat, options: ExportOptions): void {
    const db = new GraphDatabase(dbPath);

    try {
        const graph = db.getGraph();
        writeFileSync(outputPath, renderGraph(graph, format, options), 'utf-8');
        getLogger().info(
            { format, outputPath, entities: graph.entities.length, edges: graph.edges.length },
            'Graph exported'
        );
    } finally {
        db.close();
    }
}

export function isExportFormat(value: string): value is ExportFormat {
    return EXPORT_FORMATS.some((format) => format === value);
}

/**
 * Render a graph in one of the export formats.
 */
export function renderGraph(graph: BuiltGraph, format: ExportFormat, options: ExportOptions): string {
    switch (format) {
        case 'json':
            return exportJson(graph, options);
        case 'graphml':
            return exportGraphML(graph);
        case 'ntriples':
            return exportNTriples(graph, options);
    }
}

// ─── IRIs ────────────────────────────────────────────────

function isNamespacePrefix(prefix: string): prefix is NamespacePrefix {
    return Object.hasOwn(NAMESPACES, prefix);
}

/**
 * Expand a prefixed name (`crm:E21_Person`) to a full IRI. Names with an
 * unknown prefix are returned unchanged.
 */
export function expandPrefixed(name: string): string {
    const cut = name.indexOf(':');
    const prefix = name.slice(0, cut);
    if (cut < 0 || !isNamespacePrefix(prefix)) {
        return name;
    }
    return NAMESPACES[prefix] + name.slice(cut + 1);
}

/**
 * IRI of an entity: external resources (`gn:756135`) expand in their own
 * namespace, everything else is minted under the base IRI.
 */
export function entityIri(id: string, baseIri: string): string {
    const expanded = expandPrefixed(id);
    return expanded !== id ? expanded : baseIri + encodeURIComponent(id);
}

// ─── Format Implementations ─────────────────────────────

function exportJson(graph: BuiltGraph, options: ExportOptions): string {
    return JSON.stringify(
        {
            bibkg: {
                version: VERSION,
                exported_at: new Date().toISOString(),
                base_iri: options.baseIri,
                namespaces: NAMESPACES,
            },
            entities: graph.entities,
            edges: graph.edges,
            dangling: graph.dangling,
        },
        null,
        2
    );
}

function escapeXml(value: string): string {
    return value
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;');
}

function exportGraphML(graph: BuiltGraph): string {
    const propertyNames = [...new Set(graph.entities.flatMap((entity) => Object.keys(entity.properties)))].sort();

    let xml = `<?xml version="1.0" encoding="UTF-8"?>
<graphml xmlns="http://graphml.graphdrawing.org/xmlns"
         xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance">
  <key id="class" for="node" attr.name="class" attr.type="string"/>
`;
    for (const name of propertyNames) {
        xml += `  <key id="p_${escapeXml(name)}" for="node" attr.name="${escapeXml(name)}" attr.type="string"/>\n`;
    }
    xml += `  <key id="relation" for="edge" attr.name="relation" attr.type="string"/>
  <graph id="bibkg" edgedefault="directed">
`;

    for (const entity of graph.entities) {
        xml += `    <node id="${escapeXml(entity.id)}">\n`;
        xml += `      <data key="class">${escapeXml(entity.class)}</data>\n`;
        for (const [name, value] of Object.entries(entity.properties).sort(([a], [b]) => compareStrings(a, b))) {
            xml += `      <data key="p_${escapeXml(name)}">${escapeXml(value)}</data>\n`;
        }
        xml += '    </node>\n';
    }

    for (const edge of graph.edges) {
        xml += `    <edge source="${escapeXml(edge.source)}" target="${escapeXml(edge.target)}">
      <data key="relation">${escapeXml(edge.relation)}</data>
    </edge>
`;
    }

    xml += `  </graph>
</graphml>
`;

    return xml;
}

function escapeLiteral(value: string): string {
    return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n').replace(/\r/g, '\\r');
}

/**
 * N-Triples, one statement per line, sorted. Literal properties go under
 * the `lkg` namespace, except `label` which becomes `rdfs:label`. External
 * resources appear only as edge targets.
 */
function exportNTriples(graph: BuiltGraph, options: ExportOptions): string {
    const lines: string[] = [];
    const iri = (id: string): string => `<${entityIri(id, options.baseIri)}>`;

    for (const entity of graph.entities) {
        if (entity.class === EntityClass.EXTERNAL) continue;
        const subject = iri(entity.id);
        lines.push(`${subject} <${RDF_TYPE}> <${expandPrefixed(entity.class)}> .`);
        for (const [name, value] of Object.entries(entity.properties)) {
            const predicate = name === 'label' ? `${NAMESPACES.rdfs}label` : `${NAMESPACES.lkg}${name}`;
            lines.push(`${subject} <${predicate}> "${escapeLiteral(value)}" .`);
        }
    }

    for (const edge of graph.edges) {
        lines.push(`${iri(edge.source)} <${expandPrefixed(edge.relation)}> ${iri(edge.target)} .`);
    }

    return lines.sort().join('\n') + '\n';
}
