import { describe, it, expect } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { entityIri, expandPrefixed, exportGraph, isExportFormat, renderGraph } from '../exporters/export.js';
import { GraphDatabase } from '../storage/database.js';
import { EntityClass, Relation, type BuiltGraph } from '../types/index.js';
import { VERSION } from '../version.js';

const BASE = 'http://example.org/id/';

const GRAPH: BuiltGraph = {
    entities: [
        {
            id: 'F28_NFPL1',
            class: EntityClass.EXPRESSION_CREATION,
            properties: { label: 'Creation of "Solaris"' },
        },
        { id: 'F2_NFPL1', class: EntityClass.EXPRESSION, properties: { label: 'Solaris & Co', page: '12' } },
    ],
    edges: [{ source: 'F28_NFPL1', relation: Relation.CREATED_EXPRESSION, target: 'F2_NFPL1' }],
    dangling: [],
};

describe('IRIs', () => {
    it('should expand known prefixes only', () => {
        expect(expandPrefixed('crm:E21_Person')).toBe('http://www.cidoc-crm.org/cidoc-crm/E21_Person');
        expect(expandPrefixed('lkg:S142_written_by')).toBe('http://lkg.org.pl/ns/lkg-core/S142_written_by');
        expect(expandPrefixed('xyz:Thing')).toBe('xyz:Thing');
        expect(expandPrefixed('Thing')).toBe('Thing');
    });

    it('should mint entity IRIs under the base', () => {
        expect(entityIri('E53_GN756135 E53_GN3094802', BASE)).toBe(
            'http://example.org/id/E53_GN756135%20E53_GN3094802'
        );
    });

    it('should expand external resources in their own namespace', () => {
        expect(entityIri('gn:756135', BASE)).toBe('https://sws.geonames.org/756135');
        expect(entityIri('wd:Q270', BASE)).toBe('http://www.wikidata.org/entity/Q270');
    });

    it('should recognise export formats', () => {
        expect(isExportFormat('graphml')).toBe(true);
        expect(isExportFormat('csv')).toBe(false);
    });
});

describe('renderGraph', () => {
    it('should write sorted N-Triples', () => {
        const RDF_TYPE = '<http://www.w3.org/1999/02/22-rdf-syntax-ns#type>';
        const LABEL = '<http://www.w3.org/2000/01/rdf-schema#label>';

        expect(renderGraph(GRAPH, 'ntriples', { baseIri: BASE }).split('\n')).toEqual([
            '<http://example.org/id/F28_NFPL1> <http://iflastandards.info/ns/lrm/lrmoo/R17_created> <http://example.org/id/F2_NFPL1> .',
            `<http://example.org/id/F28_NFPL1> ${RDF_TYPE} <http://iflastandards.info/ns/lrm/lrmoo/F28_Expression_Creation> .`,
            `<http://example.org/id/F28_NFPL1> ${LABEL} "Creation of \\"Solaris\\"" .`,
            '<http://example.org/id/F2_NFPL1> <http://lkg.org.pl/ns/lkg-core/page> "12" .',
            `<http://example.org/id/F2_NFPL1> ${RDF_TYPE} <http://iflastandards.info/ns/lrm/lrmoo/F2_Expression> .`,
            `<http://example.org/id/F2_NFPL1> ${LABEL} "Solaris & Co" .`,
            '',
        ]);
    });

    it('should write external resources only as edge targets', () => {
        const graph: BuiltGraph = {
            entities: [
                { id: 'E53_GN756135', class: EntityClass.PLACE, properties: {} },
                { id: 'gn:756135', class: EntityClass.EXTERNAL, properties: { label: 'GeoNames 756135' } },
            ],
            edges: [{ source: 'E53_GN756135', relation: Relation.SAME_AS, target: 'gn:756135' }],
            dangling: [],
        };

        expect(renderGraph(graph, 'ntriples', { baseIri: BASE }).split('\n')).toEqual([
            '<http://example.org/id/E53_GN756135> <http://www.w3.org/1999/02/22-rdf-syntax-ns#type> <http://www.cidoc-crm.org/cidoc-crm/E53_Place> .',
            '<http://example.org/id/E53_GN756135> <http://www.w3.org/2002/07/owl#sameAs> <https://sws.geonames.org/756135> .',
            '',
        ]);
    });

    it('should write GraphML with escaped values', () => {
        const xml = renderGraph(GRAPH, 'graphml', { baseIri: BASE });

        expect(xml).toContain('  <key id="p_page" for="node" attr.name="page" attr.type="string"/>\n');
        expect(xml).toContain('      <data key="p_label">Solaris &amp; Co</data>\n');
        expect(xml).toContain('      <data key="p_label">Creation of &quot;Solaris&quot;</data>\n');
        expect(xml).toContain('    <edge source="F28_NFPL1" target="F2_NFPL1">\n      <data key="relation">lrmoo:R17_created</data>');
    });

    it('should write JSON with its header', () => {
        const parsed: unknown = JSON.parse(renderGraph(GRAPH, 'json', { baseIri: BASE }));

        expect(parsed).toMatchObject({
            bibkg: { version: VERSION, base_iri: BASE },
            entities: GRAPH.entities,
            edges: GRAPH.edges,
            dangling: [],
        });
    });
});

describe('exportGraph', () => {
    it('should export the stored graph to a file', () => {
        const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'bibkg-export-'));
        const dbPath = path.join(tmpDir, 'graph.db');
        const outputPath = path.join(tmpDir, 'graph.nt');

        const db = new GraphDatabase(dbPath);
        db.replaceGraph(GRAPH, { unresolvedPlaces: [], unresolvedCodes: [] });
        db.close();

        exportGraph(dbPath, outputPath, 'ntriples', { baseIri: BASE });

        expect(fs.readFileSync(outputPath, 'utf-8')).toBe(renderGraph(GRAPH, 'ntriples', { baseIri: BASE }));
    });
});
