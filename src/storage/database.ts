import Database from 'better-sqlite3';
import { z } from 'zod';
import {
    EntityClass,
    Relation,
    type BuiltGraph,
    type DanglingEdge,
    type GraphEdge,
    type GraphEntity,
    type RunRecord,
} from '../types/index.js';
import type { UnresolvedCode, UnresolvedPlace } from '../resolve/resolution-report.js';
import { getLogger } from '../utils/logger.js';

/**
 * SQLite schema migration v1.
 */
const MIGRATION_V1 = `
-- Runs: build session metadata
CREATE TABLE IF NOT EXISTS runs (
  run_id INTEGER PRIMARY KEY,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  bibkg_version TEXT NOT NULL,
  config_json TEXT NOT NULL,
  stats_json TEXT NOT NULL DEFAULT '{}'
);

-- Entities: typed graph nodes keyed by their stable identifier
CREATE TABLE IF NOT EXISTS entities (
  entity_id TEXT PRIMARY KEY,
  class TEXT NOT NULL,
  label TEXT NOT NULL,
  properties_json TEXT NOT NULL DEFAULT '{}'
);

-- Edges: typed relations between entities
CREATE TABLE IF NOT EXISTS edges (
  source TEXT NOT NULL REFERENCES entities(entity_id),
  relation TEXT NOT NULL,
  target TEXT NOT NULL REFERENCES entities(entity_id),
  PRIMARY KEY (source, relation, target)
);

-- Edges withheld because an endpoint is missing from the input
CREATE TABLE IF NOT EXISTS dangling_edges (
  source TEXT NOT NULL,
  relation TEXT NOT NULL,
  target TEXT NOT NULL,
  missing TEXT NOT NULL,
  PRIMARY KEY (source, relation, target)
);

-- Place strings without gazetteer ids, for curation
CREATE TABLE IF NOT EXISTS unresolved_places (
  place TEXT NOT NULL,
  publisher TEXT NOT NULL,
  occurrences INTEGER NOT NULL DEFAULT 1,
  yid TEXT NOT NULL,
  PRIMARY KEY (place, publisher)
);

-- Type and language codes missing from the vocabularies
CREATE TABLE IF NOT EXISTS unresolved_refs (
  vocabulary TEXT NOT NULL,
  code TEXT NOT NULL,
  yids_json TEXT NOT NULL DEFAULT '[]',
  PRIMARY KEY (vocabulary, code)
);

CREATE INDEX IF NOT EXISTS idx_entities_class ON entities(class);
CREATE INDEX IF NOT EXISTS idx_edges_target ON edges(target);
CREATE INDEX IF NOT EXISTS idx_edges_relation ON edges(relation);
`;

const entityRowSchema = z.object({
    entity_id: z.string(),
    class: z.nativeEnum(EntityClass),
    properties_json: z.string(),
});

const edgeRowSchema = z.object({
    source: z.string(),
    relation: z.nativeEnum(Relation),
    target: z.string(),
});

const danglingRowSchema = edgeRowSchema.extend({ missing: z.string() });
const propertiesSchema = z.record(z.string(), z.string());
const yidsSchema = z.array(z.string());

function toEntity(raw: unknown): GraphEntity {
    const row = entityRowSchema.parse(raw);
    return {
        id: row.entity_id,
        class: row.class,
        properties: propertiesSchema.parse(JSON.parse(row.properties_json)),
    };
}

interface CountRow {
    count: number;
}

/**
 * Everything a build run persists besides its run record.
 */
export interface StoredReport {
    unresolvedPlaces: UnresolvedPlace[];
    unresolvedCodes: UnresolvedCode[];
}

/**
 * Graph database wrapper around better-sqlite3.
 * Handles schema migration, WAL mode, foreign keys and graph replacement.
 */
export class GraphDatabase {
    private db: Database.Database;

    constructor(dbPath: string) {
        this.db = new Database(dbPath);

        // Set pragmas
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');

        this.migrate();

        getLogger().debug({ dbPath }, 'Database initialized');
    }

    /**
     * Run schema migrations.
     */
    private migrate(): void {
        const currentVersion = Number(this.db.pragma('user_version', { simple: true }));

        if (currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            getLogger().info('Database migrated to v1');
        }
    }

    // ─── Graph ────────────────────────────────────────────────

    /**
     * Replace the stored graph and report with a freshly built one, in a
     * single transaction.
     */
    replaceGraph(graph: BuiltGraph, report: StoredReport): void {
        const entityStmt = this.db.prepare<[string, string, string, string]>(
            'INSERT INTO entities (entity_id, class, label, properties_json) VALUES (?, ?, ?, ?)'
        );
        const edgeStmt = this.db.prepare<[string, string, string]>(
            'INSERT OR IGNORE INTO edges (source, relation, target) VALUES (?, ?, ?)'
        );
        const danglingStmt = this.db.prepare<[string, string, string, string]>(
            'INSERT OR IGNORE INTO dangling_edges (source, relation, target, missing) VALUES (?, ?, ?, ?)'
        );
        const placeStmt = this.db.prepare<[string, string, number, string]>(
            'INSERT INTO unresolved_places (place, publisher, occurrences, yid) VALUES (?, ?, ?, ?)'
        );
        const refStmt = this.db.prepare<[string, string, string]>(
            'INSERT INTO unresolved_refs (vocabulary, code, yids_json) VALUES (?, ?, ?)'
        );

        const replaceAll = this.db.transaction(() => {
            this.db.exec(`
              DELETE FROM edges;
              DELETE FROM dangling_edges;
              DELETE FROM entities;
              DELETE FROM unresolved_places;
              DELETE FROM unresolved_refs;
            `);

            for (const entity of graph.entities) {
                entityStmt.run(
                    entity.id,
                    entity.class,
                    entity.properties['label'] ?? entity.id,
                    JSON.stringify(entity.properties)
                );
            }
            for (const edge of graph.edges) {
                edgeStmt.run(edge.source, edge.relation, edge.target);
            }
            for (const edge of graph.dangling) {
                danglingStmt.run(edge.source, edge.relation, edge.target, edge.missing);
            }
            for (const place of report.unresolvedPlaces) {
                placeStmt.run(place.place, place.publisher, place.occurrences, place.yid);
            }
            for (const code of report.unresolvedCodes) {
                refStmt.run(code.vocabulary, code.code, JSON.stringify(code.yids));
            }
        });

        replaceAll();
        getLogger().debug(
            { entities: graph.entities.length, edges: graph.edges.length, dangling: graph.dangling.length },
            'Graph stored'
        );
    }

    getAllEntities(): GraphEntity[] {
        return this.db
            .prepare('SELECT entity_id, class, properties_json FROM entities ORDER BY entity_id')
            .all()
            .map(toEntity);
    }

    getEntity(id: string): GraphEntity | undefined {
        return this.getEntitiesWhere('entity_id = ?', id)[0];
    }

    getEntitiesByClass(entityClass: EntityClass): GraphEntity[] {
        return this.getEntitiesWhere('class = ?', entityClass);
    }

    getAllEdges(): GraphEdge[] {
        return this.db
            .prepare('SELECT source, relation, target FROM edges ORDER BY source, relation, target')
            .all()
            .map((raw) => edgeRowSchema.parse(raw));
    }

    getDanglingEdges(): DanglingEdge[] {
        return this.db
            .prepare('SELECT source, relation, target, missing FROM dangling_edges ORDER BY source, relation, target')
            .all()
            .map((raw) => danglingRowSchema.parse(raw));
    }

    /**
     * Load the stored graph as built.
     */
    getGraph(): BuiltGraph {
        return { entities: this.getAllEntities(), edges: this.getAllEdges(), dangling: this.getDanglingEdges() };
    }

    // ─── Reports ──────────────────────────────────────────────

    getUnresolvedPlaces(): UnresolvedPlace[] {
        return this.db
            .prepare('SELECT place, publisher, occurrences, yid FROM unresolved_places ORDER BY place, publisher')
            .all()
            .map((raw) =>
                z.object({ place: z.string(), publisher: z.string(), occurrences: z.number(), yid: z.string() }).parse(raw)
            );
    }

    getUnresolvedCodes(): UnresolvedCode[] {
        return this.db
            .prepare('SELECT vocabulary, code, yids_json FROM unresolved_refs ORDER BY vocabulary, code')
            .all()
            .map((raw) => {
                const row = z
                    .object({ vocabulary: z.enum(['type', 'language']), code: z.string(), yids_json: z.string() })
                    .parse(raw);
                return { vocabulary: row.vocabulary, code: row.code, yids: yidsSchema.parse(JSON.parse(row.yids_json)) };
            });
    }

    // ─── Runs ─────────────────────────────────────────────────

    insertRun(run: Omit<RunRecord, 'run_id'>): number {
        const stmt = this.db.prepare(`
      INSERT INTO runs (created_at, bibkg_version, config_json, stats_json)
      VALUES (@created_at, @bibkg_version, @config_json, @stats_json)
    `);
        const result = stmt.run(run);
        return Number(result.lastInsertRowid);
    }

    getLatestRun(): RunRecord | undefined {
        const raw = this.db.prepare('SELECT * FROM runs ORDER BY run_id DESC LIMIT 1').get();
        if (raw === undefined) return undefined;
        return z
            .object({
                run_id: z.number(),
                created_at: z.string(),
                bibkg_version: z.string(),
                config_json: z.string(),
                stats_json: z.string(),
            })
            .parse(raw);
    }

    // ─── Stats ────────────────────────────────────────────────

    getStats(): {
        entities: number;
        edges: number;
        dangling: number;
        unresolvedPlaces: number;
        unresolvedCodes: number;
        runs: number;
        entitiesByClass: Record<string, number>;
        edgesByRelation: Record<string, number>;
    } {
        const count = (table: string): number =>
            this.db.prepare<[], CountRow>(`SELECT COUNT(*) as count FROM ${table}`).get()?.count ?? 0;

        const entitiesByClass: Record<string, number> = {};
        for (const row of this.db
            .prepare<[], { class: string; count: number }>('SELECT class, COUNT(*) as count FROM entities GROUP BY class')
            .all()) {
            entitiesByClass[row.class] = row.count;
        }

        const edgesByRelation: Record<string, number> = {};
        for (const row of this.db
            .prepare<[], { relation: string; count: number }>('SELECT relation, COUNT(*) as count FROM edges GROUP BY relation')
            .all()) {
            edgesByRelation[row.relation] = row.count;
        }

        return {
            entities: count('entities'),
            edges: count('edges'),
            dangling: count('dangling_edges'),
            unresolvedPlaces: count('unresolved_places'),
            unresolvedCodes: count('unresolved_refs'),
            runs: count('runs'),
            entitiesByClass,
            edgesByRelation,
        };
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Close the database connection.
     */
    close(): void {
        this.db.close();
        getLogger().debug('Database closed');
    }

    private getEntitiesWhere(condition: string, value: string): GraphEntity[] {
        return this.db
            .prepare(`SELECT entity_id, class, properties_json FROM entities WHERE ${condition} ORDER BY entity_id`)
            .all(value)
            .map(toEntity);
    }
}
