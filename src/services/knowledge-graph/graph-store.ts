/**
 * Graph database boundary
 *
 * GraphStore takes finished GraphElements and writes them in one batch.
 * Neo4jGraphStore merges nodes by (label, id) and relationships by
 * (subject, type, object) inside a single write transaction, so re-ingesting
 * a document updates properties rather than duplicating the graph.
 *
 * @module services/knowledge-graph/graph-store
 */

import neo4j, { type Driver } from 'neo4j-driver';
import { MCPError } from '../../server/errors.js';
import type { Neo4jConnectionConfig } from '../../server/types.js';
import type { GraphElement, GraphProperties } from '../../models/graph.js';

export interface GraphWriteSummary {
  nodes: number;
  relationships: number;
}

export interface GraphStore {
  addGraphElements(elements: readonly GraphElement[]): Promise<GraphWriteSummary>;
  close(): Promise<void>;
}

export interface CypherStatement {
  query: string;
  params: Record<string, unknown>;
}

type StoredValue = string | number | boolean | string[] | number[] | boolean[];

// ═══════════════════════════════════════════════════════════════════════════════
// STATEMENT BUILDING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Quote a label or relationship type for interpolation into Cypher
 */
export function escapeIdentifier(name: string): string {
  return '`' + name.replace(/`/g, '``') + '`';
}

function isHomogeneousList(value: unknown[]): value is string[] | number[] | boolean[] {
  if (value.length === 0) return true;
  const kind = typeof value[0];
  if (kind !== 'string' && kind !== 'number' && kind !== 'boolean') return false;
  return value.every((v) => typeof v === kind);
}

function toStoredValue(value: unknown): StoredValue | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (Array.isArray(value) && isHomogeneousList(value)) return value;
  // Neo4j properties cannot hold maps or mixed lists
  return JSON.stringify(value);
}

/**
 * Property map Neo4j can store: nulls dropped, nested values serialized
 */
export function toStoredProperties(properties: GraphProperties): Record<string, StoredValue> {
  const stored: Record<string, StoredValue> = {};
  for (const [key, value] of Object.entries(properties)) {
    const converted = toStoredValue(value);
    if (converted !== null) stored[key] = converted;
  }
  return stored;
}

/**
 * Cypher statements that write one GraphElement, nodes first
 */
export function buildGraphWriteStatements(element: GraphElement): CypherStatement[] {
  const statements: CypherStatement[] = [];

  for (const node of element.nodes) {
    statements.push({
      query: `MERGE (n:${escapeIdentifier(node.type)} {id: $id}) SET n += $properties`,
      params: { id: node.id, properties: toStoredProperties(node.properties) },
    });
  }

  for (const rel of element.relationships) {
    const properties = toStoredProperties(rel.properties);
    if (rel.timestamp !== undefined) properties.timestamp = rel.timestamp;
    statements.push({
      query:
        `MATCH (s:${escapeIdentifier(rel.subject.type)} {id: $subjectId}), ` +
        `(o:${escapeIdentifier(rel.object.type)} {id: $objectId}) ` +
        `MERGE (s)-[r:${escapeIdentifier(rel.type)}]->(o) SET r += $properties`,
      params: { subjectId: rel.subject.id, objectId: rel.object.id, properties },
    });
  }

  return statements;
}

// ═══════════════════════════════════════════════════════════════════════════════
// NEO4J
// ═══════════════════════════════════════════════════════════════════════════════

export class Neo4jGraphStore implements GraphStore {
  private readonly driver: Driver;
  private readonly database?: string;

  constructor(config: Neo4jConnectionConfig) {
    this.driver = neo4j.driver(config.uri, neo4j.auth.basic(config.username, config.password), {
      connectionTimeout: 30000,
    });
    this.database = config.database;
  }

  async addGraphElements(elements: readonly GraphElement[]): Promise<GraphWriteSummary> {
    const statements = elements.flatMap(buildGraphWriteStatements);
    const summary: GraphWriteSummary = {
      nodes: elements.reduce((sum, e) => sum + e.nodes.length, 0),
      relationships: elements.reduce((sum, e) => sum + e.relationships.length, 0),
    };
    if (statements.length === 0) return summary;

    const session = this.driver.session({ database: this.database });
    try {
      await session.executeWrite(async (tx) => {
        for (const statement of statements) {
          await tx.run(statement.query, statement.params);
        }
      });
      console.error(
        `[Neo4jGraphStore] Stored ${summary.nodes} nodes and ${summary.relationships} relationships`
      );
      return summary;
    } catch (error) {
      throw MCPError.fromUnknown(error, 'GRAPH_STORE_ERROR');
    } finally {
      await session.close();
    }
  }

  async close(): Promise<void> {
    await this.driver.close();
  }
}
