/**
 * GraphExtractor - turns generated text into a validated GraphElement.
 *
 * Nodes are admitted in text order, first occurrence of an id wins.
 * Relationships are admitted only when both endpoint ids are already in the
 * node map; the relationship then points at those admitted nodes.
 * Nothing here throws on bad input: rejected literals become diagnostics.
 *
 * @module services/knowledge-graph/extractor
 */

import {
  DEFAULT_SOURCE,
  isNodeType,
  isRelationshipType,
  type GraphElement,
  type GraphNode,
  type GraphProperties,
  type GraphRelationship,
} from '../../models/graph.js';
import {
  parseGraphLiterals,
  type NodeLiteral,
  type ParseDiagnostic,
  type ParseResult,
  type RelationshipLiteral,
} from './grammar.js';

export interface ExtractOptions {
  /** Drop nodes and relationships whose type is outside the known vocabulary */
  strictVocabulary?: boolean;
}

export type RejectionReason =
  | 'invalid_id'
  | 'invalid_type'
  | 'unknown_type'
  | 'duplicate_id'
  | 'dangling_endpoint';

export interface Rejection {
  kind: 'node' | 'relationship';
  reason: RejectionReason;
  /** Node id, or "subject -> object" for relationships */
  ref: string;
}

export interface ExtractionReport {
  element: GraphElement;
  /** Literals that could not be parsed */
  diagnostics: ParseDiagnostic[];
  /** Parsed literals that failed validation */
  rejected: Rejection[];
}

const INTEGER_LIKE = /^-?\d+$/;
const WELL_FORMED_TYPE = /^[A-Za-z_][A-Za-z0-9_]*$/;

function isValidNodeLiteral(node: NodeLiteral): boolean {
  if (node.idKind === 'integer') return INTEGER_LIKE.test(node.id);
  return node.id.trim() !== '';
}

function isWellFormedType(type: string): boolean {
  return type.trim() !== '' && WELL_FORMED_TYPE.test(type.trim());
}

export class GraphExtractor {
  constructor(private readonly defaults: ExtractOptions = {}) {}

  /**
   * Parse generated text into a graph.
   *
   * @param metadata - Provenance merged into every node and relationship;
   *   its keys override the default `source`
   */
  extract(generatedText: string, metadata?: GraphProperties, options?: ExtractOptions): GraphElement {
    return this.extractWithReport(generatedText, metadata, options).element;
  }

  /**
   * Literals found in the text, before validation
   */
  parse(generatedText: string): ParseResult {
    return parseGraphLiterals(generatedText);
  }

  extractWithReport(
    generatedText: string,
    metadata: GraphProperties = {},
    options: ExtractOptions = {}
  ): ExtractionReport {
    const strict = options.strictVocabulary ?? this.defaults.strictVocabulary ?? false;
    const parsed = this.parse(generatedText);
    const rejected: Rejection[] = [];

    const nodes = new Map<string, GraphNode>();
    for (const literal of parsed.nodes) {
      const reason = this.checkNode(literal, nodes, strict);
      if (reason) {
        rejected.push({ kind: 'node', reason, ref: literal.id });
        continue;
      }
      const id = literal.id.trim();
      nodes.set(id, {
        id,
        type: literal.type.trim(),
        properties: { ...literal.extra, name: id, source: DEFAULT_SOURCE, ...metadata },
      });
    }

    const relationships: GraphRelationship[] = [];
    for (const literal of parsed.relationships) {
      const built = this.buildRelationship(literal, nodes, metadata, strict);
      if ('reason' in built) {
        rejected.push({
          kind: 'relationship',
          reason: built.reason,
          ref: `${literal.subject.id} -> ${literal.object.id}`,
        });
        continue;
      }
      relationships.push(built);
    }

    if (parsed.diagnostics.length > 0 || rejected.length > 0) {
      console.error(
        `[GraphExtractor] Skipped ${parsed.diagnostics.length} malformed literal(s), ` +
          `rejected ${rejected.length} invalid element(s)`
      );
    }

    const element: GraphElement = Object.freeze({
      nodes: Object.freeze([...nodes.values()]),
      relationships: Object.freeze(relationships),
      sourceRef: generatedText,
    });

    return { element, diagnostics: parsed.diagnostics, rejected };
  }

  private checkNode(
    literal: NodeLiteral,
    admitted: Map<string, GraphNode>,
    strict: boolean
  ): RejectionReason | null {
    if (!isValidNodeLiteral(literal)) return 'invalid_id';
    if (!isWellFormedType(literal.type)) return 'invalid_type';
    if (strict && !isNodeType(literal.type.trim())) return 'unknown_type';
    if (admitted.has(literal.id.trim())) return 'duplicate_id';
    return null;
  }

  private buildRelationship(
    literal: RelationshipLiteral,
    nodes: Map<string, GraphNode>,
    metadata: GraphProperties,
    strict: boolean
  ): GraphRelationship | { reason: RejectionReason } {
    const subject = nodes.get(literal.subject.id.trim());
    const object = nodes.get(literal.object.id.trim());
    if (!subject || !object) return { reason: 'dangling_endpoint' };

    if (!isWellFormedType(literal.type)) return { reason: 'invalid_type' };
    if (strict && !isRelationshipType(literal.type.trim())) return { reason: 'unknown_type' };

    const relationship: GraphRelationship = {
      subject,
      object,
      type: literal.type.trim(),
      properties: { ...literal.extra, source: DEFAULT_SOURCE, ...metadata },
    };
    if (literal.timestamp !== undefined && literal.timestamp.trim() !== '') {
      relationship.timestamp = literal.timestamp;
    }
    return relationship;
  }
}
