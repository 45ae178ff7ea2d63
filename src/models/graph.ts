/**
 * Knowledge graph model
 *
 * @module models/graph
 */

/**
 * Node categories the extraction prompt asks for
 */
export const NODE_TYPES = [
  'ClinicalObservation',
  'TherapeuticOutcome',
  'ContextualFactor',
  'MechanisticConcept',
  'TherapeuticApproach',
  'SourceText',
] as const;

export type NodeType = (typeof NODE_TYPES)[number];

export const RELATIONSHIP_TYPES = [
  'co_occurs_with',
  'preceded_by',
  'followed_by',
  'modified_by',
  'responds_to',
  'associated_with',
  'results_in',
  'described_in',
  'contradicts',
  'corroborates',
] as const;

export type RelationshipType = (typeof RELATIONSHIP_TYPES)[number];

/** Default provenance written on every node and relationship */
export const DEFAULT_SOURCE = 'agent_created';

export type GraphProperties = Record<string, unknown>;

/**
 * A graph node. Unique by `id` within one extraction.
 */
export interface GraphNode {
  id: string;
  type: string;
  properties: GraphProperties;
}

/**
 * A directed edge between two nodes of the same extraction
 */
export interface GraphRelationship {
  subject: GraphNode;
  object: GraphNode;
  type: string;
  timestamp?: string;
  properties: GraphProperties;
}

/**
 * Nodes and relationships produced by one extraction pass
 */
export interface GraphElement {
  readonly nodes: readonly GraphNode[];
  readonly relationships: readonly GraphRelationship[];
  /** The text the graph was extracted from */
  readonly sourceRef: string;
}

export function isNodeType(value: string): value is NodeType {
  return NODE_TYPES.some((t) => t === value);
}

export function isRelationshipType(value: string): value is RelationshipType {
  return RELATIONSHIP_TYPES.some((t) => t === value);
}
