/**
 * Prompts for knowledge graph extraction
 *
 * @module services/knowledge-graph/prompts
 */

import { NODE_TYPES, RELATIONSHIP_TYPES } from '../../models/graph.js';

const NODE_TYPE_NOTES: Record<(typeof NODE_TYPES)[number], string> = {
  ClinicalObservation: 'signs, symptoms, disease presentations',
  TherapeuticOutcome: 'treatment responses, recovery patterns',
  ContextualFactor: 'environmental, behavioral, constitutional factors',
  MechanisticConcept: 'traditional explanatory models, processes',
  TherapeuticApproach: 'interventions, remedies, methods',
  SourceText: 'reference to original documents or authors',
};

const RELATIONSHIP_TYPE_NOTES: Record<(typeof RELATIONSHIP_TYPES)[number], string> = {
  co_occurs_with: 'between related clinical observations',
  preceded_by: 'temporal ordering',
  followed_by: 'temporal ordering',
  modified_by: 'how contexts affect observations',
  responds_to: 'observation responses to treatments',
  associated_with: 'contextual associations with observations',
  results_in: 'effects produced by treatments',
  described_in: 'attribution to source texts',
  contradicts: 'inconsistent accounts',
  corroborates: 'consistent accounts',
};

export const KG_SYSTEM_INSTRUCTION =
  'Your mission is to transform unstructured content into structured graph data. ' +
  'Extract nodes and relationships with precision.';

const EXAMPLE_OUTPUT = `Nodes:
Node(id='paralysis_spinal_blood_congestion', type='ClinicalObservation')
Node(id='incomplete_paralysis', type='ClinicalObservation')
Node(id='blood_accumulation_spinal_veins', type='MechanisticConcept')
Node(id='spontaneous_resolution', type='TherapeuticOutcome')
Node(id='Ollivier', type='SourceText')

Relationships:
Relationship(subj=Node(id='blood_accumulation_spinal_veins', type='MechanisticConcept'), obj=Node(id='paralysis_spinal_blood_congestion', type='ClinicalObservation'), type='associated_with')
Relationship(subj=Node(id='paralysis_spinal_blood_congestion', type='ClinicalObservation'), obj=Node(id='incomplete_paralysis', type='ClinicalObservation'), type='co_occurs_with')
Relationship(subj=Node(id='paralysis_spinal_blood_congestion', type='ClinicalObservation'), obj=Node(id='spontaneous_resolution', type='TherapeuticOutcome'), type='results_in')
Relationship(subj=Node(id='paralysis_spinal_blood_congestion', type='ClinicalObservation'), obj=Node(id='Ollivier', type='SourceText'), type='described_in')`;

/**
 * Build the extraction prompt for one piece of content.
 * The content goes last so long documents do not push the instructions out.
 */
export function createGraphExtractionPrompt(content: string): string {
  const nodeTypes = NODE_TYPES.map((t) => `- ${t} (${NODE_TYPE_NOTES[t]})`).join('\n');
  const relationshipTypes = RELATIONSHIP_TYPES.map((t) => `- ${t} (${RELATIONSHIP_TYPE_NOTES[t]})`).join('\n');

  return `You are extracting entities (nodes) and relationships from historical spine science texts and traditional medicine documents. Whatever the language of the document, write the extracted nodes and relationships in English.

NODES:
Each entity becomes a Node with a unique id and a type. The type must be one of:
${nodeTypes}

RELATIONSHIPS:
Each relationship has a subject (subj) and an object (obj), both Node literals that were also emitted on their own, and a type from:
${relationshipTypes}
An optional timestamp='...' may follow the type.

OUTPUT FORMAT:
One literal per line, exactly as in the example. Do not wrap the output in lists or dictionaries and add nothing else.

EXAMPLE CONTENT:
"Ollivier describes cases of paralysis linked to spinal blood congestions, where an accumulation of blood in the spinal veins leads to incomplete paralysis. He notes that these congestions often resolve spontaneously."

EXAMPLE OUTPUT:
${EXAMPLE_OUTPUT}

===== TASK =====
Extract nodes and relationships from the following content.

${content}`;
}
