/**
 * KnowledgeGraphAgent - asks the text-generation service for Node and
 * Relationship literals and parses the answer into a GraphElement.
 *
 * @module services/knowledge-graph/agent
 */

import type { GeminiClient } from '../gemini/client.js';
import type { GraphElement, GraphProperties } from '../../models/graph.js';
import { GraphExtractor, type ExtractOptions, type ExtractionReport } from './extractor.js';
import { KG_SYSTEM_INSTRUCTION, createGraphExtractionPrompt } from './prompts.js';

export interface AgentRunOptions extends ExtractOptions {
  /** Replaces the built-in extraction prompt; receives the content */
  prompt?: (content: string) => string;
}

export interface AgentRunResult extends ExtractionReport {
  /** Raw generated text */
  generatedText: string;
}

type TextGenerator = Pick<GeminiClient, 'generateText'>;

export class KnowledgeGraphAgent {
  constructor(
    private readonly client: TextGenerator,
    private readonly extractor: GraphExtractor = new GraphExtractor()
  ) {}

  /**
   * Generated literals only, unparsed
   */
  async generate(content: string, options: Pick<AgentRunOptions, 'prompt'> = {}): Promise<string> {
    const buildPrompt = options.prompt ?? createGraphExtractionPrompt;
    const response = await this.client.generateText(`${KG_SYSTEM_INSTRUCTION}\n\n${buildPrompt(content)}`);
    return response.text;
  }

  async run(content: string, metadata?: GraphProperties, options: AgentRunOptions = {}): Promise<AgentRunResult> {
    console.error(`[KnowledgeGraphAgent] Extracting graph from ${content.length} characters`);
    const generatedText = await this.generate(content, options);
    const report = this.extractor.extractWithReport(generatedText, metadata, options);
    console.error(
      `[KnowledgeGraphAgent] Extracted ${report.element.nodes.length} nodes, ` +
        `${report.element.relationships.length} relationships`
    );
    return { ...report, generatedText };
  }

  async extract(content: string, metadata?: GraphProperties, options?: AgentRunOptions): Promise<GraphElement> {
    return (await this.run(content, metadata, options)).element;
  }
}
