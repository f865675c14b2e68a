import type { ConfigManager } from './ConfigManager';
import type { LlmClient } from './OllamaChatClient';
import type { RetrievedChunk, SearchService } from './SearchService';
import { WithLogging } from './WithLogging';

export const NO_CONTEXT = 'No relevant documents found.';

export interface AgentResponse {
  answer: string;
  sources: RetrievedChunk[];
}

export interface SupportAgentOptions {
  search: Pick<SearchService, 'searchChunks'>;
  llm: LlmClient;
  configManager: ConfigManager;
}

/**
 * Retrieved chunks are quoted verbatim; chunks without stored text fall
 * back to their label
 */
export function buildPrompt(query: string, chunks: RetrievedChunk[]): string {
  const context =
    chunks.length > 0
      ? chunks.map(chunk => chunk.text ?? chunk.label).join('\n---\n')
      : NO_CONTEXT;

  return `Given the following context:
---
${context}
---

Answer the user's question:
${query}

If the context doesn't contain relevant information, say that you cannot answer based on the available information.
Answer:`;
}

/**
 * Answers questions from the knowledge base: retrieve, build a prompt,
 * generate
 */
export class SupportAgent extends WithLogging {
  protected readonly componentName = 'SupportAgent';
  protected readonly configManager: ConfigManager;
  private readonly search: Pick<SearchService, 'searchChunks'>;
  private readonly llm: LlmClient;

  constructor(options: SupportAgentOptions) {
    super();
    this.search = options.search;
    this.llm = options.llm;
    this.configManager = options.configManager;
  }

  async handleQuery(query: string, k?: number): Promise<AgentResponse> {
    const sources = await this.search.searchChunks(query, k);
    this.verbose(`Retrieved ${sources.length} chunk(s) for query`);
    const answer = await this.llm.generate(buildPrompt(query, sources));
    return { answer, sources };
  }
}
