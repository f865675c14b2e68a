import { type EmbedRequest, type EmbedResponse, Ollama } from 'ollama';
import type { ConfigManager } from './ConfigManager';
import type { Embedder } from './Embedder';
import { EmbeddingError, errorMessage } from './errors';
import { WithLogging } from './WithLogging';

export interface OllamaEmbedClient {
  embed(request: EmbedRequest): Promise<Pick<EmbedResponse, 'embeddings'>>;
}

/**
 * Embedding generation using Ollama API
 * Sends the whole batch in one /api/embed request
 */
export class OllamaEmbedder extends WithLogging implements Embedder {
  protected readonly componentName = 'OllamaEmbedder';
  private readonly client: OllamaEmbedClient;

  constructor(
    protected readonly configManager: ConfigManager,
    client?: OllamaEmbedClient
  ) {
    super();
    this.client =
      client ?? new Ollama({ host: this.configManager.get('ollamaUrl') });
    this.log(`Initialized with ${this.configManager.get('embeddingModel')}`);
  }

  async getEmbeddings(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    const model = this.configManager.get('embeddingModel');
    this.verbose(`Generating embeddings for ${texts.length} text(s)...`);

    let embeddings: number[][];
    try {
      const response = await this.client.embed({ model, input: texts });
      embeddings = response.embeddings;
    } catch (error) {
      this.error(`Failed to generate embeddings: ${errorMessage(error)}`);
      throw new EmbeddingError(
        `Batch embedding with ${model} failed: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    if (!Array.isArray(embeddings) || embeddings.length !== texts.length) {
      throw new EmbeddingError(
        `Ollama returned ${Array.isArray(embeddings) ? embeddings.length : 0} embeddings for ${texts.length} texts`
      );
    }
    return embeddings;
  }

  async getEmbedding(text: string): Promise<number[]> {
    const [embedding] = await this.getEmbeddings([text]);
    return embedding;
  }
}
