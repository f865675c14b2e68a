import type { ChunkStore } from './ChunkStore';
import type { ConfigManager } from './ConfigManager';
import type { Embedder } from './Embedder';
import type { SearchHit, VectorIndex } from './VectorIndex';
import { WithLogging } from './WithLogging';

/**
 * Chunk-level search result. `text` is only known when the service has a
 * chunk store with an entry for the id.
 */
export interface RetrievedChunk {
  id: number;
  distance: number; // Squared Euclidean
  label: string;
  text?: string;
  sourceId?: string;
  metadata?: Record<string, string>;
}

export interface SearchServiceOptions {
  index: VectorIndex;
  embedder: Embedder;
  configManager: ConfigManager;
  chunkStore?: ChunkStore;
}

export function formatHitLabel(hit: SearchHit): string {
  return `Document chunk ${hit.id} (distance: ${hit.distance.toFixed(3)})`;
}

/**
 * Nearest-neighbor search over the vector index, embedding queries with the
 * same embedder the ingestion pipeline uses
 */
export class SearchService extends WithLogging {
  protected readonly componentName = 'SearchService';
  protected readonly configManager: ConfigManager;
  private readonly index: VectorIndex;
  private readonly embedder: Embedder;
  private readonly chunkStore?: ChunkStore;

  constructor(options: SearchServiceOptions) {
    super();
    this.index = options.index;
    this.embedder = options.embedder;
    this.configManager = options.configManager;
    this.chunkStore = options.chunkStore;
  }

  /**
   * Labels of the `k` nearest chunks in rank order. The labels name the
   * chunk id and distance only; use {@link searchChunks} for the text.
   *
   * @throws DimensionMismatchError if the query embedding is not as wide as the index
   */
  async search(query: string, k?: number): Promise<string[]> {
    const hits = await this.rank(query, k);
    return hits.map(formatHitLabel);
  }

  async searchChunks(query: string, k?: number): Promise<RetrievedChunk[]> {
    const hits = await this.rank(query, k);
    return hits.map(hit => {
      const result: RetrievedChunk = { ...hit, label: formatHitLabel(hit) };
      const stored = this.chunkStore?.get(hit.id);
      if (stored) {
        result.text = stored.text;
        result.sourceId = stored.sourceId;
        if (stored.metadata) {
          result.metadata = stored.metadata;
        }
      }
      return result;
    });
  }

  private async rank(query: string, k?: number): Promise<SearchHit[]> {
    const topK = k ?? this.configManager.get('topK');
    if (this.index.size() === 0 || topK < 1) {
      return [];
    }

    const embedding = await this.embedder.getEmbedding(query);
    const hits = this.index.search(embedding, topK);
    this.verbose(`Found ${hits.length} result(s) for query`);
    return hits;
  }
}
