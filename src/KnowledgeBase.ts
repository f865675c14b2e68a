import { ChunkStore } from './ChunkStore';
import { resolveChunkStorePath } from './config';
import type { ConfigManager } from './ConfigManager';
import type { Embedder } from './Embedder';
import { HashEmbedder } from './HashEmbedder';
import { IngestionPipeline } from './IngestionPipeline';
import { OllamaEmbedder } from './OllamaEmbedder';
import { SearchService } from './SearchService';
import { VectorIndex } from './VectorIndex';
import { createComponentLogger } from './WithLogging';

/**
 * The index, its chunk sidecar and the services built on them, sharing one
 * embedder so stored and query vectors are comparable
 */
export interface KnowledgeBase {
  configManager: ConfigManager;
  index: VectorIndex;
  chunkStore: ChunkStore;
  embedder: Embedder;
  pipeline: IngestionPipeline;
  search: SearchService;
}

export function createEmbedder(configManager: ConfigManager): Embedder {
  switch (configManager.get('embedderType')) {
    case 'hash':
      return new HashEmbedder(configManager.get('embeddingDim'));
    case 'ollama':
      return new OllamaEmbedder(configManager);
  }
}

export async function openKnowledgeBase(
  configManager: ConfigManager,
  options: { embedder?: Embedder } = {}
): Promise<KnowledgeBase> {
  const settings = configManager.getAll();
  const index = await VectorIndex.open(
    settings.vectorDbPath,
    settings.embeddingDim,
    { logger: createComponentLogger(configManager, 'VectorIndex') }
  );

  // Text recorded for vectors the index no longer holds (a discarded index,
  // or an append whose text was written but whose vectors were not) goes
  const chunkStore = await ChunkStore.open(resolveChunkStorePath(settings));
  const stale = await chunkStore.truncateTo(index.size());
  if (stale > 0) {
    createComponentLogger(configManager, 'ChunkStore').warn(
      `Dropped ${stale} chunk text entr${stale === 1 ? 'y' : 'ies'} without a vector`
    );
  }

  const embedder = options.embedder ?? createEmbedder(configManager);
  return {
    configManager,
    index,
    chunkStore,
    embedder,
    pipeline: new IngestionPipeline({
      index,
      embedder,
      configManager,
      chunkStore,
    }),
    search: new SearchService({ index, embedder, configManager, chunkStore }),
  };
}
