import { type Chunk, createChunks } from './chunker';
import type { ChunkStore } from './ChunkStore';
import type { ConfigManager } from './ConfigManager';
import { isPlaceholderContent } from './crawler/htmlExtractor';
import type { CrawledPage } from './crawler/types';
import { type ReconciliationResult, reconcileDimensions } from './dimensions';
import type { Embedder } from './Embedder';
import {
  EmbeddingError,
  IngestionError,
  type IngestionStage,
  type Result,
  err,
  errorMessage,
  ok,
} from './errors';
import type { VectorIndex } from './VectorIndex';
import { WithLogging } from './WithLogging';

export type DocumentMetadata = Record<string, string>;

export type IngestOutcome =
  | { status: 'skipped'; reason: 'empty-text' | 'no-chunks' }
  | {
      status: 'added';
      ids: number[];
      chunkCount: number;
      reconciliation: ReconciliationResult['action'];
    };

export interface BatchResult {
  documents: number; // Documents whose chunks were added
  skipped: number; // Empty documents filtered out before embedding
  chunks: number;
  ids: number[];
  error?: IngestionError;
}

export interface IngestionPipelineOptions {
  index: VectorIndex;
  embedder: Embedder;
  configManager: ConfigManager;
  chunkStore?: ChunkStore;
}

function isBlank(text: string | null | undefined): boolean {
  return !text || text.trim().length === 0;
}

/**
 * Chunks documents, embeds the chunks in one batch and appends the vectors
 * to the index. A failed call leaves the index as it was.
 */
export class IngestionPipeline extends WithLogging {
  protected readonly componentName = 'IngestionPipeline';
  protected readonly configManager: ConfigManager;
  private readonly index: VectorIndex;
  private readonly embedder: Embedder;
  private readonly chunkStore?: ChunkStore;

  constructor(options: IngestionPipelineOptions) {
    super();
    this.index = options.index;
    this.embedder = options.embedder;
    this.configManager = options.configManager;
    this.chunkStore = options.chunkStore;
  }

  /**
   * Chunks with the configured size and overlap, so re-chunking a document
   * reproduces the stored chunks
   */
  chunk(text: string, sourceId = ''): Chunk[] {
    return createChunks(
      text,
      this.configManager.get('chunkSize'),
      this.configManager.get('chunkOverlap'),
      sourceId
    );
  }

  async addDocument(
    text: string,
    metadata?: DocumentMetadata
  ): Promise<Result<IngestOutcome, IngestionError>> {
    const sourceId = metadata?.source ?? metadata?.url ?? '';

    if (isBlank(text)) {
      this.warn('Empty content provided. Skipping document.');
      return ok<IngestOutcome>({ status: 'skipped', reason: 'empty-text' });
    }

    let chunks: Chunk[];
    try {
      chunks = this.chunk(text, sourceId);
    } catch (error) {
      return this.fail('chunk', error);
    }
    if (chunks.length === 0) {
      this.warn('No chunks created from document. Skipping.');
      return ok<IngestOutcome>({ status: 'skipped', reason: 'no-chunks' });
    }

    const stored = await this.embedAndStore(
      chunks,
      chunks.map(() => metadata)
    );
    if (!stored.ok) {
      return stored;
    }

    this.log(
      `Added ${chunks.length} chunk(s)${sourceId ? ` from ${sourceId}` : ''}`
    );
    return ok<IngestOutcome>({
      status: 'added',
      ids: stored.value.ids,
      chunkCount: chunks.length,
      reconciliation: stored.value.reconciliation,
    });
  }

  /**
   * Adds many documents with one embedding call and one index append.
   * A failure aborts the whole batch and is reported once in `error`.
   */
  async addDocuments(
    texts: string[],
    metadatas?: (DocumentMetadata | undefined)[]
  ): Promise<BatchResult> {
    const valid: { text: string; metadata?: DocumentMetadata }[] = [];
    texts.forEach((text, i) => {
      if (!isBlank(text)) {
        valid.push({ text, metadata: metadatas?.[i] });
      }
    });
    const skipped = texts.length - valid.length;
    if (skipped > 0) {
      this.warn(`Skipped ${skipped} empty document(s).`);
    }

    const empty: BatchResult = { documents: 0, skipped, chunks: 0, ids: [] };
    if (valid.length === 0) {
      this.warn('No valid documents to add.');
      return empty;
    }

    const chunks: Chunk[] = [];
    const chunkMetadata: (DocumentMetadata | undefined)[] = [];
    try {
      for (const doc of valid) {
        const sourceId = doc.metadata?.source ?? doc.metadata?.url ?? '';
        for (const chunk of this.chunk(doc.text, sourceId)) {
          chunks.push(chunk);
          chunkMetadata.push(doc.metadata);
        }
      }
    } catch (error) {
      const failed = this.fail('chunk', error);
      return { ...empty, error: failed.error };
    }

    if (chunks.length === 0) {
      this.warn('No chunks created from documents. Skipping.');
      return empty;
    }

    const stored = await this.embedAndStore(chunks, chunkMetadata);
    if (!stored.ok) {
      return { ...empty, error: stored.error };
    }

    this.log(
      `Added ${chunks.length} chunk(s) from ${valid.length} document(s)`
    );
    return {
      documents: valid.length,
      skipped,
      chunks: chunks.length,
      ids: stored.value.ids,
    };
  }

  /**
   * Adds crawl results as one batch. Pages the crawler could not extract any
   * text from count as skipped.
   */
  async ingestPages(pages: CrawledPage[]): Promise<BatchResult> {
    const extracted = pages.filter(page => !isPlaceholderContent(page.content));
    const placeholders = pages.length - extracted.length;
    if (placeholders > 0) {
      this.warn(`Skipped ${placeholders} page(s) without extractable content.`);
    }

    const result = await this.addDocuments(
      extracted.map(page => page.content),
      extracted.map(({ metadata }) => ({
        url: metadata.url,
        title: metadata.title,
        description: metadata.description,
      }))
    );
    return { ...result, skipped: result.skipped + placeholders };
  }

  private async embedAndStore(
    chunks: Chunk[],
    metadata: (DocumentMetadata | undefined)[]
  ): Promise<
    Result<
      { ids: number[]; reconciliation: ReconciliationResult['action'] },
      IngestionError
    >
  > {
    let embeddings: number[][];
    try {
      embeddings = await this.embedder.getEmbeddings(chunks.map(c => c.text));
    } catch (error) {
      return this.fail('embed', error);
    }
    if (embeddings.length !== chunks.length) {
      return this.fail(
        'embed',
        new EmbeddingError(
          `Embedder returned ${embeddings.length} vectors for ${chunks.length} chunks`
        )
      );
    }

    const reconciled = reconcileDimensions(embeddings, this.index.dimension);
    if (reconciled.action !== 'none') {
      this.warn(
        `Embedding dimension mismatch. Expected ${this.index.dimension}, got ${reconciled.sourceWidths.join('/')}. ` +
          `Vectors were ${reconciled.action === 'mixed' ? 'truncated and padded' : reconciled.action} to ${this.index.dimension} dimensions.`
      );
    }

    let ids: number[];
    try {
      ids = await this.index.add(reconciled.vectors);
    } catch (error) {
      return this.fail('index', error);
    }

    if (this.chunkStore) {
      try {
        await this.chunkStore.put(ids, chunks, metadata);
      } catch (error) {
        // Vectors are already durable; only the text lookup is missing
        this.error(
          `Vectors ${ids[0]}..${ids[ids.length - 1]} were indexed but their text was not recorded: ${errorMessage(error)}`
        );
      }
    }

    return ok({ ids, reconciliation: reconciled.action });
  }

  private fail(
    stage: IngestionStage,
    cause: unknown
  ): { ok: false; error: IngestionError } {
    const message = `Error adding document to index (${stage}): ${errorMessage(cause)}`;
    this.error(message);
    return err(new IngestionError(message, stage, { cause }));
  }
}
