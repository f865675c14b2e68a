import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import { ChunkStore } from './ChunkStore';
import { ConfigManager } from './ConfigManager';
import { IngestionError } from './errors';
import { IngestionPipeline } from './IngestionPipeline';
import { VectorIndex } from './VectorIndex';
import { FakeEmbedder } from './test-helpers/fake-embedder';
import { createTempDir, removeTempDir } from './test-helpers/tmp-dir';

const SEVEN_WORDS = 'w0 w1 w2 w3 w4 w5 w6';

let dir: string;
let indexPath: string;

beforeEach(async () => {
  dir = await createTempDir();
  indexPath = path.join(dir, 'index.bin');
});

afterEach(async () => {
  vi.restoreAllMocks();
  await removeTempDir(dir);
});

async function setup(
  indexDim: number,
  embedderDim = indexDim,
  withChunkStore = false
) {
  // Size 4 with overlap 1: seven words make two chunks
  const configManager = ConfigManager.fromSettings({
    chunkSize: 4,
    chunkOverlap: 1,
    logLevel: 'error',
  });
  const index = await VectorIndex.open(indexPath, indexDim);
  const embedder = new FakeEmbedder(embedderDim);
  const chunkStore = withChunkStore
    ? await ChunkStore.open(`${indexPath}.chunks.json`)
    : undefined;
  const pipeline = new IngestionPipeline({
    index,
    embedder,
    configManager,
    chunkStore,
  });
  return { configManager, index, embedder, chunkStore, pipeline };
}

describe('IngestionPipeline.addDocument', () => {
  it.each(['', '   ', '\n\t'])(
    'skips blank text %j without touching the index',
    async text => {
      const { index, embedder, pipeline } = await setup(8);

      const result = await pipeline.addDocument(text);

      expect(result).toEqual({
        ok: true,
        value: { status: 'skipped', reason: 'empty-text' },
      });
      expect(index.size()).toBe(0);
      expect(embedder.getEmbeddings).not.toHaveBeenCalled();
    }
  );

  it('embeds all chunks in one call and appends them', async () => {
    const { index, embedder, pipeline } = await setup(8);

    const result = await pipeline.addDocument(SEVEN_WORDS);

    expect(result).toEqual({
      ok: true,
      value: {
        status: 'added',
        ids: [0, 1],
        chunkCount: 2,
        reconciliation: 'none',
      },
    });
    expect(embedder.getEmbeddings).toHaveBeenCalledTimes(1);
    expect(embedder.getEmbeddings).toHaveBeenCalledWith([
      'w0 w1 w2 w3',
      'w3 w4 w5 w6',
    ]);
    expect(index.size()).toBe(2);
  });

  it('pads narrow embeddings with zeros up to the index width', async () => {
    const { index, pipeline } = await setup(256, 128);

    const result = await pipeline.addDocument(SEVEN_WORDS);

    expect(result).toMatchObject({
      ok: true,
      value: { status: 'added', reconciliation: 'padded' },
    });
    expect(index.size()).toBe(2);
    for (const id of [0, 1]) {
      const stored = index.getVector(id);
      expect(stored).toHaveLength(256);
      expect(stored?.slice(0, 2)).toEqual([11, 1]);
      expect(stored?.slice(128)).toEqual(new Array(128).fill(0));
    }
  });

  it('warns when it reconciles widths', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { configManager, pipeline } = await setup(256, 128);
    await configManager.update({ logLevel: 'warn' });

    const result = await pipeline.addDocument(SEVEN_WORDS);

    expect(result.ok).toBe(true);
    expect(warn).toHaveBeenCalledWith(
      '[SupportAgent.IngestionPipeline] Embedding dimension mismatch. Expected 256, got 128. Vectors were padded to 256 dimensions.'
    );
  });

  it('truncates wide embeddings', async () => {
    const { index, pipeline } = await setup(4, 6);

    const result = await pipeline.addDocument('alpha beta');

    expect(result).toEqual({
      ok: true,
      value: {
        status: 'added',
        ids: [0],
        chunkCount: 1,
        reconciliation: 'truncated',
      },
    });
    expect(index.getVector(0)).toEqual([10, 1, 1, 1]);
  });

  it('returns an embed-stage error and leaves the index unchanged', async () => {
    const { index, embedder, pipeline } = await setup(8);
    embedder.getEmbeddings.mockRejectedValueOnce(new Error('model offline'));

    const result = await pipeline.addDocument(SEVEN_WORDS);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(IngestionError);
      expect(result.error.stage).toBe('embed');
      expect(result.error.message).toBe(
        'Error adding document to index (embed): model offline'
      );
      expect(result.error.cause).toEqual(new Error('model offline'));
    }
    expect(index.size()).toBe(0);
  });

  it('rejects an embedder that returns the wrong number of vectors', async () => {
    const { embedder, pipeline } = await setup(8);
    embedder.getEmbeddings.mockResolvedValueOnce([[1, 2, 3, 4, 5, 6, 7, 8]]);

    const result = await pipeline.addDocument(SEVEN_WORDS);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.stage).toBe('embed');
      expect(result.error.message).toBe(
        'Error adding document to index (embed): Embedder returned 1 vectors for 2 chunks'
      );
    }
  });

  it('returns an index-stage error when the index cannot be written', async () => {
    const { index, pipeline } = await setup(8);
    await fs.mkdir(`${indexPath}.tmp`);

    const result = await pipeline.addDocument(SEVEN_WORDS);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.stage).toBe('index');
    }
    expect(index.size()).toBe(0);
  });

  it('records chunk text and metadata under the assigned ids', async () => {
    const { chunkStore, pipeline } = await setup(8, 8, true);

    await pipeline.addDocument(SEVEN_WORDS, { source: 'guide.pdf' });

    expect(chunkStore?.get(0)).toEqual({
      text: 'w0 w1 w2 w3',
      sourceId: 'guide.pdf',
      ordinal: 0,
      metadata: { source: 'guide.pdf' },
    });
    expect(chunkStore?.get(1)?.ordinal).toBe(1);
  });
});

describe('IngestionPipeline.addDocuments', () => {
  it('filters blank documents and appends the rest in one batch', async () => {
    const { index, embedder, pipeline } = await setup(8);

    const result = await pipeline.addDocuments([
      '',
      'one two three',
      '   ',
      'four five',
    ]);

    expect(result).toEqual({ documents: 2, skipped: 2, chunks: 2, ids: [0, 1] });
    expect(embedder.getEmbeddings).toHaveBeenCalledTimes(1);
    expect(embedder.getEmbeddings).toHaveBeenCalledWith([
      'one two three',
      'four five',
    ]);
    expect(index.size()).toBe(2);
  });

  it('does nothing when every document is blank', async () => {
    const { embedder, pipeline } = await setup(8);

    const result = await pipeline.addDocuments(['', ' ']);

    expect(result).toEqual({ documents: 0, skipped: 2, chunks: 0, ids: [] });
    expect(embedder.getEmbeddings).not.toHaveBeenCalled();
  });

  it('aborts the whole batch on an embedding failure', async () => {
    const { index, embedder, pipeline } = await setup(8);
    embedder.getEmbeddings.mockRejectedValueOnce(new Error('model offline'));

    const result = await pipeline.addDocuments(['first doc', 'second doc']);

    expect(result.documents).toBe(0);
    expect(result.ids).toEqual([]);
    expect(result.error?.stage).toBe('embed');
    expect(index.size()).toBe(0);
  });
});

describe('IngestionPipeline.ingestPages', () => {
  it('skips placeholder pages and keeps page metadata', async () => {
    const { chunkStore, pipeline } = await setup(8, 8, true);

    const result = await pipeline.ingestPages([
      {
        content: '[No content extracted from https://site.test/empty]',
        metadata: {
          url: 'https://site.test/empty',
          title: '',
          description: '',
          links: [],
        },
      },
      {
        content: 'Reset your password',
        metadata: {
          url: 'https://site.test/reset',
          title: 'Reset',
          description: 'How to reset',
          links: ['https://site.test/'],
        },
      },
    ]);

    expect(result).toEqual({ documents: 1, skipped: 1, chunks: 1, ids: [0] });
    expect(chunkStore?.get(0)).toEqual({
      text: 'Reset your password',
      sourceId: 'https://site.test/reset',
      ordinal: 0,
      metadata: {
        url: 'https://site.test/reset',
        title: 'Reset',
        description: 'How to reset',
      },
    });
  });
});
