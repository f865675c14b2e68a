import fs from 'fs/promises';
import { z } from 'zod';
import type { Chunk } from './chunker';
import { StorageError, errorMessage, isNotFound } from './errors';
import { writeFileAtomic } from './utils';

const storedChunkSchema = z.object({
  text: z.string(),
  sourceId: z.string(),
  ordinal: z.number().int().min(0),
  metadata: z.record(z.string()).optional(),
});

const chunkFileSchema = z.object({
  version: z.literal(1),
  chunks: z.record(z.string().regex(/^\d+$/), storedChunkSchema),
});

export type StoredChunk = z.infer<typeof storedChunkSchema>;

/**
 * Sidecar that maps index ids back to chunk text, written next to the
 * vector index. The index stays the source of truth: entries for ids the
 * index does not hold are dropped by {@link truncateTo}, and ids without an
 * entry simply have no text.
 */
export class ChunkStore {
  private constructor(
    readonly path: string,
    private chunks: Map<number, StoredChunk>
  ) {}

  static async open(filePath: string): Promise<ChunkStore> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return new ChunkStore(filePath, new Map());
      }
      throw new StorageError(
        `Cannot read chunk store: ${errorMessage(error)}`,
        filePath,
        { cause: error }
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new StorageError('Chunk store is not valid JSON', filePath, {
        cause: error,
      });
    }
    const parsed = chunkFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new StorageError(
        `Chunk store has an unexpected shape: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`,
        filePath
      );
    }

    const chunks = new Map<number, StoredChunk>();
    for (const [id, chunk] of Object.entries(parsed.data.chunks)) {
      chunks.set(Number(id), chunk);
    }
    return new ChunkStore(filePath, chunks);
  }

  size(): number {
    return this.chunks.size;
  }

  get(id: number): StoredChunk | undefined {
    return this.chunks.get(id);
  }

  /**
   * Records the chunks stored under `ids` (same order, same length)
   */
  async put(
    ids: number[],
    chunks: Chunk[],
    metadata?: (Record<string, string> | undefined)[]
  ): Promise<void> {
    if (ids.length !== chunks.length) {
      throw new RangeError(
        `Got ${ids.length} ids for ${chunks.length} chunks`
      );
    }
    ids.forEach((id, i) => {
      const chunk = chunks[i];
      const entry: StoredChunk = {
        text: chunk.text,
        sourceId: chunk.sourceId,
        ordinal: chunk.ordinal,
      };
      const meta = metadata?.[i];
      if (meta && Object.keys(meta).length > 0) {
        entry.metadata = meta;
      }
      this.chunks.set(id, entry);
    });
    await this.persist();
  }

  /**
   * Drops entries whose id is not below `indexSize`
   */
  async truncateTo(indexSize: number): Promise<number> {
    let removed = 0;
    for (const id of [...this.chunks.keys()]) {
      if (id >= indexSize) {
        this.chunks.delete(id);
        removed++;
      }
    }
    if (removed > 0) {
      await this.persist();
    }
    return removed;
  }

  private async persist(): Promise<void> {
    const data = {
      version: 1,
      chunks: Object.fromEntries(
        [...this.chunks.entries()].sort(([a], [b]) => a - b)
      ),
    };
    try {
      await writeFileAtomic(this.path, JSON.stringify(data));
    } catch (error) {
      throw new StorageError(
        `Cannot write chunk store: ${errorMessage(error)}`,
        this.path,
        { cause: error }
      );
    }
  }
}
