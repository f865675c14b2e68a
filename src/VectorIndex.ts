import fs from 'fs/promises';
import {
  DimensionMismatchError,
  StorageError,
  errorMessage,
  isNotFound,
} from './errors';
import { writeFileAtomic } from './utils';
import type { ComponentLogger } from './WithLogging';

/**
 * On-disk layout (little-endian):
 *   0  magic "SAVX"
 *   4  format version (uint32)
 *   8  dimension (uint32)
 *   12 vector count (uint32)
 *   16 float32 data, one row per vector, in id order
 */
const MAGIC = 'SAVX';
const FORMAT_VERSION = 1;
const HEADER_BYTES = 16;
const FLOAT_BYTES = 4;

export interface SearchHit {
  id: number;
  distance: number; // Squared Euclidean
}

export interface DiscardedIndex {
  storedDimension: number;
  storedCount: number;
}

export interface OpenOptions {
  logger?: ComponentLogger;
}

export function encodeIndex(
  dimension: number,
  vectors: readonly Float32Array[]
): Buffer {
  const buffer = Buffer.alloc(
    HEADER_BYTES + vectors.length * dimension * FLOAT_BYTES
  );
  buffer.write(MAGIC, 0, 'ascii');
  buffer.writeUInt32LE(FORMAT_VERSION, 4);
  buffer.writeUInt32LE(dimension, 8);
  buffer.writeUInt32LE(vectors.length, 12);

  let offset = HEADER_BYTES;
  for (const vector of vectors) {
    for (const value of vector) {
      buffer.writeFloatLE(value, offset);
      offset += FLOAT_BYTES;
    }
  }
  return buffer;
}

export function decodeIndex(
  buffer: Buffer,
  filePath: string
): { dimension: number; vectors: Float32Array[] } {
  if (buffer.length < HEADER_BYTES) {
    throw new StorageError('Index file is truncated', filePath);
  }
  if (buffer.toString('ascii', 0, 4) !== MAGIC) {
    throw new StorageError('Not a vector index file', filePath);
  }
  const version = buffer.readUInt32LE(4);
  if (version !== FORMAT_VERSION) {
    throw new StorageError(
      `Unsupported index format version ${version}`,
      filePath
    );
  }
  const dimension = buffer.readUInt32LE(8);
  const count = buffer.readUInt32LE(12);
  if (dimension === 0) {
    throw new StorageError('Index file declares dimension 0', filePath);
  }
  const expectedBytes = HEADER_BYTES + count * dimension * FLOAT_BYTES;
  if (buffer.length !== expectedBytes) {
    throw new StorageError(
      `Index file holds ${buffer.length} bytes, expected ${expectedBytes} for ${count} vectors of dimension ${dimension}`,
      filePath
    );
  }

  const vectors: Float32Array[] = [];
  let offset = HEADER_BYTES;
  for (let i = 0; i < count; i++) {
    const vector = new Float32Array(dimension);
    for (let j = 0; j < dimension; j++) {
      vector[j] = buffer.readFloatLE(offset);
      offset += FLOAT_BYTES;
    }
    vectors.push(vector);
  }
  return { dimension, vectors };
}

/**
 * Rounds to float32, the precision the index stores. Values that overflow
 * float32 (|x| > ~3.4e38) become infinite and are rejected with the rest.
 */
function toFloat32(values: number[], context: string): Float32Array {
  const rounded = Float32Array.from(values);
  if (!rounded.every(Number.isFinite)) {
    throw new RangeError(`${context} holds a value that is not a finite float32`);
  }
  return rounded;
}

function squaredDistance(a: Float32Array, b: Float32Array): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const diff = a[i] - b[i];
    sum += diff * diff;
  }
  return sum;
}

/**
 * Append-only, exact nearest-neighbor index over fixed-width vectors,
 * persisted as a single binary file.
 *
 * Ids are insertion ranks (0-based) and are never reused. Every successful
 * {@link add} has written the whole index to disk before it resolves.
 */
export class VectorIndex {
  private writeChain: Promise<unknown> = Promise.resolve();

  private constructor(
    readonly path: string,
    readonly dimension: number,
    private vectors: Float32Array[],
    /** Set when a stored index of another dimension was replaced on open */
    readonly discarded: DiscardedIndex | null,
    private readonly logger?: ComponentLogger
  ) {}

  /**
   * Opens the index at `filePath`, creating it if absent.
   *
   * A stored index whose dimension differs from `expectedDim` is discarded
   * and replaced by an empty one (its vectors are lost); the replacement is
   * logged as a warning and reported through {@link discarded}.
   */
  static async open(
    filePath: string,
    expectedDim: number,
    options: OpenOptions = {}
  ): Promise<VectorIndex> {
    if (!Number.isInteger(expectedDim) || expectedDim < 1) {
      throw new RangeError(
        `Index dimension must be a positive integer: ${expectedDim}`
      );
    }
    const logger = options.logger;

    let buffer: Buffer | null;
    try {
      buffer = await fs.readFile(filePath);
    } catch (error) {
      if (!isNotFound(error)) {
        throw new StorageError(
          `Cannot read index file: ${errorMessage(error)}`,
          filePath,
          { cause: error }
        );
      }
      buffer = null;
    }

    if (buffer === null) {
      const index = new VectorIndex(filePath, expectedDim, [], null, logger);
      await index.persist();
      logger?.log(`Created empty index of dimension ${expectedDim}`);
      return index;
    }

    const stored = decodeIndex(buffer, filePath);
    if (stored.dimension !== expectedDim) {
      const message =
        `Existing index has dimension ${stored.dimension}, but expected ${expectedDim}. ` +
        `Discarding ${stored.vectors.length} stored vector(s) and creating a new index with dimension ${expectedDim}.`;
      if (logger) {
        logger.warn(message);
      } else {
        console.warn(message);
      }
      const index = new VectorIndex(
        filePath,
        expectedDim,
        [],
        { storedDimension: stored.dimension, storedCount: stored.vectors.length },
        logger
      );
      await index.persist();
      return index;
    }

    logger?.log(
      `Loaded ${stored.vectors.length} vector(s) of dimension ${stored.dimension}`
    );
    return new VectorIndex(
      filePath,
      stored.dimension,
      stored.vectors,
      null,
      logger
    );
  }

  size(): number {
    return this.vectors.length;
  }

  /**
   * Stored vector as float32 values widened to numbers
   */
  getVector(id: number): number[] | undefined {
    const vector = this.vectors[id];
    return vector ? Array.from(vector) : undefined;
  }

  /**
   * Appends vectors and persists the index. Resolves with the assigned ids in
   * insertion order. Concurrent calls are applied one at a time.
   *
   * @throws DimensionMismatchError if any vector has the wrong width (nothing is appended)
   * @throws StorageError if the index cannot be written (the append is rolled back)
   */
  add(vectors: number[][]): Promise<number[]> {
    const run = this.writeChain.then(() => this.appendAndPersist(vectors));
    // The failure reaches the caller through `run`; later appends still proceed
    this.writeChain = run.catch(() => undefined);
    return run;
  }

  /**
   * Exact k-nearest-neighbor search by squared Euclidean distance.
   * Ascending distance, ties broken by lower id; at most min(k, size) hits.
   */
  search(query: number[], k: number): SearchHit[] {
    if (query.length !== this.dimension) {
      throw new DimensionMismatchError(this.dimension, query.length, 'query');
    }
    const limit = Math.min(Math.floor(k), this.vectors.length);
    if (limit <= 0) {
      return [];
    }

    // Stored values are float32; rounding the query the same way makes an
    // exact self-match come out at distance 0
    const q = toFloat32(query, 'query');
    const hits = this.vectors.map((vector, id) => ({
      id,
      distance: squaredDistance(q, vector),
    }));
    hits.sort((a, b) => a.distance - b.distance || a.id - b.id);
    return hits.slice(0, limit);
  }

  private async appendAndPersist(vectors: number[][]): Promise<number[]> {
    const rows = vectors.map((vector, i) => {
      if (vector.length !== this.dimension) {
        throw new DimensionMismatchError(
          this.dimension,
          vector.length,
          `vector ${i} of batch`
        );
      }
      return toFloat32(vector, `vector ${i} of batch`);
    });
    if (rows.length === 0) {
      return [];
    }

    const firstId = this.vectors.length;
    this.vectors.push(...rows);

    try {
      await this.persist();
    } catch (error) {
      this.vectors.length = firstId;
      throw error;
    }

    this.logger?.verbose(
      `Appended ${vectors.length} vector(s); index size is ${this.vectors.length}`
    );
    return vectors.map((_, i) => firstId + i);
  }

  /**
   * Writes the full index; it is on disk before this resolves
   */
  private async persist(): Promise<void> {
    try {
      await writeFileAtomic(this.path, encodeIndex(this.dimension, this.vectors));
    } catch (error) {
      throw new StorageError(
        `Cannot write index file: ${errorMessage(error)}`,
        this.path,
        { cause: error }
      );
    }
  }
}
