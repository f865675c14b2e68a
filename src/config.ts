export type LogLevel = 'error' | 'warn' | 'log' | 'verbose';
export type FetchStrategy = 'static' | 'rendering' | 'auto';
export type EmbedderType = 'hash' | 'ollama';

export const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  log: 2,
  verbose: 3,
};

export interface SupportAgentSettings {
  // Index configuration
  // ===================
  vectorDbPath: string; // Binary vector index file
  chunkStorePath: string; // Chunk text sidecar (empty = derived from vectorDbPath)
  embeddingDim: number; // Dimension every stored vector must have

  // Chunking configuration
  // ======================
  chunkSize: number; // Maximum tokens per chunk
  chunkOverlap: number; // Tokens repeated between consecutive chunks

  // Embedder configuration
  // ======================
  embedderType: EmbedderType; // 'hash' (deterministic, offline) or 'ollama'
  ollamaUrl: string;
  embeddingModel: string; // Ollama embedding model name

  // Search parameters
  // =================
  topK: number; // Default number of chunks returned per query

  // Crawler configuration
  // =====================
  maxPages: number; // Page budget per crawl
  allowedDomains: string[]; // Empty = host of the start URL
  crawlDelayMs: number; // Fixed politeness delay between fetches
  fetchTimeoutMs: number; // Per-request timeout
  renderTimeoutMs: number; // Script execution budget for the rendering fetcher
  fetchStrategy: FetchStrategy;
  userAgent: string;

  // Language model
  // ==============
  llmModel: string;
  llmTemperature: number;
  llmMaxTokens: number;

  // Logging configuration
  // =====================
  feedbackLogPath: string; // JSONL feedback log
  logLevel: LogLevel;
}

export const DEFAULT_SETTINGS: SupportAgentSettings = {
  // Index configuration
  // ===================
  vectorDbPath: './data/vector-index.bin',
  chunkStorePath: '',
  embeddingDim: 768,

  // Chunking configuration
  // ======================
  chunkSize: 512,
  chunkOverlap: 50,

  // Embedder configuration
  // ======================
  embedderType: 'hash',
  ollamaUrl: 'http://localhost:11434',
  embeddingModel: 'nomic-embed-text:latest',

  // Search parameters
  // =================
  topK: 3,

  // Crawler configuration
  // =====================
  maxPages: 10,
  allowedDomains: [],
  crawlDelayMs: 1000,
  fetchTimeoutMs: 20000,
  renderTimeoutMs: 5000,
  fetchStrategy: 'static',
  userAgent: 'support-agent-crawler/0.1',

  // Language model
  // ==============
  llmModel: 'llama3.2',
  llmTemperature: 0.7,
  llmMaxTokens: 1024,

  // Logging configuration
  // =====================
  feedbackLogPath: './logs/feedback.log',
  logLevel: 'warn',
};

/**
 * Path of the chunk text sidecar that belongs to an index file
 */
export function resolveChunkStorePath(settings: SupportAgentSettings): string {
  return settings.chunkStorePath || `${settings.vectorDbPath}.chunks.json`;
}
