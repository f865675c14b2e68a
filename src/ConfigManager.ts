import fs from 'fs/promises';
import { z } from 'zod';
import { type SupportAgentSettings, DEFAULT_SETTINGS } from './config';
import { ConfigError, errorMessage, isNotFound } from './errors';
import { Logger } from './Logger';
import { writeFileAtomic } from './utils';

export const DEFAULT_CONFIG_PATH = './.support-agent.json';

export type ConfigChangeListener = <K extends keyof SupportAgentSettings>(
  key: K,
  value: SupportAgentSettings[K],
  oldValue: SupportAgentSettings[K]
) => void;

const settingsSchema = z
  .object({
    vectorDbPath: z.string().min(1),
    chunkStorePath: z.string(),
    embeddingDim: z.number().int().min(1).max(65536),
    chunkSize: z.number().int().min(1),
    chunkOverlap: z.number().int().min(0),
    embedderType: z.enum(['hash', 'ollama']),
    ollamaUrl: z.string().url(),
    embeddingModel: z.string().min(1),
    topK: z.number().int().min(1),
    maxPages: z.number().int().min(1),
    allowedDomains: z.array(z.string().min(1)),
    crawlDelayMs: z.number().int().min(0),
    fetchTimeoutMs: z.number().int().min(1),
    renderTimeoutMs: z.number().int().min(1),
    fetchStrategy: z.enum(['static', 'rendering', 'auto']),
    userAgent: z.string().min(1),
    llmModel: z.string().min(1),
    llmTemperature: z.number().min(0).max(2),
    llmMaxTokens: z.number().int().min(1),
    feedbackLogPath: z.string().min(1),
    logLevel: z.enum(['error', 'warn', 'log', 'verbose']),
  })
  .refine(s => s.chunkOverlap < s.chunkSize, {
    message: 'chunkOverlap must be smaller than chunkSize',
    path: ['chunkOverlap'],
  });

// Environment variables, all optional, parsed from strings
const ENV_KEYS: Record<string, keyof SupportAgentSettings> = {
  SSA_VECTOR_DB_PATH: 'vectorDbPath',
  SSA_CHUNK_STORE_PATH: 'chunkStorePath',
  SSA_EMBEDDING_DIM: 'embeddingDim',
  SSA_CHUNK_SIZE: 'chunkSize',
  SSA_CHUNK_OVERLAP: 'chunkOverlap',
  SSA_EMBEDDER: 'embedderType',
  SSA_OLLAMA_URL: 'ollamaUrl',
  SSA_EMBEDDING_MODEL: 'embeddingModel',
  SSA_TOP_K: 'topK',
  SSA_MAX_PAGES: 'maxPages',
  SSA_ALLOWED_DOMAINS: 'allowedDomains',
  SSA_CRAWL_DELAY_MS: 'crawlDelayMs',
  SSA_FETCH_TIMEOUT_MS: 'fetchTimeoutMs',
  SSA_FETCH_STRATEGY: 'fetchStrategy',
  SSA_LLM_MODEL: 'llmModel',
  SSA_FEEDBACK_LOG_PATH: 'feedbackLogPath',
  SSA_LOG_LEVEL: 'logLevel',
};

/**
 * Converts a raw string (from the environment or `config --set`) into the
 * type the setting's default value has
 */
export function coerceSettingValue(
  key: keyof SupportAgentSettings,
  raw: string
): unknown {
  const defaultValue = DEFAULT_SETTINGS[key];
  if (typeof defaultValue === 'number') {
    const parsed = Number(raw);
    return raw.trim() === '' || Number.isNaN(parsed) ? raw : parsed;
  }
  if (Array.isArray(defaultValue)) {
    return raw
      .split(',')
      .map(s => s.trim())
      .filter(s => s.length > 0);
  }
  return raw;
}

export function isSettingKey(key: string): key is keyof SupportAgentSettings {
  return Object.prototype.hasOwnProperty.call(DEFAULT_SETTINGS, key);
}

export function readEnvOverrides(
  env: NodeJS.ProcessEnv
): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  for (const [envKey, settingKey] of Object.entries(ENV_KEYS)) {
    const raw = env[envKey];
    if (raw !== undefined) {
      overrides[settingKey] = coerceSettingValue(settingKey, raw);
    }
  }
  return overrides;
}

export function validateSettings(candidate: unknown): SupportAgentSettings {
  const parsed = settingsSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigError(
      'Invalid configuration',
      parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`)
    );
  }
  return parsed.data;
}

function sameValue(a: unknown, b: unknown): boolean {
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => item === b[i]);
  }
  return a === b;
}

export interface LoadOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

export class ConfigManager {
  private settings: SupportAgentSettings;
  private changeListeners: Map<string, Set<ConfigChangeListener>> = new Map();
  readonly logger: Logger;

  // What the config file holds; environment overrides never end up here
  private fileSettings: Record<string, unknown>;

  private constructor(
    initialSettings: SupportAgentSettings,
    private readonly configPath: string | null,
    fileSettings: Record<string, unknown> = {}
  ) {
    this.settings = { ...initialSettings };
    this.fileSettings = { ...fileSettings };
    this.logger = new Logger(() => this.settings.logLevel);
  }

  /**
   * Defaults, then the JSON config file (if present), then SSA_* variables
   */
  static async load(options: LoadOptions = {}): Promise<ConfigManager> {
    const configPath = options.configPath ?? DEFAULT_CONFIG_PATH;
    const fromFile = await readConfigFile(configPath);
    const fromEnv = readEnvOverrides(options.env ?? process.env);
    const settings = validateSettings({
      ...DEFAULT_SETTINGS,
      ...fromFile,
      ...fromEnv,
    });
    return new ConfigManager(settings, configPath, fromFile);
  }

  /**
   * In-memory configuration that is never written anywhere
   */
  static fromSettings(
    overrides: Partial<SupportAgentSettings> = {}
  ): ConfigManager {
    return new ConfigManager(
      validateSettings({ ...DEFAULT_SETTINGS, ...overrides }),
      null
    );
  }

  get<K extends keyof SupportAgentSettings>(key: K): SupportAgentSettings[K] {
    return this.settings[key];
  }

  getAll(): SupportAgentSettings {
    return { ...this.settings };
  }

  getLogger(): Logger {
    return this.logger;
  }

  /**
   * Update multiple settings at once; the merged result is validated before
   * anything changes. Only the changed keys are added to the config file.
   */
  async update(changes: Partial<SupportAgentSettings>): Promise<void> {
    await this.apply(
      validateSettings({ ...this.settings, ...changes }),
      Object.keys(changes)
    );
  }

  /**
   * Set one setting from its string form, as typed on the command line
   */
  async set(key: string, raw: string): Promise<void> {
    if (!isSettingKey(key)) {
      throw new ConfigError(`Unknown setting: ${key}`);
    }
    await this.apply(
      validateSettings({
        ...this.settings,
        [key]: coerceSettingValue(key, raw),
      }),
      [key]
    );
  }

  async save(): Promise<void> {
    if (!this.configPath) {
      return;
    }
    await writeFileAtomic(
      this.configPath,
      JSON.stringify(this.fileSettings, null, 2)
    );
  }

  private async apply(
    next: SupportAgentSettings,
    keys: string[]
  ): Promise<void> {
    const previous = this.settings;
    this.settings = next;

    let changed = false;
    for (const key of keys) {
      if (!isSettingKey(key) || sameValue(previous[key], next[key])) {
        continue;
      }
      changed = true;
      this.fileSettings[key] = next[key];
      this.notifyListeners(key, next[key], previous[key]);
    }

    if (!changed) {
      return;
    }

    await this.save();
  }

  /**
   * Subscribe to changes for a specific setting key
   */
  subscribe<K extends keyof SupportAgentSettings>(
    key: K,
    listener: ConfigChangeListener
  ): () => void {
    const keyStr = String(key);
    let listeners = this.changeListeners.get(keyStr);
    if (!listeners) {
      listeners = new Set();
      this.changeListeners.set(keyStr, listeners);
    }
    listeners.add(listener);

    return () => {
      const current = this.changeListeners.get(keyStr);
      if (current) {
        current.delete(listener);
        if (current.size === 0) {
          this.changeListeners.delete(keyStr);
        }
      }
    };
  }

  private notifyListeners<K extends keyof SupportAgentSettings>(
    key: K,
    value: SupportAgentSettings[K],
    oldValue: SupportAgentSettings[K]
  ): void {
    const listeners = this.changeListeners.get(String(key));
    if (listeners) {
      listeners.forEach(listener => {
        try {
          listener(key, value, oldValue);
        } catch (error) {
          this.logger.error(
            `Error in config listener for ${String(key)}: ${errorMessage(error)}`
          );
        }
      });
    }
  }
}

async function readConfigFile(
  configPath: string
): Promise<Record<string, unknown>> {
  let raw: string;
  try {
    raw = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      return {};
    }
    throw new ConfigError(
      `Cannot read config file ${configPath}: ${errorMessage(error)}`
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(
      `Config file ${configPath} is not valid JSON: ${errorMessage(error)}`
    );
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`Config file ${configPath} must hold a JSON object`);
  }
  return Object.fromEntries(Object.entries(parsed));
}
