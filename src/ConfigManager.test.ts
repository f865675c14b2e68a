import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import { DEFAULT_SETTINGS, resolveChunkStorePath } from './config';
import {
  ConfigManager,
  coerceSettingValue,
  readEnvOverrides,
} from './ConfigManager';
import { ConfigError } from './errors';
import { createTempDir, removeTempDir } from './test-helpers/tmp-dir';

let dir: string;
let configPath: string;

beforeEach(async () => {
  dir = await createTempDir();
  configPath = path.join(dir, '.support-agent.json');
});

afterEach(async () => {
  await removeTempDir(dir);
});

describe('ConfigManager.load', () => {
  it('uses the defaults when there is no file and no environment', async () => {
    const config = await ConfigManager.load({ configPath, env: {} });
    expect(config.getAll()).toEqual(DEFAULT_SETTINGS);
  });

  it('layers the environment over the file over the defaults', async () => {
    await fs.writeFile(
      configPath,
      JSON.stringify({ topK: 5, chunkSize: 256, unknownKey: true })
    );
    const config = await ConfigManager.load({
      configPath,
      env: { SSA_TOP_K: '7', SSA_ALLOWED_DOMAINS: 'help.example.com, docs.example.com' },
    });

    expect(config.get('topK')).toBe(7);
    expect(config.get('chunkSize')).toBe(256);
    expect(config.get('allowedDomains')).toEqual([
      'help.example.com',
      'docs.example.com',
    ]);
    expect(config.getAll()).not.toHaveProperty('unknownKey');
  });

  it('rejects a file that is not JSON', async () => {
    await fs.writeFile(configPath, '{ topK: 5');
    await expect(
      ConfigManager.load({ configPath, env: {} })
    ).rejects.toBeInstanceOf(ConfigError);
  });

  it('rejects a file that holds an array', async () => {
    await fs.writeFile(configPath, '[]');
    await expect(ConfigManager.load({ configPath, env: {} })).rejects.toThrow(
      `Config file ${configPath} must hold a JSON object`
    );
  });

  it('rejects environment values of the wrong type', async () => {
    await expect(
      ConfigManager.load({ configPath, env: { SSA_TOP_K: 'lots' } })
    ).rejects.toBeInstanceOf(ConfigError);
  });
});

describe('validation', () => {
  it('requires the overlap to be smaller than the chunk size', () => {
    expect(() =>
      ConfigManager.fromSettings({ chunkSize: 10, chunkOverlap: 10 })
    ).toThrow(
      'Invalid configuration: chunkOverlap: chunkOverlap must be smaller than chunkSize'
    );
  });

  it('lists every failing setting', () => {
    try {
      ConfigManager.fromSettings({ topK: 0, embeddingDim: -1 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.issues.map(issue => issue.split(':')[0])).toEqual([
          'embeddingDim',
          'topK',
        ]);
      }
    }
  });
});

describe('ConfigManager.update', () => {
  it('saves the change and notifies listeners', async () => {
    const config = await ConfigManager.load({ configPath, env: {} });
    const listener = vi.fn();
    config.subscribe('topK', listener);

    await config.update({ topK: 8 });

    expect(config.get('topK')).toBe(8);
    expect(listener).toHaveBeenCalledWith('topK', 8, 3);
    const saved = JSON.parse(await fs.readFile(configPath, 'utf-8'));
    expect(saved.topK).toBe(8);
  });

  it('writes back only what the file held plus the change', async () => {
    await fs.writeFile(configPath, JSON.stringify({ chunkSize: 100 }));
    const config = await ConfigManager.load({
      configPath,
      env: { SSA_TOP_K: '7', SSA_ALLOWED_DOMAINS: 'help.example.com' },
    });

    await config.update({ llmModel: 'mistral' });

    expect(config.get('topK')).toBe(7);
    const saved = JSON.parse(await fs.readFile(configPath, 'utf-8'));
    expect(saved).toEqual({ chunkSize: 100, llmModel: 'mistral' });
  });

  it('treats an equal list as unchanged', async () => {
    const config = await ConfigManager.load({
      configPath,
      env: { SSA_ALLOWED_DOMAINS: 'help.example.com' },
    });
    const listener = vi.fn();
    config.subscribe('allowedDomains', listener);

    await config.update({ allowedDomains: ['help.example.com'] });

    expect(listener).not.toHaveBeenCalled();
    await expect(fs.readFile(configPath, 'utf-8')).rejects.toMatchObject({
      code: 'ENOENT',
    });
  });

  it('leaves the settings untouched when the result is invalid', async () => {
    const config = await ConfigManager.load({ configPath, env: {} });

    await expect(config.update({ chunkOverlap: 1000 })).rejects.toBeInstanceOf(
      ConfigError
    );
    expect(config.get('chunkOverlap')).toBe(50);
  });

  it('stops notifying after unsubscribe', async () => {
    const config = ConfigManager.fromSettings();
    const listener = vi.fn();
    const unsubscribe = config.subscribe('logLevel', listener);
    unsubscribe();

    await config.update({ logLevel: 'verbose' });

    expect(listener).not.toHaveBeenCalled();
  });
});

describe('ConfigManager.set', () => {
  it('coerces the raw value and saves only that key', async () => {
    const config = await ConfigManager.load({
      configPath,
      env: { SSA_LLM_MODEL: 'mistral' },
    });

    await config.set('allowedDomains', 'a.test, b.test');

    expect(config.get('allowedDomains')).toEqual(['a.test', 'b.test']);
    const saved = JSON.parse(await fs.readFile(configPath, 'utf-8'));
    expect(saved).toEqual({ allowedDomains: ['a.test', 'b.test'] });
  });

  it('rejects unknown keys', async () => {
    const config = await ConfigManager.load({ configPath, env: {} });

    await expect(config.set('colour', 'blue')).rejects.toThrow(
      'Unknown setting: colour'
    );
  });

  it('rejects values of the wrong type', async () => {
    const config = await ConfigManager.load({ configPath, env: {} });

    await expect(config.set('topK', 'many')).rejects.toBeInstanceOf(
      ConfigError
    );
    expect(config.get('topK')).toBe(3);
  });
});

describe('helpers', () => {
  it('coerces raw strings to the setting type', () => {
    expect(coerceSettingValue('maxPages', '25')).toBe(25);
    expect(coerceSettingValue('maxPages', '')).toBe('');
    expect(coerceSettingValue('allowedDomains', 'a.com,,b.com')).toEqual([
      'a.com',
      'b.com',
    ]);
    expect(coerceSettingValue('llmModel', 'mistral')).toBe('mistral');
  });

  it('reads only SSA_ variables it knows', () => {
    expect(
      readEnvOverrides({ SSA_CHUNK_SIZE: '128', SSA_UNKNOWN: 'x', HOME: '/root' })
    ).toEqual({ chunkSize: 128 });
  });

  it('derives the chunk store path from the index path', () => {
    expect(resolveChunkStorePath(DEFAULT_SETTINGS)).toBe(
      './data/vector-index.bin.chunks.json'
    );
    expect(
      resolveChunkStorePath({ ...DEFAULT_SETTINGS, chunkStorePath: 'x.json' })
    ).toBe('x.json');
  });
});
