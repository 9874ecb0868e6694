/**
 * ModelConfigLoader Tests
 */

import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { ModelConfigLoader } from '../model-config.loader';
import { getDefaultConfigDir } from '../default-configs';
import { RemotePathResolver } from '../../remote';
import { ConfigNotFoundError, ConfigParseError, RemoteFetchError } from '../../errors';
import { InMemoryObjectStore } from '../../__tests__/fakes';

const GPT_4O = [
  'name: GPT-4o',
  'provider: openai',
  'model_id: gpt-4o',
  'max_tokens: 4096',
  'temperature: 0.7',
].join('\n');

function remotePaths(modelsConfigPath?: string): RemotePathResolver {
  return new RemotePathResolver(
    {
      providerPathParameter: '/LLM_CONFIG/PROVIDER_MODULES_S3_PATH',
      modelsPathParameter: '/LLM_CONFIG/MODELS_CONFIG_S3_PATH',
      modelsConfigPath,
    },
    null,
  );
}

describe('ModelConfigLoader', () => {
  let localDir: string;

  beforeEach(async () => {
    localDir = await mkdtemp(path.join(tmpdir(), 'model-config-'));
  });

  afterEach(async () => {
    await rm(localDir, { recursive: true, force: true });
  });

  describe('load()', () => {
    it('should read a descriptor from a local directory', async () => {
      await writeFile(path.join(localDir, 'gpt_4o.yaml'), GPT_4O);
      const loader = new ModelConfigLoader();

      const config = await loader.load('gpt_4o', localDir);

      expect(config.name).toBe('GPT-4o');
      expect(config.modelId).toBe('gpt-4o');
      expect(config.maxTokens).toBe(4096);
    });

    it('should default to the built-in directory', async () => {
      const loader = new ModelConfigLoader();

      const config = await loader.load('gpt_4o');

      expect(loader.defaultConfigDir).toBe(getDefaultConfigDir());
      expect(config.provider).toBe('openai');
      expect(config.modelId).toBe('gpt-4o');
    });

    it('should read a descriptor from an s3:// directory', async () => {
      const store = new InMemoryObjectStore({ 's3://test-bucket/models/gpt_4o.yaml': GPT_4O });
      const loader = new ModelConfigLoader({ objectStore: store });

      const config = await loader.load('gpt_4o', 's3://test-bucket/models');

      expect(config.modelId).toBe('gpt-4o');
      expect(store.reads).toEqual(['s3://test-bucket/models/gpt_4o.yaml']);
    });

    it('should prefer the configured remote directory over the local one', async () => {
      await writeFile(path.join(localDir, 'gpt_4o.yaml'), GPT_4O);
      const store = new InMemoryObjectStore({
        's3://test-bucket/models/gpt_4o.yaml': GPT_4O.replace('max_tokens: 4096', 'max_tokens: 2048'),
      });
      const loader = new ModelConfigLoader({
        objectStore: store,
        remotePaths: remotePaths('s3://test-bucket/models'),
      });

      const config = await loader.load('gpt_4o', localDir);

      expect(config.maxTokens).toBe(2048);
    });

    it('should fall back to the local directory when the remote one lacks the descriptor', async () => {
      await writeFile(path.join(localDir, 'gpt_4o.yaml'), GPT_4O);
      const store = new InMemoryObjectStore();
      const loader = new ModelConfigLoader({
        objectStore: store,
        remotePaths: remotePaths('s3://test-bucket/models'),
      });

      const config = await loader.load('gpt_4o', localDir);

      expect(config.maxTokens).toBe(4096);
      expect(store.reads).toEqual(['s3://test-bucket/models/gpt_4o.yaml']);
    });

    it('should raise ConfigNotFoundError listing every searched source', async () => {
      const loader = new ModelConfigLoader({
        objectStore: new InMemoryObjectStore(),
        remotePaths: remotePaths('s3://test-bucket/models'),
      });

      const attempt = loader.load('nonexistent_model', localDir);

      await expect(attempt).rejects.toBeInstanceOf(ConfigNotFoundError);
      await expect(attempt).rejects.toThrow(
        `Config for 'nonexistent_model' not found in s3://test-bucket/models, ${localDir}`,
      );
    });

    it('should raise ConfigNotFoundError for a missing directory', async () => {
      const loader = new ModelConfigLoader();

      await expect(loader.load('gpt_4o', path.join(localDir, 'missing'))).rejects.toBeInstanceOf(ConfigNotFoundError);
    });

    it('should reject names that are not file stems', async () => {
      const loader = new ModelConfigLoader();

      await expect(loader.load('', localDir)).rejects.toBeInstanceOf(ConfigNotFoundError);
      await expect(loader.load('../secrets', localDir)).rejects.toBeInstanceOf(ConfigNotFoundError);
    });

    it('should raise ConfigParseError for an invalid descriptor', async () => {
      await writeFile(path.join(localDir, 'broken.yaml'), 'name: Broken\nprovider: openai\n');
      const loader = new ModelConfigLoader();

      await expect(loader.load('broken', localDir)).rejects.toBeInstanceOf(ConfigParseError);
    });

    it('should propagate remote fetch failures instead of falling back', async () => {
      await writeFile(path.join(localDir, 'gpt_4o.yaml'), GPT_4O);
      const store = new InMemoryObjectStore();
      jest.spyOn(store, 'readText').mockRejectedValue(
        new RemoteFetchError('s3://test-bucket/models/gpt_4o.yaml', 'unreachable'),
      );
      const loader = new ModelConfigLoader({
        objectStore: store,
        remotePaths: remotePaths('s3://test-bucket/models'),
      });

      await expect(loader.load('gpt_4o', localDir)).rejects.toBeInstanceOf(RemoteFetchError);
    });

    it('should raise RemoteFetchError for an s3:// source without an object store', async () => {
      const loader = new ModelConfigLoader();

      const attempt = loader.load('gpt_4o', 's3://test-bucket/models');

      await expect(attempt).rejects.toBeInstanceOf(RemoteFetchError);
      await expect(attempt).rejects.toThrow(
        'Cannot read s3://test-bucket/models/gpt_4o.yaml: no object store configured for s3:// sources',
      );
    });
  });

  describe('listModels()', () => {
    it('should merge local and remote descriptor names', async () => {
      await writeFile(path.join(localDir, 'gpt_4o.yaml'), GPT_4O);
      await writeFile(path.join(localDir, 'notes.txt'), 'ignored');
      const store = new InMemoryObjectStore({
        's3://test-bucket/models/gpt_4o.yaml': GPT_4O,
        's3://test-bucket/models/acme_large.yaml': 'name: Acme',
      });
      const loader = new ModelConfigLoader({
        objectStore: store,
        remotePaths: remotePaths('s3://test-bucket/models'),
      });

      await expect(loader.listModels(localDir)).resolves.toEqual(['acme_large', 'gpt_4o']);
    });

    it('should return no names for a missing local directory', async () => {
      const loader = new ModelConfigLoader();

      await expect(loader.listModels(path.join(localDir, 'missing'))).resolves.toEqual([]);
    });

    it('should list the built-in descriptors by default', async () => {
      const loader = new ModelConfigLoader();

      const names = await loader.listModels();

      expect(names).toEqual([
        'claude_sonnet_3_7',
        'claude_sonnet_4',
        'deepseek_chat',
        'gemini_2_flash',
        'gpt_4o',
        'llama_3_8b_instruct',
      ]);
    });
  });
});
