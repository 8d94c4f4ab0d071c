import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import { canonicalModelName, fetchRemoteModelInfo, isModelReference, parseModelReference } from '../../src/llm/registry.js';
import { RegistryError, UsageError } from '../../src/errors.js';
import { startFakeOllama, type FakeOllama } from '../mocks/fake-ollama.js';

const MANIFEST = {
  schemaVersion: 2,
  mediaType: 'application/vnd.docker.distribution.manifest.v2+json',
  config: { mediaType: 'application/vnd.docker.container.image.v1+json', digest: 'sha256:cfg', size: 500 },
  layers: [
    { mediaType: 'application/vnd.ollama.image.model', digest: 'sha256:weights', size: 1000 },
    { mediaType: 'application/vnd.ollama.image.license', digest: 'sha256:license', size: 2000 },
  ],
};

function silentLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('parseModelReference', () => {
  it('should default namespace and tag', () => {
    expect(parseModelReference('codellama')).toEqual({
      host: null,
      namespace: 'library',
      name: 'codellama',
      tag: 'latest',
    });
  });

  it('should read an explicit tag', () => {
    expect(parseModelReference('llama3:8b').tag).toBe('8b');
  });

  it('should read a user namespace', () => {
    expect(parseModelReference('someone/model:v1')).toEqual({
      host: null,
      namespace: 'someone',
      name: 'model',
      tag: 'v1',
    });
  });

  it('should keep a port on the host', () => {
    expect(parseModelReference('localhost:5000/team/model')).toEqual({
      host: 'localhost:5000',
      namespace: 'team',
      name: 'model',
      tag: 'latest',
    });
  });

  it('should treat an empty tag as latest', () => {
    expect(parseModelReference('model:').tag).toBe('latest');
  });

  it('should reject an empty name', () => {
    expect(() => parseModelReference('  ')).toThrow(UsageError);
  });
});

describe('isModelReference', () => {
  it('should need a name part', () => {
    expect(isModelReference('codellama')).toBe(true);
    expect(isModelReference('someone/model:v1')).toBe(true);
    expect(isModelReference(':7b')).toBe(false);
    expect(isModelReference('/')).toBe(false);
  });
});

describe('canonicalModelName', () => {
  it('should add the implicit latest tag', () => {
    expect(canonicalModelName('codellama')).toBe('codellama:latest');
    expect(canonicalModelName('localhost:5000/m')).toBe('localhost:5000/m:latest');
  });

  it('should keep an explicit tag', () => {
    expect(canonicalModelName('llama3:8b')).toBe('llama3:8b');
  });
});

describe('fetchRemoteModelInfo', () => {
  describe('with manifest and config blob', () => {
    let fake: FakeOllama;

    beforeAll(async () => {
      fake = await startFakeOllama({
        manifest: MANIFEST,
        configBlob: { model_format: 'gguf', model_family: 'llama', model_type: '7B', file_type: 'Q4_0' },
      });
    });

    afterAll(async () => {
      await fake.close();
    });

    it('should sum the blob sizes and read family and parameters', async () => {
      const info = await fetchRemoteModelInfo('codellama', { registryUrl: fake.baseUrl });
      expect(info).toEqual({ name: 'codellama', size: 3500, parameterSize: '7B', family: 'llama' });
    });

    it('should request the manifest and config blob paths', async () => {
      await fetchRemoteModelInfo('someone/model:v1', { registryUrl: fake.baseUrl });
      const urls = fake.requests.map((entry) => entry.url);
      expect(urls).toContain('/v2/someone/model/manifests/v1');
      expect(urls).toContain('/v2/someone/model/blobs/sha256:cfg');
    });
  });

  describe('with a manifest only', () => {
    let fake: FakeOllama;

    beforeAll(async () => {
      fake = await startFakeOllama({ manifest: MANIFEST, configBlob: null });
    });

    afterAll(async () => {
      await fake.close();
    });

    it('should keep the size and mark details unknown', async () => {
      const log = silentLogger();
      const info = await fetchRemoteModelInfo('codellama', { registryUrl: fake.baseUrl, log });
      expect(info).toEqual({ name: 'codellama', size: 3500, parameterSize: 'Unknown', family: 'Unknown' });
      expect(log.warn).toHaveBeenCalledTimes(1);
    });
  });

  describe('with model_families only', () => {
    let fake: FakeOllama;

    beforeAll(async () => {
      fake = await startFakeOllama({ manifest: MANIFEST, configBlob: { model_families: ['qwen2'] } });
    });

    afterAll(async () => {
      await fake.close();
    });

    it('should use the first listed family', async () => {
      const info = await fetchRemoteModelInfo('qwen2', { registryUrl: fake.baseUrl });
      expect(info.family).toBe('qwen2');
      expect(info.parameterSize).toBe('Unknown');
    });
  });

  describe('without a manifest', () => {
    let fake: FakeOllama;

    beforeAll(async () => {
      fake = await startFakeOllama({ manifest: null });
    });

    afterAll(async () => {
      await fake.close();
    });

    it('should reject with RegistryError', async () => {
      await expect(fetchRemoteModelInfo('missing', { registryUrl: fake.baseUrl })).rejects.toBeInstanceOf(
        RegistryError
      );
      await expect(fetchRemoteModelInfo('missing', { registryUrl: fake.baseUrl })).rejects.toThrow(
        `Registry lookup failed for ${fake.baseUrl}/v2/library/missing/manifests/latest: HTTP 404`
      );
    });

    it('should reject a name without a model part before any request', async () => {
      const before = fake.requests.length;
      await expect(fetchRemoteModelInfo(':7b', { registryUrl: fake.baseUrl })).rejects.toThrow(
        `Registry lookup failed for ${fake.baseUrl}: ':7b' does not name a model`
      );
      expect(fake.requests).toHaveLength(before);
    });
  });
});
