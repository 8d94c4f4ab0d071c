// Remote registry lookups - size, parameter count and family of a model before pulling it
import type { z } from 'zod';
import type { ModelInfo } from '@casegen/shared';
import { RegistryError, UsageError, describeFetchFailure } from '../errors.js';
import type { Logger } from '../log.js';
import type { FetchLike } from './client.js';
import { ManifestSchema, ModelConfigBlobSchema, formatValidationErrors } from './schema.js';

const MANIFEST_MEDIA_TYPE = 'application/vnd.docker.distribution.manifest.v2+json';
const DEFAULT_NAMESPACE = 'library';
const DEFAULT_TAG = 'latest';

export interface ModelReference {
  host: string | null;
  namespace: string;
  name: string;
  tag: string;
}

function splitReference(identifier: string): ModelReference | null {
  const trimmed = identifier.trim();
  const lastSlash = trimmed.lastIndexOf('/');
  const lastColon = trimmed.lastIndexOf(':');

  let path = trimmed;
  let tag = DEFAULT_TAG;
  if (lastColon > lastSlash) {
    path = trimmed.slice(0, lastColon);
    tag = trimmed.slice(lastColon + 1) || DEFAULT_TAG;
  }

  const parts = path.split('/').filter((part) => part.length > 0);
  if (parts.length === 0) {
    return null;
  }

  if (parts.length === 1) {
    return { host: null, namespace: DEFAULT_NAMESPACE, name: parts[0], tag };
  }
  if (parts.length === 2) {
    return { host: null, namespace: parts[0], name: parts[1], tag };
  }
  return { host: parts[0], namespace: parts[1], name: parts.slice(2).join('/'), tag };
}

/**
 * Split `[host/][namespace/]name[:tag]`. A colon only counts as the tag
 * separator when it follows the last slash, so `localhost:5000/ns/m` keeps
 * its port.
 */
export function parseModelReference(identifier: string): ModelReference {
  const ref = splitReference(identifier);
  if (!ref) {
    throw new UsageError(`Invalid model name: '${identifier}'`);
  }
  return ref;
}

// True when the identifier has a model name, not just a tag such as `:7b`
export function isModelReference(identifier: string): boolean {
  return splitReference(identifier) !== null;
}

// `codellama` and `codellama:latest` name the same model
export function canonicalModelName(identifier: string): string {
  const trimmed = identifier.trim();
  return trimmed.lastIndexOf(':') > trimmed.lastIndexOf('/') ? trimmed : `${trimmed}:${DEFAULT_TAG}`;
}

export interface RegistryOptions {
  registryUrl: string;
  timeoutMs?: number;
  fetch?: FetchLike;
  log?: Logger;
}

/**
 * Fetch the manifest (for the total size) and the config blob (for family and
 * parameter size). Throws RegistryError when the manifest is unavailable; a
 * missing config blob only leaves the descriptive fields as 'Unknown'.
 */
export async function fetchRemoteModelInfo(model: string, options: RegistryOptions): Promise<ModelInfo> {
  const ref = splitReference(model);
  if (!ref) {
    throw new RegistryError(options.registryUrl, `'${model}' does not name a model`);
  }
  const base = ref.host ? `https://${ref.host}` : options.registryUrl.replace(/\/+$/, '');
  const repository = `${base}/v2/${ref.namespace}/${ref.name}`;
  const fetchImpl = options.fetch ?? fetch;
  const timeoutMs = options.timeoutMs ?? 10_000;

  const manifest = await getJson(
    fetchImpl,
    `${repository}/manifests/${encodeURIComponent(ref.tag)}`,
    ManifestSchema,
    timeoutMs,
    { Accept: MANIFEST_MEDIA_TYPE }
  );

  const size = manifest.layers.reduce((total, layer) => total + layer.size, manifest.config.size);
  const info: ModelInfo = {
    name: model,
    size,
    parameterSize: 'Unknown',
    family: 'Unknown',
  };

  try {
    const config = await getJson(
      fetchImpl,
      `${repository}/blobs/${manifest.config.digest}`,
      ModelConfigBlobSchema,
      timeoutMs
    );
    info.family = config.model_family ?? config.model_families?.[0] ?? 'Unknown';
    info.parameterSize = config.model_type ?? 'Unknown';
  } catch (err) {
    if (!(err instanceof RegistryError)) {
      throw err;
    }
    options.log?.warn(`Model details unavailable: ${err.message}`);
  }

  return info;
}

async function getJson<S extends z.ZodTypeAny>(
  fetchImpl: FetchLike,
  url: string,
  schema: S,
  timeoutMs: number,
  headers: Record<string, string> = {}
): Promise<z.infer<S>> {
  let response: Response;
  try {
    response = await fetchImpl(url, {
      method: 'GET',
      headers,
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (err) {
    throw new RegistryError(url, describeFetchFailure(err), err);
  }

  if (!response.ok) {
    throw new RegistryError(url, `HTTP ${response.status}`);
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (err) {
    throw new RegistryError(url, 'response is not valid JSON', err);
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new RegistryError(url, formatValidationErrors(parsed.error));
  }
  return parsed.data;
}
