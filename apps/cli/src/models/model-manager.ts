// Ollama model management - availability check, download confirmation and pull

import type { GeneratorStage, LocalModel, ModelAvailability, ModelInfo } from '@casegen/shared';
import { RegistryError } from '../errors.js';
import type { LineWriter, Logger } from '../log.js';
import type { OllamaClient } from '../llm/client.js';
import { canonicalModelName } from '../llm/registry.js';
import { ProgressLine, formatPullProgress, formatSize } from './progress.js';

const RULE = '='.repeat(60);

export interface ModelManagerDeps {
  client: Pick<OllamaClient, 'listModels' | 'pull'>;
  lookupModelInfo: (model: string) => Promise<ModelInfo>;
  confirm: (question: string) => Promise<boolean>;
  write: LineWriter;
  log: Logger;
  onStage?: (stage: GeneratorStage) => void;
}

// Exact match once both sides carry a tag: `codellama` is listed as `codellama:latest`
export function isListed(models: LocalModel[], model: string): boolean {
  const wanted = canonicalModelName(model);
  return models.some(
    (entry) =>
      canonicalModelName(entry.name) === wanted ||
      (entry.model !== undefined && canonicalModelName(entry.model) === wanted)
  );
}

/**
 * Check whether a model is present on the server
 */
export async function isModelAvailable(
  client: Pick<OllamaClient, 'listModels'>,
  model: string
): Promise<boolean> {
  const models = await client.listModels();
  return isListed(models, model);
}

/**
 * Block shown before asking to download a missing model
 */
export function formatDownloadNotice(model: string, info: ModelInfo | null, lookupFailure: string | null): string {
  const lines = [
    '',
    RULE,
    `Model '${model}' is not available locally.`,
    RULE,
  ];

  if (info) {
    lines.push(
      'Model Information:',
      `  • Size: ${formatSize(info.size)}`,
      `  • Parameters: ${info.parameterSize}`,
      `  • Family: ${info.family}`
    );
  } else {
    lines.push(
      `Model Information: unavailable (${lookupFailure ?? 'unknown error'})`,
      '  • Will be downloaded from the Ollama registry'
    );
  }

  lines.push(
    '',
    'This will download the model to your local Ollama installation.',
    'Download time depends on your internet connection and model size.',
    ''
  );
  return lines.join('\n');
}

export function isAffirmative(answer: string | null): boolean {
  if (answer === null) {
    return false;
  }
  const normalized = answer.trim().toLowerCase();
  return normalized === 'y' || normalized === 'yes';
}

/**
 * Pull a model, rendering server status events on a single updating line
 */
export async function pullWithProgress(
  model: string,
  deps: Pick<ModelManagerDeps, 'client' | 'write' | 'log'>
): Promise<void> {
  deps.log.info(`Pulling model '${model}'... This may take a few minutes.`);
  const line = new ProgressLine(deps.write);
  try {
    await deps.client.pull(model, (event) => line.update(formatPullProgress(event)));
  } finally {
    line.finish();
  }
  deps.log.info(`Successfully pulled model '${model}'.`);
}

/**
 * Ensure the model is present, offering to pull it when it is not
 */
export async function ensureModelAvailable(model: string, deps: ModelManagerDeps): Promise<ModelAvailability> {
  const stage = (next: GeneratorStage): void => deps.onStage?.(next);

  stage('checking');
  if (await isModelAvailable(deps.client, model)) {
    deps.log.info(`Model '${model}' is available locally.`);
    stage('present');
    return { status: 'present' };
  }

  stage('confirming');
  deps.log.info(`Checking model information for '${model}'...`);
  let info: ModelInfo | null = null;
  let lookupFailure: string | null = null;
  try {
    info = await deps.lookupModelInfo(model);
  } catch (err) {
    if (!(err instanceof RegistryError)) {
      throw err;
    }
    deps.log.warn(err.message);
    lookupFailure = err.message;
  }

  deps.write(formatDownloadNotice(model, info, lookupFailure));

  if (!(await deps.confirm(`Do you want to download '${model}'? (y/n): `))) {
    deps.log.info('Model download cancelled by user.');
    stage('declined');
    return { status: 'declined' };
  }

  stage('downloading');
  try {
    await pullWithProgress(model, deps);
  } catch (err) {
    stage('failed');
    throw err;
  }

  stage('pulled');
  return { status: 'pulled' };
}
