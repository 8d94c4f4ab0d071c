// LLM module exports

export { OllamaClient, type OllamaClientOptions, type FetchLike } from './client.js';
export { buildTestCasePrompt } from './prompts.js';
export {
  canonicalModelName,
  fetchRemoteModelInfo,
  isModelReference,
  parseModelReference,
  type ModelReference,
  type RegistryOptions,
} from './registry.js';
export { formatValidationErrors } from './schema.js';
