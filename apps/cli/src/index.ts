// Public surface of @casegen/cli

export * from './llm/index.js';
export { runGenerator, reportError, type RunDeps } from './cli/run.js';
export { buildProgram, parseArguments, PROGRAMS, type GeneratorVariant, type ParseOutcome } from './cli/program.js';
export { askQuestion, createProcessIO, installInterruptHandler, type CliIO } from './cli/io.js';
export { loadEnvConfig, CliOptionsSchema, DEFAULT_BASE_URL, DEFAULT_MODEL, DEFAULT_REGISTRY_URL } from './config.js';
export type { CliOptions, EnvConfig } from './config.js';
export {
  CaseGenError,
  ConnectionError,
  DownloadError,
  RegistryError,
  ResponseParseError,
  UsageError,
} from './errors.js';
export { generateTestCases } from './generator/generate.js';
export { interpretModelOutput, splitLines } from './generator/interpret.js';
export { renderResult } from './generator/render.js';
export { ensureModelAvailable, isModelAvailable, pullWithProgress } from './models/model-manager.js';
export { formatPullProgress, formatSize, ProgressLine } from './models/progress.js';
export { createLogger, type Logger } from './log.js';
