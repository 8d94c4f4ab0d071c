// Configuration: defaults, environment overrides and validation

import { z } from 'zod';
import { OUTPUT_FORMATS } from '@casegen/shared';
import { UsageError } from './errors.js';
import { isModelReference } from './llm/registry.js';
import { formatValidationErrors } from './llm/schema.js';

export const DEFAULT_MODEL = 'codellama';
export const DEFAULT_BASE_URL = 'http://localhost:11434';
export const DEFAULT_REGISTRY_URL = 'https://registry.ollama.ai';

const HttpUrlSchema = z
  .string()
  .trim()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), { message: 'must be an http(s) URL' })
  .transform((value) => value.replace(/\/+$/, ''));

const TimeoutSchema = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  CASEGEN_MODEL: z.string().trim().min(1).optional(),
  OLLAMA_BASE_URL: z.string().trim().min(1).optional(),
  OLLAMA_REGISTRY_URL: HttpUrlSchema.default(DEFAULT_REGISTRY_URL),
  CASEGEN_GENERATE_TIMEOUT_MS: TimeoutSchema(30_000),
  CASEGEN_LIST_TIMEOUT_MS: TimeoutSchema(10_000),
  CASEGEN_PULL_IDLE_TIMEOUT_MS: TimeoutSchema(300_000),
});

export interface EnvConfig {
  defaultModel: string;
  defaultBaseUrl: string;
  registryUrl: string;
  generateTimeoutMs: number;
  listTimeoutMs: number;
  pullIdleTimeoutMs: number;
}

// Empty strings count as unset, like `process.env.X || default`
function dropEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') {
      out[key] = value;
    }
  }
  return out;
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = EnvSchema.safeParse(dropEmpty(env));
  if (!result.success) {
    throw new UsageError(`Invalid environment configuration: ${formatValidationErrors(result.error)}`);
  }

  const parsed = result.data;
  return {
    defaultModel: parsed.CASEGEN_MODEL ?? DEFAULT_MODEL,
    defaultBaseUrl: parsed.OLLAMA_BASE_URL ?? DEFAULT_BASE_URL,
    registryUrl: parsed.OLLAMA_REGISTRY_URL,
    generateTimeoutMs: parsed.CASEGEN_GENERATE_TIMEOUT_MS,
    listTimeoutMs: parsed.CASEGEN_LIST_TIMEOUT_MS,
    pullIdleTimeoutMs: parsed.CASEGEN_PULL_IDLE_TIMEOUT_MS,
  };
}

// Options as resolved from the command line, validated before any request
export const CliOptionsSchema = z.object({
  feature: z.string().trim().min(1, { message: 'feature description must not be empty' }),
  model: z
    .string()
    .trim()
    .min(1, { message: 'model must not be empty' })
    .refine(isModelReference, { message: 'model must include a name, e.g. codellama or llama3:8b' }),
  baseUrl: HttpUrlSchema,
  format: z.enum(OUTPUT_FORMATS),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;
