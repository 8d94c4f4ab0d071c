// Generator runner - argument parsing through rendering, returns the exit code

import type { GenerationRequest, GeneratorStage } from '@casegen/shared';
import { loadEnvConfig } from '../config.js';
import { CaseGenError } from '../errors.js';
import { generateTestCases } from '../generator/generate.js';
import { renderResult } from '../generator/render.js';
import { OllamaClient, type FetchLike } from '../llm/client.js';
import { fetchRemoteModelInfo } from '../llm/registry.js';
import { createLogger } from '../log.js';
import { ensureModelAvailable, isAffirmative } from '../models/model-manager.js';
import type { CliIO } from './io.js';
import { buildProgram, parseArguments, type GeneratorVariant } from './program.js';

export interface RunDeps {
  io: CliIO;
  env?: NodeJS.ProcessEnv;
  fetch?: FetchLike;
  onStage?: (stage: GeneratorStage) => void;
}

export function reportError(err: unknown, io: CliIO): number {
  if (err instanceof CaseGenError) {
    io.stderr(`Error: ${err.message}\n`);
    for (const hint of err.hints) {
      io.stderr(`${hint}\n`);
    }
    return err.exitCode;
  }

  io.stderr(`Unexpected error: ${err instanceof Error ? err.message : String(err)}\n`);
  return 1;
}

export async function runGenerator(variant: GeneratorVariant, argv: string[], deps: RunDeps): Promise<number> {
  const { io } = deps;
  const stage = (next: GeneratorStage): void => deps.onStage?.(next);
  const log = createLogger('Generator', io.stderr);

  try {
    const env = loadEnvConfig(deps.env ?? process.env);
    const parsed = parseArguments(buildProgram(variant, env, io), argv);
    if (parsed.kind === 'exit') {
      return parsed.exitCode;
    }

    const request: GenerationRequest = {
      feature: parsed.options.feature,
      model: parsed.options.model,
      format: parsed.options.format,
    };
    const client = new OllamaClient({
      baseUrl: parsed.options.baseUrl,
      generateTimeoutMs: env.generateTimeoutMs,
      listTimeoutMs: env.listTimeoutMs,
      pullIdleTimeoutMs: env.pullIdleTimeoutMs,
      fetch: deps.fetch,
    });

    stage('idle');
    log.info(`Generating test cases for: ${request.feature}`);
    log.info(`Using model: ${request.model}`);
    log.info(`Output format: ${request.format}`);

    if (variant === 'managed') {
      const availability = await ensureModelAvailable(request.model, {
        client,
        lookupModelInfo: (model) =>
          fetchRemoteModelInfo(model, {
            registryUrl: env.registryUrl,
            timeoutMs: env.listTimeoutMs,
            fetch: deps.fetch,
            log: createLogger('Registry', io.stderr),
          }),
        confirm: async (question) => isAffirmative(await io.prompt(question)),
        write: io.stderr,
        log: createLogger('ModelManager', io.stderr),
        onStage: deps.onStage,
      });

      if (availability.status === 'declined') {
        return 0;
      }
    }

    stage('generating');
    log.info('Calling Ollama API...');
    const result = await generateTestCases(client, request);
    if (result.source === 'lines') {
      log.warn('Response was not a JSON list; using one test case per line.');
    }
    if (result.testCases.length === 0) {
      log.warn('The model returned an empty list of test cases.');
    }

    io.stdout(renderResult(result, request.format));
    stage('rendered');
    return 0;
  } catch (err) {
    return reportError(err, io);
  }
}
