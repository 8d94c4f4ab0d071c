// Command-line definition for both generator scripts
import { Command, CommanderError, Option } from 'commander';
import { OUTPUT_FORMATS } from '@casegen/shared';
import { CliOptionsSchema, type CliOptions, type EnvConfig } from '../config.js';
import { UsageError } from '../errors.js';
import { formatValidationErrors } from '../llm/schema.js';
import type { CliIO } from './io.js';

export type GeneratorVariant = 'basic' | 'managed';

interface ProgramSpec {
  name: string;
  description: string;
  examples: string[];
}

export const PROGRAMS: Record<GeneratorVariant, ProgramSpec> = {
  basic: {
    name: 'generate-test-cases',
    description: 'Generate test cases from feature descriptions using Ollama',
    examples: [
      'generate-test-cases "User login with email and password"',
      'generate-test-cases "Shopping cart add/remove items" --format text',
      'generate-test-cases "File upload with PDF validation" --model codellama',
      'generate-test-cases "Payment processing" --base-url http://localhost:11434',
    ],
  },
  managed: {
    name: 'generate-test-cases-with-model-manager',
    description:
      'Generate test cases from feature descriptions using Ollama, ' +
      'offering to download the model first when it is missing',
    examples: [
      'generate-test-cases-with-model-manager "User login with email and password"',
      'generate-test-cases-with-model-manager "File upload with PDF validation" --model llama3:latest',
      'generate-test-cases-with-model-manager "User registration" --model codellama --format json',
    ],
  },
};

type RawOptions = {
  model: string;
  baseUrl: string;
  format: string;
};

export type ParseOutcome = { kind: 'options'; options: CliOptions } | { kind: 'exit'; exitCode: number };

export function buildProgram(variant: GeneratorVariant, env: EnvConfig, io: CliIO): Command {
  const spec = PROGRAMS[variant];
  const examples = spec.examples.map((example) => `  $ ${example}`).join('\n');

  return new Command(spec.name)
    .description(spec.description)
    .argument('<feature>', 'the feature description to generate test cases for')
    .option('--model <name>', 'the Ollama model to use', env.defaultModel)
    .option('--base-url <url>', 'the base URL for the Ollama API', env.defaultBaseUrl)
    .addOption(
      new Option('--format <format>', 'output format for test cases').choices(OUTPUT_FORMATS).default('json')
    )
    .addHelpText('after', `\nExamples:\n${examples}\n`)
    .allowExcessArguments(false)
    .configureOutput({
      writeOut: io.stdout,
      writeErr: io.stderr,
    })
    .exitOverride();
}

/**
 * Parse argv (without the node and script entries). Help exits 0, commander
 * usage errors exit 2 after commander has printed its message, and the
 * resolved options go through schema validation.
 */
export function parseArguments(program: Command, argv: string[]): ParseOutcome {
  try {
    program.parse(argv, { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) {
      return { kind: 'exit', exitCode: err.exitCode === 0 ? 0 : 2 };
    }
    throw err;
  }

  const raw = program.opts<RawOptions>();
  const result = CliOptionsSchema.safeParse({
    feature: program.args[0],
    model: raw.model,
    baseUrl: raw.baseUrl,
    format: raw.format,
  });

  if (!result.success) {
    throw new UsageError(formatValidationErrors(result.error));
  }
  return { kind: 'options', options: result.data };
}
