// Generation pipeline - prompt, one generate call, interpretation
import type { GenerationRequest, GenerationResult } from '@casegen/shared';
import type { OllamaClient } from '../llm/client.js';
import { buildTestCasePrompt } from '../llm/prompts.js';
import { interpretModelOutput } from './interpret.js';

export async function generateTestCases(
  client: Pick<OllamaClient, 'generate'>,
  request: GenerationRequest
): Promise<GenerationResult> {
  const prompt = buildTestCasePrompt(request.feature);
  const raw = await client.generate(request.model, prompt);
  return interpretModelOutput(raw);
}
