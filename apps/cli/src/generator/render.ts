// Output rendering for --format json|text
import type { GenerationResult, OutputFormat } from '@casegen/shared';

// Keeps each case on one visual line
function flatten(testCase: string): string {
  return testCase.replace(/\s*[\r\n]+\s*/g, ' ').trim();
}

export function renderResult(result: GenerationResult, format: OutputFormat): string {
  if (format === 'json') {
    return `${JSON.stringify({ test_cases: result.testCases }, null, 2)}\n`;
  }

  if (result.testCases.length === 0) {
    return '';
  }
  return result.testCases.map((testCase, index) => `${index + 1}. ${flatten(testCase)}`).join('\n') + '\n';
}
