// Prompt builder for test case generation

const TEST_CASE_PROMPT =
  'You are a QA automation expert. Given the following feature description, ' +
  'write a list of high-level test cases in JSON format. ' +
  "The JSON should have a single key called 'test_cases' whose value is an array of strings. " +
  'The test cases should cover functional and edge cases. Feature: {feature}.';

export function buildTestCasePrompt(feature: string): string {
  return TEST_CASE_PROMPT.replace('{feature}', () => feature.trim());
}
