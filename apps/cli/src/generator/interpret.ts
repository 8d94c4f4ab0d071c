// Interpret the model's raw text as a list of test cases
import type { GenerationResult } from '@casegen/shared';
import { ResponseParseError } from '../errors.js';

const TEST_CASES_KEY = 'test_cases';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Structured items read as their values so that no JSON punctuation reaches the output
function toCaseText(item: unknown): string {
  if (typeof item === 'string') {
    return item;
  }
  if (Array.isArray(item)) {
    return joinParts(item, ', ');
  }
  if (isRecord(item)) {
    return joinParts(Object.values(item), ' - ');
  }
  return item === null || item === undefined ? '' : String(item);
}

function joinParts(items: unknown[], separator: string): string {
  return items
    .map(toCaseText)
    .filter((part) => part.length > 0)
    .join(separator);
}

// Locate the test case array in parsed JSON, or null when there is none
function findCaseArray(value: unknown): unknown[] | null {
  if (Array.isArray(value)) {
    return value;
  }
  if (!isRecord(value)) {
    return null;
  }

  const direct = value[TEST_CASES_KEY];
  if (Array.isArray(direct)) {
    return direct;
  }

  for (const candidate of Object.values(value)) {
    if (Array.isArray(candidate)) {
      return candidate;
    }
  }
  return null;
}

function tryParseJson(raw: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(raw.trim()) };
  } catch {
    return { ok: false };
  }
}

export function splitLines(raw: string): string[] {
  return raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * JSON first (an array, or an object holding one, preferring `test_cases`),
 * then one test case per non-blank line. Throws ResponseParseError only when
 * both paths come up empty.
 */
export function interpretModelOutput(raw: string): GenerationResult {
  const parsed = tryParseJson(raw);
  if (parsed.ok) {
    const cases = findCaseArray(parsed.value);
    if (cases) {
      return { testCases: cases.map(toCaseText), source: 'json' };
    }
  }

  const lines = splitLines(raw);
  if (lines.length === 0) {
    throw new ResponseParseError('The model returned no test cases');
  }
  return { testCases: lines, source: 'lines' };
}
