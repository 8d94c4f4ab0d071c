import type { CliIO } from '../../src/cli/io.js';

export interface TestIO {
  io: CliIO;
  stdout(): string;
  stderr(): string;
  questions: string[];
}

// Answers are handed out in order; once exhausted the prompt sees end of input
export function createTestIO(answers: Array<string | null> = []): TestIO {
  const out: string[] = [];
  const err: string[] = [];
  const questions: string[] = [];
  const pending = [...answers];

  return {
    io: {
      stdout: (text) => {
        out.push(text);
      },
      stderr: (text) => {
        err.push(text);
      },
      prompt: async (question) => {
        questions.push(question);
        return pending.length > 0 ? (pending.shift() ?? null) : null;
      },
    },
    stdout: () => out.join(''),
    stderr: () => err.join(''),
    questions,
  };
}
