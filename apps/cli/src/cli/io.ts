// Process I/O for the generator scripts
import { createInterface } from 'readline';
import type { LineWriter } from '../log.js';

export interface CliIO {
  stdout: LineWriter;
  stderr: LineWriter;
  // Resolves null when input ends before an answer
  prompt(question: string): Promise<string | null>;
}

export function askQuestion(
  question: string,
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream
): Promise<string | null> {
  return new Promise((resolve) => {
    const rl = createInterface({ input, output });
    let answered = false;

    rl.once('close', () => {
      if (!answered) {
        resolve(null);
      }
    });
    rl.on('SIGINT', () => {
      rl.close();
      process.kill(process.pid, 'SIGINT');
    });
    rl.question(question, (answer) => {
      answered = true;
      rl.close();
      resolve(answer);
    });
  });
}

export function createProcessIO(): CliIO {
  return {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    prompt: (question) => askQuestion(question, process.stdin, process.stderr),
  };
}

export function installInterruptHandler(write: LineWriter = (text) => process.stderr.write(text)): void {
  process.once('SIGINT', () => {
    write('\nOperation cancelled by user.\n');
    process.exit(1);
  });
}
