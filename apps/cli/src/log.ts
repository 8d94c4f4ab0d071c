// Tagged logger writing to stderr, so stdout carries only the result

export type LineWriter = (text: string) => void;

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createLogger(tag: string, write: LineWriter = (text) => process.stderr.write(text)): Logger {
  return {
    info: (message) => write(`[${tag}] ${message}\n`),
    warn: (message) => write(`[${tag}] Warning: ${message}\n`),
    error: (message) => write(`[${tag}] ${message}\n`),
  };
}
