// Error taxonomy for the generators

export type OllamaStep = 'generate' | 'list models' | 'pull';

export class CaseGenError extends Error {
  readonly exitCode: number;
  readonly hints: string[];

  constructor(message: string, options: { exitCode?: number; hints?: string[]; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'CaseGenError';
    this.exitCode = options.exitCode ?? 1;
    this.hints = options.hints ?? [];
  }
}

export class UsageError extends CaseGenError {
  constructor(message: string) {
    super(message, { exitCode: 2, hints: ['Run with --help for usage.'] });
    this.name = 'UsageError';
  }
}

export class ConnectionError extends CaseGenError {
  readonly baseUrl: string;
  readonly step: OllamaStep;
  readonly status?: number;

  constructor(details: {
    baseUrl: string;
    step: OllamaStep;
    reason: string;
    status?: number;
    hints?: string[];
    cause?: unknown;
  }) {
    super(`Failed to call Ollama at ${details.baseUrl} (${details.step}): ${details.reason}`, {
      hints: [
        ...(details.hints ?? []),
        `Make sure Ollama is running and accessible at ${details.baseUrl}.`,
        'You can start Ollama with: ollama serve',
      ],
      cause: details.cause,
    });
    this.name = 'ConnectionError';
    this.baseUrl = details.baseUrl;
    this.step = details.step;
    this.status = details.status;
  }
}

export class ResponseParseError extends CaseGenError {
  constructor(message: string, cause?: unknown) {
    super(message, {
      hints: ['The model response was not usable. Try running the command again.'],
      cause,
    });
    this.name = 'ResponseParseError';
  }
}

export class DownloadError extends CaseGenError {
  readonly model: string;

  constructor(model: string, reason: string) {
    super(`Failed to pull model '${model}': ${reason}`);
    this.name = 'DownloadError';
    this.model = model;
  }
}

// Registry lookups are informational only; callers report and continue
export class RegistryError extends CaseGenError {
  readonly url: string;

  constructor(url: string, reason: string, cause?: unknown) {
    super(`Registry lookup failed for ${url}: ${reason}`, { cause });
    this.name = 'RegistryError';
    this.url = url;
  }
}

// Human-readable reason for a failed fetch (refused, timeout, DNS, ...)
export function describeFetchFailure(err: unknown): string {
  if (err instanceof Error) {
    if (err.name === 'TimeoutError' || err.name === 'AbortError') {
      return 'request timed out';
    }
    const cause: unknown = err.cause;
    if (cause instanceof Error) {
      const code = 'code' in cause && typeof cause.code === 'string' ? cause.code : null;
      return code ? `${code} ${cause.message}` : cause.message;
    }
    return err.message;
  }
  return String(err);
}
