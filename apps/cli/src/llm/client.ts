// Ollama HTTP client - generate, list local models, pull with streamed progress
import type { LocalModel, PullEvent } from '@casegen/shared';
import {
  CaseGenError,
  ConnectionError,
  DownloadError,
  ResponseParseError,
  describeFetchFailure,
  type OllamaStep,
} from '../errors.js';
import {
  ErrorBodySchema,
  GenerateResponseSchema,
  PullEventSchema,
  TagsResponseSchema,
  formatValidationErrors,
} from './schema.js';

export type FetchLike = typeof fetch;

export interface OllamaClientOptions {
  baseUrl: string;
  generateTimeoutMs?: number;
  listTimeoutMs?: number;
  pullIdleTimeoutMs?: number;
  fetch?: FetchLike;
}

const MAX_ERROR_DETAIL = 200;

export class OllamaClient {
  readonly baseUrl: string;
  private readonly generateTimeoutMs: number;
  private readonly listTimeoutMs: number;
  private readonly pullIdleTimeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: OllamaClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.generateTimeoutMs = options.generateTimeoutMs ?? 30_000;
    this.listTimeoutMs = options.listTimeoutMs ?? 10_000;
    this.pullIdleTimeoutMs = options.pullIdleTimeoutMs ?? 300_000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  /**
   * Run a single non-streaming completion and return the model's raw text.
   */
  async generate(model: string, prompt: string): Promise<string> {
    const response = await this.request('generate', '/api/generate', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model,
        prompt,
        format: 'json',
        stream: false,
      }),
      signal: AbortSignal.timeout(this.generateTimeoutMs),
    });

    if (!response.ok) {
      throw await this.httpError(response, 'generate', model);
    }

    const body = await this.readJson(response, 'generate', '/api/generate');
    const parsed = GenerateResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ResponseParseError(
        `Unexpected response from /api/generate: ${formatValidationErrors(parsed.error)}`
      );
    }

    return parsed.data.response;
  }

  /**
   * List models available locally (GET /api/tags).
   */
  async listModels(): Promise<LocalModel[]> {
    const response = await this.request('list models', '/api/tags', {
      method: 'GET',
      signal: AbortSignal.timeout(this.listTimeoutMs),
    });

    if (!response.ok) {
      throw await this.httpError(response, 'list models', null);
    }

    const body = await this.readJson(response, 'list models', '/api/tags');
    const parsed = TagsResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ResponseParseError(
        `Unexpected response from /api/tags: ${formatValidationErrors(parsed.error)}`
      );
    }

    return parsed.data.models;
  }

  /**
   * Pull a model, reporting every NDJSON status event. Resolves once the
   * server reports "success"; rejects with DownloadError on an error event or
   * when the stream ends without success.
   */
  async pull(model: string, onEvent: (event: PullEvent) => void): Promise<void> {
    const controller = new AbortController();
    let idleTimer: NodeJS.Timeout | undefined;
    const armIdleTimer = (): void => {
      clearTimeout(idleTimer);
      idleTimer = setTimeout(() => {
        const reason = new Error(`no data for ${this.pullIdleTimeoutMs}ms`);
        reason.name = 'TimeoutError';
        controller.abort(reason);
      }, this.pullIdleTimeoutMs);
    };

    armIdleTimer();
    try {
      const response = await this.request('pull', '/api/pull', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ model, name: model, stream: true }),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw await this.httpError(response, 'pull', model);
      }
      if (!response.body) {
        throw new DownloadError(model, 'server returned an empty body');
      }

      const reader = response.body.getReader();
      const decoder = new TextDecoder();
      let buffered = '';
      let succeeded = false;

      try {
        for (;;) {
          const chunk = await reader.read();
          if (chunk.done) {
            break;
          }

          armIdleTimer();
          buffered += decoder.decode(chunk.value, { stream: true });

          let newline = buffered.indexOf('\n');
          while (newline >= 0) {
            const line = buffered.slice(0, newline);
            buffered = buffered.slice(newline + 1);
            if (handlePullLine(line, model, onEvent)) {
              succeeded = true;
            }
            newline = buffered.indexOf('\n');
          }
        }
      } catch (err) {
        if (err instanceof CaseGenError) {
          throw err;
        }
        throw this.streamFailure(controller.signal.aborted ? controller.signal.reason : err);
      }

      // an aborted body may end as a plain close instead of an error
      if (controller.signal.aborted) {
        throw this.streamFailure(controller.signal.reason);
      }

      buffered += decoder.decode();
      if (handlePullLine(buffered, model, onEvent)) {
        succeeded = true;
      }

      if (!succeeded) {
        throw new DownloadError(model, 'stream ended before the server reported success');
      }
    } finally {
      clearTimeout(idleTimer);
      // releases the connection when the loop left before the server ended the stream
      controller.abort();
    }
  }

  private streamFailure(err: unknown): ConnectionError {
    return new ConnectionError({
      baseUrl: this.baseUrl,
      step: 'pull',
      reason: describeFetchFailure(err),
      cause: err,
    });
  }

  private async request(step: OllamaStep, path: string, init: RequestInit): Promise<Response> {
    try {
      return await this.fetchImpl(`${this.baseUrl}${path}`, init);
    } catch (err) {
      throw new ConnectionError({
        baseUrl: this.baseUrl,
        step,
        reason: describeFetchFailure(err),
        cause: err,
      });
    }
  }

  private async readJson(response: Response, step: OllamaStep, path: string): Promise<unknown> {
    let text: string;
    try {
      text = await response.text();
    } catch (err) {
      throw new ConnectionError({
        baseUrl: this.baseUrl,
        step,
        reason: describeFetchFailure(err),
        cause: err,
      });
    }

    try {
      return JSON.parse(text);
    } catch (err) {
      throw new ResponseParseError(`Ollama returned a body from ${path} that is not valid JSON`, err);
    }
  }

  private async httpError(response: Response, step: OllamaStep, model: string | null): Promise<ConnectionError> {
    const detail = await readErrorDetail(response);
    const hints: string[] = [];

    if (model && response.status === 404 && detail && /not found/i.test(detail)) {
      hints.push(`Model '${model}' is not available. Please pull it with: ollama pull ${model}`);
    }

    return new ConnectionError({
      baseUrl: this.baseUrl,
      step,
      status: response.status,
      reason: detail ? `HTTP ${response.status}: ${detail}` : `HTTP ${response.status}`,
      hints,
    });
  }
}

// Returns true when the line is the terminal "success" event
function handlePullLine(line: string, model: string, onEvent: (event: PullEvent) => void): boolean {
  const trimmed = line.trim();
  if (!trimmed) {
    return false;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(trimmed);
  } catch {
    // malformed lines are skipped
    return false;
  }

  const parsed = PullEventSchema.safeParse(raw);
  if (!parsed.success) {
    return false;
  }

  const event = parsed.data;
  if (event.error) {
    throw new DownloadError(model, event.error);
  }

  onEvent(event);
  return event.status === 'success';
}

async function readErrorDetail(response: Response): Promise<string | null> {
  let text: string;
  try {
    text = (await response.text()).trim();
  } catch {
    // the status alone still describes the failure
    return null;
  }
  if (!text) {
    return null;
  }

  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    body = text;
  }

  const parsed = ErrorBodySchema.safeParse(body);
  const detail = parsed.success ? parsed.data.error : text;
  return detail.length > MAX_ERROR_DETAIL ? `${detail.slice(0, MAX_ERROR_DETAIL)}...` : detail;
}
