// In-process stand-in for the Ollama server and model registry
import { PassThrough } from 'node:stream';
import Fastify from 'fastify';

export interface FakeGenerateReply {
  status?: number;
  // Strings are sent verbatim, anything else as JSON
  body: unknown;
}

export interface FakeOllamaOptions {
  models?: string[];
  generate?: FakeGenerateReply;
  pullStatus?: number;
  pullLines?: string[];
  // Delay between pull lines; set to stream them one by one
  pullIntervalMs?: number;
  // Keep the pull response open after the last line
  pullHold?: boolean;
  // null answers 404
  manifest?: unknown;
  configBlob?: unknown;
}

export interface RecordedRequest {
  method: string;
  url: string;
  body: unknown;
}

export interface FakeOllama {
  baseUrl: string;
  requests: RecordedRequest[];
  requestsTo(url: string): RecordedRequest[];
  // Resolves once the client side of a streamed pull has gone away
  pullClosed: Promise<void>;
  close(): Promise<void>;
}

export async function startFakeOllama(options: FakeOllamaOptions = {}): Promise<FakeOllama> {
  const app = Fastify({ logger: false, forceCloseConnections: true });
  const requests: RecordedRequest[] = [];
  const streams: PassThrough[] = [];
  let markPullClosed = (): void => undefined;
  const pullClosed = new Promise<void>((resolve) => {
    markPullClosed = resolve;
  });

  app.addHook('preHandler', async (request) => {
    requests.push({ method: request.method, url: request.url, body: request.body ?? null });
  });

  app.get('/api/tags', async () => ({
    models: (options.models ?? []).map((name) => ({
      name,
      model: name,
      size: 3825819519,
      modified_at: '2026-01-15T10:00:00Z',
      details: { family: 'llama', parameter_size: '7B', quantization_level: 'Q4_0' },
    })),
  }));

  app.post('/api/generate', async (_request, reply) => {
    const generate = options.generate ?? { body: { response: '{"test_cases":[]}' } };
    reply.status(generate.status ?? 200);
    return generate.body;
  });

  app.post('/api/pull', async (_request, reply) => {
    reply.status(options.pullStatus ?? 200).type('application/x-ndjson');
    const lines = options.pullLines ?? [];
    if (options.pullIntervalMs === undefined && !options.pullHold) {
      return `${lines.join('\n')}\n`;
    }

    const stream = new PassThrough();
    streams.push(stream);
    reply.raw.on('close', () => markPullClosed());
    feedLines(stream, lines, options.pullIntervalMs ?? 0, !options.pullHold);
    reply.send(stream);
    return reply;
  });

  app.get('/v2/:namespace/:name/manifests/:tag', async (_request, reply) => {
    if (options.manifest === undefined || options.manifest === null) {
      reply.status(404);
      return { errors: [{ code: 'MANIFEST_UNKNOWN' }] };
    }
    return options.manifest;
  });

  app.get('/v2/:namespace/:name/blobs/:digest', async (_request, reply) => {
    if (options.configBlob === undefined || options.configBlob === null) {
      reply.status(404);
      return { errors: [{ code: 'BLOB_UNKNOWN' }] };
    }
    return options.configBlob;
  });

  const baseUrl = await app.listen({ port: 0, host: '127.0.0.1' });

  return {
    baseUrl,
    requests,
    requestsTo: (url) => requests.filter((entry) => entry.url === url),
    pullClosed,
    close: async () => {
      for (const stream of streams) {
        stream.destroy();
      }
      await app.close();
    },
  };
}

function feedLines(stream: PassThrough, lines: string[], intervalMs: number, end: boolean): void {
  let index = 0;
  const next = (): void => {
    if (stream.destroyed) {
      return;
    }
    if (index >= lines.length) {
      if (end) {
        stream.end();
      }
      return;
    }
    stream.write(`${lines[index]}\n`);
    index += 1;
    setTimeout(next, intervalMs);
  };
  next();
}

// Base URL of a server that has already shut down, so connections are refused
export async function closedServerUrl(): Promise<string> {
  const fake = await startFakeOllama();
  await fake.close();
  return fake.baseUrl;
}
