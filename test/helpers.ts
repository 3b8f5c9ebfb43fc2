import type { FastifyInstance } from 'fastify';
import { createLogger, type LogLevel } from '../chat/logger.js';
import type { FetchInit, FetchLike } from '../chat/provider.js';

export async function* bytesSource(chunks: Array<string | Uint8Array>): AsyncGenerator<Uint8Array, void, undefined> {
  const encoder = new TextEncoder();
  for (const chunk of chunks) yield typeof chunk === 'string' ? encoder.encode(chunk) : chunk;
}

export async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of items) out.push(item);
  return out;
}

export type LogRecord = { level: number; msg: string; [key: string]: unknown };

export function captureLogger(level: LogLevel = 'debug') {
  const records: LogRecord[] = [];
  const log = createLogger(level, {
    write(line: string) {
      records.push(JSON.parse(line));
    },
  });
  return { log, records };
}

export function memoryOut() {
  const parts: string[] = [];
  return {
    out: {
      write(chunk: string) {
        parts.push(chunk);
        return true;
      },
    },
    parts,
    text: () => parts.join(''),
  };
}

export function fakeFetch(respond: (init: FetchInit) => Response | Promise<Response>) {
  const calls: Array<{ url: string; init: FetchInit }> = [];
  const fetchImpl: FetchLike = async (url, init) => {
    calls.push({ url, init });
    return respond(init);
  };
  return { fetchImpl, calls };
}

// Rejects once the request signal fires, like fetch does for an aborted connect.
export function pendingUntilAbort(init: FetchInit): Promise<Response> {
  return new Promise((_, reject) => {
    init.signal.addEventListener('abort', () => reject(init.signal.reason), { once: true });
  });
}

export type BodyEnd = 'close' | 'hang' | Error;

// Body served one chunk per read. Aborting the request signal errors the body.
export function streamBody(chunks: string[], opts: { signal?: AbortSignal; end?: BodyEnd } = {}) {
  const encoder = new TextEncoder();
  let i = 0;
  return new ReadableStream<Uint8Array>({
    start(controller) {
      const signal = opts.signal;
      signal?.addEventListener('abort', () => controller.error(signal.reason), { once: true });
    },
    pull(controller) {
      if (i < chunks.length) {
        controller.enqueue(encoder.encode(chunks[i++]));
        return;
      }
      const end = opts.end ?? 'close';
      if (end === 'close') {
        controller.close();
        return;
      }
      if (end instanceof Error) {
        controller.error(end);
        return;
      }
      return new Promise<void>(() => undefined);
    },
  });
}

export function sseResponse(chunks: string[], init?: FetchInit, end?: BodyEnd) {
  return new Response(streamBody(chunks, { signal: init?.signal, end }), {
    status: 200,
    headers: { 'Content-Type': 'text/event-stream' },
  });
}

export function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

export function chunkFrame(content: string) {
  return `data: ${JSON.stringify({ choices: [{ index: 0, delta: { content } }] })}\n\n`;
}

// Routes transport requests into a fastify app without opening a socket.
export function injectFetch(app: FastifyInstance): FetchLike {
  return async (url, init) => {
    const { pathname, search } = new URL(url);
    const res = await app.inject({
      method: 'POST',
      url: `${pathname}${search}`,
      headers: init.headers,
      payload: init.body,
    });
    return new Response(res.payload, {
      status: res.statusCode,
      headers: { 'Content-Type': String(res.headers['content-type'] ?? 'application/json') },
    });
  };
}
