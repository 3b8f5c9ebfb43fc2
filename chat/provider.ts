import { ApiError } from '../schemas/apiError.js';
import type { ChatRequestType } from '../schemas/chatRequest.js';
import { ConfigurationError, HttpStatusError, NetworkError, ParseError, TurnAbortedError } from './errors.js';

export type ProviderFlavor = 'azure' | 'openai';

export type ProviderSettings = {
  endpoint: string;
  apiKey: string;
  model: string;
  apiVersion: string;
  flavor: ProviderFlavor;
  connectTimeoutMs: number;
  readTimeoutMs: number;
};

export type FetchInit = {
  method: string;
  headers: Record<string, string>;
  body: string;
  signal: AbortSignal;
};

export type FetchLike = (url: string, init: FetchInit) => Promise<Response>;

// Response body of a streaming call. Iterating it to the end, or stopping
// early, frees the connection; `release()` does the same for a body that is
// never iterated and may always be called once the caller is done.
export type BodyStream = AsyncIterable<Uint8Array> & { release(): Promise<void> };

/**
 * HTTP leg of a turn: one POST per call, no retries.
 *
 * Connection problems surface as NetworkError, non-2xx answers as
 * HttpStatusError with the response body, a user abort as TurnAbortedError.
 */
export class ChatTransport {
  constructor(
    readonly settings: ProviderSettings,
    private fetchImpl: FetchLike = fetch,
  ) {
    assertSettings(settings);
  }

  buildUrl() {
    const base = this.settings.endpoint.replace(/\/+$/, '');
    if (this.settings.flavor === 'openai') return `${base}/chat/completions`;
    const deployment = encodeURIComponent(this.settings.model);
    const version = encodeURIComponent(this.settings.apiVersion);
    return `${base}/openai/deployments/${deployment}/chat/completions?api-version=${version}`;
  }

  buildHeaders(stream: boolean): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.settings.flavor === 'azure') headers['api-key'] = this.settings.apiKey;
    else headers.Authorization = `Bearer ${this.settings.apiKey}`;
    if (stream) headers.Accept = 'text/event-stream';
    return headers;
  }

  async openStream(request: ChatRequestType, signal?: AbortSignal): Promise<BodyStream> {
    const { res, controller, done } = await this.send({ ...request, stream: true }, signal);
    const body = res.body;
    if (!body) {
      done();
      throw new ParseError('Streaming response has no body');
    }
    const chunks = readBody(body, controller, this.settings.readTimeoutMs, signal, done);
    let started = false;
    return {
      [Symbol.asyncIterator]() {
        started = true;
        return chunks;
      },
      async release() {
        await chunks.return(undefined);
        if (started) return;
        // A generator closed before its first step skips its finally block.
        done();
        // An aborted request has already errored the body.
        await body.cancel().catch((err: unknown) => {
          if (!controller.signal.aborted) throw err;
        });
      },
    };
  }

  async complete(request: ChatRequestType, signal?: AbortSignal): Promise<unknown> {
    const { res, controller, done } = await this.send({ ...request, stream: false }, signal);
    const timer = armTimer(controller, this.settings.readTimeoutMs, 'Timed out reading the response');
    try {
      const text = await res.text();
      try {
        return JSON.parse(text);
      } catch (err) {
        throw new ParseError('Failed to parse response from the chat endpoint', { cause: err });
      }
    } catch (err) {
      throw classifyFailure(err, controller, signal, 'read');
    } finally {
      clearTimeout(timer);
      done();
    }
  }

  private async send(request: ChatRequestType, signal?: AbortSignal) {
    const controller = new AbortController();
    const unlink = linkSignal(signal, controller);
    const timer = armTimer(controller, this.settings.connectTimeoutMs, 'Timed out connecting to the chat endpoint');

    let res: Response;
    try {
      res = await this.fetchImpl(this.buildUrl(), {
        method: 'POST',
        headers: this.buildHeaders(request.stream),
        body: JSON.stringify(request),
        signal: controller.signal,
      });
    } catch (err) {
      unlink();
      throw classifyFailure(err, controller, signal, 'connect');
    } finally {
      clearTimeout(timer);
    }

    if (!res.ok) {
      const readTimer = armTimer(controller, this.settings.readTimeoutMs, 'Timed out reading the error response');
      try {
        // A status is known by now, so a body that cannot be read only loses the detail.
        const body = await res.text().catch((err: unknown) => {
          if (signal?.aborted) throw new TurnAbortedError({ cause: err });
          return '';
        });
        throw new HttpStatusError(res.status, body, errorDetail(body));
      } finally {
        clearTimeout(readTimer);
        unlink();
      }
    }
    return { res, controller, done: unlink };
  }
}

export function assertSettings(settings: ProviderSettings) {
  if (!settings.endpoint.trim()) throw new ConfigurationError('Chat endpoint is required');
  if (!settings.apiKey.trim()) throw new ConfigurationError('API key is required');
  if (!settings.model.trim()) throw new ConfigurationError('Model (deployment) name is required');
  let url: URL;
  try {
    url = new URL(settings.endpoint);
  } catch {
    throw new ConfigurationError(`Chat endpoint is not a valid URL: ${settings.endpoint}`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigurationError(`Chat endpoint must use http or https: ${settings.endpoint}`);
  }
}

export function errorDetail(body: string) {
  const parsed = ApiError.safeParse(tryParseJson(body));
  return parsed.success ? parsed.data.error.message : body.trim();
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

// Yields body chunks; silence longer than readTimeoutMs aborts the request.
async function* readBody(
  body: NonNullable<Response['body']>,
  controller: AbortController,
  readTimeoutMs: number,
  signal: AbortSignal | undefined,
  done: () => void,
): AsyncGenerator<Uint8Array, void, undefined> {
  const reader = body.getReader();
  let finished = false;
  try {
    while (true) {
      const timer = armTimer(controller, readTimeoutMs, 'Timed out waiting for stream data');
      let chunk: Awaited<ReturnType<typeof reader.read>>;
      try {
        chunk = await reader.read();
      } catch (err) {
        throw classifyFailure(err, controller, signal, 'read');
      } finally {
        clearTimeout(timer);
      }
      if (chunk.done) {
        finished = true;
        return;
      }
      yield chunk.value;
    }
  } finally {
    // Consumer stopped early (sentinel, error frame, abort): drop the connection.
    if (!finished) await reader.cancel().catch(() => undefined);
    reader.releaseLock();
    done();
  }
}

function armTimer(controller: AbortController, ms: number, message: string) {
  return setTimeout(() => controller.abort(new NetworkError(message)), ms);
}

function linkSignal(signal: AbortSignal | undefined, controller: AbortController) {
  if (!signal) return () => undefined;
  if (signal.aborted) {
    controller.abort(signal.reason);
    return () => undefined;
  }
  const onAbort = () => controller.abort(signal.reason);
  signal.addEventListener('abort', onAbort, { once: true });
  return () => signal.removeEventListener('abort', onAbort);
}

function classifyFailure(
  err: unknown,
  controller: AbortController,
  signal: AbortSignal | undefined,
  phase: 'connect' | 'read',
): Error {
  if (signal?.aborted) return new TurnAbortedError({ cause: err });
  const reason: unknown = controller.signal.reason;
  if (controller.signal.aborted && reason instanceof NetworkError) return reason;
  if (err instanceof ParseError || err instanceof NetworkError) return err;
  const message = err instanceof Error ? err.message : String(err);
  if (phase === 'connect') return new NetworkError(`Failed to send request to the chat endpoint: ${message}`, { cause: err });
  return new ParseError(`Stream closed abnormally: ${message}`, { cause: err });
}
