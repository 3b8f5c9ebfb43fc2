export type ChatErrorCode =
  | 'configuration_error'
  | 'network_error'
  | 'http_status_error'
  | 'stream_decode_error'
  | 'parse_error'
  | 'provider_error'
  | 'turn_aborted';

export class ChatError extends Error {
  constructor(
    public readonly code: ChatErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Fatal at startup: the process exits before any request is sent.
export class ConfigurationError extends ChatError {
  constructor(message: string) {
    super('configuration_error', message);
  }
}

export class NetworkError extends ChatError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('network_error', message, options);
  }
}

export class HttpStatusError extends ChatError {
  constructor(
    public readonly status: number,
    public readonly body: string,
    public readonly detail: string,
  ) {
    super('http_status_error', `API request failed (${status}): ${detail || 'no response body'}`);
  }
}

// Raised per frame and only ever logged; the turn keeps reading.
export class StreamDecodeError extends ChatError {
  constructor(
    public readonly frame: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super('stream_decode_error', `Malformed stream frame: ${reason}`, options);
  }
}

export class ParseError extends ChatError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('parse_error', message, options);
  }
}

export class ProviderError extends ChatError {
  constructor(
    message: string,
    public readonly type?: string,
    public readonly providerCode?: string,
  ) {
    super('provider_error', message);
  }
}

export class TurnAbortedError extends ChatError {
  constructor(options?: { cause?: unknown }) {
    super('turn_aborted', 'Response cancelled by user', options);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof HttpStatusError) {
    if (err.status === 401 || err.status === 403) return `Unauthorized (${err.status}): ${err.detail}`;
    if (err.status === 429) return `Rate limit exceeded: ${err.detail}`;
    return err.message;
  }
  if (err instanceof NetworkError) return `Network error: ${err.message}`;
  if (err instanceof ProviderError) return `Provider error: ${err.message}`;
  if (err instanceof ChatError) return err.message;
  if (err instanceof Error) return err.message || 'Unknown error';
  return String(err);
}
