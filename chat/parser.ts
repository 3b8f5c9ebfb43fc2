import { StreamError, StreamErrorDetail } from '../schemas/apiError.js';
import { ChatChunk } from '../schemas/chatChunk.js';
import { ProviderError, StreamDecodeError } from './errors.js';
import type { ChatLogger } from './logger.js';
import type { StreamEnd } from './sse.js';

export type ChunkResult =
  | { kind: 'delta'; text: string; finishReason: string | null }
  | { kind: 'ignore'; finishReason: string | null }
  | { kind: 'error'; error: ProviderError }
  | { kind: 'malformed'; error: StreamDecodeError };

export type TextDelta =
  | { type: 'text'; text: string }
  | { type: 'done'; endedBy: StreamEnd; finishReason: string | null }
  | { type: 'error'; error: ProviderError };

export function parseChunk(frame: string): ChunkResult {
  let json: unknown;
  try {
    json = JSON.parse(frame);
  } catch (err) {
    return { kind: 'malformed', error: new StreamDecodeError(frame, 'invalid JSON', { cause: err }) };
  }

  const streamError = StreamError.safeParse(json);
  if (streamError.success) return { kind: 'error', error: providerError(streamError.data.error) };

  const chunk = ChatChunk.safeParse(json);
  if (!chunk.success) {
    return {
      kind: 'malformed',
      error: new StreamDecodeError(frame, 'unexpected chunk shape', { cause: chunk.error }),
    };
  }

  // Azure sends a leading chunk with empty choices that only carries content-filter results.
  const choice = chunk.data.choices[0];
  if (!choice) return { kind: 'ignore', finishReason: null };

  const finishReason = choice.finish_reason ?? null;
  const text = choice.delta?.content ?? choice.message?.content ?? '';
  if (!text) return { kind: 'ignore', finishReason };
  return { kind: 'delta', text, finishReason };
}

export const GENERIC_PROVIDER_ERROR = 'The provider reported an error';

function providerError(error: unknown): ProviderError {
  if (typeof error === 'string') return new ProviderError(error.trim() || GENERIC_PROVIDER_ERROR);
  const detail = StreamErrorDetail.safeParse(error);
  if (!detail.success) return new ProviderError(GENERIC_PROVIDER_ERROR);
  const { message, type, code } = detail.data;
  return new ProviderError(message || GENERIC_PROVIDER_ERROR, type ?? undefined, code == null ? undefined : String(code));
}

export type FrameSource = AsyncIterable<string> & { readonly endedBy: StreamEnd | null };

// Turns raw frames into text deltas. A bad frame is logged and skipped; an
// error object from the provider ends the sequence.
export async function* textDeltas(frames: FrameSource, log: ChatLogger): AsyncGenerator<TextDelta, void, undefined> {
  let finishReason: string | null = null;
  let index = 0;
  for await (const frame of frames) {
    const result = parseChunk(frame);
    switch (result.kind) {
      case 'malformed':
        log.warn({ err: result.error, frameIndex: index, frame: truncate(frame) }, 'skipping malformed stream frame');
        break;
      case 'error':
        yield { type: 'error', error: result.error };
        return;
      case 'ignore':
        finishReason = result.finishReason ?? finishReason;
        break;
      case 'delta':
        finishReason = result.finishReason ?? finishReason;
        yield { type: 'text', text: result.text };
        break;
    }
    index++;
  }
  const endedBy = frames.endedBy ?? 'eof';
  if (endedBy === 'eof') log.debug({ frames: index }, 'stream closed without [DONE]');
  yield { type: 'done', endedBy, finishReason };
}

function truncate(s: string, max = 100) {
  return s.length > max ? `${s.slice(0, max)}...` : s;
}
