import type { Writable } from 'node:stream';
import type { TextDelta } from './parser.js';
import type { ProviderError } from './errors.js';
import type { StreamEnd } from './sse.js';

export interface DisplaySink {
  write(text: string): void;
}

// Writes each fragment as it arrives; no separators, no line buffering.
export class StreamSink implements DisplaySink {
  constructor(private out: Pick<Writable, 'write'>) {}

  write(text: string) {
    if (text) this.out.write(text);
  }
}

export type AccumulatedReply =
  | { ok: true; text: string; endedBy: StreamEnd; finishReason: string | null }
  | { ok: false; text: string; error: ProviderError };

export async function accumulate(deltas: AsyncIterable<TextDelta>, sink: DisplaySink): Promise<AccumulatedReply> {
  let text = '';
  for await (const delta of deltas) {
    if (delta.type === 'text') {
      sink.write(delta.text);
      text += delta.text;
    } else if (delta.type === 'error') {
      return { ok: false, text, error: delta.error };
    } else {
      return { ok: true, text, endedBy: delta.endedBy, finishReason: delta.finishReason };
    }
  }
  // textDeltas always ends with a done or error delta; a bare iterable may not.
  return { ok: true, text, endedBy: 'eof', finishReason: null };
}
