export const DONE_SENTINEL = '[DONE]';

export type StreamEnd = 'sentinel' | 'eof';

// Incremental SSE framing. Input may arrive cut at any point: a partial line
// stays buffered until its newline shows up in a later ingest().
export class SseParser {
  private buffer = '';
  private dataLines: string[] = [];

  constructor(private emit: (frame: string) => void) {}

  ingest(chunk: string) {
    this.buffer += chunk;
    let idx;
    while ((idx = this.buffer.indexOf('\n')) !== -1) {
      const line = this.buffer.slice(0, idx);
      this.buffer = this.buffer.slice(idx + 1);
      this.dispatchLine(line.endsWith('\r') ? line.slice(0, -1) : line);
    }
  }

  // End of input terminates the last line and the last event.
  finish() {
    if (this.buffer.length) {
      const line = this.buffer;
      this.buffer = '';
      this.dispatchLine(line.endsWith('\r') ? line.slice(0, -1) : line);
    }
    this.dispatchEvent();
  }

  private dispatchLine(line: string) {
    if (line === '') {
      this.dispatchEvent();
      return;
    }
    if (line.startsWith(':')) return;

    const colon = line.indexOf(':');
    const field = colon === -1 ? line : line.slice(0, colon);
    if (field !== 'data') return; // event, id, retry carry nothing the chat stream needs

    let value = colon === -1 ? '' : line.slice(colon + 1);
    if (value.startsWith(' ')) value = value.slice(1);
    this.dataLines.push(value);
  }

  private dispatchEvent() {
    if (!this.dataLines.length) return;
    const frame = this.dataLines.join('\n');
    this.dataLines = [];
    this.emit(frame);
  }
}

export type SseFrameReaderOptions = {
  sentinel?: string;
};

/**
 * Pull-based view of an SSE body as raw frame payloads.
 *
 * The next network chunk is only read once every frame decoded from the
 * previous one has been consumed. Iteration stops at the sentinel payload
 * (never yielded) or when the source closes; `endedBy` records which.
 * A reader is bound to one response and can be iterated once.
 */
export class SseFrameReader implements AsyncIterable<string> {
  endedBy: StreamEnd | null = null;
  private started = false;
  private readonly sentinel: string;

  constructor(
    private source: AsyncIterable<Uint8Array>,
    opts: SseFrameReaderOptions = {},
  ) {
    this.sentinel = opts.sentinel ?? DONE_SENTINEL;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<string, void, undefined> {
    if (this.started) throw new Error('SseFrameReader can only be iterated once');
    this.started = true;

    const pending: string[] = [];
    const parser = new SseParser((frame) => pending.push(frame));
    const decoder = new TextDecoder('utf-8');

    // Returning from inside for-await closes the source, which cancels the body.
    for await (const chunk of this.source) {
      parser.ingest(decoder.decode(chunk, { stream: true }));
      while (pending.length) {
        const frame = pending.shift() ?? '';
        if (frame.trim() === this.sentinel) {
          this.endedBy = 'sentinel';
          return;
        }
        yield frame;
      }
    }

    parser.ingest(decoder.decode());
    parser.finish();
    for (const frame of pending) {
      if (frame.trim() === this.sentinel) {
        this.endedBy = 'sentinel';
        return;
      }
      yield frame;
    }
    this.endedBy = 'eof';
  }
}
