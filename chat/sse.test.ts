import { describe, expect, it } from 'vitest';
import { bytesSource, collect } from '../test/helpers.js';
import { SseFrameReader, SseParser } from './sse.js';

const SCENARIO =
  'data: {"choices":[{"delta":{"content":"Hi"}}]}\n\n' +
  'data: {"choices":[{"delta":{"content":" there"}}]}\n\n' +
  'data: [DONE]\n\n';

function parseAll(input: string) {
  const frames: string[] = [];
  const parser = new SseParser((f) => frames.push(f));
  parser.ingest(input);
  parser.finish();
  return frames;
}

describe('SseParser', () => {
  it('joins multi-line data and ignores comments and other fields', () => {
    expect(parseAll(': keep-alive\nevent: message\nid: 7\nretry: 100\ndata: line1\ndata:line2\n\n')).toEqual([
      'line1\nline2',
    ]);
  });

  it('strips only one leading space and handles CRLF', () => {
    expect(parseAll('data:  indented\r\n\r\ndata: x\r\n\r\n')).toEqual([' indented', 'x']);
  });

  it('skips events without data and lines without a data field', () => {
    expect(parseAll('event: ping\n\nnonsense\n\ndata\n\n')).toEqual(['']);
  });

  it('keeps a partial line until its newline arrives', () => {
    const frames: string[] = [];
    const parser = new SseParser((f) => frames.push(f));
    parser.ingest('data: {"a"');
    expect(frames).toEqual([]);
    parser.ingest(':1}\n');
    expect(frames).toEqual([]);
    parser.ingest('\n');
    expect(frames).toEqual(['{"a":1}']);
  });

  it('flushes the final event at end of input', () => {
    expect(parseAll('data: tail')).toEqual(['tail']);
  });
});

describe('SseFrameReader', () => {
  it('yields payloads and stops at the sentinel', async () => {
    const reader = new SseFrameReader(bytesSource([SCENARIO]));
    expect(await collect(reader)).toEqual([
      '{"choices":[{"delta":{"content":"Hi"}}]}',
      '{"choices":[{"delta":{"content":" there"}}]}',
    ]);
    expect(reader.endedBy).toBe('sentinel');
  });

  it('emits the same frames for every two-read split of the bytes', async () => {
    const input = `: ping\r\n\r\n${SCENARIO.replace(' there', ' thére 👋')}`;
    const bytes = new TextEncoder().encode(input);
    const whole = await collect(new SseFrameReader(bytesSource([bytes])));
    expect(whole).toEqual([
      '{"choices":[{"delta":{"content":"Hi"}}]}',
      '{"choices":[{"delta":{"content":" thére 👋"}}]}',
    ]);

    for (let i = 0; i <= bytes.length; i++) {
      const reader = new SseFrameReader(bytesSource([bytes.slice(0, i), bytes.slice(i)]));
      expect(await collect(reader)).toEqual(whole);
      expect(reader.endedBy).toBe('sentinel');
    }
  });

  it('handles one byte per read', async () => {
    const bytes = new TextEncoder().encode(SCENARIO);
    const chunks = Array.from(bytes, (b) => Uint8Array.of(b));
    expect(await collect(new SseFrameReader(bytesSource(chunks)))).toHaveLength(2);
  });

  it('never forwards the sentinel or anything after it', async () => {
    const reader = new SseFrameReader(bytesSource(['data: a\n\ndata:  [DONE] \n\ndata: b\n\n']));
    expect(await collect(reader)).toEqual(['a']);
    expect(reader.endedBy).toBe('sentinel');
  });

  it('does not read past the chunk holding the sentinel', async () => {
    async function* source() {
      yield new TextEncoder().encode('data: a\n\ndata: [DONE]\n\n');
      throw new Error('should not be read');
    }
    const reader = new SseFrameReader(source());
    expect(await collect(reader)).toEqual(['a']);
  });

  it('accepts a close without sentinel and reports it as eof', async () => {
    const reader = new SseFrameReader(bytesSource(['data: a\n\n', 'data: b']));
    expect(await collect(reader)).toEqual(['a', 'b']);
    expect(reader.endedBy).toBe('eof');
  });

  it('supports a custom sentinel', async () => {
    const reader = new SseFrameReader(bytesSource(['data: a\n\ndata: END\n\n']), { sentinel: 'END' });
    expect(await collect(reader)).toEqual(['a']);
    expect(reader.endedBy).toBe('sentinel');
  });

  it('propagates a failing source', async () => {
    async function* source() {
      yield new TextEncoder().encode('data: a\n\n');
      throw new Error('socket hang up');
    }
    const seen: string[] = [];
    const reader = new SseFrameReader(source());
    await expect(
      (async () => {
        for await (const frame of reader) seen.push(frame);
      })(),
    ).rejects.toThrow('socket hang up');
    expect(seen).toEqual(['a']);
    expect(reader.endedBy).toBeNull();
  });

  it('releases the source when the consumer stops early', async () => {
    let released = false;
    async function* source() {
      try {
        yield new TextEncoder().encode('data: a\n\ndata: b\n\n');
        yield new TextEncoder().encode('data: c\n\n');
      } finally {
        released = true;
      }
    }
    for await (const frame of new SseFrameReader(source())) {
      expect(frame).toBe('a');
      break;
    }
    expect(released).toBe(true);
  });

  it('cannot be iterated twice', async () => {
    const reader = new SseFrameReader(bytesSource(['data: a\n\n']));
    await collect(reader);
    await expect(collect(reader)).rejects.toThrow('SseFrameReader can only be iterated once');
  });
});
