import type { FastifyReply } from 'fastify';

export function sseHeaders() {
  return {
    'Content-Type': 'text/event-stream',
    'Cache-Control': 'no-cache, no-transform',
    Connection: 'keep-alive',
    'X-Accel-Buffering': 'no',
  } as const;
}

export function startHeartbeat(queue: FrameQueue, intervalMs = 15000) {
  const id = setInterval(() => {
    void queue.comment('ping');
  }, intervalMs);
  return () => clearInterval(id);
}

type QueueItem = { kind: 'data'; payload: string } | { kind: 'comment'; text: string };

// Serializes writes to a hijacked reply and waits for 'drain' when the socket pushes back.
export class FrameQueue {
  private queue: QueueItem[] = [];
  private flushing = false;
  private closed = false;

  constructor(private reply: FastifyReply) {}

  async data(data: unknown) {
    const payload = typeof data === 'string' ? data : JSON.stringify(data);
    await this.push({ kind: 'data', payload });
  }

  async comment(text: string) {
    await this.push({ kind: 'comment', text });
  }

  async close() {
    if (this.closed) return;
    this.closed = true;
    await this.flush();
    this.reply.raw.end();
  }

  private async push(item: QueueItem) {
    if (this.closed) return;
    this.queue.push(item);
    if (!this.flushing) await this.flush();
  }

  private async flush() {
    if (this.flushing) return;
    this.flushing = true;
    try {
      let item: QueueItem | undefined;
      while ((item = this.queue.shift())) {
        const text = item.kind === 'data' ? `data: ${item.payload}\n\n` : `: ${item.text}\n\n`;
        if (!this.reply.raw.write(text)) await onceDrain(this.reply);
      }
    } finally {
      this.flushing = false;
    }
  }
}

function onceDrain(reply: FastifyReply) {
  return new Promise<void>((resolve) => {
    reply.raw.once('drain', () => resolve());
  });
}
