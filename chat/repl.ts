import type { Writable } from 'node:stream';
import type { Conversation } from './conversation.js';
import { StreamSink, type DisplaySink } from './display.js';
import { describeError } from './errors.js';
import type { ChatLogger } from './logger.js';
import type { ChatTransport } from './provider.js';
import { runTurn, type SamplingOptions, type TurnResult, type TurnState } from './turn.js';

// Resolves to null once input is exhausted (Ctrl-D).
export type PromptFn = (label: string) => Promise<string | null>;

export type ReplOptions = {
  conversation: Conversation;
  transport: ChatTransport;
  log: ChatLogger;
  stream: boolean;
  sampling?: SamplingOptions;
  prompt: PromptFn;
  out: Pick<Writable, 'write'>;
};

export type Command = 'quit' | 'clear' | 'empty' | 'message';

const CLEAR_LINE = '\r\x1b[2K';

export function classifyInput(input: string): Command {
  const cmd = input.trim().toLowerCase();
  if (cmd === 'quit' || cmd === 'exit') return 'quit';
  if (cmd === 'clear') return 'clear';
  if (!cmd) return 'empty';
  return 'message';
}

export class ChatRepl {
  state: TurnState = 'idle';
  private inflight: AbortController | null = null;

  constructor(private opts: ReplOptions) {}

  banner() {
    const { model, flavor } = this.opts.transport.settings;
    return [
      `Stream Chat (${model} via ${flavor})`,
      "Type 'quit' or 'exit' to end the conversation.",
      "Type 'clear' to clear the conversation history.",
      '='.repeat(50),
      '',
    ].join('\n');
  }

  // Returns the process exit code.
  async run(): Promise<number> {
    const { out, prompt } = this.opts;
    out.write(this.banner());
    while (true) {
      this.state = 'awaiting-input';
      const line = await prompt('You: ');
      if (line === null) {
        out.write('\nGoodbye!\n');
        break;
      }
      const done = await this.handle(line);
      if (done) break;
    }
    this.state = 'idle';
    return 0;
  }

  // Handles one line of input; true means the session is over.
  async handle(line: string): Promise<boolean> {
    const { out, conversation } = this.opts;
    switch (classifyInput(line)) {
      case 'quit':
        out.write('Goodbye!\n');
        return true;
      case 'clear':
        conversation.clear();
        out.write('Conversation cleared!\n\n');
        return false;
      case 'empty':
        return false;
      case 'message':
        await this.turn(line.trim());
        return false;
    }
  }

  abortTurn() {
    if (!this.inflight) return false;
    this.inflight.abort();
    return true;
  }

  private async turn(input: string): Promise<TurnResult> {
    const { out, stream } = this.opts;
    const controller = new AbortController();
    this.inflight = controller;

    let sink: DisplaySink = new StreamSink(out);
    if (stream) {
      out.write('Assistant: ');
    } else {
      out.write('Assistant: thinking...');
      const inner = sink;
      let first = true;
      sink = {
        write(text: string) {
          if (first) {
            out.write(`${CLEAR_LINE}Assistant: `);
            first = false;
          }
          inner.write(text);
        },
      };
    }

    try {
      const result = await runTurn(
        {
          conversation: this.opts.conversation,
          transport: this.opts.transport,
          sink,
          log: this.opts.log,
          stream,
          sampling: this.opts.sampling,
          onState: (state) => {
            this.state = state;
          },
        },
        input,
        controller.signal,
      );
      const lead = stream ? '\n' : CLEAR_LINE;
      if (result.status === 'completed') {
        out.write('\n\n');
      } else if (result.status === 'aborted') {
        out.write(`${lead}[cancelled]\n\n`);
      } else {
        out.write(`${lead}Error: ${describeError(result.error)}\n\n`);
      }
      return result;
    } finally {
      this.inflight = null;
    }
  }
}
