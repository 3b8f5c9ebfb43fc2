import { ChatCompletion } from '../schemas/chatCompletion.js';
import type { ChatRequestType } from '../schemas/chatRequest.js';
import { createMessage, type Conversation, type Message } from './conversation.js';
import { accumulate, type AccumulatedReply, type DisplaySink } from './display.js';
import { ParseError, TurnAbortedError } from './errors.js';
import type { ChatLogger } from './logger.js';
import { textDeltas } from './parser.js';
import type { ChatTransport } from './provider.js';
import { SseFrameReader, type StreamEnd } from './sse.js';

export type TurnState = 'idle' | 'awaiting-input' | 'request-in-flight' | 'streaming-reply' | 'failed';

export type SamplingOptions = {
  maxTokens?: number;
  temperature?: number;
};

export type TurnContext = {
  conversation: Conversation;
  transport: ChatTransport;
  sink: DisplaySink;
  log: ChatLogger;
  stream: boolean;
  sampling?: SamplingOptions;
  onState?: (state: TurnState) => void;
};

export type TurnResult =
  | { status: 'completed'; message: Message; endedBy: StreamEnd | 'complete' }
  | { status: 'failed'; error: Error }
  | { status: 'aborted' };

export function buildRequest(
  model: string,
  messages: readonly Message[],
  stream: boolean,
  sampling: SamplingOptions = {},
): ChatRequestType {
  const request: ChatRequestType = {
    model,
    messages: messages.map((m) => ({ role: m.role, content: m.content })),
    stream,
  };
  if (sampling.maxTokens !== undefined) request.max_tokens = sampling.maxTokens;
  if (sampling.temperature !== undefined) request.temperature = sampling.temperature;
  return Object.freeze(request);
}

export function extractCompletion(doc: unknown): string {
  const parsed = ChatCompletion.safeParse(doc);
  if (!parsed.success) throw new ParseError('Unexpected response shape from the chat endpoint', { cause: parsed.error });
  const choice = parsed.data.choices[0];
  if (!choice) throw new ParseError('No response choices available');
  return choice.message.content ?? '';
}

/**
 * One user prompt and its reply.
 *
 * The user message is appended up front. If the turn does not complete, the
 * conversation is rolled back to where it was, so neither the user message nor
 * any partial reply stays in the history. Text already written to the sink is
 * left as it is.
 */
export async function runTurn(ctx: TurnContext, userInput: string, signal?: AbortSignal): Promise<TurnResult> {
  const { conversation, transport, sink, log } = ctx;
  const before = conversation.size;
  conversation.append(createMessage('user', userInput));
  const request = buildRequest(transport.settings.model, conversation.messages(), ctx.stream, ctx.sampling);

  ctx.onState?.('request-in-flight');
  try {
    let content: string;
    let endedBy: StreamEnd | 'complete';
    if (ctx.stream) {
      const body = await transport.openStream(request, signal);
      let reply: AccumulatedReply;
      try {
        ctx.onState?.('streaming-reply');
        reply = await accumulate(textDeltas(new SseFrameReader(body), log), sink);
      } finally {
        await body.release();
      }
      if (!reply.ok) throw reply.error;
      content = reply.text;
      endedBy = reply.endedBy;
    } else {
      const doc = await transport.complete(request, signal);
      content = extractCompletion(doc);
      sink.write(content);
      endedBy = 'complete';
    }
    if (signal?.aborted) throw new TurnAbortedError();

    const message = createMessage('assistant', content);
    conversation.append(message);
    ctx.onState?.('idle');
    return { status: 'completed', message, endedBy };
  } catch (err) {
    conversation.rollback(before);
    if (err instanceof TurnAbortedError || signal?.aborted) {
      log.info({ turn: before }, 'turn aborted by user');
      ctx.onState?.('idle');
      return { status: 'aborted' };
    }
    const error = err instanceof Error ? err : new Error(String(err));
    log.error({ err: error }, 'turn failed');
    ctx.onState?.('failed');
    return { status: 'failed', error };
  }
}
