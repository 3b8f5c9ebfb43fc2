import { fastify, type FastifyReply, type FastifyRequest } from 'fastify';
import { z } from 'zod';
import { ChatRequest, type ChatRequestType } from '../schemas/chatRequest.js';
import { FrameQueue, sseHeaders, startHeartbeat } from './sse.js';

export const MockMode = z.enum(['normal', 'malformed', 'error', 'truncate']);
export type MockModeType = z.infer<typeof MockMode>;

export type MockProviderOptions = {
  apiKey?: string;
  mode?: MockModeType;
  chunkDelayMs?: number;
  heartbeatMs?: number;
  logger?: boolean;
};

// Azure addresses the model through the deployment path instead of the body.
const AzureRequest = ChatRequest.partial({ model: true });
const DeploymentParams = z.object({ deployment: z.string().min(1) });

const STREAM_ERROR = {
  error: {
    message: 'The server had an error while processing your request.',
    type: 'server_error',
  },
};

export function mockReplyFor(request: Pick<ChatRequestType, 'messages'>) {
  const lastUser = [...request.messages].reverse().find((m) => m.role === 'user');
  return `You said: ${lastUser?.content ?? ''}`;
}

// Splits text into word-sized deltas that concatenate back to the original.
export function tokenize(text: string): string[] {
  return text.match(/\s*\S+|\s+$/g) ?? [];
}

/**
 * Local stand-in for a chat-completions endpoint. Serves the Azure deployment
 * route and the OpenAI `/v1/chat/completions` route; the reply echoes the last
 * user message. `x-mock-mode` overrides the configured fault mode per request.
 */
export function buildMockProvider(opts: MockProviderOptions = {}) {
  const app = fastify({ logger: opts.logger ?? false });
  let completions = 0;

  const handle = async (
    request: FastifyRequest,
    reply: FastifyReply,
    body: Omit<ChatRequestType, 'model'> & { model?: string },
    model: string,
    flavor: 'azure' | 'openai',
  ) => {
    const id = `chatcmpl-mock-${++completions}`;
    const created = Math.floor(Date.now() / 1000);
    const content = mockReplyFor(body);
    const modeHeader = MockMode.safeParse(request.headers['x-mock-mode']);
    const mode = modeHeader.success ? modeHeader.data : opts.mode ?? 'normal';

    if (!body.stream) {
      const completionTokens = tokenize(content).length;
      return {
        id,
        object: 'chat.completion',
        created,
        model,
        choices: [{ index: 0, message: { role: 'assistant', content }, finish_reason: 'stop' }],
        usage: { prompt_tokens: 0, completion_tokens: completionTokens, total_tokens: completionTokens },
      };
    }

    reply.hijack();
    reply.raw.writeHead(200, sseHeaders());
    const queue = new FrameQueue(reply);
    const stopHeartbeat = startHeartbeat(queue, opts.heartbeatMs);
    request.raw.on('close', stopHeartbeat);
    const chunk = (delta: { role?: string; content?: string }, finishReason: string | null = null) => ({
      id,
      object: 'chat.completion.chunk',
      created,
      model,
      choices: [{ index: 0, delta, finish_reason: finishReason }],
    });

    try {
      if (flavor === 'azure') await queue.data({ id: '', object: '', created: 0, model: '', choices: [], prompt_filter_results: [] });
      await queue.data(chunk({ role: 'assistant', content: '' }));
      const tokens = tokenize(content);
      for (const [i, token] of tokens.entries()) {
        await delay(opts.chunkDelayMs ?? 0);
        await queue.data(chunk({ content: token }));
        if (i === 0 && mode === 'malformed') await queue.data('{"choices":[{"delta":');
        if (i === 0 && mode === 'error') {
          await queue.data(STREAM_ERROR);
          return;
        }
      }
      await queue.data(chunk({}, 'stop'));
      if (mode !== 'truncate') await queue.data('[DONE]');
    } catch (err) {
      request.log.error({ err }, 'mock stream error');
    } finally {
      stopHeartbeat();
      await queue.close();
    }
  };

  app.post('/openai/deployments/:deployment/chat/completions', async (request, reply) => {
    if (opts.apiKey && request.headers['api-key'] !== opts.apiKey) return unauthorized(reply);
    const { deployment } = DeploymentParams.parse(request.params);
    const parsed = AzureRequest.safeParse(request.body);
    if (!parsed.success) return badRequest(reply, parsed.error);
    return handle(request, reply, parsed.data, deployment, 'azure');
  });

  app.post('/v1/chat/completions', async (request, reply) => {
    if (opts.apiKey && request.headers.authorization !== `Bearer ${opts.apiKey}`) return unauthorized(reply);
    const parsed = ChatRequest.safeParse(request.body);
    if (!parsed.success) return badRequest(reply, parsed.error);
    return handle(request, reply, parsed.data, parsed.data.model, 'openai');
  });

  app.get('/health', async () => ({ ok: true }));

  return app;
}

function unauthorized(reply: FastifyReply) {
  return reply.code(401).send({
    error: {
      message: 'Access denied due to invalid subscription key or wrong API endpoint.',
      type: 'invalid_request_error',
      code: '401',
    },
  });
}

function badRequest(reply: FastifyReply, error: z.ZodError) {
  const issue = error.issues[0];
  return reply.code(400).send({
    error: {
      message: issue ? `${issue.path.join('.') || 'body'}: ${issue.message}` : 'Invalid request body',
      type: 'invalid_request_error',
      code: 'invalid_body',
    },
  });
}

function delay(ms: number) {
  return new Promise((res) => setTimeout(res, ms));
}
