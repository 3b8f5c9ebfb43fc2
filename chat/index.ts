export { loadConfig, USAGE, DEFAULTS, type ChatConfig, type LoadedConfig } from './config.js';
export { Conversation, createMessage, type Message } from './conversation.js';
export { StreamSink, accumulate, type DisplaySink, type AccumulatedReply } from './display.js';
export {
  ChatError,
  ConfigurationError,
  NetworkError,
  HttpStatusError,
  StreamDecodeError,
  ParseError,
  ProviderError,
  TurnAbortedError,
  describeError,
  type ChatErrorCode,
} from './errors.js';
export { createLogger, type ChatLogger, type LogLevel } from './logger.js';
export { parseChunk, textDeltas, type ChunkResult, type TextDelta } from './parser.js';
export { ChatTransport, type ProviderSettings, type ProviderFlavor, type FetchLike } from './provider.js';
export { ChatRepl, classifyInput, type PromptFn, type ReplOptions } from './repl.js';
export { SseParser, SseFrameReader, DONE_SENTINEL, type StreamEnd } from './sse.js';
export { runTurn, buildRequest, extractCompletion, type TurnContext, type TurnResult, type TurnState } from './turn.js';
