import { destination as fileDestination, pino, type DestinationStream, type Logger } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

// Subset of the pino API the pipeline logs through.
export type ChatLogger = Pick<Logger, 'error' | 'warn' | 'info' | 'debug'>;

// stdout carries the conversation, so logs go to stderr unless a destination is given.
export function createLogger(level: LogLevel = 'warn', destination?: DestinationStream): Logger {
  return pino({ name: 'stream-chat', level }, destination ?? fileDestination(2));
}
