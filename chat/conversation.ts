import { ChatMessage, type ChatMessageType, type ChatRoleType } from '../schemas/chatMessage.js';
import { ConfigurationError } from './errors.js';

export type Message = Readonly<ChatMessageType>;

export function createMessage(role: ChatRoleType, content: string): Message {
  return Object.freeze(ChatMessage.parse({ role, content }));
}

/**
 * Ordered chat history for one process run.
 *
 * Append-only apart from `clear()` and `rollback()`. The first message, when
 * there is one, is always the system message.
 */
export class Conversation {
  private items: Message[] = [];

  constructor(private systemPrompt: string) {
    if (!systemPrompt.trim()) throw new ConfigurationError('System prompt must not be empty');
    this.seed();
  }

  get size() {
    return this.items.length;
  }

  append(message: Message) {
    if (message.role === 'system' && this.items.length > 0) {
      throw new Error('A system message can only start the conversation');
    }
    if (message.role !== 'system' && this.items.length === 0) {
      throw new Error('The conversation must start with a system message');
    }
    this.items.push(Object.isFrozen(message) ? message : createMessage(message.role, message.content));
  }

  messages(): readonly Message[] {
    return [...this.items];
  }

  last(): Message | undefined {
    return this.items[this.items.length - 1];
  }

  clear() {
    this.items = [];
    this.seed();
  }

  // Drops everything appended after the conversation had `size` messages.
  rollback(size: number) {
    if (!Number.isInteger(size) || size < 0 || size > this.items.length) {
      throw new RangeError(`Cannot roll back to ${size}; conversation has ${this.items.length} messages`);
    }
    this.items = this.items.slice(0, size);
  }

  private seed() {
    this.items.push(createMessage('system', this.systemPrompt));
  }
}
