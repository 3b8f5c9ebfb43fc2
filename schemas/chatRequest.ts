import { z } from 'zod';
import { ChatMessage } from './chatMessage.js';

export const ChatRequest = z.object({
  model: z.string().min(1),
  messages: z.array(ChatMessage).min(1),
  stream: z.boolean().default(false),
  max_tokens: z.number().int().positive().optional(),
  temperature: z.number().min(0).max(2).optional(),
});

export type ChatRequestType = z.infer<typeof ChatRequest>;
