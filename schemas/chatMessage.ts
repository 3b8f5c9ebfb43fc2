import { z } from 'zod';

export const ChatRole = z.enum(['system', 'user', 'assistant']);

export const ChatMessage = z.object({
  role: ChatRole,
  content: z.string(),
});

export type ChatRoleType = z.infer<typeof ChatRole>;
export type ChatMessageType = z.infer<typeof ChatMessage>;
