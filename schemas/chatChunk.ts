import { z } from 'zod';

// One `data:` payload of a streamed chat completion. Compatible servers differ
// in which fields they fill, so almost everything is optional.
export const ChatChunk = z.object({
  id: z.string().optional(),
  object: z.string().optional(),
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        index: z.number().int().optional(),
        delta: z
          .object({
            role: z.string().optional(),
            content: z.string().nullish(),
          })
          .optional(),
        message: z
          .object({
            role: z.string().optional(),
            content: z.string().nullish(),
          })
          .optional(),
        finish_reason: z.string().nullish(),
      }),
    )
    .default([]),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional(),
    })
    .nullish(),
});

export type ChatChunkType = z.infer<typeof ChatChunk>;
