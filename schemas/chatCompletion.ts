import { z } from 'zod';

export const ChatCompletion = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  choices: z.array(
    z.object({
      index: z.number().int().optional(),
      message: z.object({
        role: z.string(),
        content: z.string().nullable(),
      }),
      finish_reason: z.string().nullish(),
    }),
  ),
});

export type ChatCompletionType = z.infer<typeof ChatCompletion>;
