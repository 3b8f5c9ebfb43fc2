import { z } from 'zod';

export const ApiError = z.object({
  error: z.object({
    message: z.string(),
    type: z.string().nullish(),
    code: z.union([z.string(), z.number()]).nullish(),
  }),
});

export type ApiErrorType = z.infer<typeof ApiError>;

// Error frames inside a stream are looser: `error` may be a bare string or an
// object without a message.
export const StreamError = z.object({
  error: z.unknown().refine((v) => v != null, 'error must be set'),
});

export const StreamErrorDetail = z.object({
  message: z.string().nullish(),
  type: z.string().nullish(),
  code: z.union([z.string(), z.number()]).nullish(),
});
