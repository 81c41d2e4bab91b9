import { z } from 'zod';

export const toolCallBodySchema = z.object({
  arguments: z.record(z.unknown()).default({}),
});

export type ToolCallBody = z.infer<typeof toolCallBodySchema>;

export const namedParamsSchema = z.object({
  name: z.string().min(1),
});
