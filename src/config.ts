import { z } from "zod";

export const DEFAULT_MAX_SUBNEGOTIATION_SIZE = 64 * 1024;

export const ConnectionConfigSchema = z.object({
  maxSubnegotiationSize: z
    .number()
    .int()
    .positive()
    .optional()
    .default(DEFAULT_MAX_SUBNEGOTIATION_SIZE),
  translateNewlines: z.boolean().optional().default(false),
});

export type ConnectionConfigInput = z.input<typeof ConnectionConfigSchema>;
export type ConnectionConfig = z.infer<typeof ConnectionConfigSchema>;
