import { z } from "zod";

export const ConfigSchema = z.object({
  transport: z.enum(["stdio", "sse", "http"]).default("stdio"),
  port: z.number().int().nonnegative().default(8008),
  authToken: z.string().optional(),

  gmail: z.object({
    credentialsPath: z.string().min(1),
    tokenPath: z.string().min(1),
    consentPort: z.number().int().nonnegative().default(0),
    unreadQuery: z.string().min(1).default("is:unread in:inbox"),
  }),

  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type Config = z.infer<typeof ConfigSchema>;
