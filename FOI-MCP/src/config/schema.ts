import { z } from "zod";

export const ConfigSchema = z.object({
  transport: z.enum(["stdio", "sse", "http"]).default("stdio"),
  port: z.number().int().nonnegative().default(8009),
  authToken: z.string().optional(),

  gmail: z.object({
    credentialsPath: z.string().min(1),
    tokenPath: z.string().min(1),
    consentPort: z.number().int().nonnegative().default(0),
  }),

  foi: z.object({
    libraryPath: z.string().min(1),
    teamsPath: z.string().min(1),
    libraryLimit: z.number().int().positive().default(50),
    maxUnread: z.number().int().positive().default(3),
    organisation: z.string().min(1),
    signature: z.string().min(1),
    responseDays: z.number().int().positive().default(20),
  }),

  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type Config = z.infer<typeof ConfigSchema>;
