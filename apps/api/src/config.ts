import { z } from "zod";

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  HOST: z.string().min(1).default("0.0.0.0"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
});

export type ServerEnv = z.infer<typeof envSchema>;

/** Validate the server's environment. Throws on invalid values. */
export function loadEnv(env: NodeJS.ProcessEnv = process.env): ServerEnv {
  return envSchema.parse(env);
}
