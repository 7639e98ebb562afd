import { z } from "zod";
import { LOG_LEVELS } from "./logger";

export const envSchema = z.object({
  PACWARDEN_LOG_LEVEL: z.enum(LOG_LEVELS).default("warn"),
  OPENAI_API_KEY: z.string().optional(),
  PACWARDEN_LLM_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  PACWARDEN_LLM_MODEL: z.string().min(1).default("gpt-4o-mini"),
  PACWARDEN_LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),
  PACWARDEN_AUDIT_PATH: z.string().min(1).optional(),
  PACWARDEN_PARU: z.enum(["auto", "yes", "no"]).default("auto"),
});

export type Env = z.infer<typeof envSchema>;

export const loadEnv = (source: NodeJS.ProcessEnv = process.env): Env => envSchema.parse(source);
