import { z } from "zod";

import { DEFAULT_HISTORY_CAPACITY } from "./critique/critique.history.js";

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).default(8080),
  DATABASE_URL: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  ANTHROPIC_MODEL: z.string().default("claude-sonnet-4-20250514"),
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().default("gpt-4o"),
  VISION_TIMEOUT_MS: z.coerce.number().int().positive().default(90000),
  CRITIQUE_HISTORY_CAPACITY: z.coerce.number().int().positive().default(DEFAULT_HISTORY_CAPACITY),
});

export interface VisionModelConfig {
  apiKey?: string;
  model: string;
}

export interface AppConfig {
  port: number;
  database: {
    url?: string;
  };
  vision: {
    anthropic: VisionModelConfig;
    openai: VisionModelConfig;
    timeoutMs: number;
  };
  critique: {
    historyCapacity: number;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    port: parsed.PORT,
    database: {
      url: parsed.DATABASE_URL,
    },
    vision: {
      anthropic: { apiKey: parsed.ANTHROPIC_API_KEY, model: parsed.ANTHROPIC_MODEL },
      openai: { apiKey: parsed.OPENAI_API_KEY, model: parsed.OPENAI_MODEL },
      timeoutMs: parsed.VISION_TIMEOUT_MS,
    },
    critique: {
      historyCapacity: parsed.CRITIQUE_HISTORY_CAPACITY,
    },
  };
}
