// ============================================================
// Environment Configuration
// ============================================================
// Every setting the service reads from process.env lives here.
// dotenv fills process.env from .env (see server.ts), then
// loadConfig() parses it with zod:
//
//   - numbers arrive as strings, so they are coerced
//   - missing optional keys fall back to defaults
//   - API keys are optional at parse time; code that needs one
//     calls requireSetting(), which names the missing key
//
// The index setup script only needs Pinecone, the server needs
// Gemini, tests need neither.
// ============================================================

import { z } from "zod";
import { ConfigError } from "../utils/errors";

// Empty strings in .env ("MONGODB_URI=") count as "not set"
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8000),
  NODE_ENV: z.string().default("development"),
  ALLOWED_ORIGINS: z.string().default("http://localhost:5173"),

  GEMINI_API_KEY: optionalString,
  CHAT_MODEL: z.string().default("gemini-2.5-flash"),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(1200),
  EMBEDDING_MODEL: z.string().default("gemini-embedding-001"),
  EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(768),

  PINECONE_API_KEY: optionalString,
  PINECONE_INDEX_NAME: z.string().default("medical-knowledge"),
  PINECONE_NAMESPACE: z.string().default(""),

  BRAVE_API_KEY: optionalString,
  MONGODB_URI: optionalString,

  AGENT_MAX_STEPS: z.coerce.number().int().positive().default(10),
  HISTORY_TURNS: z.coerce.number().int().min(0).default(5),
  HISTORY_LIMIT: z.coerce.number().int().positive().default(10),
});

export type AppConfig = z.infer<typeof envSchema>;

type SecretKey = "GEMINI_API_KEY" | "PINECONE_API_KEY" | "BRAVE_API_KEY" | "MONGODB_URI";

/**
 * Parse an environment map into a typed config.
 * Throws a ConfigError listing every invalid variable.
 */
export const loadConfig = (
  env: Record<string, string | undefined> = process.env
): AppConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid environment configuration: ${problems}`);
  }
  return parsed.data;
};

/**
 * Read a key that the caller cannot work without.
 */
export const requireSetting = (config: AppConfig, key: SecretKey): string => {
  const value = config[key];
  if (!value) {
    throw new ConfigError(`${key} is required. Add it to your .env file.`);
  }
  return value;
};

/** CORS origins from the comma-separated ALLOWED_ORIGINS value. */
export const parseAllowedOrigins = (raw: string): string[] =>
  raw
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
