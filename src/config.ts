import path from "node:path";
import { z } from "zod";
import { ConfigurationError } from "./errors";

export interface LlmConfig {
  baseUrl: string;
  apiKey: string;
  model: string;
  timeoutSeconds: number;
  maxRetries: number;
  retryBackoffMs: number;
}

export interface AppConfig {
  projectRoot: string;
  temperature: number;
  port: number;
}

export const DEFAULT_MODEL = "gpt-4.1-mini";
export const DEFAULT_PROJECT_ROOT = "generated_project";

const requiredString = (name: string) =>
  z
    .string({ required_error: `${name} is required. Add it to .env or shell env.` })
    .trim()
    .min(1, `${name} is required. Add it to .env or shell env.`);

const intFromEnv = (fallback: number, min: number) => z.coerce.number().int().min(min).default(fallback);

const llmEnvSchema = z.object({
  OPENAI_BASE_URL: requiredString("OPENAI_BASE_URL").pipe(z.string().url("OPENAI_BASE_URL must be a URL")),
  OPENAI_API_KEY: requiredString("OPENAI_API_KEY"),
  OPENAI_MODEL: z.string().trim().min(1).default(DEFAULT_MODEL),
  LLM_TIMEOUT_SECONDS: intFromEnv(90, 1),
  LLM_MAX_RETRIES: intFromEnv(2, 0),
  LLM_RETRY_BACKOFF_MS: intFromEnv(1000, 0)
});

const appEnvSchema = z.object({
  PROJECT_ROOT: z.string().trim().min(1).default(DEFAULT_PROJECT_ROOT),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  PORT: intFromEnv(3000, 1).pipe(z.number().max(65535))
});

// Empty strings count as unset so that `FOO=` in .env falls back to the default.
const withoutBlanks = (env: NodeJS.ProcessEnv): Record<string, string> =>
  Object.fromEntries(
    Object.entries(env).filter((entry): entry is [string, string] => typeof entry[1] === "string" && entry[1].trim() !== "")
  );

const toProblems = (error: z.ZodError): string[] =>
  error.issues.map((issue) => {
    const key = issue.path.join(".");
    return issue.message.startsWith(key) ? issue.message : `${key}: ${issue.message}`;
  });

export const loadLlmConfig = (env: NodeJS.ProcessEnv = process.env): LlmConfig => {
  const parsed = llmEnvSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    throw new ConfigurationError(toProblems(parsed.error));
  }

  return {
    baseUrl: parsed.data.OPENAI_BASE_URL.replace(/\/+$/, ""),
    apiKey: parsed.data.OPENAI_API_KEY,
    model: parsed.data.OPENAI_MODEL,
    timeoutSeconds: parsed.data.LLM_TIMEOUT_SECONDS,
    maxRetries: parsed.data.LLM_MAX_RETRIES,
    retryBackoffMs: parsed.data.LLM_RETRY_BACKOFF_MS
  };
};

export const loadAppConfig = (env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): AppConfig => {
  const parsed = appEnvSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    throw new ConfigurationError(toProblems(parsed.error));
  }

  return {
    projectRoot: path.resolve(cwd, parsed.data.PROJECT_ROOT),
    temperature: parsed.data.LLM_TEMPERATURE,
    port: parsed.data.PORT
  };
};
