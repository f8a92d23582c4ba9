import { z } from "zod";
import type { ConfigurationGate } from "./matrix.js";
import type { RetryBudget } from "./poll.js";
import { READINESS_PROFILES } from "./readiness.js";

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration:\n${problems.map((p) => `  - ${p}`).join("\n")}`);
    this.name = "ConfigError";
  }
}

export const required = (name: string) => z.string({ required_error: `${name} is required` }).trim().min(1, `${name} is required`);
const flag = z
  .string()
  .optional()
  .transform((val) => val?.trim().toLowerCase() === "true");
const positiveInt = z.coerce.number().int().positive();

export const smokeEnvSchema = z.object({
  LLAMA_STACK_BASE_URL: z.string().url().default("http://127.0.0.1:8321"),
  VLLM_INFERENCE_MODEL: required("VLLM_INFERENCE_MODEL"),
  EMBEDDING_MODEL: required("EMBEDDING_MODEL"),
  VLLM_URL: z.string().default(""),

  VERTEX_AI_PROJECT: z.string().optional(),
  VERTEX_AI_LOCATION: z.string().default("us-central1"),
  VERTEX_AI_INFERENCE_MODEL: z.string().optional(),
  GOOGLE_APPLICATION_CREDENTIALS: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_INFERENCE_MODEL: z.string().optional(),

  POSTGRES_HOST: z.string().default("localhost"),
  POSTGRES_PORT: positiveInt.default(5432),
  POSTGRES_DB: z.string().default("llamastack"),
  POSTGRES_USER: z.string().default("llamastack"),
  POSTGRES_PASSWORD: z.string().default("llamastack"),
  DB_CLIENT: z.enum(["pg", "docker-psql"]).default("pg"),
  POSTGRES_CONTAINER: z.string().default("postgres"),

  SKIP_INFERENCE_TESTS: flag,
  STOP_CONTAINER: flag,

  IMAGE_NAME: required("IMAGE_NAME"),
  GITHUB_SHA: z.string().default("latest"),
  CONTAINER_NAME: z.string().default("llama-stack"),
  CONTAINER_RUNTIME: z.string().default("docker"),

  HEALTH_PROFILE: z.enum(["fast", "emulated"]).default("fast"),
  HEALTH_ATTEMPTS: positiveInt.optional(),
  HEALTH_INTERVAL_MS: z.coerce.number().int().nonnegative().optional(),
});

export interface PostgresSettings {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  client: "pg" | "docker-psql";
  container: string;
}

export interface ModelSettings {
  primary: string;
  embedding: string;
  vertex?: string;
  openai?: string;
}

export interface SmokeConfig {
  endpoint: string;
  models: ModelSettings;
  vllmUrl: string;
  vertex: { project?: string; location: string; credentialsFile?: string };
  openaiApiKey?: string;
  gates: ConfigurationGate[];
  postgres: PostgresSettings;
  container: { runtime: string; name: string; image: string; tag: string; stopAfterRun: boolean };
  readiness: RetryBudget;
  skipInference: boolean;
}

/** Drops unset and blank values so schema defaults apply to both. */
export function cleanEnv(env: Record<string, string | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") out[key] = value;
  }
  return out;
}

export function parseEnv<S extends z.ZodTypeAny>(schema: S, env: Record<string, string | undefined>): z.output<S> {
  const parsed = schema.safeParse(cleanEnv(env));
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => {
        const path = issue.path.join(".");
        return issue.message.startsWith(path) ? issue.message : `${path}: ${issue.message}`;
      }),
    );
  }
  return parsed.data;
}

/**
 * Gates in their evaluation order. Gate models come straight from the environment,
 * so an open gate with no model name set fails matrix validation.
 */
export function buildGates(env: {
  VERTEX_AI_PROJECT?: string;
  VERTEX_AI_INFERENCE_MODEL?: string;
  OPENAI_API_KEY?: string;
  OPENAI_INFERENCE_MODEL?: string;
}): ConfigurationGate[] {
  return [
    {
      name: "vertex-ai",
      variable: "VERTEX_AI_PROJECT",
      value: env.VERTEX_AI_PROJECT,
      models: [env.VERTEX_AI_INFERENCE_MODEL ?? ""],
    },
    {
      name: "openai",
      variable: "OPENAI_API_KEY",
      value: env.OPENAI_API_KEY,
      models: [env.OPENAI_INFERENCE_MODEL ?? ""],
    },
  ];
}

export function loadSmokeConfig(env: Record<string, string | undefined>): SmokeConfig {
  const e = parseEnv(smokeEnvSchema, env);
  const profile = READINESS_PROFILES[e.HEALTH_PROFILE];

  return {
    endpoint: e.LLAMA_STACK_BASE_URL.replace(/\/$/, ""),
    models: {
      primary: e.VLLM_INFERENCE_MODEL,
      embedding: e.EMBEDDING_MODEL,
      vertex: e.VERTEX_AI_INFERENCE_MODEL,
      openai: e.OPENAI_INFERENCE_MODEL,
    },
    vllmUrl: e.VLLM_URL,
    vertex: {
      project: e.VERTEX_AI_PROJECT,
      location: e.VERTEX_AI_LOCATION,
      credentialsFile: e.GOOGLE_APPLICATION_CREDENTIALS,
    },
    openaiApiKey: e.OPENAI_API_KEY,
    gates: buildGates(e),
    postgres: {
      host: e.POSTGRES_HOST,
      port: e.POSTGRES_PORT,
      database: e.POSTGRES_DB,
      user: e.POSTGRES_USER,
      password: e.POSTGRES_PASSWORD,
      client: e.DB_CLIENT,
      container: e.POSTGRES_CONTAINER,
    },
    container: {
      runtime: e.CONTAINER_RUNTIME,
      name: e.CONTAINER_NAME,
      image: e.IMAGE_NAME,
      tag: e.GITHUB_SHA,
      stopAfterRun: e.STOP_CONTAINER,
    },
    readiness: {
      attempts: e.HEALTH_ATTEMPTS ?? profile.attempts,
      intervalMs: e.HEALTH_INTERVAL_MS ?? profile.intervalMs,
    },
    skipInference: e.SKIP_INFERENCE_TESTS,
  };
}
