import { join } from "path";
import { z } from "zod";
import { buildGates, parseEnv, required, type ModelSettings } from "../harness/config.js";
import type { ConfigurationGate } from "../harness/matrix.js";

export const suiteEnvSchema = z.object({
  VLLM_INFERENCE_MODEL: required("VLLM_INFERENCE_MODEL"),
  EMBEDDING_MODEL: required("EMBEDDING_MODEL"),
  VERTEX_AI_PROJECT: z.string().optional(),
  VERTEX_AI_INFERENCE_MODEL: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_INFERENCE_MODEL: z.string().optional(),
  CONTAINERFILE: z.string().optional(),
  STACK_CONFIG_PATH: z.string().optional(),
  WORK_DIR: z.string().default("/tmp/llama-stack-integration-tests"),
});

export interface SuiteConfig {
  models: ModelSettings;
  gates: ConfigurationGate[];
  containerfile: string;
  stackConfigPath: string;
  workDir: string;
  /** Environment the suite's child processes start from. */
  childEnv: Record<string, string>;
}

/** Paths default to the `distribution/` directory of `repoRoot`. */
export function loadSuiteConfig(env: Record<string, string | undefined>, repoRoot: string): SuiteConfig {
  const e = parseEnv(suiteEnvSchema, env);
  return {
    models: {
      primary: e.VLLM_INFERENCE_MODEL,
      embedding: e.EMBEDDING_MODEL,
      vertex: e.VERTEX_AI_INFERENCE_MODEL,
      openai: e.OPENAI_INFERENCE_MODEL,
    },
    gates: buildGates(e),
    containerfile: e.CONTAINERFILE ?? join(repoRoot, "distribution", "Containerfile"),
    stackConfigPath: e.STACK_CONFIG_PATH ?? join(repoRoot, "distribution", "config.yaml"),
    workDir: e.WORK_DIR,
    childEnv: definedValues(env),
  };
}

function definedValues(env: Record<string, string | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}
