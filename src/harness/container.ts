import { existsSync } from "fs";
import type { SmokeConfig } from "./config.js";
import { runCommand, type CommandRunner } from "./exec.js";

export const STACK_PORT = 8321;
export const GCP_CREDENTIALS_MOUNT = "/run/secrets/gcp-credentials";

export interface ContainerRuntime {
  /** Starts a detached container; rejects with the runtime's stderr on failure. */
  start(args: string[]): Promise<string>;
  logs(name: string): Promise<string>;
  stop(name: string): Promise<void>;
}

type RunSettings = Pick<SmokeConfig, "models" | "vllmUrl" | "vertex" | "openaiApiKey" | "postgres" | "container">;

/**
 * Arguments for `docker run`. Provider settings are only passed when their gate
 * is open, and the credential file is only mounted when it exists on this host.
 */
export function buildRunArgs(
  config: RunSettings,
  fileExists: (path: string) => boolean = existsSync,
): string[] {
  const env = (name: string, value: string | number) => ["--env", `${name}=${value}`];
  const { postgres, vertex } = config;

  const args = [
    "run",
    "-d",
    "--pull=never",
    "--net=host",
    "-p",
    `${STACK_PORT}:${STACK_PORT}`,
    ...env("INFERENCE_MODEL", config.models.primary),
    ...env("EMBEDDING_MODEL", config.models.embedding),
    ...env("VLLM_URL", config.vllmUrl),
    ...env("ENABLE_SENTENCE_TRANSFORMERS", "True"),
    ...env("EMBEDDING_PROVIDER", "sentence-transformers"),
    ...env("TRUSTYAI_LMEVAL_USE_K8S", "False"),
    ...env("POSTGRES_HOST", postgres.host),
    ...env("POSTGRES_PORT", postgres.port),
    ...env("POSTGRES_DB", postgres.database),
    ...env("POSTGRES_USER", postgres.user),
    ...env("POSTGRES_PASSWORD", postgres.password),
  ];

  if (vertex.project) {
    args.push(
      ...env("VERTEX_AI_PROJECT", vertex.project),
      ...env("VERTEX_AI_LOCATION", vertex.location),
      ...env("GOOGLE_APPLICATION_CREDENTIALS", GCP_CREDENTIALS_MOUNT),
    );
    if (vertex.credentialsFile && fileExists(vertex.credentialsFile)) {
      args.push("--volume", `${vertex.credentialsFile}:${GCP_CREDENTIALS_MOUNT}:ro`);
    }
  }

  if (config.openaiApiKey) {
    args.push(...env("OPENAI_API_KEY", config.openaiApiKey));
  }

  args.push("--name", config.container.name, `${config.container.image}:${config.container.tag}`);
  return args;
}

/** Drives the docker (or podman) CLI. */
export class DockerCli implements ContainerRuntime {
  constructor(
    private readonly binary = "docker",
    private readonly run: CommandRunner = runCommand,
  ) {}

  async start(args: string[]): Promise<string> {
    const { exitCode, stdout, stderr } = await this.run(this.binary, args);
    if (exitCode !== 0) {
      throw new Error(`${this.binary} run exited with ${exitCode}: ${stderr.trim() || "(no output)"}`);
    }
    return stdout.trim();
  }

  async logs(name: string): Promise<string> {
    const { exitCode, stdout, stderr } = await this.run(this.binary, ["logs", "--tail", "200", name]);
    // docker logs writes the container's stderr stream to its own stderr
    const output = `${stdout}${stderr}`.trim();
    if (exitCode !== 0) return `(${this.binary} logs exited with ${exitCode}) ${output}`;
    return output;
  }

  async stop(name: string): Promise<void> {
    await this.run(this.binary, ["rm", "-f", name]);
  }
}
