import { exitCodeFor, FailureLedger, planProbes, printSummary, runAll } from "./aggregate.js";
import type { StackClient } from "./client.js";
import type { SmokeConfig } from "./config.js";
import { buildRunArgs, type ContainerRuntime } from "./container.js";
import { errorMessage, log, type Logger } from "./log.js";
import { buildMatrix, type ModelMatrix } from "./matrix.js";
import type { Sleep } from "./poll.js";
import type { ProbeResult } from "./probes/types.js";
import { waitUntilReady } from "./readiness.js";
import type { SqlStore } from "./store.js";

export type SmokeState =
  | "not-started"
  | "service-starting"
  | "service-ready"
  | "aborted"
  | "probes-running"
  | "reported";

export interface SmokeDeps {
  client: Pick<StackClient, "health" | "listModels" | "chatCompletion">;
  container: ContainerRuntime;
  store: SqlStore;
  log?: Logger;
  sleep?: Sleep;
  fileExists?: (path: string) => boolean;
  /** Observes every state transition. */
  onState?: (state: SmokeState) => void;
}

export interface SmokeOutcome {
  state: "aborted" | "reported";
  exitCode: number;
  ledger: FailureLedger;
  results: ProbeResult[];
  matrix: ModelMatrix;
}

/** Listing covers the embedding model too; inference only the generation models. */
export function smokeMatrix(config: Pick<SmokeConfig, "models" | "gates">): ModelMatrix {
  return buildMatrix(
    {
      listing: [config.models.primary, config.models.embedding],
      inference: [config.models.primary],
    },
    config.gates,
  );
}

function logGates(matrix: ModelMatrix, logger: Logger): void {
  for (const gate of matrix.included) {
    logger(`===> ${gate.variable} is set, including ${gate.name} models in tests`, "cyan");
  }
  for (const gate of matrix.skipped) {
    logger(`===> ${gate.variable} is not set, skipping ${gate.name} models`, "yellow");
  }
}

/**
 * Starts the stack, waits for it, runs the probe plan and reports.
 * Throws only for invalid input (InvalidModelError), before anything is started.
 */
export async function runSmoke(config: SmokeConfig, deps: SmokeDeps): Promise<SmokeOutcome> {
  const logger = deps.log ?? log;
  const enter = (state: SmokeState) => deps.onState?.(state);
  const containerName = config.container.name;

  enter("not-started");
  const matrix = smokeMatrix(config);

  const abort = (reason: string): SmokeOutcome => {
    logger(`❌ ${reason}`, "red");
    enter("aborted");
    return { state: "aborted", exitCode: 1, ledger: new FailureLedger(), results: [], matrix };
  };

  enter("service-starting");
  try {
    const id = await deps.container.start(buildRunArgs(config, deps.fileExists));
    logger(`Started Llama Stack container ${containerName} ${id}`.trimEnd(), "dim");
  } catch (err) {
    return abort(`Could not start Llama Stack container: ${errorMessage(err)}`);
  }

  try {
    return await verifyStack(config, deps, matrix, logger, enter, abort);
  } finally {
    if (config.container.stopAfterRun) await stopContainer(deps.container, containerName, logger);
  }
}

/** Everything after a successful start; the caller stops the container once this settles. */
async function verifyStack(
  config: SmokeConfig,
  deps: SmokeDeps,
  matrix: ModelMatrix,
  logger: Logger,
  enter: (state: SmokeState) => void,
  abort: (reason: string) => SmokeOutcome,
): Promise<SmokeOutcome> {
  const containerName = config.container.name;

  logger("Waiting for Llama Stack server...", "cyan");
  const readiness = await waitUntilReady(deps.client, config.readiness, { sleep: deps.sleep, log: logger });
  if (!readiness.ready) {
    if (readiness.lastBody !== undefined) logger(`Last health response: ${readiness.lastBody}`, "dim");
    if (readiness.lastError !== undefined) logger(`Last health error: ${readiness.lastError}`, "dim");
    logger("Container logs:", "dim");
    logger(await collectLogs(deps.container, containerName), "dim");
    return abort(`Llama Stack server failed to start after ${readiness.attempts} attempts`);
  }
  logger(`  ✓ Llama Stack server is up after ${readiness.attempts} attempt(s)`, "green");
  enter("service-ready");

  if (config.skipInference) {
    logger("===> SKIP_INFERENCE_TESTS is set, running container health and PostgreSQL verification only", "yellow");
    logger("===> Skipping model list, inference, and data population checks", "yellow");
  } else {
    logGates(matrix, logger);
  }

  enter("probes-running");
  const probes = planProbes(
    matrix,
    {
      client: deps.client,
      store: deps.store,
      collectLogs: () => collectLogs(deps.container, containerName),
      log: logger,
      sleep: deps.sleep,
    },
    { skipInference: config.skipInference },
  );
  const { results, ledger } = await runAll(probes, { log: logger });

  printSummary(ledger, logger);
  enter("reported");

  return { state: "reported", exitCode: exitCodeFor(ledger), ledger, results, matrix };
}

async function stopContainer(container: ContainerRuntime, name: string, logger: Logger): Promise<void> {
  try {
    await container.stop(name);
    logger(`Stopped Llama Stack container ${name}`, "dim");
  } catch (err) {
    logger(`⚠️  Could not stop Llama Stack container ${name}: ${errorMessage(err)}`, "yellow");
  }
}

async function collectLogs(container: ContainerRuntime, name: string): Promise<string> {
  try {
    return await container.logs(name);
  } catch (err) {
    return `(could not collect container logs: ${errorMessage(err)})`;
  }
}
