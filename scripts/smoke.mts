#!/usr/bin/env node
/**
 * Smoke test for a Llama Stack distribution image.
 *
 * Starts the image, waits for /v1/health, checks model registration and inference
 * for every configured model, then verifies the PostgreSQL store was initialised
 * and populated. Provider models are included only when their credentials are set.
 *
 * Usage:
 *   IMAGE_NAME=... GITHUB_SHA=... VLLM_INFERENCE_MODEL=... EMBEDDING_MODEL=... \
 *     node --import tsx scripts/smoke.mts
 *
 * Exit codes:
 *   0 = every check passed
 *   1 = server never became ready, invalid configuration, or a check failed
 */

import { loadSmokeConfig } from "../src/harness/config.js";
import { StackClient } from "../src/harness/client.js";
import { DockerCli } from "../src/harness/container.js";
import { banner, errorMessage, log } from "../src/harness/log.js";
import { runSmoke } from "../src/harness/orchestrator.js";
import { createStore } from "../src/harness/store.js";

async function main(): Promise<number> {
  banner("Llama Stack Smoke Test");

  const config = loadSmokeConfig(process.env);
  log(`\nEndpoint:  ${config.endpoint}`, "dim");
  log(`Image:     ${config.container.image}:${config.container.tag}`, "dim");
  log(`Readiness: ${config.readiness.attempts} attempts, ${config.readiness.intervalMs}ms apart\n`, "dim");

  const store = createStore(config.postgres, config.container.runtime);
  try {
    const outcome = await runSmoke(config, {
      client: new StackClient(config.endpoint),
      container: new DockerCli(config.container.runtime),
      store,
    });
    return outcome.exitCode;
  } finally {
    await store.close();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    log(`\n❌ Fatal error: ${errorMessage(err)}`, "red");
    process.exit(1);
  });
