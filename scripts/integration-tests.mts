#!/usr/bin/env node
/**
 * Runs the upstream llama-stack inference integration suite against a running
 * server, once per configured generation model. The suite is checked out at the
 * release pinned in distribution/Containerfile.
 */

import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { banner, errorMessage, log } from "../src/harness/log.js";
import { loadSuiteConfig } from "../src/suite/config.js";
import { runSuite } from "../src/suite/runner.js";

const REPO_ROOT = join(dirname(fileURLToPath(import.meta.url)), "..");

async function main(): Promise<number> {
  banner("Llama Stack Integration Tests");
  const config = loadSuiteConfig(process.env, REPO_ROOT);
  const outcome = await runSuite(config);
  return outcome.exitCode;
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    log(`\n❌ Fatal error: ${errorMessage(err)}`, "red");
    process.exit(1);
  });
