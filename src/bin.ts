#!/usr/bin/env node

import { hideBin } from "yargs/helpers";
import { buildCli } from "./cli.js";
import { DeployError, DeployErrorCode, describeError } from "./errors.js";
import { logError, logInfo } from "./log.js";

/**
 * CLI entry point for kubeprofile
 */
async function main(): Promise<void> {
  await buildCli(hideBin(process.argv)).parseAsync();
}

main().catch((error: unknown) => {
  if (error instanceof DeployError && error.code === DeployErrorCode.CANCELLED) {
    logInfo(error.message);
    return;
  }
  if (error instanceof Error && error.name === "ExitPromptError") {
    logError("Deployment interrupted by user");
  } else {
    logError(describeError(error));
  }
  process.exitCode = 1;
});
