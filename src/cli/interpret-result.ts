/**
 * Bridges CLI command results to log output and process exit codes
 */

import { log } from "../utils/logger";
import { CliResult, toNumericExitCode } from "./types";

/**
 * Log a result's output; details only show at debug level
 */
export function printResult(result: CliResult): void {
  const output = result.output;
  if (!output) return;

  if (result.kind === "success") {
    log.info("cli", output.message);
    for (const detail of output.details ?? []) {
      log.debug("cli", detail);
    }
    return;
  }

  const report = output.severity === "warning" ? log.warn : log.error;
  report("cli", output.message);
  for (const detail of output.details ?? []) {
    log.debug("cli", detail);
  }
}

/**
 * Print a result and return the process exit code it maps to
 */
export function interpretCliResult(result: CliResult): number {
  printResult(result);
  return result.kind === "success" ? 0 : toNumericExitCode(result.exitCode);
}
