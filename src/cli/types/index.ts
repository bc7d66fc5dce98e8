export type { ExitCode } from "./exit-code";
export { toNumericExitCode } from "./exit-code";

export type { CliOutput, CliResult } from "./cli-result";
export { success, failure, misuse } from "./cli-result";
