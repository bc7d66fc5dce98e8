import type { ExitCode } from "./exit-code";

/**
 * What a command wants shown to the user
 */
export interface CliOutput {
  readonly message: string;
  readonly details?: readonly string[];
  /** Failures default to "error"; a signature mismatch is reported as a warning */
  readonly severity?: "warning" | "error";
}

/**
 * Result of a CLI command. Commands return these; only the composition root
 * turns them into a process exit.
 */
export type CliResult =
  | { kind: "success"; output?: CliOutput }
  | { kind: "failure"; exitCode: ExitCode; output: CliOutput };

export function success(message: string, details?: readonly string[]): CliResult {
  return { kind: "success", output: { message, details } };
}

export function failure(
  message: string,
  options?: {
    exitCode?: ExitCode;
    details?: readonly string[];
    severity?: "warning" | "error";
  },
): CliResult {
  return {
    kind: "failure",
    exitCode: options?.exitCode ?? { kind: "general_error" },
    output: { message, details: options?.details, severity: options?.severity },
  };
}

/**
 * Bad invocation: missing or invalid options
 */
export function misuse(message: string): CliResult {
  return { kind: "failure", exitCode: { kind: "usage_error" }, output: { message } };
}
