/**
 * Typed exit codes for CLI commands.
 * The numbers follow the legacy administration tool: 1 for failures,
 * 3 for bad invocations.
 */
export type ExitCode =
  | { kind: "success" } // 0
  | { kind: "general_error" } // 1 - failed operation or signature mismatch
  | { kind: "usage_error" }; // 3 - missing or invalid options

export function toNumericExitCode(exitCode: ExitCode): number {
  switch (exitCode.kind) {
    case "success":
      return 0;
    case "general_error":
      return 1;
    case "usage_error":
      return 3;
  }
}
