import { Command, Option } from "commander";
import { setLogLevel } from "../utils/logger";
import { executeSignCommand, executeVerifyCommand } from "./commands";
import type { SignCommandOptions, VerifyCommandOptions } from "./commands";
import { interpretCliResult } from "./interpret-result";

export const SIGN_PASSWORD_ENV = "APPLIANCE_SIGN_PASSWORD";

interface GlobalOptions {
  verbose: number;
  quiet?: boolean;
}

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

function signPasswordOption(): Option {
  return new Option("-g, --sign-password <password>", "password the configuration is signed with").env(
    SIGN_PASSWORD_ENV,
  );
}

/**
 * Build the CLI. Each action stores its exit code in `process.exitCode`
 * and lets the process end on its own.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name("appliance-config")
    .description("Sign and verify search appliance XML configuration exports")
    .version("0.1.0")
    .option("-v, --verbose", "more output, repeat for debug", increaseVerbosity, 0)
    .option("-q, --quiet", "only report errors");

  program.hook("preAction", () => {
    const { verbose, quiet } = program.opts<GlobalOptions>();
    if (quiet) {
      setLogLevel("error");
    } else {
      setLogLevel(verbose > 0 ? "debug" : "info");
    }
  });

  program
    .command("sign")
    .description("Sign an XML configuration file")
    .option("-f, --input-file <file>", "configuration file to sign")
    .option("-o, --output <file>", "where to write the signed file (must not exist)")
    .addOption(signPasswordOption())
    .option("--allow-duplicates", "use the first of duplicated special elements instead of failing")
    .action((options: SignCommandOptions) => {
      process.exitCode = interpretCliResult(executeSignCommand(options));
    });

  program
    .command("verify")
    .description("Verify the signature/HMAC of an XML configuration file")
    .option("-f, --input-file <file>", "configuration file to verify")
    .addOption(signPasswordOption())
    .option("--allow-duplicates", "use the first of duplicated special elements instead of failing")
    .action((options: VerifyCommandOptions) => {
      process.exitCode = interpretCliResult(executeVerifyCommand(options));
    });

  return program;
}
