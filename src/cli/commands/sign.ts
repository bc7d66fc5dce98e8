import { ApplianceConfig } from "../../core/config";
import { log } from "../../utils/logger";
import { CliResult, misuse, success } from "../types";
import { SigningCommandOptions, checkSignPassword, domainFailure, toConfigOptions } from "./shared";

export interface SignCommandOptions extends SigningCommandOptions {
  output?: string;
}

/**
 * Sign an exported configuration file and write the result to a new file
 */
export function executeSignCommand(options: SignCommandOptions): CliResult {
  const passwordProblem = checkSignPassword(options.signPassword);
  if (passwordProblem) return passwordProblem;

  const { inputFile, output, signPassword } = options;
  if (!inputFile) return misuse("Input file not given");
  if (!output) return misuse("Output file not given");
  if (!signPassword) return misuse("Signing password not given");

  try {
    log.info("sign", `Signing ${inputFile}`);
    const config = ApplianceConfig.openFile(inputFile, toConfigOptions(options));
    const signature = config.sign(signPassword);
    log.info("sign", `Writing signed file to ${output}`);
    config.writeFile(output);
    return success(`Signed ${inputFile} into ${output}`, [`signature: ${signature}`]);
  } catch (error) {
    return domainFailure(error);
  }
}
