import { ApplianceConfig } from "../../core/config";
import { CliResult, failure, misuse, success } from "../types";
import { SigningCommandOptions, checkSignPassword, domainFailure, toConfigOptions } from "./shared";

export type VerifyCommandOptions = SigningCommandOptions;

/**
 * Check the signature embedded in a configuration file against a password
 */
export function executeVerifyCommand(options: VerifyCommandOptions): CliResult {
  const passwordProblem = checkSignPassword(options.signPassword);
  if (passwordProblem) return passwordProblem;

  const { inputFile, signPassword } = options;
  if (!inputFile) return misuse("Input file not given");
  if (!signPassword) return misuse("Signing password not given");

  try {
    const config = ApplianceConfig.openFile(inputFile, toConfigOptions(options));
    const result = config.checkSignature(signPassword);
    if (result.isValid) {
      return success("XML Signature/HMAC matches supplied password");
    }
    return failure("XML Signature/HMAC does NOT match supplied password", {
      severity: "warning",
      details: [`embedded: ${result.embedded || "(empty)"}`, `computed: ${result.expected}`],
    });
  } catch (error) {
    return domainFailure(error);
  }
}
