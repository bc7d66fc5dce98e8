import { ApplianceConfigError } from "../../core/errors";
import { ConfigOptions } from "../../core/types";
import { CliResult, failure, misuse } from "../types";

export const MIN_SIGN_PASSWORD_LENGTH = 8;

/**
 * Options common to the commands that need the signing password
 */
export interface SigningCommandOptions {
  inputFile?: string;
  signPassword?: string;
  allowDuplicates?: boolean;
}

/**
 * Check the signing password; returns the usage failure to report, if any
 */
export function checkSignPassword(password: string | undefined): CliResult | null {
  if (!password) {
    return misuse("Signing password not given");
  }
  if (password.length < MIN_SIGN_PASSWORD_LENGTH) {
    return misuse(`Signing password must be ${MIN_SIGN_PASSWORD_LENGTH} characters or longer`);
  }
  return null;
}

export function toConfigOptions(options: SigningCommandOptions): ConfigOptions {
  return { duplicates: options.allowDuplicates ? "first" : "error" };
}

/**
 * Map errors raised by the configuration core to a failed result.
 * Anything else is a bug and is rethrown.
 */
export function domainFailure(error: unknown): CliResult {
  if (error instanceof ApplianceConfigError) {
    return failure(error.message, { details: [`${error.name} (${error.code})`] });
  }
  throw error;
}
