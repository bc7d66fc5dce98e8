export { executeSignCommand } from "./sign";
export type { SignCommandOptions } from "./sign";
export { executeVerifyCommand } from "./verify";
export type { VerifyCommandOptions } from "./verify";
export { MIN_SIGN_PASSWORD_LENGTH } from "./shared";
