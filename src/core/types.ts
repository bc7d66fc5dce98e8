/**
 * How lookups of the four special elements treat more than one match:
 * - "error": raise MultipleMatchError
 * - "first": log a warning and use the first match in document order
 */
export type DuplicatePolicy = "error" | "first";

/**
 * Options accepted by the configuration document and facade
 */
export interface ConfigOptions {
  duplicates?: DuplicatePolicy;
}

export const DEFAULT_CONFIG_OPTIONS: Required<ConfigOptions> = {
  duplicates: "error",
};

/** Element names the signing pipeline knows about */
export const CONFIG_ELEMENTS = {
  uamDir: "uam_dir",
  uarData: "uar_data",
  config: "config",
  signature: "signature",
} as const;
