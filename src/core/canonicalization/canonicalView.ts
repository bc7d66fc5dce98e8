import { ConfigDocument, removeFromParent, setText } from "../document";
import { ConfigSerializer } from "./ConfigSerializer";
import { CONFIG_ELEMENTS } from "../types";
import { hmacSha1Hex } from "../hmac";
import { getCharacterData } from "../../utils/xmlParser";
import { log } from "../../utils/logger";

/** Path the appliance substitutes for inline user agent rules data */
export const UAR_DATA_PLACEHOLDER_PATH = "/tmp/tmp_uar_data_dir";

/** Indentation the appliance leaves before </uar_data> */
export const UAR_DATA_CLOSING_INDENT = " ".repeat(10);

/**
 * Text the appliance hashes in place of non-blank <uar_data> content
 */
export function uarDataPlaceholder(uarData: string, password: string): string {
  const digest = hmacSha1Hex(password, uarData.trim() + "\n");
  return `\n${UAR_DATA_PLACEHOLDER_PATH},${digest}\n${UAR_DATA_CLOSING_INDENT}`;
}

/**
 * Build the exact string whose HMAC is the document signature.
 *
 * Works on a fresh tree, the document itself is left untouched:
 * 1. <uam_dir> is removed together with its line (appliances from 7.0 on
 *    reject documents containing it). A document without it is accepted.
 * 2. Non-blank <uar_data> content is replaced by the placeholder path and
 *    the HMAC of the trimmed content plus a newline.
 * 3. The <config> element is serialized with its subtree.
 *
 * @throws StructureError if <uar_data> or <config> is missing
 */
export function buildCanonicalView(document: ConfigDocument, password: string): string {
  const tree = document.parse();

  const uamDir = document.findOptional(tree, CONFIG_ELEMENTS.uamDir);
  if (uamDir) {
    removeFromParent(uamDir, { collapseLine: true });
  } else {
    log.debug("canonical-view", "No <uam_dir> element, nothing to remove");
  }

  const uarData = document.findSingle(tree, CONFIG_ELEMENTS.uarData);
  const uarContent = getCharacterData(uarData);
  if (uarContent.trim() !== "") {
    setText(uarData, uarDataPlaceholder(uarContent, password));
    log.debug("canonical-view", "UAR data present (7.0 or newer export), replaced by placeholder");
  }

  const config = document.findSingle(tree, CONFIG_ELEMENTS.config);
  return ConfigSerializer.serialize(config);
}
