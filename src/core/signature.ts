import { ConfigDocument, removeFromParent, setText } from "./document";
import { buildCanonicalView } from "./canonicalization/canonicalView";
import { CONFIG_ELEMENTS } from "./types";
import { hmacSha1Hex } from "./hmac";
import { getCharacterData } from "../utils/xmlParser";
import { log } from "../utils/logger";

/**
 * Result of comparing the embedded signature with the computed one
 */
export interface SignatureVerificationResult {
  isValid: boolean;
  expected: string;
  embedded: string;
}

/**
 * HMAC-SHA1 (lowercase hex) of the document's canonical view
 */
export function computeSignature(document: ConfigDocument, password: string): string {
  return hmacSha1Hex(password, buildCanonicalView(document, password));
}

/**
 * Write a fresh signature into the document.
 *
 * The output also loses its <uam_dir> element, which newer appliances refuse
 * on import. The signature text is replaced as a whole, so any whitespace
 * around a previous value goes away.
 *
 * @throws StructureError if there is no <signature> element
 */
export function signDocument(document: ConfigDocument, password: string): string {
  const signature = computeSignature(document, password);
  const tree = document.parse();

  const uamDir = document.findOptional(tree, CONFIG_ELEMENTS.uamDir);
  if (uamDir) {
    removeFromParent(uamDir, { collapseLine: true });
  }

  const signatureElement = document.findSingle(tree, CONFIG_ELEMENTS.signature);
  setText(signatureElement, signature);
  document.update(tree);

  log.debug("signature", `Document signed: ${signature}`);
  return signature;
}

/**
 * Text content of the <signature> element, trimmed
 * @throws StructureError if there is no <signature> element
 */
export function readEmbeddedSignature(document: ConfigDocument): string {
  const tree = document.parse();
  return getCharacterData(document.findSingle(tree, CONFIG_ELEMENTS.signature)).trim();
}

/**
 * Compare the embedded signature with the one computed for a password.
 *
 * The embedded value may carry whitespace and line breaks, so it matches when
 * the computed digest occurs anywhere inside it. A mismatch is a normal
 * result, not an error.
 */
export function checkSignature(document: ConfigDocument, password: string): SignatureVerificationResult {
  const expected = computeSignature(document, password);
  const tree = document.parse();
  const embedded = getCharacterData(document.findSingle(tree, CONFIG_ELEMENTS.signature));
  const isValid = embedded.includes(expected);

  if (isValid) {
    log.debug("signature", "Signature matches");
  } else {
    log.debug("signature", `Signature does not match ${embedded.trim()} vs ${expected}`);
  }

  return { isValid, expected, embedded: embedded.trim() };
}

export function verifySignature(document: ConfigDocument, password: string): boolean {
  return checkSignature(document, password).isValid;
}
