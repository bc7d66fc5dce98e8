import { existsSync, readFileSync, writeFileSync } from "fs";
import { ConfigDocument } from "./document";
import { AlreadyExistsError, InputFileError } from "./errors";
import { ConfigOptions } from "./types";
import {
  computeSignature,
  signDocument,
  checkSignature,
  SignatureVerificationResult,
} from "./signature";
import { log } from "../utils/logger";

/**
 * Search appliance XML configuration: the entry point used by the CLI and
 * by anything that moves exports to and from an appliance.
 *
 * All operations are synchronous and work on this instance's document only.
 */
export class ApplianceConfig {
  private readonly document: ConfigDocument;

  private constructor(document: ConfigDocument) {
    this.document = document;
  }

  /**
   * Read a configuration export from disk
   * @throws InputFileError if the file does not exist or cannot be read
   * @throws ParseError if it is not well-formed XML
   */
  static openFile(fileName: string, options: ConfigOptions = {}): ApplianceConfig {
    if (!existsSync(fileName)) {
      throw new InputFileError(fileName, "file does not exist");
    }

    let bytes: Uint8Array;
    try {
      bytes = readFileSync(fileName);
    } catch (error) {
      throw new InputFileError(fileName, error instanceof Error ? error.message : String(error));
    }

    log.debug("config", `Read ${bytes.length} bytes from ${fileName}`);
    return ApplianceConfig.fromBytes(bytes, options);
  }

  static fromString(xml: string, options: ConfigOptions = {}): ApplianceConfig {
    return new ApplianceConfig(ConfigDocument.fromString(xml, options));
  }

  static fromBytes(bytes: Uint8Array, options: ConfigOptions = {}): ApplianceConfig {
    return new ApplianceConfig(ConfigDocument.load(bytes, options));
  }

  getXMLContents(): string {
    return this.document.getText();
  }

  toBytes(): Uint8Array {
    return this.document.getBytes();
  }

  toString(): string {
    return this.getXMLContents();
  }

  computeSignature(password: string): string {
    return computeSignature(this.document, password);
  }

  /**
   * Embed the signature for `password`; returns the new signature
   */
  sign(password: string): string {
    return signDocument(this.document, password);
  }

  verifySignature(password: string): boolean {
    return checkSignature(this.document, password).isValid;
  }

  /**
   * Like verifySignature, with the expected and embedded values for reporting
   */
  checkSignature(password: string): SignatureVerificationResult {
    return checkSignature(this.document, password);
  }

  /**
   * Write the document, normalized the way the appliance expects it on import.
   * Never overwrites.
   *
   * @throws AlreadyExistsError if `fileName` exists; the existing file is left as it was
   */
  writeFile(fileName: string): void {
    const output = ConfigDocument.serialize(this.document.parse());

    log.debug("config", `Writing XML to ${fileName}`);
    try {
      writeFileSync(fileName, output, { encoding: "utf-8", flag: "wx" });
    } catch (error) {
      if (isErrnoException(error) && error.code === "EEXIST") {
        throw new AlreadyExistsError(fileName);
      }
      throw error;
    }
  }
}

// fs errors can come from another realm (Jest's sandbox), so no instanceof check
function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === "object" && error !== null && "code" in error;
}
