import { ApplianceConfig } from "./core/config";
import { ConfigDocument, removeFromParent, setText } from "./core/document";
import {
  computeSignature,
  signDocument,
  verifySignature,
  checkSignature,
  readEmbeddedSignature,
  SignatureVerificationResult,
} from "./core/signature";
import {
  buildCanonicalView,
  uarDataPlaceholder,
  UAR_DATA_PLACEHOLDER_PATH,
} from "./core/canonicalization/canonicalView";
import { ConfigSerializer, XML_DECLARATION } from "./core/canonicalization/ConfigSerializer";
import { hmacSha1Hex, SIGNATURE_HEX_LENGTH } from "./core/hmac";
import {
  ApplianceConfigError,
  ApplianceConfigErrorCode,
  ParseError,
  StructureError,
  MultipleMatchError,
  AlreadyExistsError,
  InputFileError,
  SerializationError,
} from "./core/errors";
import { ConfigOptions, DuplicatePolicy, CONFIG_ELEMENTS } from "./core/types";
import { setLogLevel, LogLevel } from "./utils/logger";

export {
  // Facade
  ApplianceConfig,
  ConfigOptions,
  DuplicatePolicy,

  // Document model
  ConfigDocument,
  removeFromParent,
  setText,
  CONFIG_ELEMENTS,

  // Signing
  computeSignature,
  signDocument,
  verifySignature,
  checkSignature,
  readEmbeddedSignature,
  SignatureVerificationResult,
  hmacSha1Hex,
  SIGNATURE_HEX_LENGTH,

  // Canonicalization
  buildCanonicalView,
  uarDataPlaceholder,
  UAR_DATA_PLACEHOLDER_PATH,
  ConfigSerializer,
  XML_DECLARATION,

  // Errors
  ApplianceConfigError,
  ApplianceConfigErrorCode,
  ParseError,
  StructureError,
  MultipleMatchError,
  AlreadyExistsError,
  InputFileError,
  SerializationError,

  // Logging
  setLogLevel,
  LogLevel,
};
