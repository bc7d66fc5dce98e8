// src/core/errors.ts

export type ApplianceConfigErrorCode =
  | "PARSE_ERROR"
  | "STRUCTURE_ERROR"
  | "MULTIPLE_MATCH"
  | "ALREADY_EXISTS"
  | "INPUT_FILE"
  | "SERIALIZATION_ERROR";

/**
 * Base class for every error the configuration core raises
 */
export class ApplianceConfigError extends Error {
  readonly code: ApplianceConfigErrorCode;

  constructor(code: ApplianceConfigErrorCode, message: string) {
    super(message);
    this.name = "ApplianceConfigError";
    this.code = code;
  }
}

/**
 * Input is not well-formed XML (or not valid UTF-8)
 */
export class ParseError extends ApplianceConfigError {
  constructor(message: string) {
    super("PARSE_ERROR", message);
    this.name = "ParseError";
  }
}

/**
 * A required element is missing: the input is not an appliance configuration export
 */
export class StructureError extends ApplianceConfigError {
  readonly element: string;

  constructor(element: string, message = `Required element <${element}> not found`) {
    super("STRUCTURE_ERROR", message);
    this.name = "StructureError";
    this.element = element;
  }
}

/**
 * A required element appears more than once
 */
export class MultipleMatchError extends ApplianceConfigError {
  readonly element: string;
  readonly count: number;

  constructor(element: string, count: number) {
    super("MULTIPLE_MATCH", `Expected exactly one <${element}> element, found ${count}`);
    this.name = "MultipleMatchError";
    this.element = element;
    this.count = count;
  }
}

export class AlreadyExistsError extends ApplianceConfigError {
  readonly path: string;

  constructor(path: string) {
    super("ALREADY_EXISTS", `Output file exists: ${path}`);
    this.name = "AlreadyExistsError";
    this.path = path;
  }
}

export class InputFileError extends ApplianceConfigError {
  readonly path: string;

  constructor(path: string, reason: string) {
    super("INPUT_FILE", `Cannot read input file ${path}: ${reason}`);
    this.name = "InputFileError";
    this.path = path;
  }
}

/**
 * The tree holds content that has no XML serialization (e.g. "]]>" inside CDATA)
 */
export class SerializationError extends ApplianceConfigError {
  constructor(message: string) {
    super("SERIALIZATION_ERROR", message);
    this.name = "SerializationError";
  }
}
