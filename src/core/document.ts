import { ParseError, StructureError, MultipleMatchError } from "./errors";
import { ConfigSerializer } from "./canonicalization/ConfigSerializer";
import { ConfigOptions, DEFAULT_CONFIG_OPTIONS, DuplicatePolicy } from "./types";
import {
  parseXML,
  findElementsByTagNameRecursive,
  setCharacterData,
  isWhitespaceText,
} from "../utils/xmlParser";
import { bytesToUtf8, utf8ToBytes } from "../utils/encoding";
import { log } from "../utils/logger";

/**
 * An appliance configuration document.
 *
 * Owns the raw UTF-8 content. Trees are always parsed fresh from that
 * content, and a mutated tree only reaches the content through `update`,
 * which re-serializes it, so content and tree cannot drift apart.
 */
export class ConfigDocument {
  private content: Uint8Array;
  readonly options: Required<ConfigOptions>;

  private constructor(content: Uint8Array, options: ConfigOptions) {
    this.content = content;
    this.options = { ...DEFAULT_CONFIG_OPTIONS, ...options };
  }

  /**
   * Load a document from raw bytes
   * @throws ParseError if the bytes are not UTF-8 encoded, well-formed XML
   */
  static load(bytes: Uint8Array, options: ConfigOptions = {}): ConfigDocument {
    const document = new ConfigDocument(Uint8Array.from(bytes), options);
    document.parse();
    return document;
  }

  static fromString(xml: string, options: ConfigOptions = {}): ConfigDocument {
    return ConfigDocument.load(utf8ToBytes(xml), options);
  }

  getBytes(): Uint8Array {
    return Uint8Array.from(this.content);
  }

  getText(): string {
    return decode(this.content);
  }

  /**
   * Parse a fresh tree from the current content
   */
  parse(): Document {
    return parseXML(decode(this.content));
  }

  /**
   * Replace the content with the serialization of a (mutated) tree
   */
  update(tree: Document): void {
    this.content = utf8ToBytes(ConfigDocument.serialize(tree));
  }

  static serialize(tree: Document): string {
    return ConfigSerializer.serializeDocument(tree);
  }

  /**
   * First element with this tag name in document order
   * @throws StructureError if there is none
   * @throws MultipleMatchError if there are several and the duplicate policy is "error"
   */
  findSingle(tree: Node, tagName: string): Element {
    const element = this.findOptional(tree, tagName);
    if (!element) {
      throw new StructureError(tagName);
    }
    return element;
  }

  /**
   * Like findSingle, but an absent element is not an error
   */
  findOptional(tree: Node, tagName: string): Element | null {
    return selectFirst(findElementsByTagNameRecursive(tree, tagName), tagName, this.options.duplicates);
  }
}

function decode(bytes: Uint8Array): string {
  try {
    return bytesToUtf8(bytes);
  } catch (error) {
    throw new ParseError(
      `Input is not valid UTF-8: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}

function selectFirst(matches: Element[], tagName: string, policy: DuplicatePolicy): Element | null {
  if (matches.length > 1) {
    if (policy === "error") {
      throw new MultipleMatchError(tagName, matches.length);
    }
    log.warn("document", `Found ${matches.length} <${tagName}> elements, using the first one`);
  }
  return matches[0] ?? null;
}

export function setText(element: Element, value: string): void {
  setCharacterData(element, value);
}

/**
 * Detach a node from its parent.
 *
 * With `collapseLine`, the node's line disappears with it: the indentation
 * run at the end of a whitespace-only text node right before it and one line
 * break at the start of a whitespace-only text node right after it are
 * removed as well.
 */
export function removeFromParent(node: Node, options: { collapseLine?: boolean } = {}): void {
  const parent = node.parentNode;
  if (!parent) return;

  if (options.collapseLine) {
    const before = node.previousSibling;
    if (isWhitespaceText(before)) {
      const trimmed = before.data.replace(/[ \t]+$/, "");
      before.replaceData(0, before.data.length, trimmed);
    }
    const after = node.nextSibling;
    if (isWhitespaceText(after)) {
      const trimmed = after.data.replace(/^\r?\n/, "");
      after.replaceData(0, after.data.length, trimmed);
    }
  }

  parent.removeChild(node);
}
