import { DOMParser } from "@xmldom/xmldom";
import { ParseError } from "../core/errors";
import { log } from "./logger";

export const NODE_TYPES = {
  ELEMENT_NODE: 1,
  TEXT_NODE: 3,
  CDATA_SECTION_NODE: 4,
  PROCESSING_INSTRUCTION_NODE: 7,
  COMMENT_NODE: 8,
  DOCUMENT_NODE: 9,
  DOCUMENT_TYPE_NODE: 10,
} as const;

// Sections whose content is not scanned for entity and character references
const UNPARSED_SECTIONS = /<!\[CDATA\[[\s\S]*?\]\]>|<!--[\s\S]*?-->|<\?[\s\S]*?\?>/g;
const BARE_AMPERSAND = /&(?!#[0-9]+;|#x[0-9a-fA-F]+;|[A-Za-z_:][\w.:-]*;)/;

/**
 * Parse an XML string with xmldom.
 *
 * xmldom reports problems through its error handler and keeps going, so the
 * reports (warnings included) are collected and turned into a single
 * ParseError afterwards. Some violations pass xmldom without any report:
 * text before or after the root element and a `&` that starts no reference.
 * Those are checked here.
 *
 * @throws ParseError if the document is not well-formed or has no root element
 */
export function parseXML(text: string): Document {
  if (/^\s*[^\s<]/.test(text)) {
    throw new ParseError("Malformed XML: text before the root element");
  }
  if (BARE_AMPERSAND.test(text.replace(UNPARSED_SECTIONS, ""))) {
    throw new ParseError("Malformed XML: '&' does not start an entity or character reference");
  }

  const problems: string[] = [];
  const parser = new DOMParser({
    errorHandler: {
      warning: (msg: unknown) => problems.push(String(msg)),
      error: (msg: unknown) => problems.push(String(msg)),
      fatalError: (msg: unknown) => problems.push(String(msg)),
    },
  });

  const doc = parser.parseFromString(text, "text/xml");

  if (problems.length > 0) {
    log.debug("xml", `parser reported ${problems.length} problem(s)`);
    throw new ParseError(`Malformed XML: ${problems[0]}`);
  }
  if (!doc || !doc.documentElement) {
    throw new ParseError("Malformed XML: no root element");
  }
  for (let child = doc.firstChild; child; child = child.nextSibling) {
    if (child.nodeType === NODE_TYPES.TEXT_NODE && !isWhitespaceText(child)) {
      throw new ParseError("Malformed XML: text after the root element");
    }
  }
  return doc;
}

export function isElement(node: Node): node is Element {
  return node.nodeType === NODE_TYPES.ELEMENT_NODE;
}

/**
 * Text and CDATA nodes: the two kinds of node that carry an element's character data
 */
export function isCharacterData(node: Node): node is Text {
  return node.nodeType === NODE_TYPES.TEXT_NODE || node.nodeType === NODE_TYPES.CDATA_SECTION_NODE;
}

export function isWhitespaceText(node: Node | null): node is Text {
  return (
    node !== null &&
    node.nodeType === NODE_TYPES.TEXT_NODE &&
    isCharacterData(node) &&
    /^\s*$/.test(node.data)
  );
}

/**
 * Recursive DOM traversal collecting elements with the given tag name,
 * in document order
 *
 * @param parent The node to search within (not matched itself unless it is an element)
 * @param tagName Exact tag name, e.g. "signature"
 */
export function findElementsByTagNameRecursive(parent: Node, tagName: string): Element[] {
  const results: Element[] = [];

  function searchNode(node: Node) {
    if (isElement(node) && node.nodeName === tagName) {
      results.push(node);
    }

    for (let child = node.firstChild; child; child = child.nextSibling) {
      searchNode(child);
    }
  }

  searchNode(parent);
  return results;
}

/**
 * Concatenated character data of an element's direct text and CDATA children
 */
export function getCharacterData(element: Element): string {
  let text = "";
  for (let child = element.firstChild; child; child = child.nextSibling) {
    if (isCharacterData(child)) {
      text += child.data;
    }
  }
  return text;
}

/**
 * Replace an element's character data.
 *
 * The first text or CDATA child keeps its node type and receives the value;
 * any further character data children are dropped. An element without one
 * gets a new text node.
 */
export function setCharacterData(element: Element, value: string): void {
  const dataNodes: Text[] = [];
  for (let child = element.firstChild; child; child = child.nextSibling) {
    if (isCharacterData(child)) {
      dataNodes.push(child);
    }
  }

  const [first, ...rest] = dataNodes;
  if (!first) {
    element.appendChild(element.ownerDocument.createTextNode(value));
    return;
  }

  // replaceData keeps xmldom's data and nodeValue fields in step
  first.replaceData(0, first.data.length, value);
  for (const extra of rest) {
    element.removeChild(extra);
  }
}
