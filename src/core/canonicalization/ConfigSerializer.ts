import { SerializationError } from "../errors";
import { NODE_TYPES, isCharacterData, isElement } from "../../utils/xmlParser";

/** Declaration the appliance writes in front of every export */
export const XML_DECLARATION = '<?xml version="1.0" ?>';

/**
 * Byte-exact serializer for appliance configuration trees.
 *
 * The appliance verifies the HMAC over its own serialization of the
 * <config> subtree, so the rules here are fixed:
 * - attributes are written in code-unit order of their names
 * - childless elements are written as `<name/>`
 * - text and attribute values escape `&`, `<`, `"` and `>`
 * - CDATA sections, comments and processing instructions are kept verbatim
 * - no whitespace is added or removed
 */
export class ConfigSerializer {
  static escapeXml(text: string): string {
    return text
      .replace(/&/g, "&amp;")
      .replace(/</g, "&lt;")
      .replace(/"/g, "&quot;")
      .replace(/>/g, "&gt;");
  }

  static compareNames(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
  }

  /**
   * Serialize an element (with its subtree) or a single child node
   */
  static serialize(node: Node): string {
    if (isElement(node)) {
      return ConfigSerializer.serializeElement(node);
    }

    if (isCharacterData(node)) {
      if (node.nodeType === NODE_TYPES.CDATA_SECTION_NODE) {
        if (node.data.includes("]]>")) {
          throw new SerializationError("CDATA section cannot contain ']]>'");
        }
        return `<![CDATA[${node.data}]]>`;
      }
      return ConfigSerializer.escapeXml(node.data);
    }

    if (isComment(node)) {
      if (node.data.includes("--")) {
        throw new SerializationError("'--' is not allowed in a comment node");
      }
      return `<!--${node.data}-->`;
    }

    if (isProcessingInstruction(node)) {
      return `<?${node.target} ${node.data}?>`;
    }

    throw new SerializationError(`Unsupported node type ${node.nodeType} (${node.nodeName})`);
  }

  private static serializeElement(element: Element): string {
    const attrs: Attr[] = [];
    for (let i = 0; i < element.attributes.length; i++) {
      attrs.push(element.attributes[i]);
    }
    attrs.sort((a, b) => ConfigSerializer.compareNames(a.name, b.name));

    let result = "<" + element.nodeName;
    for (const attr of attrs) {
      result += ` ${attr.name}="${ConfigSerializer.escapeXml(attr.value)}"`;
    }

    if (!element.firstChild) {
      return result + "/>";
    }

    result += ">";
    for (let child: Node | null = element.firstChild; child; child = child.nextSibling) {
      result += ConfigSerializer.serialize(child);
    }
    return result + "</" + element.nodeName + ">";
  }

  /**
   * Quoting and spacing follow the appliance tool's output:
   * `<!DOCTYPE eef  PUBLIC 'pub'  'sys'>`, `<!DOCTYPE eef  SYSTEM 'sys'>`
   */
  private static serializeDocumentType(node: DocumentType): string {
    let result = "<!DOCTYPE " + node.name;
    if (node.publicId) {
      result += `  PUBLIC '${unquote(node.publicId)}'  '${unquote(node.systemId)}'`;
    } else if (node.systemId) {
      result += `  SYSTEM '${unquote(node.systemId)}'`;
    }
    return result + ">";
  }

  /**
   * Serialize a whole document.
   *
   * The declaration is always rewritten and top-level whitespace is dropped.
   * A newline goes right in front of the document element (appliances newer
   * than 6.x expect `<eef>` on a line of its own); comments, processing
   * instructions and a doctype before it stay on the declaration's line.
   */
  static serializeDocument(doc: Document): string {
    const parts: string[] = [];

    for (let child = doc.firstChild; child; child = child.nextSibling) {
      if (child.nodeType === NODE_TYPES.TEXT_NODE) continue;
      if (isProcessingInstruction(child) && child.target === "xml") continue;
      if (isDocumentType(child)) {
        parts.push(ConfigSerializer.serializeDocumentType(child));
        continue;
      }
      if (child === doc.documentElement) {
        parts.push("\n");
      }
      parts.push(ConfigSerializer.serialize(child));
    }

    return XML_DECLARATION + parts.join("");
  }
}

// xmldom keeps the quotes around doctype identifiers
function unquote(id: string): string {
  return /^(["']).*\1$/s.test(id) ? id.slice(1, -1) : id;
}

function isDocumentType(node: Node): node is DocumentType {
  return node.nodeType === NODE_TYPES.DOCUMENT_TYPE_NODE;
}

function isComment(node: Node): node is Comment {
  return node.nodeType === NODE_TYPES.COMMENT_NODE;
}

function isProcessingInstruction(node: Node): node is ProcessingInstruction {
  return node.nodeType === NODE_TYPES.PROCESSING_INSTRUCTION_NODE;
}
