import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import { XmlSyntaxError } from '../errors';

const COMMENT_NODE = '#comment';

/**
 * Re-indents an XML document for display. The XML declaration is always
 * dropped; whitespace-only text between elements is not preserved, and
 * leading or trailing whitespace inside text values is trimmed. Character
 * references are decoded and re-escaped only where XML requires it.
 *
 * Only used for diagnostics: request bodies go over the wire unformatted.
 */
export function formatXml(xmlText: string): string {
  const verdict = XMLValidator.validate(xmlText);
  if (verdict !== true) {
    throw new XmlSyntaxError(verdict.err.msg, verdict.err.line, verdict.err.col);
  }

  // Both live only for this call
  const parser = new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    ignoreDeclaration: true,
    commentPropName: COMMENT_NODE,
    parseTagValue: false,
    parseAttributeValue: false,
    htmlEntities: true,
  });
  const builder = new XMLBuilder({
    preserveOrder: true,
    ignoreAttributes: false,
    commentPropName: COMMENT_NODE,
    format: true,
    indentBy: '  ',
    suppressEmptyNode: false,
  });

  const tree: unknown = parser.parse(xmlText);
  const roots = Array.isArray(tree) ? tree.filter(isElementNode).length : 0;
  if (roots !== 1) {
    throw new XmlSyntaxError(`Expected exactly one root element, found ${roots}`);
  }

  return String(builder.build(tree)).trim();
}

// preserveOrder nodes are `{ tagName: children, ':@'?: attributes }`
function isElementNode(node: unknown): boolean {
  if (typeof node !== 'object' || node === null) {
    return false;
  }
  return Object.keys(node).some(key => key !== ':@' && !key.startsWith('#') && !key.startsWith('?'));
}
