/**
 * Response Parser
 *
 * Turns vendor response bodies into a plain object tree (fast-xml-parser):
 * elements become keys, attributes are prefixed with `@_`, and every value
 * stays a string. Elements listed in REPEATED_ELEMENTS are always arrays.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { ResponseParseError } from '../errors';

export type XmlValue = string | XmlElement | XmlValue[];

export interface XmlElement {
  [name: string]: XmlValue;
}

const TEXT_NODE = '#text';
const REPEATED_ELEMENTS = new Set(['Report']);

export function isXmlElement(value: unknown): value is XmlElement {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseXmlDocument(body: string): XmlElement {
  const verdict = XMLValidator.validate(body);
  if (verdict !== true) {
    throw new ResponseParseError(
      `Response is not well-formed XML: ${verdict.err.msg} (line ${verdict.err.line}, column ${verdict.err.col})`,
      body
    );
  }

  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    ignoreDeclaration: true,
    parseTagValue: false,
    parseAttributeValue: false,
    htmlEntities: true,
    isArray: name => REPEATED_ELEMENTS.has(name),
  });
  const document: unknown = parser.parse(body);

  if (!isXmlElement(document) || rootElement(document) === undefined) {
    throw new ResponseParseError('Response has no root element', body);
  }
  const roots = topLevelElementCount(document);
  if (roots !== 1) {
    throw new ResponseParseError(`Response must have exactly one root element, found ${roots}`, body);
  }
  return document;
}

function topLevelElementCount(document: XmlElement): number {
  let count = 0;
  for (const [name, value] of Object.entries(document)) {
    if (!name.startsWith('?') && !name.startsWith('#')) {
      count += Array.isArray(value) ? value.length : 1;
    }
  }
  return count;
}

/**
 * The document's single top-level element.
 */
export function rootElement(document: XmlElement): { name: string; element: XmlElement } | undefined {
  for (const [name, value] of Object.entries(document)) {
    if (name.startsWith('?') || name.startsWith('#')) {
      continue;
    }
    return { name, element: asElement(value) };
  }
  return undefined;
}

function asElement(value: XmlValue): XmlElement {
  if (Array.isArray(value)) {
    return value.length > 0 ? asElement(value[0]) : {};
  }
  if (typeof value === 'string') {
    return value === '' ? {} : { [TEXT_NODE]: value };
  }
  return value;
}

export function hasChild(element: XmlElement, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(element, name);
}

/**
 * Text content of the first `name` child, or undefined when there is none.
 */
export function childText(element: XmlElement, name: string): string | undefined {
  if (!hasChild(element, name)) {
    return undefined;
  }
  const value = element[name];
  const first = Array.isArray(value) ? value[0] : value;
  if (first === undefined) {
    return undefined;
  }
  if (typeof first === 'string') {
    return first;
  }
  if (Array.isArray(first)) {
    return undefined;
  }
  const text = first[TEXT_NODE];
  return typeof text === 'string' ? text : '';
}

export function childElements(element: XmlElement, name: string): XmlElement[] {
  if (!hasChild(element, name)) {
    return [];
  }
  const value = element[name];
  return (Array.isArray(value) ? value : [value]).map(asElement);
}
