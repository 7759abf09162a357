/**
 * Typed XML tree for service responses.
 *
 * fast-xml-parser runs in `preserveOrder` mode, so every element is one entry
 * in its parent's child list. A repeated element is simply several entries and
 * a single one is a list of one; callers never branch on scalar versus list.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { ResponseParseError } from './errors';

export interface XmlText {
  kind: 'text';
  value: string;
}

export interface XmlElement {
  kind: 'element';
  name: string;
  attributes: Record<string, string>;
  children: XmlNode[];
}

export type XmlNode = XmlText | XmlElement;

const TEXT_KEY = '#text';
const ATTRIBUTES_KEY = ':@';

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '',
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  // Numeric character references (&#38; &#x2122;) are only decoded with this on
  htmlEntities: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toAttributes(raw: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(raw)) return attributes;
  for (const [name, value] of Object.entries(raw)) {
    attributes[name] = String(value);
  }
  return attributes;
}

function toNodes(raw: unknown): XmlNode[] {
  if (!Array.isArray(raw)) return [];
  const entries: unknown[] = raw;
  const nodes: XmlNode[] = [];

  for (const entry of entries) {
    if (!isRecord(entry)) continue;
    for (const [key, value] of Object.entries(entry)) {
      if (key === ATTRIBUTES_KEY) continue;
      if (key === TEXT_KEY) {
        nodes.push({ kind: 'text', value: String(value) });
        continue;
      }
      nodes.push({
        kind: 'element',
        name: key,
        attributes: toAttributes(entry[ATTRIBUTES_KEY]),
        children: toNodes(value),
      });
    }
  }
  return nodes;
}

/**
 * Parse an XML document and return its root element.
 * Throws ResponseParseError when the input is not well-formed XML.
 */
export function parseXmlDocument(xml: string | Buffer): XmlElement {
  const source = typeof xml === 'string' ? xml : xml.toString('utf8');

  const validation = XMLValidator.validate(source);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new ResponseParseError('Response is not well-formed XML', `${msg} (line ${line}, column ${col})`);
  }

  const root = toNodes(parser.parse(source)).find((node): node is XmlElement => node.kind === 'element');
  if (!root) {
    throw new ResponseParseError('Response has no root element');
  }
  return root;
}

// ---------------------------------------------------------------------------
// Accessors
// ---------------------------------------------------------------------------

function splitPath(path: string | readonly string[]): readonly string[] {
  if (typeof path !== 'string') return path;
  return path.split('/').filter((segment) => segment.length > 0);
}

/** Direct child elements, optionally only those with the given name */
export function childElements(element: XmlElement, name?: string): XmlElement[] {
  return element.children.filter(
    (child): child is XmlElement => child.kind === 'element' && (name === undefined || child.name === name),
  );
}

/**
 * Every element matching a slash-separated path below `element`, in document order.
 */
export function findElements(element: XmlElement, path: string | readonly string[]): XmlElement[] {
  let current: XmlElement[] = [element];
  for (const segment of splitPath(path)) {
    current = current.flatMap((el) => childElements(el, segment));
    if (current.length === 0) break;
  }
  return current;
}

export function findElement(element: XmlElement, path: string | readonly string[]): XmlElement | undefined {
  return findElements(element, path)[0];
}

/** Concatenated direct text content */
export function textOf(element: XmlElement): string {
  return element.children
    .map((child) => (child.kind === 'text' ? child.value : ''))
    .join('');
}

export function textAt(element: XmlElement, path: string | readonly string[], fallback = ''): string {
  const found = findElement(element, path);
  return found ? textOf(found) : fallback;
}

export function attributeOf(element: XmlElement, name: string, fallback = ''): string {
  return element.attributes[name] ?? fallback;
}
