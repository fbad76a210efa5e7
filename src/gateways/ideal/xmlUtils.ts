/**
 * XML Utilities
 *
 * Handles XML request rendering, response parsing and DOM access for the
 * signature code.
 */

import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import { DOMParser, XMLSerializer } from '@xmldom/xmldom';
import { XmlParseError } from '../types';
import { XML_DECLARATION } from './protocol';

/**
 * Element content accepted by the request renderer. Keys are wire tags,
 * `@_`-prefixed keys are attributes. Key order is document order.
 */
export interface XmlElement {
  [tag: string]: string | XmlElement;
}

/**
 * Parsed response tree, namespace prefixes removed
 */
export type XmlValue = string | XmlRecord | XmlValue[];

export interface XmlRecord {
  [tag: string]: XmlValue;
}

// Repeated elements in directory responses
const ARRAY_PATHS = new Set([
  'DirectoryRes.Directory.Issuer',
  'DirectoryRes.Directory.Country',
  'DirectoryRes.Directory.Country.Issuer',
]);

const xmlParser = new XMLParser({
  ignoreAttributes: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  removeNSPrefix: true,
  parseTagValue: false,
  trimValues: true,
  // Decode numeric character references such as &#233;
  htmlEntities: true,
  isArray: (_name, jpath) => ARRAY_PATHS.has(jpath),
});

const xmlBuilder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  format: true,
  suppressEmptyNode: false,
});

/**
 * Render a request document with its root element
 */
export function buildXmlDocument(rootTag: string, content: XmlElement): string {
  return XML_DECLARATION + '\n' + xmlBuilder.build({ [rootTag]: content });
}

export function isXmlRecord(value: XmlValue | undefined): value is XmlRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parsed response with the name of its root element
 */
export interface ParsedXml {
  rootName: string;
  root: XmlRecord;
}

/**
 * Parse an XML response body into a plain tree
 */
export function parseXmlResponse(xml: string): ParsedXml {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new XmlParseError(
      `Failed to parse iDEAL XML response: ${validation.err.msg} (line ${validation.err.line})`,
      xml
    );
  }

  const parsed: XmlValue = xmlParser.parse(xml);
  if (!isXmlRecord(parsed)) {
    throw new XmlParseError('Failed to parse iDEAL XML response: no root element', xml);
  }

  const [rootName] = Object.keys(parsed);
  const root = rootName === undefined ? undefined : parsed[rootName];
  if (rootName === undefined || root === undefined) {
    throw new XmlParseError('Failed to parse iDEAL XML response: no root element', xml);
  }

  // An empty root element parses to ''
  return { rootName, root: isXmlRecord(root) ? root : {} };
}

/**
 * Follow a path of child tags and return the element's text, if any
 */
export function textAt(root: XmlRecord, path: readonly string[]): string | undefined {
  let current: XmlValue | undefined = root;

  for (const tag of path) {
    if (Array.isArray(current)) {
      current = current[0];
    }
    if (!isXmlRecord(current)) {
      return undefined;
    }
    current = current[tag];
  }

  return typeof current === 'string' ? current : undefined;
}

/**
 * Return the child elements under a tag as a list
 */
export function elementsAt(root: XmlRecord, path: readonly string[]): XmlRecord[] {
  let current: XmlValue | undefined = root;

  for (const tag of path) {
    if (Array.isArray(current)) {
      current = current[0];
    }
    if (!isXmlRecord(current)) {
      return [];
    }
    current = current[tag];
  }

  const values = Array.isArray(current) ? current : current === undefined ? [] : [current];
  return values.filter(isXmlRecord);
}

function raiseParseError(message: string): never {
  throw new XmlParseError(`Malformed XML: ${message}`);
}

/**
 * Parse XML into a DOM document. Anything the parser would have to repair
 * is rejected.
 */
export function parseXmlDocument(xml: string): Document {
  if (xml.trim() === '') {
    throw new XmlParseError('Malformed XML: empty document');
  }

  const parser = new DOMParser({
    errorHandler: {
      warning: raiseParseError,
      error: raiseParseError,
      fatalError: raiseParseError,
    },
  });

  let document: Document;
  try {
    document = parser.parseFromString(xml, 'application/xml');
  } catch (error) {
    if (error instanceof XmlParseError) {
      throw error;
    }
    const message = error instanceof Error ? error.message : 'Unknown error';
    throw new XmlParseError(`Malformed XML: ${message}`);
  }

  if (!document || !document.documentElement) {
    throw new XmlParseError('Malformed XML: no document element');
  }

  return document;
}

/**
 * Serialize a DOM document with a UTF-8 XML declaration
 */
export function serializeXmlDocument(document: Document): string {
  return XML_DECLARATION + '\n' + new XMLSerializer().serializeToString(document.documentElement) + '\n';
}

/**
 * Append a child element in the parent's namespace, optionally with text
 */
export function appendElement(parent: Element, tag: string, text?: string): Element {
  const document = parent.ownerDocument;
  const child = document.createElementNS(parent.namespaceURI, tag);
  if (text !== undefined) {
    child.appendChild(document.createTextNode(text));
  }
  parent.appendChild(child);
  return child;
}
