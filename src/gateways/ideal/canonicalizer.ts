/**
 * Exclusive XML Canonicalization 1.0 (without comments)
 *
 * http://www.w3.org/2001/10/xml-exc-c14n#
 *
 * Operates on a W3C DOM. Namespace declarations are emitted on the element
 * that visibly uses them, unless an output ancestor already rendered the same
 * binding.
 */

import { XmlParseError } from '../types';

const XMLNS_NAMESPACE = 'http://www.w3.org/2000/xmlns/';

// prefix ('' for the default namespace) -> namespace URI rendered in the output
type RenderedNamespaces = ReadonlyMap<string, string>;

export interface CanonicalizeOptions {
  /** A subtree left out of the output, e.g. an enveloped Signature. */
  exclude?: Node | null;
}

function isElement(node: Node): node is Element {
  return node.nodeType === 1;
}

function isText(node: Node): node is Text | CDATASection {
  return node.nodeType === 3 || node.nodeType === 4;
}

function isProcessingInstruction(node: Node): node is ProcessingInstruction {
  return node.nodeType === 7;
}

function isDocument(node: Node): node is Document {
  return node.nodeType === 9;
}

function isNamespaceDeclaration(attr: Attr): boolean {
  return attr.namespaceURI === XMLNS_NAMESPACE || attr.name === 'xmlns' || attr.name.startsWith('xmlns:');
}

function escapeText(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/\r/g, '&#xD;');
}

function escapeAttribute(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/"/g, '&quot;')
    .replace(/\t/g, '&#x9;')
    .replace(/\n/g, '&#xA;')
    .replace(/\r/g, '&#xD;');
}

// Code point order, not locale order
function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function compareAttributes(a: Attr, b: Attr): number {
  const byNamespace = compareStrings(a.namespaceURI ?? '', b.namespaceURI ?? '');
  if (byNamespace !== 0) return byNamespace;
  return compareStrings(a.localName || a.name, b.localName || b.name);
}

/**
 * Prefixes visibly utilized by the element: its own and those of its
 * attributes. The `xml` prefix is never declared.
 */
function visiblyUsedNamespaces(element: Element, attributes: readonly Attr[]): Map<string, string> {
  const used = new Map<string, string>();
  used.set(element.prefix ?? '', element.namespaceURI ?? '');

  for (const attr of attributes) {
    if (attr.prefix && attr.prefix !== 'xml') {
      used.set(attr.prefix, attr.namespaceURI ?? '');
    }
  }

  return used;
}

function canonicalizeElement(element: Element, rendered: RenderedNamespaces, exclude: Node | null): string {
  const attributes = Array.from(element.attributes).filter((attr) => !isNamespaceDeclaration(attr));
  const scope = new Map(rendered);
  const declarations: Array<[string, string]> = [];

  for (const [prefix, uri] of visiblyUsedNamespaces(element, attributes)) {
    if ((rendered.get(prefix) ?? '') !== uri) {
      declarations.push([prefix, uri]);
      scope.set(prefix, uri);
    }
  }

  declarations.sort(([a], [b]) => compareStrings(a, b));
  attributes.sort(compareAttributes);

  let out = `<${element.nodeName}`;
  for (const [prefix, uri] of declarations) {
    out += prefix === '' ? ` xmlns="${escapeAttribute(uri)}"` : ` xmlns:${prefix}="${escapeAttribute(uri)}"`;
  }
  for (const attr of attributes) {
    out += ` ${attr.name}="${escapeAttribute(attr.value)}"`;
  }
  out += '>';

  for (const child of Array.from(element.childNodes)) {
    if (child === exclude) continue;
    out += canonicalizeChild(child, scope, exclude);
  }

  return `${out}</${element.nodeName}>`;
}

function canonicalizeChild(node: Node, rendered: RenderedNamespaces, exclude: Node | null): string {
  if (isElement(node)) {
    return canonicalizeElement(node, rendered, exclude);
  }
  if (isText(node)) {
    return escapeText(node.data);
  }
  if (isProcessingInstruction(node)) {
    return `<?${node.target}${node.data ? ` ${node.data}` : ''}?>`;
  }
  // comments
  return '';
}

/**
 * Canonicalize a document or a single element.
 *
 * For a document only the document element is rendered: the XML
 * declaration, top-level processing instructions and comments are dropped.
 * An element is canonicalized in isolation, as if it were the root.
 */
export function canonicalize(node: Node, options: CanonicalizeOptions = {}): string {
  const exclude = options.exclude ?? null;

  if (isDocument(node)) {
    const root = node.documentElement;
    if (!root) {
      throw new XmlParseError('Cannot canonicalize a document without a document element');
    }
    return root === exclude ? '' : canonicalizeElement(root, new Map(), exclude);
  }

  if (isElement(node)) {
    return node === exclude ? '' : canonicalizeElement(node, new Map(), exclude);
  }

  throw new XmlParseError(`Cannot canonicalize node of type ${node.nodeType}`);
}
