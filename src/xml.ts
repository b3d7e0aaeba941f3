/**
 * XML plumbing for XDMF documents: a DOM parser front end for reading, and a
 * small element tree with a serializer for writing
 */

import { DOMParser } from '@xmldom/xmldom';
import { FormatError } from './errors.js';

// ============================================================================
// Reading
// ============================================================================

export function parseXml(text: string, source: string): Document {
  const fail = (msg: string): never => {
    throw new FormatError(`Invalid XML in ${source}: ${msg}`);
  };
  const parser = new DOMParser({
    errorHandler: {
      warning: () => undefined,
      error: fail,
      fatalError: fail,
    },
  });
  return parser.parseFromString(text, 'text/xml');
}

export function isElement(node: Node): node is Element {
  return node.nodeType === 1;
}

/** Element children in document order; comments and text are skipped */
export function childElements(parent: Element): Element[] {
  const elements: Element[] = [];
  for (let i = 0; i < parent.childNodes.length; i++) {
    const child = parent.childNodes.item(i);
    if (child !== null && isElement(child)) {
      elements.push(child);
    }
  }
  return elements;
}

/** Attribute value, or null when the attribute is absent */
export function attr(el: Element, name: string): string | null {
  return el.hasAttribute(name) ? el.getAttribute(name) : null;
}

export function requireAttr(el: Element, name: string): string {
  const value = attr(el, name);
  if (value === null) {
    throw new FormatError(`<${el.nodeName}> has no ${name} attribute`);
  }
  return value;
}

/** The single element child of `el`, as XDMF requires for DataItem holders */
export function onlyChild(el: Element, name: string): Element {
  const children = childElements(el);
  if (children.length !== 1 || children[0].nodeName !== name) {
    throw new FormatError(
      `<${el.nodeName}> must hold exactly one <${name}>, found ${children.length} child element(s)`
    );
  }
  return children[0];
}

// ============================================================================
// Writing
// ============================================================================

export interface XmlNode {
  name: string;
  /** Attributes in output order */
  attributes: Array<[string, string]>;
  children: XmlNode[];
  text: string | null;
}

export function xmlNode(name: string, attributes: Record<string, string> = {}, text: string | null = null): XmlNode {
  return { name, attributes: Object.entries(attributes), children: [], text };
}

/** Append a new child to `parent` and return it */
export function subNode(parent: XmlNode, name: string, attributes: Record<string, string> = {}): XmlNode {
  const child = xmlNode(name, attributes);
  parent.children.push(child);
  return child;
}

export function escapeXml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function writeNode(node: XmlNode, pretty: boolean, depth: number, out: string[]): void {
  const indent = pretty ? '  '.repeat(depth) : '';
  const newline = pretty ? '\n' : '';
  const attrs = node.attributes.map(([k, v]) => ` ${k}="${escapeXml(v)}"`).join('');

  if (node.children.length === 0 && node.text === null) {
    out.push(`${indent}<${node.name}${attrs}/>${newline}`);
    return;
  }
  if (node.children.length === 0) {
    out.push(`${indent}<${node.name}${attrs}>${escapeXml(node.text ?? '')}</${node.name}>${newline}`);
    return;
  }
  out.push(`${indent}<${node.name}${attrs}>${newline}`);
  for (const child of node.children) {
    writeNode(child, pretty, depth + 1, out);
  }
  out.push(`${indent}</${node.name}>${newline}`);
}

export function serializeXml(root: XmlNode, pretty: boolean): string {
  const out: string[] = ['<?xml version="1.0" encoding="UTF-8"?>\n'];
  writeNode(root, pretty, 0, out);
  return out.join('');
}
