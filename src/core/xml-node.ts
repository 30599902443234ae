/**
 * XML Node Class
 *
 * Minimal element tree for LS3 files: ordered attributes, ordered child
 * elements, no text content. Serializes in the layout the simulator's
 * own tools write and parses through fast-xml-parser.
 */

import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';
import { Ls3SchemaError } from '../errors';
import { UTF8_BOM, XML_DECLARATION } from '../constants/ls3';

const XmlNameSchema = z.string().regex(/^[A-Za-z_][A-Za-z0-9_.-]*$/, 'Invalid XML name');

const INDENT = '  ';

function escapeAttribute(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class XmlNode {
  private readonly _name: string;
  private readonly _attributes = new Map<string, string>();
  private readonly _children: XmlNode[] = [];

  constructor(name: string) {
    const result = XmlNameSchema.safeParse(name);
    if (!result.success) {
      throw new Ls3SchemaError(`Invalid XML element name: ${name}`, name, result.error);
    }
    this._name = name;
  }

  get name(): string {
    return this._name;
  }

  /**
   * Set an attribute; re-setting keeps its original position.
   */
  setAttribute(key: string, value: string | number): this {
    this._attributes.set(key, String(value));
    return this;
  }

  getAttribute(key: string): string | undefined {
    return this._attributes.get(key);
  }

  hasAttribute(key: string): boolean {
    return this._attributes.has(key);
  }

  /**
   * Attribute parsed as a number; missing or unparsable values give `fallback`.
   */
  getNumber(key: string, fallback = 0): number {
    const raw = this._attributes.get(key);
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    return Number.isFinite(value) ? value : fallback;
  }

  addChild(child: XmlNode): this {
    this._children.push(child);
    return this;
  }

  /**
   * Create, append and return a new child element.
   */
  appendChild(name: string): XmlNode {
    const child = new XmlNode(name);
    this._children.push(child);
    return child;
  }

  getChildren(): readonly XmlNode[] {
    return this._children;
  }

  findChildren(name: string): XmlNode[] {
    return this._children.filter(child => child._name === name);
  }

  findChild(name: string): XmlNode | undefined {
    return this._children.find(child => child._name === name);
  }

  /**
   * Serialize this element as a generator of lines
   */
  *serializeLines(depth: number = 0): Generator<string> {
    const space = INDENT.repeat(depth);
    let open = `${space}<${this._name}`;
    for (const [key, value] of this._attributes) {
      open += ` ${key}="${escapeAttribute(value)}"`;
    }

    if (this._children.length === 0) {
      yield `${open}/>`;
      return;
    }

    yield `${open}>`;
    for (const child of this._children) {
      yield* child.serializeLines(depth + 1);
    }
    yield `${space}</${this._name}>`;
  }

  /**
   * Full document text: byte order mark, XML declaration, this element as
   * root, and every line (including the last) ended by `lineSeparator`.
   */
  serializeDocument(lineSeparator: string): string {
    let result = UTF8_BOM + XML_DECLARATION + lineSeparator;
    for (const line of this.serializeLines()) {
      result += line + lineSeparator;
    }
    return result;
  }

  /**
   * Parse a document and return its root element.
   */
  static parse(text: string): XmlNode {
    const parser = new XMLParser({
      preserveOrder: true,
      ignoreAttributes: false,
      attributeNamePrefix: '',
      ignoreDeclaration: true,
      parseAttributeValue: false,
      parseTagValue: false,
    });
    const body = text.startsWith(UTF8_BOM) ? text.slice(UTF8_BOM.length) : text;
    const parsed: unknown = parser.parse(body);
    const roots = XmlNode.fromParsed(parsed);
    if (roots.length === 0) {
      throw new Ls3SchemaError('Document has no root element', '/');
    }
    return roots[0];
  }

  private static fromParsed(items: unknown): XmlNode[] {
    if (!Array.isArray(items)) return [];

    const nodes: XmlNode[] = [];
    for (const item of items) {
      if (!isRecord(item)) continue;
      const attributes = item[':@'];
      for (const [key, value] of Object.entries(item)) {
        if (key === ':@' || key === '#text' || key.startsWith('?')) continue;
        const node = new XmlNode(key);
        if (isRecord(attributes)) {
          for (const [attrName, attrValue] of Object.entries(attributes)) {
            node.setAttribute(attrName, String(attrValue));
          }
        }
        for (const child of XmlNode.fromParsed(value)) {
          node.addChild(child);
        }
        nodes.push(node);
      }
    }
    return nodes;
  }
}
