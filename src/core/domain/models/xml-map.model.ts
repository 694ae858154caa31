import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { FormatError } from '../errors';
import { renderParamValue } from '../../signing/canonicalization';
import { ParamMap, ParamValue } from './param-map.model';

export type XmlValue = string | number | boolean;

const XML_NAME = /^[A-Za-z_][A-Za-z0-9_.-]*$/;
const MARKUP_CHARS = /[<>&'"]/;

export const DEFAULT_XML_ROOT = 'xml';

/**
 * XmlMap - flat tagged document container
 *
 * Values are always text. Serialization wraps any value carrying markup
 * characters in CDATA and writes carriage returns as character references,
 * so merchant-supplied text survives a round trip.
 */
export class XmlMap {
  private readonly data = new Map<string, string>();

  constructor(public readonly rootTag: string = DEFAULT_XML_ROOT) {}

  /**
   * Parse a flat document. Empty elements are kept as empty strings.
   *
   * @throws FormatError on malformed markup, a root mismatch, nested
   * elements or an element name that is not a plain XML name
   */
  static parse(text: string, rootTag: string = DEFAULT_XML_ROOT): XmlMap {
    const validation = XMLValidator.validate(text);
    if (validation !== true) {
      throw new FormatError(`Malformed XML document: ${validation.err.msg}`, {
        line: validation.err.line,
        col: validation.err.col,
      });
    }

    const parser = new XMLParser({
      preserveOrder: true,
      ignoreAttributes: true,
      ignoreDeclaration: true,
      htmlEntities: true,
      parseTagValue: false,
      trimValues: false,
    });
    const nodes: unknown = parser.parse(text);

    const roots = elementNodes(nodes);
    if (roots.length !== 1) {
      throw new FormatError('XML document must have exactly one root element');
    }

    const [[tag, children]] = roots;
    if (tag !== rootTag) {
      throw new FormatError(`Unexpected root element <${tag}>, expected <${rootTag}>`);
    }

    const map = new XmlMap(rootTag);
    for (const [name, content] of elementNodes(children)) {
      if (!XML_NAME.test(name)) {
        throw new FormatError(`Unsupported element name: ${name}`);
      }
      map.data.set(name, textContent(name, content));
    }
    return map;
  }

  /**
   * Copy a ParamMap; nested containers are stored as their JSON text
   */
  static fromParamMap(params: ParamMap, rootTag: string = DEFAULT_XML_ROOT): XmlMap {
    const map = new XmlMap(rootTag);
    for (const [key, value] of params.entries()) {
      map.set(key, renderParamValue(value));
    }
    return map;
  }

  set(key: string, value: XmlValue | null | undefined): this {
    if (value === null || value === undefined || value === '') {
      return this;
    }
    this.data.set(key, String(value));
    return this;
  }

  get(key: string): string | undefined;
  get(key: string, defaultValue: string): string;
  get(key: string, defaultValue?: string): string | undefined {
    return this.data.get(key) ?? defaultValue;
  }

  remove(key: string): this {
    this.data.delete(key);
    return this;
  }

  contains(key: string): boolean {
    return this.data.has(key);
  }

  clear(): this {
    this.data.clear();
    return this;
  }

  get size(): number {
    return this.data.size;
  }

  keys(): string[] {
    return Array.from(this.data.keys());
  }

  entries(): Array<[string, string]> {
    return Array.from(this.data.entries());
  }

  toMapping(): Record<string, string> {
    return Object.fromEntries(this.data);
  }

  /**
   * Flatten to a ParamMap for canonicalization; empty values are kept
   */
  toParamMap(): ParamMap {
    const record: Record<string, ParamValue> = this.toMapping();
    return ParamMap.fromRecord(record, { keepEmpty: true });
  }

  equals(other: XmlMap): boolean {
    if (other.size !== this.size) {
      return false;
    }
    return this.entries().every(([key, value]) => other.data.get(key) === value);
  }

  /**
   * @throws FormatError when a key is not a plain XML element name
   */
  serialize(rootTag: string = this.rootTag): string {
    assertXmlName(rootTag);
    const children = this.entries().map(([key, value]) => {
      assertXmlName(key);
      return `<${key}>${encodeText(value)}</${key}>`;
    });
    return `<${rootTag}>${children.join('')}</${rootTag}>`;
  }

  toString(): string {
    return this.serialize();
  }
}

function assertXmlName(name: string): void {
  if (!XML_NAME.test(name)) {
    throw new FormatError(`Invalid XML element name: ${name}`);
  }
}

/**
 * Parsers normalise raw line endings, so `\r` is written as `&#13;` outside
 * any CDATA section. CDATA cannot contain `]]>`, so it is split across two
 * sections.
 */
function encodeText(value: string): string {
  return value.split('\r').map(encodeSegment).join('&#13;');
}

function encodeSegment(segment: string): string {
  if (!MARKUP_CHARS.test(segment)) {
    return segment;
  }
  return `<![CDATA[${segment.split(']]>').join(']]]]><![CDATA[>')}]]>`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Element entries of an ordered node list; whitespace between elements is skipped
 */
function elementNodes(nodes: unknown): Array<[string, unknown]> {
  if (!Array.isArray(nodes)) {
    throw new FormatError('Unexpected XML structure');
  }

  const elements: Array<[string, unknown]> = [];
  for (const node of nodes) {
    if (!isRecord(node)) {
      throw new FormatError('Unexpected XML structure');
    }
    for (const [name, content] of Object.entries(node)) {
      if (name === '#text') {
        if (typeof content === 'string' && content.trim() === '') {
          continue;
        }
        throw new FormatError('Unexpected text outside of an element');
      }
      elements.push([name, content]);
    }
  }
  return elements;
}

function textContent(name: string, content: unknown): string {
  if (!Array.isArray(content)) {
    throw new FormatError(`Unexpected content in <${name}>`);
  }

  let text = '';
  for (const node of content) {
    if (!isRecord(node)) {
      throw new FormatError(`Unexpected content in <${name}>`);
    }
    for (const [key, value] of Object.entries(node)) {
      if (key !== '#text') {
        throw new FormatError(`Nested element <${key}> in <${name}> is not supported`);
      }
      text += renderParamValue(value);
    }
  }
  return text;
}
