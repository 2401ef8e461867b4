import { XMLParser, XMLValidator } from 'fast-xml-parser';

import { ErrorCode } from '@/lib/errors/error-codes';
import { protocolError } from '@/lib/errors/error';

import type { StructuredObject, StructuredValue } from './types';

/** Key under which an element's attributes are nested. Never a valid element name. */
export const ATTRIBUTES_KEY = '@';

/** Text of a leaf kept as an object because its attributes were asked for. */
export const TEXT_KEY = '#text';

/**
 * A field declared `many`: every occurrence under a parent is kept, in document order, as an array.
 * With `within`, a listed parent that has no occurrence gets an empty array.
 */
export type ArrayRule = {
  tag: string;
  within?: readonly string[];
};

/** Cardinality table. Tags not listed are scalar: repeated siblings collapse to the last one. */
export type CardinalitySchema = readonly (string | ArrayRule)[];

export type TranscodeOptions = {
  /** Reports each scalar field whose earlier siblings were dropped, as a dotted element path. */
  onCollapse?: (path: string) => void;
  /** Leaf tags whose attributes are kept, as `{ '@': attrs, '#text': text }`. Other leaves are plain text. */
  leafAttributes?: readonly string[];
};

type CompiledSchema = {
  arrays: Set<string>;
  within: Map<string, string[]>;
};

type XmlElement = {
  name: string;
  attributes: Record<string, string>;
  children: XmlElement[];
  text: string;
};

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '',
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

function localName(qualified: string): string {
  const idx = qualified.indexOf(':');
  return idx === -1 ? qualified : qualified.slice(idx + 1);
}

function isNamespaceDeclaration(qualified: string): boolean {
  return qualified === 'xmlns' || qualified.startsWith('xmlns:');
}

function readAttributes(node: Record<string, unknown>): Record<string, string> {
  const raw = node[':@'];
  const out: Record<string, string> = {};
  if (!isRecord(raw)) return out;
  for (const [name, value] of Object.entries(raw)) {
    if (isNamespaceDeclaration(name)) continue;
    out[localName(name)] = typeof value === 'string' ? value : String(value);
  }
  return out;
}

// fast-xml-parser ordered output: each entry is `{ <tag>: entries[], ':@'?: attrs }` or `{ '#text': text }`.
function readElements(entries: unknown): { elements: XmlElement[]; text: string } {
  const elements: XmlElement[] = [];
  let text = '';
  if (!Array.isArray(entries)) return { elements, text };

  for (const entry of entries) {
    if (!isRecord(entry)) continue;
    if ('#text' in entry) {
      text += String(entry['#text']);
      continue;
    }
    const tag = Object.keys(entry).find((key) => key !== ':@');
    if (!tag) continue;
    const inner = readElements(entry[tag]);
    elements.push({
      name: localName(tag),
      attributes: readAttributes(entry),
      children: inner.elements,
      text: inner.text,
    });
  }

  return { elements, text };
}

export function compileSchema(schema: CardinalitySchema): CompiledSchema {
  const arrays = new Set<string>();
  const within = new Map<string, string[]>();
  for (const rule of schema) {
    const normalized = typeof rule === 'string' ? { tag: rule } : rule;
    arrays.add(normalized.tag);
    for (const parent of normalized.within ?? []) {
      const tags = within.get(parent) ?? [];
      if (!tags.includes(normalized.tag)) tags.push(normalized.tag);
      within.set(parent, tags);
    }
  }
  return { arrays, within };
}

function transcodeElement(
  element: XmlElement,
  schema: CompiledSchema,
  path: string,
  options: TranscodeOptions,
): StructuredValue {
  const materialize = schema.within.get(element.name) ?? [];
  if (element.children.length === 0 && materialize.length === 0) {
    const keepAttributes =
      options.leafAttributes?.includes(element.name) && Object.keys(element.attributes).length > 0;
    if (!keepAttributes) return element.text;
    return { [ATTRIBUTES_KEY]: { ...element.attributes }, [TEXT_KEY]: element.text };
  }

  const out: StructuredObject = {};
  if (Object.keys(element.attributes).length > 0) out[ATTRIBUTES_KEY] = { ...element.attributes };

  for (const child of element.children) {
    const childPath = `${path}.${child.name}`;
    const value = transcodeElement(child, schema, childPath, options);

    if (schema.arrays.has(child.name)) {
      const existing = out[child.name];
      if (Array.isArray(existing)) existing.push(value);
      else out[child.name] = [value];
      continue;
    }

    if (child.name in out) options.onCollapse?.(childPath);
    out[child.name] = value;
  }

  for (const tag of materialize) {
    if (!(tag in out)) out[tag] = [];
  }

  return out;
}

/**
 * Converts an XML document into a structured value keyed by local element names.
 * Pure: the same document and schema always produce the same value.
 */
export function transcodeDocument(
  xml: string,
  schema: CardinalitySchema,
  options: TranscodeOptions = {},
): StructuredObject {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw protocolError({
      code: ErrorCode.SOAP_MALFORMED_RESPONSE,
      message: `response is not well-formed XML: ${validation.err.msg}`,
      redacted_context: { line: validation.err.line, col: validation.err.col, body_excerpt: xml.slice(0, 500) },
    });
  }

  const { elements } = readElements(parser.parse(xml));
  const root = elements[0];
  if (!root) {
    throw protocolError({ code: ErrorCode.SOAP_MALFORMED_RESPONSE, message: 'response has no document element' });
  }

  const compiled = compileSchema(schema);
  return { [root.name]: transcodeElement(root, compiled, root.name, options) };
}

/** JSON text of a structured value; control characters, backslash and double quote are escaped. */
export function encodeStructuredJson(value: StructuredValue): string {
  return JSON.stringify(value);
}

export function asObject(value: StructuredValue | undefined): StructuredObject | undefined {
  return value !== undefined && typeof value === 'object' && !Array.isArray(value) ? value : undefined;
}

export function asArray(value: StructuredValue | undefined): StructuredValue[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

export function asText(value: StructuredValue | undefined): string | undefined {
  return typeof value === 'string' ? value : undefined;
}
