/**
 * Config XML Reader
 *
 * Reads a job configuration document into a small element tree.
 * Failures come back as values, never as exceptions.
 *
 *   <job>
 *     <job_language>en</job_language>
 *     <tasks>
 *       <task>
 *         <task_language>en</task_language>
 *       </task>
 *     </tasks>
 *   </job>
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { XmlParseError } from '@aligner/core';
import { isArray, isObject, isString, removeBom } from '@aligner/utils';

export type XmlSource = string | Uint8Array;

export interface XmlElement {
  tag: string;
  /** Character data before the first child element; null when there is none */
  text: string | null;
  children: XmlElement[];
}

export type XmlParseOutcome =
  | { ok: true; root: XmlElement }
  | { ok: false; error: XmlParseError };

const TEXT_NODE = '#text';
const CDATA_NODE = '#cdata';
const ATTRIBUTES_NODE = ':@';

// Entity references are decoded by readBody, so CDATA sections stay literal
const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  trimValues: false,
  parseTagValue: false,
  processEntities: false,
  textNodeName: TEXT_NODE,
  cdataPropName: CDATA_NODE,
});

const PREDEFINED_ENTITIES: Readonly<Record<string, string>> = {
  lt: '<',
  gt: '>',
  amp: '&',
  apos: "'",
  quot: '"',
};

const MAX_CODE_POINT = 0x10ffff;
const ENTITY_REFERENCE = /&(?:#(\d+)|#x([0-9a-fA-F]+)|([^\s&;#]+));/g;
const INTERNAL_SUBSET = /<!DOCTYPE[^[>]*\[([\s\S]*?)\]\s*>/;
const ENTITY_DECLARATION = /<!ENTITY\s+([^\s%]+)\s+(["'])([\s\S]*?)\2\s*>/g;

type EntityTable = ReadonlyMap<string, string>;

interface ElementBody {
  text: string | null;
  children: XmlElement[];
}

function failure(error: XmlParseError): XmlParseOutcome {
  return { ok: false, error };
}

function decode(source: XmlSource): string | XmlParseError {
  if (isString(source)) {
    return removeBom(source);
  }
  try {
    // fatal: reject malformed byte sequences; the decoder drops a UTF-8 BOM
    return new TextDecoder('utf-8', { fatal: true }).decode(source);
  } catch (error) {
    return new XmlParseError('encoding', 'Document is not valid UTF-8', undefined, {
      cause: error,
    });
  }
}

/**
 * Replace character and entity references in one pass.
 * Named entities must be predefined or declared in the internal DTD subset.
 */
function decodeReferences(text: string, entities: EntityTable): string | XmlParseError {
  const problems: XmlParseError[] = [];

  const decoded = text.replace(
    ENTITY_REFERENCE,
    (reference: string, decimal?: string, hex?: string, name?: string) => {
      if (name !== undefined) {
        const value = PREDEFINED_ENTITIES[name] ?? entities.get(name);
        if (value === undefined) {
          problems.push(
            new XmlParseError('syntax', `Undefined entity '${reference}'`, { entity: name })
          );
          return reference;
        }
        return value;
      }

      const codePoint = decimal !== undefined ? Number(decimal) : parseInt(hex ?? '', 16);
      if (!(codePoint > 0 && codePoint <= MAX_CODE_POINT)) {
        problems.push(new XmlParseError('syntax', `Invalid character reference '${reference}'`));
        return reference;
      }
      return String.fromCodePoint(codePoint);
    }
  );

  return problems[0] ?? decoded;
}

/**
 * Entities declared in the document's internal DTD subset
 */
function readDeclaredEntities(text: string): EntityTable {
  const entities = new Map<string, string>();
  const subset = INTERNAL_SUBSET.exec(text)?.[1];
  if (subset === undefined) {
    return entities;
  }

  for (const [, name, , value] of subset.matchAll(ENTITY_DECLARATION)) {
    if (name !== undefined && value !== undefined && !entities.has(name)) {
      entities.set(name, value);
    }
  }
  return entities;
}

function tagOf(node: Record<string, unknown>): string | undefined {
  return Object.keys(node).find((key) => key !== ATTRIBUTES_NODE);
}

/**
 * Raw text of a CDATA node: `[{ '#text': '...' }]`
 */
function cdataText(content: unknown): string | null {
  if (!isArray(content)) {
    return null;
  }
  let text = '';
  for (const part of content) {
    if (!isObject(part) || !isString(part[TEXT_NODE])) {
      return null;
    }
    text += part[TEXT_NODE];
  }
  return text;
}

function unexpectedShape(): XmlParseError {
  return new XmlParseError('structure', 'Unexpected document structure');
}

/**
 * Convert the ordered node list of one element
 */
function readBody(nodes: unknown, entities: EntityTable): ElementBody | XmlParseError {
  if (!isArray(nodes)) {
    return unexpectedShape();
  }

  let text: string | null = null;
  const children: XmlElement[] = [];

  for (const node of nodes) {
    if (!isObject(node)) {
      return unexpectedShape();
    }
    const tag = tagOf(node);
    if (tag === undefined) {
      continue;
    }

    const content = node[tag];
    if (tag === TEXT_NODE || tag === CDATA_NODE) {
      const raw = tag === TEXT_NODE ? (isString(content) ? content : null) : cdataText(content);
      if (raw === null) {
        return unexpectedShape();
      }
      const value = tag === TEXT_NODE ? decodeReferences(raw, entities) : raw;
      if (!isString(value)) {
        return value;
      }
      if (children.length === 0) {
        text = (text ?? '') + value;
      }
      continue;
    }

    const body = readBody(content, entities);
    if (body instanceof XmlParseError) {
      return body;
    }
    children.push({ tag, ...body });
  }

  return { text, children };
}

/**
 * Parse a configuration document
 */
export function parseConfigXml(source: XmlSource): XmlParseOutcome {
  const text = decode(source);
  if (!isString(text)) {
    return failure(text);
  }

  const validation = XMLValidator.validate(text);
  if (validation !== true) {
    const { code, msg, line, col } = validation.err;
    return failure(
      new XmlParseError('syntax', `${msg} (line ${line}, column ${col})`, { code, line, col })
    );
  }

  let parsed: unknown;
  try {
    parsed = parser.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return failure(new XmlParseError('syntax', message, undefined, { cause: error }));
  }

  const document = readBody(parsed, readDeclaredEntities(text));
  if (document instanceof XmlParseError) {
    return failure(document);
  }

  const [root] = document.children;
  if (!root) {
    return failure(new XmlParseError('structure', 'Document has no root element'));
  }

  return { ok: true, root };
}

/**
 * First direct child of `element` with the given tag
 */
export function findChild(element: XmlElement, tag: string): XmlElement | undefined {
  return element.children.find((child) => child.tag === tag);
}
