/**
 * Core XML parsing utilities for Pastebin API responses
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type { ZodType, ZodTypeDef } from 'zod';
import { ParseError } from '../errors/index.js';

/**
 * Name of the element wrapped around root-less fragment lists.
 */
export const FRAGMENT_ROOT = 'root';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Creates a configured XML parser instance.
 *
 * Tag values stay strings, kept as sent apart from entity decoding (numeric
 * character references included); `arrayTags` are always returned as arrays
 * so a single element parses the same way as many.
 */
export function createXmlParser(arrayTags: readonly string[] = []): XMLParser {
  return new XMLParser({
    ignoreAttributes: true,
    ignoreDeclaration: true,
    parseTagValue: false,
    trimValues: false,
    htmlEntities: true,
    isArray: (tagName: string) => arrayTags.includes(tagName),
  });
}

/**
 * Checks that `xml` is a well-formed document.
 * @throws ParseError with the validator's line and column otherwise
 */
export function assertWellFormed(xml: string): void {
  const result = XMLValidator.validate(xml);
  if (result !== true) {
    throw new ParseError(
      `Failed to parse XML at line ${result.err.line}, column ${result.err.col}: ${result.err.msg}`
    );
  }
}

/**
 * Parses a single-root document.
 *
 * @returns the content of the `root` element
 * @throws ParseError if the XML is malformed or `root` is missing
 */
export function parseXmlDocument(xml: string, root: string): unknown {
  const trimmed = xml.trim();
  assertWellFormed(trimmed);
  const document: unknown = createXmlParser().parse(trimmed);
  if (!isRecord(document) || !(root in document)) {
    throw new ParseError(`Expected a <${root}> document`);
  }
  return document[root];
}

/**
 * Parses a sequence of sibling elements that lack a common root by wrapping
 * them in a synthetic one.
 *
 * @returns every `element` child, in document order
 * @throws ParseError if the wrapped document is malformed
 */
export function parseXmlFragments(xml: string, element: string): unknown[] {
  const wrapped = `<${FRAGMENT_ROOT}>${xml.trim()}</${FRAGMENT_ROOT}>`;
  assertWellFormed(wrapped);
  const document: unknown = createXmlParser([element]).parse(wrapped);
  const root = isRecord(document) ? document[FRAGMENT_ROOT] : undefined;
  // A root with only text (or nothing) has no element children.
  if (!isRecord(root)) {
    return [];
  }
  const children = root[element];
  return Array.isArray(children) ? children : [];
}

/**
 * Validates a parsed element against a schema.
 * @throws ParseError listing the failing fields
 */
export function readElement<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  value: unknown,
  element: string
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || element}: ${issue.message}`);
    throw new ParseError(`Invalid <${element}> element: ${issues.join('; ')}`);
  }
  return result.data;
}

/**
 * Parses a base-10 integer element value. Surrounding whitespace is ignored.
 * @throws ParseError if the value is not an integer
 */
export function parseInteger(value: string, field: string): number {
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new ParseError(`Expected an integer for <${field}>, got: ${value}`);
  }
  return Number.parseInt(trimmed, 10);
}

/**
 * Parses a Unix timestamp in seconds.
 */
export function parseUnixTimestamp(value: string, field: string): Date {
  return new Date(parseInteger(value, field) * 1000);
}

/**
 * Maps empty element text to `null`.
 */
export function emptyToNull(value: string | undefined): string | null {
  return value === undefined || value === '' ? null : value;
}
