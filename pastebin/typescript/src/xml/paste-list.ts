/**
 * XML mapping for `api_option=list` responses
 */

import { z } from 'zod';
import { PasteDetails } from '../models/index.js';
import { ValidationError, ParseError } from '../errors/index.js';
import { visibilityFromCode } from '../types/index.js';
import {
  emptyToNull,
  parseInteger,
  parseUnixTimestamp,
  readElement,
} from './parser.js';

/**
 * Element name of one paste in a listing.
 */
export const PASTE_ELEMENT = 'paste';

/**
 * Body the service returns for an account without pastes.
 */
export const NO_PASTES_BODY = 'No pastes found.';

/**
 * Title reported for pastes listed without one.
 */
export const UNTITLED = 'Untitled';

/**
 * A `<paste>` element as produced by the parser. Values are raw text.
 */
const pasteElementSchema = z.object({
  paste_key: z.string().min(1),
  paste_date: z.string(),
  paste_title: z.string().optional(),
  paste_size: z.string(),
  paste_expire_date: z.string(),
  paste_private: z.string(),
  paste_format_short: z.string().optional(),
  paste_url: z.string().min(1),
  paste_hits: z.string(),
});

/**
 * Converts one parsed `<paste>` element.
 *
 * - `paste_expire_date` of 0 means the paste never expires
 * - missing or empty `paste_title` becomes {@link UNTITLED}
 * - unknown `paste_private` codes map to `public`
 */
export function mapPasteElement(element: unknown): PasteDetails {
  const xml = readElement(pasteElementSchema, element, PASTE_ELEMENT);
  const expireSeconds = parseInteger(xml.paste_expire_date, 'paste_expire_date');

  try {
    return new PasteDetails({
      key: xml.paste_key,
      url: xml.paste_url,
      title: xml.paste_title || UNTITLED,
      size: parseInteger(xml.paste_size, 'paste_size'),
      createdAt: parseUnixTimestamp(xml.paste_date, 'paste_date'),
      expiresAt: expireSeconds === 0 ? null : new Date(expireSeconds * 1000),
      visibility: visibilityFromCode(parseInteger(xml.paste_private, 'paste_private')),
      highlighting: emptyToNull(xml.paste_format_short),
      hits: parseInteger(xml.paste_hits, 'paste_hits'),
    });
  } catch (error) {
    if (error instanceof ValidationError) {
      throw new ParseError(`Invalid <${PASTE_ELEMENT}> ${xml.paste_key}: ${error.message}`, error);
    }
    throw error;
  }
}

/**
 * Converts every `<paste>` element, keeping the service's order.
 */
export function mapPasteElements(elements: readonly unknown[]): PasteDetails[] {
  return elements.map(mapPasteElement);
}

