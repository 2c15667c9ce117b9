/**
 * XML parsing for Pastebin list and user details responses.
 */

export {
  FRAGMENT_ROOT,
  createXmlParser,
  assertWellFormed,
  parseXmlDocument,
  parseXmlFragments,
  readElement,
  parseInteger,
  parseUnixTimestamp,
  emptyToNull,
} from './parser.js';

export {
  PASTE_ELEMENT,
  NO_PASTES_BODY,
  UNTITLED,
  mapPasteElement,
  mapPasteElements,
} from './paste-list.js';

export { USER_ELEMENT, mapUserElement } from './user-details.js';
