/**
 * Response strategies.
 *
 * Every operation states up front which body shape it expects; bodies are
 * only ever read through that declaration.
 */

import { ApiError, isBadApiRequest } from '../errors/index.js';
import { parseXmlDocument, parseXmlFragments } from '../xml/index.js';

/**
 * Plain-text body, handed to `read` unmodified.
 */
export interface TextStrategy<T> {
  readonly kind: 'text';
  readonly read: (body: string) => T;
}

/**
 * Sibling `element`s without a common root. A body equal to `emptyBody`
 * (after trimming) short-circuits to `empty()`.
 */
export interface XmlFragmentsStrategy<T> {
  readonly kind: 'xml-fragments';
  readonly element: string;
  readonly emptyBody?: string;
  readonly empty: () => T;
  readonly read: (elements: readonly unknown[]) => T;
}

/**
 * Document with a single `root` element.
 */
export interface XmlDocumentStrategy<T> {
  readonly kind: 'xml-document';
  readonly root: string;
  readonly read: (root: unknown) => T;
}

export type ResponseStrategy<T> = TextStrategy<T> | XmlFragmentsStrategy<T> | XmlDocumentStrategy<T>;

/**
 * Interprets a successful response body for `operation`.
 *
 * XML strategies report the service's `Bad API request` text as an
 * {@link ApiError} instead of a parse failure.
 */
export function interpretResponse<T>(operation: string, body: string, strategy: ResponseStrategy<T>): T {
  switch (strategy.kind) {
    case 'text':
      return strategy.read(body);

    case 'xml-fragments':
      if (isBadApiRequest(body)) {
        throw new ApiError(operation, body);
      }
      if (strategy.emptyBody !== undefined && body.trim() === strategy.emptyBody) {
        return strategy.empty();
      }
      return strategy.read(parseXmlFragments(body, strategy.element));

    case 'xml-document':
      if (isBadApiRequest(body)) {
        throw new ApiError(operation, body);
      }
      return strategy.read(parseXmlDocument(body, strategy.root));
  }
}
