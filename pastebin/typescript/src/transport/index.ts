/**
 * HTTP transport layer for the Pastebin client.
 */

export type { HttpMethod, HttpRequest, HttpResponse, HttpTransport, FormFields } from './types.js';
export { encodeForm, isSuccessResponse } from './types.js';

export type { FetchTransportOptions } from './fetch-transport.js';
export { FetchTransport, createFetchTransport } from './fetch-transport.js';
