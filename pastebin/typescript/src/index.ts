/**
 * Pastebin Client
 *
 * Typed client for the Pastebin form-post API: create, delete, read and list
 * pastes, and fetch account details.
 *
 * ## Features
 *
 * - Login with stored session defaults (visibility, lifespan, highlighting)
 * - Option validation before any request is sent
 * - Immutable paste and user models with plain-record conversion
 * - Pluggable transport and logger
 *
 * ## Quick Start
 *
 * ```typescript
 * import { PastebinClient } from 'pastebin-client';
 *
 * const client = new PastebinClient(devKey);
 * await client.login(username, password);
 *
 * const paste = await client.createPaste('let x = 1;', {
 *   name: 'main.rs',
 *   highlighting: 'rust',
 *   visibility: 'private',
 *   lifespan: '1D',
 * });
 *
 * const text = await client.fetchPasteRaw(paste.key);
 * const pastes = await client.listPastes({ limit: 10 });
 * await client.deletePaste(paste.key);
 * ```
 *
 * @module pastebin-client
 */

// Client
export { PastebinClient, PASTE_REMOVED_BODY, interpretResponse } from './client/index.js';
export type {
  CreatePasteOptions,
  FetchPasteRawOptions,
  ListPastesOptions,
  PasteWithContent,
  SessionDefaults,
  PastebinClientOptions,
  ResponseStrategy,
} from './client/index.js';

// Configuration
export {
  PastebinConfigBuilder,
  SecretString,
  createConfig,
  DEFAULT_API_URL,
  DEFAULT_RAW_URL,
  DEFAULT_PASTE_URL_PREFIX,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
} from './config/index.js';
export type { PastebinConfig } from './config/index.js';

// Errors
export {
  PastebinError,
  PastebinErrorCode,
  TransportError,
  AuthenticationError,
  ApiError,
  ParseError,
  ValidationError,
  ConfigurationError,
  isPastebinError,
  isBadApiRequest,
  BAD_API_REQUEST_PREFIX,
} from './errors/index.js';

// Models
export { PasteDetails, UserDetails, pasteRecordSchema, userRecordSchema } from './models/index.js';
export type { PasteDetailsInit, PasteRecord, UserDetailsInit, UserRecord } from './models/index.js';

// Types
export {
  VISIBILITY_CODES,
  DEFAULT_VISIBILITY,
  isVisibility,
  visibilityFromCode,
  LIFESPAN_CODES,
  LIFESPAN_OFFSETS_MS,
  DEFAULT_LIFESPAN,
  isLifespan,
  computeExpiry,
  accountTypeFromCode,
  HIGHLIGHTING_FORMATS,
  isHighlighting,
  DEFAULT_LIST_LIMIT,
  MAX_LIST_LIMIT,
} from './types/index.js';
export type { Visibility, Lifespan, AccountType } from './types/index.js';

// Transport
export { FetchTransport, createFetchTransport, encodeForm, isSuccessResponse } from './transport/index.js';
export type {
  HttpMethod,
  HttpRequest,
  HttpResponse,
  HttpTransport,
  FetchTransportOptions,
  FormFields,
} from './transport/index.js';

// Observability
export {
  LogLevel,
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  redactSensitive,
} from './observability/index.js';
export type { Logger, LogEntry } from './observability/index.js';
