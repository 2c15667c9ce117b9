/**
 * Pastebin client - main entry point for Pastebin API operations.
 *
 * One method per remote operation. Each issues a single request (login issues
 * two) through the configured {@link HttpTransport} and interprets the body
 * through the operation's {@link ResponseStrategy}.
 */

import { PastebinConfig, createConfig } from '../config/index.js';
import {
  ApiError,
  AuthenticationError,
  TransportError,
  ValidationError,
  isBadApiRequest,
} from '../errors/index.js';
import { PasteDetails, UserDetails } from '../models/index.js';
import { Logger, NoopLogger } from '../observability/index.js';
import {
  FetchTransport,
  FormFields,
  HttpRequest,
  HttpTransport,
  encodeForm,
  isSuccessResponse,
} from '../transport/index.js';
import {
  DEFAULT_LIFESPAN,
  DEFAULT_LIST_LIMIT,
  DEFAULT_VISIBILITY,
  Lifespan,
  MAX_LIST_LIMIT,
  VISIBILITY_CODES,
  Visibility,
  computeExpiry,
  isHighlighting,
  isLifespan,
  isVisibility,
} from '../types/index.js';
import {
  NO_PASTES_BODY,
  PASTE_ELEMENT,
  USER_ELEMENT,
  mapPasteElements,
  mapUserElement,
} from '../xml/index.js';
import { ResponseStrategy, interpretResponse } from './response.js';

export type { ResponseStrategy } from './response.js';
export { interpretResponse } from './response.js';

// ============================================================================
// Endpoints and fixed bodies
// ============================================================================

const LOGIN_ENDPOINT = 'api_login.php';
const POST_ENDPOINT = 'api_post.php';
const RAW_ENDPOINT = 'api_raw.php';

/** Body acknowledging a deletion. */
export const PASTE_REMOVED_BODY = 'Paste Removed';

// ============================================================================
// Parameter Types
// ============================================================================

/**
 * Options for creating a paste. Unset fields fall back to the session
 * defaults stored by {@link PastebinClient.login}, then to `unlisted` and `10M`.
 * Empty strings count as unset.
 */
export interface CreatePasteOptions {
  /** Paste title */
  name?: string;
  /** Syntax highlighting format, e.g. `rust` */
  highlighting?: string;
  /** `public`, `unlisted` or `private` */
  visibility?: string;
  /** One of `N`, `10M`, `1H`, `1D`, `1W`, `2W`, `1M`, `6M`, `1Y` */
  lifespan?: string;
  /** Folder to place the paste in; requires a user key */
  folderKey?: string;
  /** User session key; overrides the session default */
  userKey?: string;
}

export interface FetchPasteRawOptions {
  /**
   * Read through the owner endpoint with the user key (needed for private
   * pastes). When false, the public raw URL is fetched with no credentials.
   * Default: true
   */
  owned?: boolean;
  userKey?: string;
}

export interface ListPastesOptions {
  userKey?: string;
  /** Maximum number of pastes, 1-1000. Default: 50 */
  limit?: number;
}

/**
 * A listed paste together with its content.
 */
export interface PasteWithContent {
  paste: PasteDetails;
  content: string;
}

/**
 * Defaults captured at login. Every field is `null` before login.
 */
export interface SessionDefaults {
  readonly userKey: string | null;
  readonly highlighting: string | null;
  readonly expiration: Lifespan | null;
  readonly visibility: Visibility | null;
}

/**
 * Pastebin client options.
 */
export interface PastebinClientOptions {
  /** Transport; defaults to a fetch transport using the configured timeout */
  transport?: HttpTransport;
  /** Logger instance */
  logger?: Logger;
}

const EMPTY_SESSION: SessionDefaults = Object.freeze({
  userKey: null,
  highlighting: null,
  expiration: null,
  visibility: null,
});

// ============================================================================
// Pastebin Client
// ============================================================================

/**
 * Pastebin API client.
 *
 * Session defaults are written only by {@link login} and {@link logout}.
 * An instance is not meant to be logged in from concurrent callers; use one
 * client per account.
 */
export class PastebinClient {
  private readonly config: PastebinConfig;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;
  private session: SessionDefaults = EMPTY_SESSION;

  /**
   * @param config - Configuration, or a developer key for the default endpoints
   * @throws ConfigurationError if the developer key is empty
   */
  constructor(config: PastebinConfig | string, options: PastebinClientOptions = {}) {
    this.config = typeof config === 'string' ? createConfig(config) : config;
    this.transport = options.transport ?? new FetchTransport({ timeoutMs: this.config.timeoutMs });
    this.logger = (options.logger ?? new NoopLogger()).child({ component: 'pastebin' });
  }

  // ==========================================================================
  // Session
  // ==========================================================================

  /**
   * Retrieves a user session key (`api_user_key`).
   *
   * @throws AuthenticationError if the service rejects the credentials
   * @throws TransportError on a non-2xx status
   */
  async fetchUserKey(username: string, password: string): Promise<string> {
    return this.post(
      'fetchUserKey',
      LOGIN_ENDPOINT,
      {
        api_dev_key: this.devKey,
        api_user_name: username,
        api_user_password: password,
      },
      {
        kind: 'text',
        read: (body) => {
          if (isBadApiRequest(body)) {
            throw new AuthenticationError(`Login failure: ${body.trim()}`);
          }
          const userKey = body.trim();
          if (userKey === '') {
            throw new ApiError('fetchUserKey', body, 'fetchUserKey failed: empty user key');
          }
          return userKey;
        },
      }
    );
  }

  /**
   * Logs in and stores the user key and the account's paste defaults.
   * Nothing is stored unless both requests succeed.
   */
  async login(username: string, password: string): Promise<void> {
    const userKey = await this.fetchUserKey(username, password);
    const user = await this.fetchUserDetails(userKey);

    this.session = Object.freeze({
      userKey,
      highlighting: user.defaultHighlighting,
      expiration: user.defaultExpiration,
      visibility: user.defaultVisibility,
    });

    this.logger.info('Logged in', { username: user.username, accountType: user.accountType });
  }

  /**
   * Forgets the stored user key and defaults.
   */
  logout(): void {
    this.session = EMPTY_SESSION;
  }

  getSessionDefaults(): SessionDefaults {
    return this.session;
  }

  // ==========================================================================
  // Pastes
  // ==========================================================================

  /**
   * Creates a paste.
   *
   * `expiresAt` on the result is computed from the local clock as
   * `createdAt + lifespan`; the service keeps its own value, which may differ
   * slightly. `size` counts the code points of `text`.
   *
   * @throws ValidationError for an unknown visibility, lifespan or highlighting, before any request
   * @throws ApiError if the body is not a paste URL
   */
  async createPaste(text: string, options: CreatePasteOptions = {}): Promise<PasteDetails> {
    const visibility = options.visibility || this.session.visibility || DEFAULT_VISIBILITY;
    const lifespan = options.lifespan || this.session.expiration || DEFAULT_LIFESPAN;
    const highlighting = options.highlighting || this.session.highlighting || undefined;
    const userKey = options.userKey || this.session.userKey || undefined;

    if (!isVisibility(visibility)) {
      throw ValidationError.notAllowed('visibility', visibility);
    }
    if (!isLifespan(lifespan)) {
      throw ValidationError.notAllowed('lifespan', lifespan);
    }
    if (highlighting !== undefined && !isHighlighting(highlighting)) {
      throw ValidationError.notAllowed('highlighting', highlighting);
    }

    const url = await this.post(
      'createPaste',
      POST_ENDPOINT,
      {
        api_dev_key: this.devKey,
        api_option: 'paste',
        api_paste_code: text,
        api_paste_private: VISIBILITY_CODES[visibility],
        api_paste_expire_date: lifespan,
        api_paste_format: highlighting,
        api_paste_name: options.name || undefined,
        api_folder_key: options.folderKey || undefined,
        api_user_key: userKey,
      },
      {
        kind: 'text',
        read: (body) => {
          const pasteUrl = body.trim();
          if (!pasteUrl.startsWith(this.config.pasteUrlPrefix)) {
            throw new ApiError('createPaste', body);
          }
          return pasteUrl;
        },
      }
    );

    const key = url.slice(url.lastIndexOf('/') + 1);
    if (key === '') {
      throw new ApiError('createPaste', url, `createPaste failed: no paste key in ${url}`);
    }

    const createdAt = new Date();
    return new PasteDetails({
      key,
      url,
      title: options.name || null,
      size: [...text].length,
      createdAt,
      expiresAt: computeExpiry(createdAt, lifespan),
      visibility,
      highlighting: highlighting ?? null,
      hits: 0,
    });
  }

  /**
   * Deletes a paste owned by the user.
   *
   * @throws ApiError unless the service acknowledges the removal
   */
  async deletePaste(key: string, userKey?: string): Promise<void> {
    await this.post(
      'deletePaste',
      POST_ENDPOINT,
      {
        api_dev_key: this.devKey,
        api_user_key: this.requireUserKey('deletePaste', userKey),
        api_paste_key: key,
        api_option: 'delete',
      },
      {
        kind: 'text',
        read: (body) => {
          if (body.trim() !== PASTE_REMOVED_BODY) {
            throw new ApiError('deletePaste', body);
          }
        },
      }
    );
    this.logger.info('Paste deleted', { key });
  }

  /**
   * Fetches the raw text of a paste.
   *
   * @throws TransportError on a non-2xx status
   */
  async fetchPasteRaw(key: string, options: FetchPasteRawOptions = {}): Promise<string> {
    if (options.owned === false) {
      return this.execute(
        'fetchPasteRaw',
        {
          method: 'GET',
          url: `${this.config.rawUrl}${encodeURIComponent(key)}`,
          headers: { 'User-Agent': this.config.userAgent },
        },
        { kind: 'text', read: (body) => body }
      );
    }

    return this.post(
      'fetchPasteRaw',
      RAW_ENDPOINT,
      {
        api_option: 'show_paste',
        api_dev_key: this.devKey,
        api_user_key: this.requireUserKey('fetchPasteRaw', options.userKey),
        api_paste_key: key,
      },
      {
        kind: 'text',
        read: (body) => {
          if (isBadApiRequest(body)) {
            throw new ApiError('fetchPasteRaw', body);
          }
          return body;
        },
      }
    );
  }

  /**
   * Lists the user's pastes. An account without pastes yields `[]`.
   *
   * The listing is all or nothing: one `<paste>` that cannot be mapped, such
   * as an expiry date not after its creation date, fails the whole call.
   *
   * @throws ValidationError if `limit` is not an integer in 1-1000
   * @throws ParseError if the body is not well-formed XML or any paste is invalid
   */
  async listPastes(options: ListPastesOptions = {}): Promise<PasteDetails[]> {
    const limit = options.limit ?? DEFAULT_LIST_LIMIT;
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIST_LIMIT) {
      throw ValidationError.notAllowed('limit', limit);
    }

    return this.post(
      'listPastes',
      POST_ENDPOINT,
      {
        api_option: 'list',
        api_dev_key: this.devKey,
        api_user_key: this.requireUserKey('listPastes', options.userKey),
        api_results_limit: limit,
      },
      {
        kind: 'xml-fragments',
        element: PASTE_ELEMENT,
        emptyBody: NO_PASTES_BODY,
        empty: () => [],
        read: mapPasteElements,
      }
    );
  }

  /**
   * Looks up one of the user's pastes by key.
   *
   * @throws ApiError if the paste is not among the user's pastes
   */
  async fetchPasteDetails(key: string, userKey?: string): Promise<PasteDetails> {
    const pastes = await this.listPastes({ userKey, limit: MAX_LIST_LIMIT });
    const paste = pastes.find((candidate) => candidate.key === key);
    if (!paste) {
      throw new ApiError('fetchPasteDetails', '', `fetchPasteDetails failed: no paste with key ${key}`);
    }
    return paste;
  }

  /**
   * Lists the user's pastes and fetches each one's content, one at a time.
   */
  async listPastesRaw(options: ListPastesOptions = {}): Promise<PasteWithContent[]> {
    const pastes = await this.listPastes(options);
    const results: PasteWithContent[] = [];
    for (const paste of pastes) {
      const content = await this.fetchPasteRaw(paste.key, { owned: true, userKey: options.userKey });
      results.push({ paste, content });
    }
    return results;
  }

  // ==========================================================================
  // Users
  // ==========================================================================

  /**
   * Fetches the user's account details and paste defaults.
   *
   * @throws ParseError if the body is malformed or lacks required fields
   */
  async fetchUserDetails(userKey?: string): Promise<UserDetails> {
    return this.post(
      'fetchUserDetails',
      POST_ENDPOINT,
      {
        api_option: 'userdetails',
        api_dev_key: this.devKey,
        api_user_key: this.requireUserKey('fetchUserDetails', userKey),
      },
      {
        kind: 'xml-document',
        root: USER_ELEMENT,
        read: mapUserElement,
      }
    );
  }

  // ==========================================================================
  // Request plumbing
  // ==========================================================================

  private get devKey(): string {
    return this.config.devKey.expose();
  }

  private requireUserKey(operation: string, userKey: string | undefined): string {
    const resolved = userKey || this.session.userKey;
    if (!resolved) {
      throw new AuthenticationError(`${operation} requires a user key; call login() or pass one`);
    }
    return resolved;
  }

  private post<T>(
    operation: string,
    endpoint: string,
    fields: FormFields,
    strategy: ResponseStrategy<T>
  ): Promise<T> {
    return this.execute(
      operation,
      {
        method: 'POST',
        url: `${this.config.apiUrl}${endpoint}`,
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          'User-Agent': this.config.userAgent,
        },
        body: encodeForm(fields),
      },
      strategy
    );
  }

  private async execute<T>(
    operation: string,
    request: HttpRequest,
    strategy: ResponseStrategy<T>
  ): Promise<T> {
    const startTime = Date.now();
    this.logger.debug('Executing Pastebin request', {
      operation,
      method: request.method,
      url: request.url,
      responseKind: strategy.kind,
    });

    try {
      const response = await this.transport.send(request);
      if (!isSuccessResponse(response)) {
        throw TransportError.fromStatus(operation, response.status, response.body);
      }

      const result = interpretResponse(operation, response.body, strategy);
      this.logger.debug('Pastebin request succeeded', {
        operation,
        status: response.status,
        durationMs: Date.now() - startTime,
      });
      return result;
    } catch (error) {
      this.logger.error('Pastebin request failed', {
        operation,
        error: error instanceof Error ? error.message : String(error),
        durationMs: Date.now() - startTime,
      });
      throw error;
    }
  }
}
