/**
 * Pastebin client configuration and builder.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';

// ============================================================================
// Default Constants
// ============================================================================

/** Base URL of the form-post API endpoints. */
export const DEFAULT_API_URL = 'https://pastebin.com/api/';

/** Base URL for public raw paste content. */
export const DEFAULT_RAW_URL = 'https://pastebin.com/raw/';

/** Prefix every successfully created paste URL starts with. */
export const DEFAULT_PASTE_URL_PREFIX = 'https://pastebin.com/';

/** Default request timeout in milliseconds. */
export const DEFAULT_TIMEOUT_MS = 30000;

/** Default User-Agent header. */
export const DEFAULT_USER_AGENT = 'pastebin-client/0.1.0';

// ============================================================================
// Secret String
// ============================================================================

/**
 * SecretString wrapper to prevent accidental logging of sensitive values.
 * The value is only accessible via the expose() method.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /**
   * Exposes the secret value. Use with caution.
   */
  expose(): string {
    return this.value;
  }

  toString(): string {
    return '[REDACTED]';
  }

  toJSON(): string {
    return '[REDACTED]';
  }
}

// ============================================================================
// Configuration
// ============================================================================

/**
 * Pastebin client configuration.
 */
export interface PastebinConfig {
  /** Developer API key */
  devKey: SecretString;
  /** Base URL of `api_login.php`, `api_post.php` and `api_raw.php`, with trailing slash */
  apiUrl: string;
  /** Base URL for public raw content, with trailing slash */
  rawUrl: string;
  /** Prefix a paste URL must start with for creation to count as successful */
  pasteUrlPrefix: string;
  /** Request timeout in milliseconds, handed to the transport */
  timeoutMs: number;
  /** User agent string */
  userAgent: string;
}

const httpUrlSchema = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//.test(value), { message: 'must use http or https' })
  .transform((value) => (value.endsWith('/') ? value : `${value}/`));

const configSchema = z.object({
  devKey: z.string({ required_error: 'developer key is required' }).trim().min(1, 'developer key cannot be empty'),
  apiUrl: httpUrlSchema,
  rawUrl: httpUrlSchema,
  pasteUrlPrefix: httpUrlSchema,
  timeoutMs: z.number().int().positive(),
  userAgent: z.string().min(1),
});

/**
 * Builder for Pastebin client configuration.
 */
export class PastebinConfigBuilder {
  private devKey?: string;
  private apiUrl: string = DEFAULT_API_URL;
  private rawUrl: string = DEFAULT_RAW_URL;
  private pasteUrlPrefix: string = DEFAULT_PASTE_URL_PREFIX;
  private timeoutMs: number = DEFAULT_TIMEOUT_MS;
  private userAgent: string = DEFAULT_USER_AGENT;

  /**
   * Sets the developer API key (`api_dev_key`).
   */
  withDevKey(devKey: string): this {
    this.devKey = devKey;
    return this;
  }

  withApiUrl(url: string): this {
    this.apiUrl = url;
    return this;
  }

  withRawUrl(url: string): this {
    this.rawUrl = url;
    return this;
  }

  /**
   * Sets the prefix expected on created paste URLs. Change it together with
   * the API URL when pointing the client at another deployment.
   */
  withPasteUrlPrefix(prefix: string): this {
    this.pasteUrlPrefix = prefix;
    return this;
  }

  withTimeout(timeoutMs: number): this {
    this.timeoutMs = timeoutMs;
    return this;
  }

  withUserAgent(userAgent: string): this {
    this.userAgent = userAgent;
    return this;
  }

  /**
   * Builds the Pastebin configuration.
   * @throws ConfigurationError if any value fails validation
   */
  build(): PastebinConfig {
    const result = configSchema.safeParse({
      devKey: this.devKey,
      apiUrl: this.apiUrl,
      rawUrl: this.rawUrl,
      pasteUrlPrefix: this.pasteUrlPrefix,
      timeoutMs: this.timeoutMs,
      userAgent: this.userAgent,
    });

    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigurationError(issues.join('; '), issues);
    }

    return {
      ...result.data,
      devKey: new SecretString(result.data.devKey),
    };
  }
}

/**
 * Shorthand for a configuration with default endpoints.
 */
export function createConfig(devKey: string): PastebinConfig {
  return new PastebinConfigBuilder().withDevKey(devKey).build();
}
