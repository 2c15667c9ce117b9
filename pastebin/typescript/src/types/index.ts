/**
 * Static lookup tables for Pastebin enumerations.
 *
 * The service uses numeric codes for visibility and account type, and short
 * string codes for paste lifespans.
 */

export { HIGHLIGHTING_FORMATS, isHighlighting } from './formats.js';

// ============================================================================
// Visibility
// ============================================================================

/**
 * Paste visibility.
 */
export type Visibility = 'public' | 'unlisted' | 'private';

/**
 * Visibility to the numeric `api_paste_private` code.
 */
export const VISIBILITY_CODES: Readonly<Record<Visibility, number>> = {
  public: 0,
  unlisted: 1,
  private: 2,
};

const VISIBILITY_BY_CODE: ReadonlyMap<number, Visibility> = new Map<number, Visibility>([
  [0, 'public'],
  [1, 'unlisted'],
  [2, 'private'],
]);

/**
 * Visibility used when neither the caller nor the session provides one.
 */
export const DEFAULT_VISIBILITY: Visibility = 'unlisted';

export function isVisibility(value: string): value is Visibility {
  return Object.prototype.hasOwnProperty.call(VISIBILITY_CODES, value);
}

/**
 * Maps a numeric visibility code. Unknown codes map to `public`.
 */
export function visibilityFromCode(code: number): Visibility {
  return VISIBILITY_BY_CODE.get(code) ?? 'public';
}

// ============================================================================
// Lifespan
// ============================================================================

/**
 * Lifespan codes accepted by `api_paste_expire_date`.
 */
export const LIFESPAN_CODES = ['N', '10M', '1H', '1D', '1W', '2W', '1M', '6M', '1Y'] as const;

export type Lifespan = (typeof LIFESPAN_CODES)[number];

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

/**
 * Offset applied to the creation time for each lifespan; `null` never expires.
 * Months and years are fixed day counts.
 */
export const LIFESPAN_OFFSETS_MS: Readonly<Record<Lifespan, number | null>> = {
  N: null,
  '10M': 10 * MINUTE_MS,
  '1H': HOUR_MS,
  '1D': DAY_MS,
  '1W': 7 * DAY_MS,
  '2W': 14 * DAY_MS,
  '1M': 30 * DAY_MS,
  '6M': 180 * DAY_MS,
  '1Y': 365 * DAY_MS,
};

/**
 * Lifespan used when neither the caller nor the session provides one.
 */
export const DEFAULT_LIFESPAN: Lifespan = '10M';

export function isLifespan(value: string): value is Lifespan {
  return LIFESPAN_CODES.some((code) => code === value);
}

/**
 * Expiry of a paste created at `createdAt`, or `null` if it never expires.
 *
 * This is computed from the local clock; the service stores its own value.
 */
export function computeExpiry(createdAt: Date, lifespan: Lifespan): Date | null {
  const offset = LIFESPAN_OFFSETS_MS[lifespan];
  return offset === null ? null : new Date(createdAt.getTime() + offset);
}

// ============================================================================
// Account type
// ============================================================================

export type AccountType = 'normal' | 'pro';

const ACCOUNT_TYPE_BY_CODE: ReadonlyMap<number, AccountType> = new Map<number, AccountType>([
  [0, 'normal'],
  [1, 'pro'],
]);

/**
 * Maps a numeric account type code. Unknown codes map to `normal`.
 */
export function accountTypeFromCode(code: number): AccountType {
  return ACCOUNT_TYPE_BY_CODE.get(code) ?? 'normal';
}

// ============================================================================
// Listing limits
// ============================================================================

export const DEFAULT_LIST_LIMIT = 50;
export const MAX_LIST_LIMIT = 1000;
