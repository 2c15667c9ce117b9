/**
 * XML mapping for `api_option=userdetails` responses
 */

import { z } from 'zod';
import { UserDetails } from '../models/index.js';
import { accountTypeFromCode, isLifespan, visibilityFromCode } from '../types/index.js';
import { emptyToNull, parseInteger, readElement } from './parser.js';

/**
 * Root element of a user details document.
 */
export const USER_ELEMENT = 'user';

const userElementSchema = z.object({
  user_name: z.string().min(1),
  user_format_short: z.string().optional(),
  user_expiration: z.string().optional(),
  user_avatar_url: z.string().optional(),
  user_private: z.string(),
  user_website: z.string().optional(),
  user_email: z.string().optional(),
  user_location: z.string().optional(),
  user_account_type: z.string(),
});

/**
 * Converts the parsed `<user>` element.
 *
 * Empty optional fields become `null`. An expiration outside the lifespan
 * codes is dropped rather than carried into paste defaults.
 */
export function mapUserElement(element: unknown): UserDetails {
  const xml = readElement(userElementSchema, element, USER_ELEMENT);
  const expiration = emptyToNull(xml.user_expiration);

  return new UserDetails({
    username: xml.user_name,
    avatarUrl: emptyToNull(xml.user_avatar_url),
    defaultHighlighting: emptyToNull(xml.user_format_short),
    defaultExpiration: expiration !== null && isLifespan(expiration) ? expiration : null,
    defaultVisibility: visibilityFromCode(parseInteger(xml.user_private, 'user_private')),
    website: emptyToNull(xml.user_website),
    email: emptyToNull(xml.user_email),
    location: emptyToNull(xml.user_location),
    accountType: accountTypeFromCode(parseInteger(xml.user_account_type, 'user_account_type')),
  });
}

