/**
 * User account metadata container.
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';
import { LIFESPAN_CODES } from '../types/index.js';
import type { AccountType, Lifespan, Visibility } from '../types/index.js';

export const userRecordSchema = z.object({
  username: z.string().min(1),
  avatar_url: z.string().nullable(),
  default_highlighting: z.string().nullable(),
  default_expiration: z.enum(LIFESPAN_CODES).nullable(),
  default_visibility: z.enum(['public', 'unlisted', 'private']),
  website: z.string().nullable(),
  email: z.string().nullable(),
  location: z.string().nullable(),
  account_type: z.enum(['normal', 'pro']),
});

export type UserRecord = z.infer<typeof userRecordSchema>;

export interface UserDetailsInit {
  username: string;
  avatarUrl?: string | null;
  defaultHighlighting?: string | null;
  defaultExpiration?: Lifespan | null;
  defaultVisibility: Visibility;
  website?: string | null;
  email?: string | null;
  location?: string | null;
  accountType: AccountType;
}

/**
 * Account details and paste defaults of a Pastebin user. Immutable.
 */
export class UserDetails {
  readonly username: string;
  readonly avatarUrl: string | null;
  readonly defaultHighlighting: string | null;
  readonly defaultExpiration: Lifespan | null;
  readonly defaultVisibility: Visibility;
  readonly website: string | null;
  readonly email: string | null;
  readonly location: string | null;
  readonly accountType: AccountType;

  constructor(init: UserDetailsInit) {
    this.username = init.username;
    this.avatarUrl = init.avatarUrl ?? null;
    this.defaultHighlighting = init.defaultHighlighting ?? null;
    this.defaultExpiration = init.defaultExpiration ?? null;
    this.defaultVisibility = init.defaultVisibility;
    this.website = init.website ?? null;
    this.email = init.email ?? null;
    this.location = init.location ?? null;
    this.accountType = init.accountType;
    Object.freeze(this);
  }

  static fromRecord(record: unknown): UserDetails {
    const result = userRecordSchema.safeParse(record);
    if (!result.success) {
      throw new ValidationError('record', `Invalid user record: ${result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
    }
    const data = result.data;
    return new UserDetails({
      username: data.username,
      avatarUrl: data.avatar_url,
      defaultHighlighting: data.default_highlighting,
      defaultExpiration: data.default_expiration,
      defaultVisibility: data.default_visibility,
      website: data.website,
      email: data.email,
      location: data.location,
      accountType: data.account_type,
    });
  }

  toRecord(): UserRecord {
    return {
      username: this.username,
      avatar_url: this.avatarUrl,
      default_highlighting: this.defaultHighlighting,
      default_expiration: this.defaultExpiration,
      default_visibility: this.defaultVisibility,
      website: this.website,
      email: this.email,
      location: this.location,
      account_type: this.accountType,
    };
  }

  toJSON(): UserRecord {
    return this.toRecord();
  }

  toString(): string {
    return `<UserDetails: ${this.username}>`;
  }
}
