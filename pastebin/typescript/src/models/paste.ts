/**
 * Paste metadata container.
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';
import type { Visibility } from '../types/index.js';

const isoTimestamp = z.string().datetime({ offset: true });

/**
 * Plain-record form of {@link PasteDetails}.
 */
export const pasteRecordSchema = z.object({
  key: z.string().min(1),
  url: z.string().min(1),
  title: z.string().nullable(),
  size: z.number().int().nonnegative(),
  created_at: isoTimestamp,
  expires_at: isoTimestamp.nullable(),
  visibility: z.enum(['public', 'unlisted', 'private']),
  highlighting: z.string().nullable(),
  hits: z.number().int().nonnegative(),
});

export type PasteRecord = z.infer<typeof pasteRecordSchema>;

export interface PasteDetailsInit {
  key: string;
  url: string;
  title?: string | null;
  size: number;
  createdAt: Date;
  /** `null` or omitted: never expires */
  expiresAt?: Date | null;
  visibility: Visibility;
  highlighting?: string | null;
  hits: number;
}

/**
 * Metadata for a single paste. Immutable.
 */
export class PasteDetails {
  readonly key: string;
  readonly url: string;
  readonly title: string | null;
  /** Code points of the submitted text, or bytes as reported by a listing */
  readonly size: number;
  readonly createdAt: Date;
  readonly expiresAt: Date | null;
  readonly visibility: Visibility;
  readonly highlighting: string | null;
  readonly hits: number;

  /**
   * @throws ValidationError if `expiresAt` is not after `createdAt`, or a count is negative
   */
  constructor(init: PasteDetailsInit) {
    const expiresAt = init.expiresAt ?? null;
    if (expiresAt !== null && expiresAt.getTime() <= init.createdAt.getTime()) {
      throw new ValidationError('expiresAt', 'expiresAt must be after createdAt', {
        createdAt: init.createdAt.toISOString(),
        expiresAt: expiresAt.toISOString(),
      });
    }
    if (!Number.isInteger(init.size) || init.size < 0) {
      throw ValidationError.notAllowed('size', init.size);
    }
    if (!Number.isInteger(init.hits) || init.hits < 0) {
      throw ValidationError.notAllowed('hits', init.hits);
    }

    this.key = init.key;
    this.url = init.url;
    this.title = init.title ?? null;
    this.size = init.size;
    this.createdAt = new Date(init.createdAt.getTime());
    this.expiresAt = expiresAt === null ? null : new Date(expiresAt.getTime());
    this.visibility = init.visibility;
    this.highlighting = init.highlighting ?? null;
    this.hits = init.hits;
    Object.freeze(this);
  }

  /**
   * Rebuilds an instance from its plain-record form.
   * @throws ValidationError if the record is malformed
   */
  static fromRecord(record: unknown): PasteDetails {
    const result = pasteRecordSchema.safeParse(record);
    if (!result.success) {
      throw new ValidationError('record', `Invalid paste record: ${result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
    }
    const data = result.data;
    return new PasteDetails({
      key: data.key,
      url: data.url,
      title: data.title,
      size: data.size,
      createdAt: new Date(data.created_at),
      expiresAt: data.expires_at === null ? null : new Date(data.expires_at),
      visibility: data.visibility,
      highlighting: data.highlighting,
      hits: data.hits,
    });
  }

  toRecord(): PasteRecord {
    return {
      key: this.key,
      url: this.url,
      title: this.title,
      size: this.size,
      created_at: this.createdAt.toISOString(),
      expires_at: this.expiresAt?.toISOString() ?? null,
      visibility: this.visibility,
      highlighting: this.highlighting,
      hits: this.hits,
    };
  }

  toJSON(): PasteRecord {
    return this.toRecord();
  }

  toString(): string {
    return `<PasteDetails: ${this.title || 'Untitled'} at ${this.url}>`;
  }
}
