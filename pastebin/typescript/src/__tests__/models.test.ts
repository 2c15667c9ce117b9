/**
 * Tests for paste and user models.
 */

import { describe, it, expect } from 'vitest';
import { PasteDetails, UserDetails, ValidationError } from '../index.js';
import type { PasteDetailsInit } from '../index.js';

const CREATED_AT = new Date('2024-03-01T12:00:00.000Z');

function pasteInit(overrides: Partial<PasteDetailsInit> = {}): PasteDetailsInit {
  return {
    key: 'abc123',
    url: 'https://pastebin.com/abc123',
    title: 'notes',
    size: 5,
    createdAt: CREATED_AT,
    expiresAt: new Date('2024-03-01T12:10:00.000Z'),
    visibility: 'unlisted',
    highlighting: 'rust',
    hits: 0,
    ...overrides,
  };
}

describe('PasteDetails', () => {
  it('should default optional fields to null', () => {
    const paste = new PasteDetails({
      key: 'abc123',
      url: 'https://pastebin.com/abc123',
      size: 0,
      createdAt: CREATED_AT,
      visibility: 'public',
      hits: 0,
    });

    expect(paste.title).toBeNull();
    expect(paste.expiresAt).toBeNull();
    expect(paste.highlighting).toBeNull();
  });

  it('should be immutable', () => {
    const paste = new PasteDetails(pasteInit());
    expect(Object.isFrozen(paste)).toBe(true);
  });

  it('should copy dates', () => {
    const createdAt = new Date(CREATED_AT.getTime());
    const paste = new PasteDetails(pasteInit({ createdAt }));
    createdAt.setFullYear(2000);
    expect(paste.createdAt.toISOString()).toBe('2024-03-01T12:00:00.000Z');
  });

  it('should reject an expiry not after creation', () => {
    expect(() => new PasteDetails(pasteInit({ expiresAt: CREATED_AT }))).toThrow(ValidationError);
    expect(() => new PasteDetails(pasteInit({ expiresAt: new Date('2024-01-01T00:00:00Z') }))).toThrow(
      'expiresAt must be after createdAt'
    );
  });

  it('should reject negative counts', () => {
    expect(() => new PasteDetails(pasteInit({ size: -1 }))).toThrow('Invalid size: -1');
    expect(() => new PasteDetails(pasteInit({ hits: 1.5 }))).toThrow('Invalid hits: 1.5');
  });

  it('should convert to a record', () => {
    expect(new PasteDetails(pasteInit()).toRecord()).toEqual({
      key: 'abc123',
      url: 'https://pastebin.com/abc123',
      title: 'notes',
      size: 5,
      created_at: '2024-03-01T12:00:00.000Z',
      expires_at: '2024-03-01T12:10:00.000Z',
      visibility: 'unlisted',
      highlighting: 'rust',
      hits: 0,
    });
  });

  it('should rebuild an equal instance from its record', () => {
    const original = new PasteDetails(pasteInit({ expiresAt: null, title: null }));
    const restored = PasteDetails.fromRecord(original.toRecord());

    expect(restored).toBeInstanceOf(PasteDetails);
    expect(restored).toEqual(original);
  });

  it('should survive a JSON round trip', () => {
    const original = new PasteDetails(pasteInit());
    const restored = PasteDetails.fromRecord(JSON.parse(JSON.stringify(original)));
    expect(restored).toEqual(original);
  });

  it('should reject malformed records', () => {
    expect(() => PasteDetails.fromRecord({ key: 'abc123' })).toThrow(ValidationError);
    expect(() =>
      PasteDetails.fromRecord({ ...new PasteDetails(pasteInit()).toRecord(), visibility: 'secret' })
    ).toThrow('Invalid paste record: visibility:');
    expect(() => PasteDetails.fromRecord(null)).toThrow(ValidationError);
  });

  it('should describe itself', () => {
    expect(String(new PasteDetails(pasteInit()))).toBe('<PasteDetails: notes at https://pastebin.com/abc123>');
    expect(String(new PasteDetails(pasteInit({ title: null })))).toBe(
      '<PasteDetails: Untitled at https://pastebin.com/abc123>'
    );
  });
});

describe('UserDetails', () => {
  const user = new UserDetails({
    username: 'tester',
    avatarUrl: 'https://pastebin.com/cache/a/1.jpg',
    defaultHighlighting: 'rust',
    defaultExpiration: '1W',
    defaultVisibility: 'private',
    email: 'tester@example.com',
    accountType: 'pro',
  });

  it('should default optional fields to null', () => {
    expect(user.website).toBeNull();
    expect(user.location).toBeNull();
    expect(Object.isFrozen(user)).toBe(true);
  });

  it('should convert to a record', () => {
    expect(user.toRecord()).toEqual({
      username: 'tester',
      avatar_url: 'https://pastebin.com/cache/a/1.jpg',
      default_highlighting: 'rust',
      default_expiration: '1W',
      default_visibility: 'private',
      website: null,
      email: 'tester@example.com',
      location: null,
      account_type: 'pro',
    });
  });

  it('should rebuild an equal instance from its record', () => {
    expect(UserDetails.fromRecord(user.toRecord())).toEqual(user);
  });

  it('should reject an unknown expiration code', () => {
    expect(() => UserDetails.fromRecord({ ...user.toRecord(), default_expiration: '3D' })).toThrow(
      ValidationError
    );
  });

  it('should describe itself', () => {
    expect(user.toString()).toBe('<UserDetails: tester>');
  });
});
