/**
 * Tests for Pastebin enumerations.
 */

import { describe, it, expect } from 'vitest';
import {
  VISIBILITY_CODES,
  isVisibility,
  visibilityFromCode,
  LIFESPAN_CODES,
  LIFESPAN_OFFSETS_MS,
  isLifespan,
  computeExpiry,
  accountTypeFromCode,
  HIGHLIGHTING_FORMATS,
  isHighlighting,
} from '../index.js';

describe('visibility', () => {
  it('should map visibilities to codes', () => {
    expect(VISIBILITY_CODES).toEqual({ public: 0, unlisted: 1, private: 2 });
  });

  it.each([
    [0, 'public'],
    [1, 'unlisted'],
    [2, 'private'],
    [7, 'public'],
    [-1, 'public'],
  ])('should map code %i to %s', (code, visibility) => {
    expect(visibilityFromCode(code)).toBe(visibility);
  });

  it('should recognise only known names', () => {
    expect(isVisibility('private')).toBe(true);
    expect(isVisibility('secret')).toBe(false);
    expect(isVisibility('toString')).toBe(false);
  });
});

describe('lifespan', () => {
  it('should list every code', () => {
    expect([...LIFESPAN_CODES]).toEqual(['N', '10M', '1H', '1D', '1W', '2W', '1M', '6M', '1Y']);
  });

  it.each([
    ['10M', 600],
    ['1H', 3600],
    ['1D', 86400],
    ['1W', 604800],
    ['2W', 1209600],
    ['1M', 2592000],
    ['6M', 15552000],
    ['1Y', 31536000],
  ] as const)('should offset %s by %i seconds', (code, seconds) => {
    expect(LIFESPAN_OFFSETS_MS[code]).toBe(seconds * 1000);
  });

  it('should never expire for N', () => {
    expect(LIFESPAN_OFFSETS_MS.N).toBeNull();
    expect(computeExpiry(new Date('2024-01-01T00:00:00Z'), 'N')).toBeNull();
  });

  it('should compute expiry from the creation time', () => {
    const expiry = computeExpiry(new Date('2024-01-01T00:00:00Z'), '1D');
    expect(expiry?.toISOString()).toBe('2024-01-02T00:00:00.000Z');
  });

  it('should recognise only known codes', () => {
    expect(isLifespan('2W')).toBe(true);
    expect(isLifespan('3D')).toBe(false);
    expect(isLifespan('1d')).toBe(false);
  });
});

describe('account type', () => {
  it('should map codes', () => {
    expect(accountTypeFromCode(0)).toBe('normal');
    expect(accountTypeFromCode(1)).toBe('pro');
    expect(accountTypeFromCode(9)).toBe('normal');
  });
});

describe('highlighting', () => {
  it('should load the format list', () => {
    expect(HIGHLIGHTING_FORMATS.size).toBeGreaterThan(200);
  });

  it('should accept known formats', () => {
    expect(isHighlighting('rust')).toBe(true);
    expect(isHighlighting('javascript')).toBe(true);
    expect(isHighlighting('text')).toBe(true);
  });

  it('should reject unknown formats', () => {
    expect(isHighlighting('not-a-language')).toBe(false);
    expect(isHighlighting('Rust')).toBe(false);
  });
});
