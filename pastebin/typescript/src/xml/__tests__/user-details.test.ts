/**
 * Tests for user details XML mapping
 */

import { describe, it, expect } from 'vitest';
import { buildUserXml } from '../../testing/index.js';
import { parseXmlDocument } from '../parser.js';
import { USER_ELEMENT, mapUserElement } from '../user-details.js';

function mapXml(xml: string) {
  return mapUserElement(parseXmlDocument(xml, USER_ELEMENT));
}

describe('mapUserElement', () => {
  it('should map every field', () => {
    const user = mapXml(buildUserXml());

    expect(user.toRecord()).toEqual({
      username: 'tester',
      avatar_url: 'https://pastebin.com/cache/a/1.jpg',
      default_highlighting: 'text',
      default_expiration: 'N',
      default_visibility: 'unlisted',
      website: null,
      email: 'tester@example.com',
      location: null,
      account_type: 'normal',
    });
  });

  it('should decode character references', () => {
    expect(mapXml(buildUserXml({ user_location: 'O&#039;Hare' })).location).toBe("O'Hare");
    expect(mapXml(buildUserXml({ user_website: 'https://example.com/?a=1&amp;b=2' })).website).toBe(
      'https://example.com/?a=1&b=2'
    );
  });

  it('should map a pro account', () => {
    expect(mapXml(buildUserXml({ user_account_type: '1' })).accountType).toBe('pro');
  });

  it('should map private defaults', () => {
    expect(mapXml(buildUserXml({ user_private: '2' })).defaultVisibility).toBe('private');
  });

  it('should drop an unknown expiration', () => {
    expect(mapXml(buildUserXml({ user_expiration: '3D' })).defaultExpiration).toBeNull();
  });

  it('should map missing optional fields to null', () => {
    const user = mapXml(
      buildUserXml({ user_format_short: undefined, user_expiration: undefined, user_avatar_url: undefined })
    );

    expect(user.defaultHighlighting).toBeNull();
    expect(user.defaultExpiration).toBeNull();
    expect(user.avatarUrl).toBeNull();
  });

  it('should reject a document without a username', () => {
    expect(() => mapXml(buildUserXml({ user_name: undefined }))).toThrow(
      'Invalid <user> element: user_name: Required'
    );
  });

  it('should reject a non-numeric visibility', () => {
    expect(() => mapXml(buildUserXml({ user_private: 'yes' }))).toThrow(
      'Expected an integer for <user_private>, got: yes'
    );
  });
});
