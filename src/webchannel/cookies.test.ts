import { describe, expect, test } from 'vitest';

import { CookieJar } from './cookies.js';

describe('webchannel/cookies', () => {
  test('keeps values containing = and drops attributes', () => {
    const jar = new CookieJar();
    expect(jar.setFromHeader('COMPASS=dynamite=abc=def; Path=/; Secure; HttpOnly')).toBe('COMPASS');
    expect(jar.get('COMPASS')).toBe('dynamite=abc=def');
  });

  test('unquotes values and rejects lines without a name', () => {
    const jar = new CookieJar();
    jar.setFromHeader('NID="xyz"; Max-Age=10');
    expect(jar.get('NID')).toBe('xyz');
    expect(jar.setFromHeader('=novalue')).toBeNull();
    expect(jar.setFromHeader('garbage')).toBeNull();
    expect(jar.size).toBe(1);
  });

  test('builds the Cookie header and clears', () => {
    const jar = new CookieJar();
    expect(jar.header()).toBeUndefined();
    jar.set('a', '1');
    jar.set('b', '2');
    expect(jar.header()).toBe('a=1; b=2');
    jar.clear();
    expect(jar.header()).toBeUndefined();
  });

  test('stores every Set-Cookie header of a response', () => {
    const headers = new Headers();
    headers.append('Set-Cookie', 'a=1; Path=/');
    headers.append('Set-Cookie', 'b=2');
    const jar = new CookieJar();
    jar.storeResponseCookies(headers);
    expect(jar.header()).toBe('a=1; b=2');
  });
});
