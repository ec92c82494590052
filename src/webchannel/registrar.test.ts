import { describe, expect, test } from 'vitest';

import { hangUntilAborted, scriptedFetch } from '../testing/http.js';
import { staticCredentials } from './auth.js';
import { HttpSession } from './http.js';
import { registerChannel } from './registrar.js';

const BASE = 'https://chat.google.com/webchannel/';

const makeSession = (fetchImpl: typeof fetch, requestTimeoutMs?: number): HttpSession =>
  new HttpSession({
    credentials: staticCredentials('test-secret'),
    trustedDomainSuffix: '.google.com',
    requestTimeoutMs,
    fetchImpl,
  });

const withCookie = (value: string) => () =>
  new Response('', { headers: [['Set-Cookie', `COMPASS=${value}; Path=/; Secure`]] });

describe('webchannel/registrar', () => {
  test('returns the csessionid from the session cookie', async () => {
    const scripted = scriptedFetch({ 'POST register': withCookie('dynamite=abc123') });
    const session = makeSession(scripted.fetchImpl);

    expect(await registerChannel(session, BASE)).toEqual({ kind: 'ok', csessionid: 'abc123' });
    const [call] = scripted.calls;
    expect(call?.url.href).toBe(`${BASE}register`);
    expect(call?.headers.get('content-type')).toBe('application/x-protobuf');
  });

  test('clears stale cookies before registering', async () => {
    const scripted = scriptedFetch({ 'POST register': withCookie('dynamite=fresh') });
    const session = makeSession(scripted.fetchImpl);
    session.cookies.set('COMPASS', 'dynamite=stale');
    session.cookies.set('OTHER', '1');

    await registerChannel(session, BASE);
    expect(scripted.calls[0]?.headers.get('cookie')).toBeNull();
    expect(session.cookies.get('OTHER')).toBeUndefined();
  });

  test('a missing or malformed cookie is a registration failure', async () => {
    const missing = scriptedFetch({ 'POST register': () => new Response('') });
    expect(await registerChannel(makeSession(missing.fetchImpl), BASE)).toEqual({
      kind: 'registration_failed',
      message: 'Missing COMPASS cookie',
    });

    const malformed = scriptedFetch({ 'POST register': withCookie('other=abc') });
    expect((await registerChannel(makeSession(malformed.fetchImpl), BASE)).kind).toBe(
      'registration_failed',
    );

    const empty = scriptedFetch({ 'POST register': withCookie('dynamite=') });
    expect((await registerChannel(makeSession(empty.fetchImpl), BASE)).kind).toBe(
      'registration_failed',
    );
  });

  test('non-200 and transport failures are network errors', async () => {
    const rejected = scriptedFetch({
      'POST register': () =>
        new Response('nope', { status: 503, statusText: 'Service Unavailable' }),
    });
    expect(await registerChannel(makeSession(rejected.fetchImpl), BASE)).toEqual({
      kind: 'network_error',
      message: 'Request return unexpected status: 503: Service Unavailable',
      status: 503,
    });

    const down = scriptedFetch({});
    expect((await registerChannel(makeSession(down.fetchImpl), BASE)).kind).toBe('network_error');
  });

  test('a register that never answers becomes a network error', async () => {
    const hung = scriptedFetch({ 'POST register': (req) => hangUntilAborted(req.signal) });
    expect(await registerChannel(makeSession(hung.fetchImpl, 20), BASE)).toEqual({
      kind: 'network_error',
      message: 'Request timed out after 20 ms',
    });
  });
});
