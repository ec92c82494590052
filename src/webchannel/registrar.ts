import { errorFields, log } from '../util/logger.js';
import type { HttpSession } from './http.js';

export const SESSION_COOKIE = 'COMPASS';
export const SESSION_COOKIE_PREFIX = 'dynamite=';

export type RegistrationResult =
  | { kind: 'ok'; csessionid: string }
  | { kind: 'registration_failed'; message: string }
  | { kind: 'network_error'; message: string; status?: number | undefined };

const logger = log.child({ component: 'registrar' });

/**
 * Registers a new channel session. The jar is cleared first: the server invalidates the old
 * cookie on registration and does not reliably send a replacement.
 */
export const registerChannel = async (
  http: HttpSession,
  channelUrl: string,
  signal?: AbortSignal,
): Promise<RegistrationResult> => {
  http.cookies.clear();

  let res: Response;
  try {
    res = await http.fetchRaw('POST', new URL('register', channelUrl), {
      headers: { 'Content-Type': 'application/x-protobuf' },
      signal,
    });
    // Drain so the connection can be reused.
    await res.arrayBuffer();
  } catch (err) {
    if (signal?.aborted) throw err;
    logger.warn('register.network_error', errorFields(err));
    const msg = err instanceof Error ? err.message : String(err);
    return { kind: 'network_error', message: msg };
  }

  if (res.status !== 200) {
    logger.warn('register.unexpected_status', { status: res.status });
    return {
      kind: 'network_error',
      message: `Request return unexpected status: ${res.status}: ${res.statusText}`,
      status: res.status,
    };
  }

  const cookie = http.cookies.get(SESSION_COOKIE);
  if (cookie === undefined) {
    logger.warn('register.missing_cookie');
    return { kind: 'registration_failed', message: `Missing ${SESSION_COOKIE} cookie` };
  }
  if (!cookie.startsWith(SESSION_COOKIE_PREFIX) || cookie.length === SESSION_COOKIE_PREFIX.length) {
    logger.warn('register.malformed_cookie');
    return {
      kind: 'registration_failed',
      message: `${SESSION_COOKIE} cookie does not start with ${SESSION_COOKIE_PREFIX}`,
    };
  }

  logger.info('register.ok');
  return { kind: 'ok', csessionid: cookie.slice(SESSION_COOKIE_PREFIX.length) };
};
