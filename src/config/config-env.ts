export interface BridgeEnv extends NodeJS.ProcessEnv {
  GCHAT_BRIDGE_CONFIG_PATH?: string | undefined;
  GCHAT_BRIDGE_CHANNEL_URL?: string | undefined;
  GCHAT_BRIDGE_USER_AGENT?: string | undefined;
  GCHAT_BRIDGE_MAX_RETRIES?: string | undefined;
  GCHAT_BRIDGE_RETRY_BACKOFF_BASE?: string | undefined;
  GCHAT_BRIDGE_MAX_AGE_MS?: string | undefined;
  GCHAT_BRIDGE_PUSH_TIMEOUT_MS?: string | undefined;
  GCHAT_BRIDGE_DEDUP_CAPACITY?: string | undefined;
  GCHAT_BRIDGE_DISABLE_NOTICES?: string | undefined;
}

const parseBoolEnv = (value: string | undefined): boolean | undefined => {
  if (value === undefined) return undefined;
  const v = value.trim().toLowerCase();
  if (v === '1' || v === 'true' || v === 'yes' || v === 'y' || v === 'on') return true;
  if (v === '0' || v === 'false' || v === 'no' || v === 'n' || v === 'off') return false;
  return undefined;
};

export const parseBoolEnvStrict = (
  value: string | undefined,
  label: string,
): boolean | undefined => {
  const parsed = parseBoolEnv(value);
  if (value !== undefined && parsed === undefined) {
    throw new Error(`Invalid ${label}: expected true/false/1/0/yes/no/on/off`);
  }
  return parsed;
};

export const parseNumberEnvStrict = (
  value: string | undefined,
  label: string,
): number | undefined => {
  if (value === undefined || !value.trim()) return undefined;
  const n = Number(value);
  if (!Number.isFinite(n)) throw new Error(`Invalid ${label}: expected a number`);
  return n;
};

export const parseIntEnvStrict = (value: string | undefined, label: string): number | undefined => {
  const n = parseNumberEnvStrict(value, label);
  if (n === undefined) return undefined;
  if (!Number.isInteger(n)) throw new Error(`Invalid ${label}: expected an integer`);
  return n;
};

export const nonEmptyTrimmed = (value: string | undefined): string | undefined => {
  const v = value?.trim();
  return v ? v : undefined;
};

/**
 * True when `host` is a subdomain of `suffix`, with or without its leading dot. The bare domain
 * and look-alikes such as `evilgoogle.com` do not match.
 */
export const hostMatchesSuffix = (host: string, suffix: string): boolean => {
  const bare = suffix.replace(/^\./u, '').toLowerCase();
  if (!bare) return false;
  return host.toLowerCase().endsWith(`.${bare}`);
};

/** Validates the channel URL against the trusted suffix and normalizes it to end in `/`. */
export const normalizeChannelUrl = (raw: string, trustedSuffix: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(raw.trim());
  } catch (_err) {
    throw new Error('Invalid backend.channel_url: expected a valid https URL');
  }
  if (parsed.protocol !== 'https:') {
    throw new Error('Invalid backend.channel_url: expected a valid https URL');
  }
  if (!hostMatchesSuffix(parsed.hostname, trustedSuffix)) {
    throw new Error(
      `Invalid backend.channel_url: host "${parsed.hostname}" is not under "${trustedSuffix}"`,
    );
  }
  const out = parsed.toString();
  return out.endsWith('/') ? out : `${out}/`;
};
