import path from 'node:path';

import { parse as parseToml } from 'smol-toml';
import { findUp, readTextFile } from '../util/fs.js';
import { assertConfigNumericBounds } from './bounds.js';
import {
  type BridgeEnv,
  nonEmptyTrimmed,
  normalizeChannelUrl,
  parseBoolEnvStrict,
  parseIntEnvStrict,
  parseNumberEnvStrict,
} from './config-env.js';
import { createDefaultConfig } from './defaults.js';
import type { BridgeConfig } from './types.js';
import { type BridgeConfigFileParsed, BridgeConfigFileSchema } from './zod.js';

export const CONFIG_FILENAME = 'gchat-bridge.toml';

export interface LoadBridgeConfigOptions {
  cwd?: string | undefined;
  configPath?: string | undefined;
  env?: NodeJS.ProcessEnv | undefined;
}

export interface LoadedBridgeConfig {
  /** Absent when no config file was found and only defaults and env were applied. */
  configPath: string | null;
  config: BridgeConfig;
}

export const loadBridgeConfig = async (
  options: LoadBridgeConfigOptions = {},
): Promise<LoadedBridgeConfig> => {
  const cwd = options.cwd ?? process.cwd();
  const env: BridgeEnv = options.env ?? process.env;

  const configPath =
    options.configPath ??
    nonEmptyTrimmed(env.GCHAT_BRIDGE_CONFIG_PATH) ??
    (await findUp(CONFIG_FILENAME, cwd));

  let file: BridgeConfigFileParsed = {};
  if (configPath) {
    const tomlText = await readTextFile(path.resolve(cwd, configPath));
    let tomlUnknown: unknown;
    try {
      tomlUnknown = parseToml(tomlText) as unknown;
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err ?? 'unknown error');
      throw new Error(`Malformed ${CONFIG_FILENAME} (${configPath}): ${msg}`);
    }
    const parsed = BridgeConfigFileSchema.safeParse(tomlUnknown);
    if (!parsed.success) {
      throw new Error(`Invalid ${CONFIG_FILENAME} (${configPath}): ${parsed.error.message}`);
    }
    file = parsed.data;
  }

  const defaults = createDefaultConfig();

  const trustedDomainSuffix =
    file.backend?.trusted_domain_suffix ?? defaults.backend.trustedDomainSuffix;
  const channelUrl = normalizeChannelUrl(
    nonEmptyTrimmed(env.GCHAT_BRIDGE_CHANNEL_URL) ??
      file.backend?.channel_url ??
      defaults.backend.channelUrl,
    trustedDomainSuffix,
  );

  const config: BridgeConfig = {
    schemaVersion: file.schema_version ?? defaults.schemaVersion,
    backend: {
      channelUrl,
      trustedDomainSuffix,
      userAgent:
        nonEmptyTrimmed(env.GCHAT_BRIDGE_USER_AGENT) ??
        file.backend?.user_agent ??
        defaults.backend.userAgent,
    },
    reconnect: {
      maxRetries:
        parseIntEnvStrict(env.GCHAT_BRIDGE_MAX_RETRIES, 'GCHAT_BRIDGE_MAX_RETRIES') ??
        file.reconnect?.max_retries ??
        defaults.reconnect.maxRetries,
      retryBackoffBase:
        parseNumberEnvStrict(
          env.GCHAT_BRIDGE_RETRY_BACKOFF_BASE,
          'GCHAT_BRIDGE_RETRY_BACKOFF_BASE',
        ) ??
        file.reconnect?.retry_backoff_base ??
        defaults.reconnect.retryBackoffBase,
      maxAgeMs:
        parseIntEnvStrict(env.GCHAT_BRIDGE_MAX_AGE_MS, 'GCHAT_BRIDGE_MAX_AGE_MS') ??
        file.reconnect?.max_age_ms ??
        defaults.reconnect.maxAgeMs,
      pushTimeoutMs:
        parseIntEnvStrict(env.GCHAT_BRIDGE_PUSH_TIMEOUT_MS, 'GCHAT_BRIDGE_PUSH_TIMEOUT_MS') ??
        file.reconnect?.push_timeout_ms ??
        defaults.reconnect.pushTimeoutMs,
      maxReadBytes: file.reconnect?.max_read_bytes ?? defaults.reconnect.maxReadBytes,
      restartDelayMs: file.reconnect?.restart_delay_ms ?? defaults.reconnect.restartDelayMs,
    },
    http: {
      requestTimeoutMs: file.http?.request_timeout_ms ?? defaults.http.requestTimeoutMs,
    },
    bridge: {
      dedupCapacity:
        parseIntEnvStrict(env.GCHAT_BRIDGE_DEDUP_CAPACITY, 'GCHAT_BRIDGE_DEDUP_CAPACITY') ??
        file.bridge?.dedup_capacity ??
        defaults.bridge.dedupCapacity,
      disableBridgeNotices:
        parseBoolEnvStrict(env.GCHAT_BRIDGE_DISABLE_NOTICES, 'GCHAT_BRIDGE_DISABLE_NOTICES') ??
        file.bridge?.disable_bridge_notices ??
        defaults.bridge.disableBridgeNotices,
      unimportantBridgeNotices:
        file.bridge?.unimportant_bridge_notices ?? defaults.bridge.unimportantBridgeNotices,
      localIdPrefix: file.bridge?.local_id_prefix ?? defaults.bridge.localIdPrefix,
    },
  };

  assertConfigNumericBounds(config);
  return { configPath: configPath ?? null, config };
};
