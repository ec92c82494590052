import { z } from 'zod';

export interface BridgeConfigFileParsed {
  schema_version?: number | undefined;
  backend?:
    | {
        channel_url?: string | undefined;
        trusted_domain_suffix?: string | undefined;
        user_agent?: string | undefined;
      }
    | undefined;
  reconnect?:
    | {
        max_retries?: number | undefined;
        retry_backoff_base?: number | undefined;
        max_age_ms?: number | undefined;
        push_timeout_ms?: number | undefined;
        max_read_bytes?: number | undefined;
        restart_delay_ms?: number | undefined;
      }
    | undefined;
  http?:
    | {
        request_timeout_ms?: number | undefined;
      }
    | undefined;
  bridge?:
    | {
        dedup_capacity?: number | undefined;
        disable_bridge_notices?: boolean | undefined;
        unimportant_bridge_notices?: boolean | undefined;
        local_id_prefix?: string | undefined;
      }
    | undefined;
}

export const BridgeConfigFileSchema: z.ZodType<BridgeConfigFileParsed> = z
  .object({
    schema_version: z.number().int().positive().optional(),

    backend: z
      .object({
        channel_url: z.string().url().optional(),
        trusted_domain_suffix: z.string().min(1).optional(),
        user_agent: z.string().min(1).optional(),
      })
      .strict()
      .optional(),

    reconnect: z
      .object({
        max_retries: z.number().int().nonnegative().optional(),
        retry_backoff_base: z.number().positive().optional(),
        max_age_ms: z.number().int().positive().optional(),
        push_timeout_ms: z.number().int().positive().optional(),
        max_read_bytes: z.number().int().positive().optional(),
        restart_delay_ms: z.number().int().nonnegative().optional(),
      })
      .strict()
      .optional(),

    http: z
      .object({
        request_timeout_ms: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),

    bridge: z
      .object({
        dedup_capacity: z.number().int().positive().optional(),
        disable_bridge_notices: z.boolean().optional(),
        unimportant_bridge_notices: z.boolean().optional(),
        local_id_prefix: z
          .string()
          .regex(/^[A-Za-z0-9_.-]{1,64}$/u, 'Expected 1-64 characters of [A-Za-z0-9_.-]')
          .optional(),
      })
      .strict()
      .optional(),
  })
  .strict();
