import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';

export interface InventoryConfig {
     reservationTtlMinutes: number;
     sweepIntervalMs: number;
     sweepBatchSize: number;
     purgeAfterHours: number;
     publishTimeoutMs: number;
     productTimeoutMs: number;
     defaultReorderLevel: number;
     defaultMaxStock: number;
     eventSource: string;
}

type Env = Record<string, string | undefined>;

const NON_NEGATIVE_INTEGER = 'must be a non-negative integer';

/** Unset and blank values fall back; anything else must parse as a whole number >= 0. */
function integerSetting(fallback: number) {
     return z.preprocess(
          (raw) => (typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : fallback),
          z
               .number({ invalid_type_error: NON_NEGATIVE_INTEGER })
               .int(NON_NEGATIVE_INTEGER)
               .nonnegative(NON_NEGATIVE_INTEGER)
     );
}

const envSchema = z.object({
     RESERVATION_TTL_MINUTES: integerSetting(30),
     EXPIRY_SWEEP_INTERVAL_MS: integerSetting(60_000),
     EXPIRY_SWEEP_BATCH_SIZE: integerSetting(100),
     RESERVATION_PURGE_AFTER_HOURS: integerSetting(24),
     EVENT_PUBLISH_TIMEOUT_MS: integerSetting(2_000),
     PRODUCT_API_TIMEOUT_MS: integerSetting(2_000),
     DEFAULT_REORDER_LEVEL: integerSetting(10),
     DEFAULT_MAX_STOCK: integerSetting(1_000),
     SERVICE_NAME: z
          .string()
          .optional()
          .transform((value) => value?.trim() || 'inventory-service'),
});

function configurationError(env: Env, error: z.ZodError, name?: string): ConfigurationError {
     const [issue] = error.issues;
     const setting = name ?? issue.path.join('.');
     return new ConfigurationError(`${setting} ${issue.message}, got "${env[setting]}"`);
}

export function readInt(env: Env, name: string, fallback: number): number {
     const result = integerSetting(fallback).safeParse(env[name]);
     if (!result.success) {
          throw configurationError(env, result.error, name);
     }
     return result.data;
}

export function loadConfig(env: Env = process.env): InventoryConfig {
     const result = envSchema.safeParse(env);
     if (!result.success) {
          throw configurationError(env, result.error);
     }

     const settings = result.data;
     return {
          reservationTtlMinutes: settings.RESERVATION_TTL_MINUTES,
          sweepIntervalMs: settings.EXPIRY_SWEEP_INTERVAL_MS,
          sweepBatchSize: settings.EXPIRY_SWEEP_BATCH_SIZE,
          purgeAfterHours: settings.RESERVATION_PURGE_AFTER_HOURS,
          publishTimeoutMs: settings.EVENT_PUBLISH_TIMEOUT_MS,
          productTimeoutMs: settings.PRODUCT_API_TIMEOUT_MS,
          defaultReorderLevel: settings.DEFAULT_REORDER_LEVEL,
          defaultMaxStock: settings.DEFAULT_MAX_STOCK,
          eventSource: settings.SERVICE_NAME,
     };
}
