import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import { ChallengeStore } from '../http/challenge-store';
import type { TrustOptions } from '../hydra/trust-bootstrap';

export interface IdpConfig extends TrustOptions {
  keyCacheExpiration: number;
  keyCacheCleanupInterval: number;
  challengeStore: ChallengeStore;
}

const booleanFlag = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform(value => value === true || value === 'true' || value === '1');

const envSchema = z.object({
  IDP_CLIENT_ID: z.string().min(1),
  IDP_CLIENT_SECRET: z.string().min(1),
  IDP_HYDRA_ADDRESS: z
    .string()
    .url()
    .transform(address => address.replace(/\/+$/, '')),
  IDP_KEY_CACHE_TTL_MS: z.coerce.number().int().default(5 * 60 * 1000),
  IDP_KEY_CACHE_CLEANUP_MS: z.coerce.number().int().default(30_000),
  IDP_TLS_VERIFY: booleanFlag.default(true),
  IDP_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
});

const ENV_KEYS = envSchema.keyof().options;

/**
 * Reads the identity provider settings through the Nest config service.
 * Throws when the client credentials or the server address are missing.
 */
export function loadIdpConfig(
  configService: ConfigService,
  challengeStore: ChallengeStore
): IdpConfig {
  const raw: Record<string, unknown> = {};
  for (const key of ENV_KEYS) {
    raw[key] = configService.get<unknown>(key);
  }

  const env = envSchema.parse(raw);
  return {
    clientId: env.IDP_CLIENT_ID,
    clientSecret: env.IDP_CLIENT_SECRET,
    hydraAddress: env.IDP_HYDRA_ADDRESS,
    tlsVerify: env.IDP_TLS_VERIFY,
    requestTimeout: env.IDP_REQUEST_TIMEOUT_MS,
    keyCacheExpiration: env.IDP_KEY_CACHE_TTL_MS,
    keyCacheCleanupInterval: env.IDP_KEY_CACHE_CLEANUP_MS,
    challengeStore,
  };
}
