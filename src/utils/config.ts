/**
 * Configuration — loads and validates environment variables
 *
 * `.env` in the working directory is loaded first; variables already set in
 * the environment win.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { MARKETPLACE_HOSTS, MARKETPLACES } from '../platforms/amazon/auth';
import { ConfigurationError } from '../platforms/amazon/errors';
import type { LookupCredentials } from '../platforms/amazon/types';

dotenvConfig();

const configSchema = z.object({
  // Credentials stay optional here; signing reports the missing ones.
  accessKeyId: z.string().trim().default(''),
  secretAccessKey: z.string().default(''),
  partnerTag: z.string().trim().default(''),
  marketplace: z.string().trim().toUpperCase().pipe(z.enum(MARKETPLACES)).default('US'),
  timeoutMs: z.coerce.number().int().positive().default(30_000),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type AppConfig = z.infer<typeof configSchema>;

function setting(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = configSchema.safeParse({
    accessKeyId: setting(env.AWS_ACCESS_KEY_ID),
    secretAccessKey: setting(env.AWS_SECRET_ACCESS_KEY),
    partnerTag: setting(env.AMAZON_ASSOCIATE_TAG),
    marketplace: setting(env.AMAZON_MARKETPLACE),
    timeoutMs: setting(env.CATALOG_LOOKUP_TIMEOUT_MS),
    logLevel: setting(env.LOG_LEVEL),
  });

  if (!result.success) {
    const fields = result.error.issues.map((issue) => issue.path.join('.'));
    const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration (${details.join('; ')})`, fields);
  }
  return result.data;
}

export function credentialsFrom(config: AppConfig): LookupCredentials {
  return {
    accessKeyId: config.accessKeyId,
    secretAccessKey: config.secretAccessKey,
    partnerTag: config.partnerTag,
  };
}

export function hostFor(config: AppConfig): string {
  return MARKETPLACE_HOSTS[config.marketplace];
}
