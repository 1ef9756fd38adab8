/**
 * Environment Configuration
 *
 * Reads Engagespot credentials and endpoint from environment variables.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/errors.js';

export const DEFAULT_BASE_URL = 'https://api.engagespot.co/v3';

const engagespotEnvSchema = z.object({
  ENGAGESPOT_API_KEY: z.string().min(1, 'ENGAGESPOT_API_KEY is required'),
  ENGAGESPOT_API_SECRET: z.string().min(1, 'ENGAGESPOT_API_SECRET is required'),
  ENGAGESPOT_BASE_URL: z.string().url('ENGAGESPOT_BASE_URL must be a URL').optional(),
});

export interface EngagespotConfig {
  apiKey: string;
  apiSecret: string;
  baseUrl: string;
}

export type EnvSource = Record<string, string | undefined>;

/**
 * Parse Engagespot settings out of an environment map (process.env by default).
 * An empty ENGAGESPOT_BASE_URL counts as unset.
 */
export function loadEngagespotConfig(env: EnvSource = process.env): EngagespotConfig {
  const result = engagespotEnvSchema.safeParse({
    ENGAGESPOT_API_KEY: env.ENGAGESPOT_API_KEY,
    ENGAGESPOT_API_SECRET: env.ENGAGESPOT_API_SECRET,
    ENGAGESPOT_BASE_URL: env.ENGAGESPOT_BASE_URL || undefined,
  });

  if (!result.success) {
    throw new ConfigurationError('Invalid Engagespot environment configuration', {
      issues: result.error.issues.map(i => ({
        path: i.path.join('.'),
        message: i.message,
        code: i.code,
      })),
    });
  }

  return {
    apiKey: result.data.ENGAGESPOT_API_KEY,
    apiSecret: result.data.ENGAGESPOT_API_SECRET,
    baseUrl: result.data.ENGAGESPOT_BASE_URL ?? DEFAULT_BASE_URL,
  };
}
