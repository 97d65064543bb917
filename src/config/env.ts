/**
 * Builds the collector configuration from environment variables
 */

import * as path from 'path';
import { z } from 'zod';
import { AuthError, ConfigError } from '../errors';
import {
  DEFAULT_BOOKMAKERS,
  DEFAULT_MARKETS,
  DEFAULT_REFERENCE_BOOKMAKER,
  DEFAULT_REGION,
  DEFAULT_SPORTS,
} from './markets';
import type { CollectorConfig } from './types';

export const API_KEY_VARIABLE = 'THE_ODDS_API_KEY';

const DEFAULT_REQUEST_TIMEOUT = 30000;

const csvList = (fallback: readonly string[]) =>
  z
    .string()
    .optional()
    .transform((value) => {
      const items = (value ?? '')
        .split(',')
        .map((item) => item.trim())
        .filter(Boolean);
      return items.length > 0 ? items : [...fallback];
    });

const envSchema = z.object({
  [API_KEY_VARIABLE]: z.string().trim().optional(),
  ODDS_SPORTS: csvList(DEFAULT_SPORTS),
  ODDS_MARKETS: csvList(DEFAULT_MARKETS),
  ODDS_BOOKMAKERS: csvList(DEFAULT_BOOKMAKERS),
  ODDS_REGION: z.string().trim().min(1).default(DEFAULT_REGION),
  ODDS_REFERENCE_BOOKMAKER: z
    .string()
    .trim()
    .min(1)
    .default(DEFAULT_REFERENCE_BOOKMAKER),
  ODDS_OUTPUT_DIR: z.string().trim().min(1).optional(),
  ODDS_REQUEST_TIMEOUT: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_REQUEST_TIMEOUT),
});

/**
 * Parse and validate configuration.
 *
 * Throws AuthError when the API key is absent and ConfigError for any other
 * invalid value.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): CollectorConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const parsed = result.data;
  const apiKey = parsed[API_KEY_VARIABLE];

  if (!apiKey) {
    throw new AuthError(
      `API key for The Odds API not found. Please set '${API_KEY_VARIABLE}' environment variable.`
    );
  }

  return Object.freeze({
    apiKey,
    sports: Object.freeze(parsed.ODDS_SPORTS),
    markets: Object.freeze(parsed.ODDS_MARKETS),
    bookmakers: Object.freeze(parsed.ODDS_BOOKMAKERS),
    region: parsed.ODDS_REGION,
    referenceBookmaker: parsed.ODDS_REFERENCE_BOOKMAKER,
    outputDir: path.resolve(cwd, parsed.ODDS_OUTPUT_DIR ?? '.'),
    requestTimeout: parsed.ODDS_REQUEST_TIMEOUT,
  });
}
