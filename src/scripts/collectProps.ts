#!/usr/bin/env node
/**
 * Collect player props
 *
 * Fetches current player-prop odds and rewrites index.html and
 * player_props.xlsx, appending the snapshot to odds.db.
 *
 * Usage:
 *   npm run collect
 *
 * Configuration comes from the environment (THE_ODDS_API_KEY is required),
 * optionally from a .env file at the repository root.
 */

import * as dotenv from 'dotenv';
import * as path from 'path';
import { loadConfig } from '../config/env';
import { createCollector } from '../core/PropsCollector';
import { CollectorError, describeError } from '../errors';

/**
 * Run one collection and return the process exit code
 */
export async function main(
  env: NodeJS.ProcessEnv = process.env,
  options: { cwd?: string; now?: () => Date; baseUrl?: string } = {}
): Promise<number> {
  try {
    const config = loadConfig(env, options.cwd);
    const collector = createCollector(config, {
      now: options.now,
      baseUrl: options.baseUrl,
    });
    await collector.run();
    return 0;
  } catch (error) {
    const label = error instanceof CollectorError ? error.name : 'Error';
    console.error(`\n❌ Collection failed (${label}): ${describeError(error)}`);
    return 1;
  }
}

if (require.main === module) {
  dotenv.config({ path: path.resolve(__dirname, '../../.env') });

  main().then(
    (exitCode) => {
      process.exitCode = exitCode;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    }
  );
}
