#!/usr/bin/env node
/**
 * Daily digest, single run.
 * Exits 0 when the digest was delivered, 1 on invalid configuration or a
 * failed delivery.
 */

import { config as loadDotenv } from 'dotenv';
import { AppConfig, loadAppConfig } from './config/env';
import { ConfigError } from './config/notifier';
import { runDigest, DigestServiceDeps } from './services/digest.service';
import { errorMessage } from './sources/common';

export async function main(env: NodeJS.ProcessEnv = process.env, deps: DigestServiceDeps = {}): Promise<number> {
  let config: AppConfig;
  try {
    config = loadAppConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Configuration error: ${error.message}`);
      return 1;
    }
    throw error;
  }

  console.log('Generating daily digest...');
  return runDigest(config, deps);
}

if (require.main === module) {
  loadDotenv();
  main()
    .then((code) => process.exit(code))
    .catch((error) => {
      console.error('Daily digest failed:', errorMessage(error));
      process.exit(1);
    });
}
