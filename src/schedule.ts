/**
 * Daily digest, scheduled mode.
 * Stays running and sends the digest every day at DIGEST_TIME.
 */

import { config as loadDotenv } from 'dotenv';
import { loadAppConfig } from './config/env';
import { DigestService } from './services/digest.service';
import { SchedulerService } from './services/scheduler.service';
import { errorMessage } from './sources/common';

function start(): void {
  loadDotenv();

  try {
    const config = loadAppConfig();
    const digestService = new DigestService(config);
    const scheduler = new SchedulerService(config, () => digestService.run());
    scheduler.start();

    const shutdown = () => {
      console.log('Shutting down gracefully...');
      scheduler.stop();
      process.exit(0);
    };

    process.on('SIGTERM', shutdown);
    process.on('SIGINT', shutdown);
  } catch (error) {
    console.error('Failed to start scheduler:', errorMessage(error));
    process.exit(1);
  }
}

start();
