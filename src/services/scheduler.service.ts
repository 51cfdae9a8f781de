/**
 * Scheduler Service
 * Runs the daily digest every day at DIGEST_TIME in TIMEZONE using node-cron.
 * A tick that fires while the previous run is still in progress is skipped.
 */

import * as cron from 'node-cron';
import { AppConfig } from '../config/env';
import { errorMessage } from '../sources/common';

export interface ScheduledRunResult {
  success: boolean;
  skipped?: boolean;
  error?: string;
}

/**
 * Daily cron expression for a HH:MM time, e.g. "07:30" → "30 7 * * *"
 */
export function generateCronExpression(time: string): string {
  const [hours, minutes] = time.split(':').map(Number);
  return `${minutes} ${hours} * * *`;
}

export class SchedulerService {
  private task: cron.ScheduledTask | null = null;
  private running = false;

  constructor(private config: AppConfig, private job: () => Promise<boolean>) {}

  start(): void {
    const expression = generateCronExpression(this.config.digestTime);
    console.log(`SchedulerService: Scheduling daily digest at ${this.config.digestTime} ${this.config.timeZone} (${expression})`);

    this.task = cron.schedule(
      expression,
      async () => {
        await this.runOnce();
      },
      { timezone: this.config.timeZone }
    );
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      console.log('SchedulerService: Stopped');
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Execute the digest job unless one is already in progress.
   */
  async runOnce(): Promise<ScheduledRunResult> {
    if (this.running) {
      console.log('SchedulerService: Digest already running, skipping');
      return { success: false, skipped: true, error: 'Job already running' };
    }

    this.running = true;
    try {
      const success = await this.job();
      return { success };
    } catch (error) {
      const message = errorMessage(error);
      console.error('SchedulerService: Digest run failed:', message);
      return { success: false, error: message };
    } finally {
      this.running = false;
    }
  }
}
