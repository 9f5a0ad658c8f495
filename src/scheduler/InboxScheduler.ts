import cron, { type ScheduledTask } from 'node-cron';
import { logger } from '../infra/logger.js';
import type { ImportService } from '../services/ImportService.js';

/**
 * InboxScheduler - periodically imports statement files dropped into the inbox
 */
export class InboxScheduler {
  private task: ScheduledTask | null = null;

  constructor(
    private importService: ImportService,
    private intervalMinutes: number
  ) {}

  /**
   * Builds the cron expression for the interval; intervals of an hour or more run hourly
   */
  static cronExpressionFor(intervalMinutes: number): string {
    if (intervalMinutes <= 59) {
      return `*/${intervalMinutes} * * * *`;
    }
    const hours = Math.max(1, Math.floor(intervalMinutes / 60));
    return hours >= 24 ? '0 0 * * *' : `0 */${hours} * * *`;
  }

  start(): void {
    if (this.intervalMinutes < 1) {
      logger.info('INBOX_SCAN_INTERVAL_MINUTES is 0, inbox scheduler disabled');
      return;
    }

    const cronExpression = InboxScheduler.cronExpressionFor(this.intervalMinutes);
    this.task = cron.schedule(cronExpression, async () => {
      await this.runScan();
    });

    logger.info('InboxScheduler started', {
      intervalMinutes: this.intervalMinutes,
      cronExpression,
    });
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      logger.info('InboxScheduler stopped');
    }
  }

  isRunning(): boolean {
    return this.task !== null;
  }

  async runScan(): Promise<void> {
    try {
      const runs = await this.importService.importInbox();
      if (runs.length > 0) {
        logger.info('Scheduled inbox import finished', {
          files: runs.length,
          failed: runs.filter((run) => run.outcome === 'failed').length,
        });
      }
    } catch (error) {
      logger.error('Scheduled inbox import failed', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
