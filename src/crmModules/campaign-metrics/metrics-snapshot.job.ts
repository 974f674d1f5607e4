// src/crmModules/campaign-metrics/metrics-snapshot.job.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';

import { MetricsAggregatorService } from './metrics-aggregator.service';
import { APP_CONFIG, AppConfig } from 'src/config/app.config';

@Injectable()
export class MetricsSnapshotJob {
  private readonly logger = new Logger(MetricsSnapshotJob.name);

  // re-entrancy guard for cron
  private tickRunning = false;

  constructor(
    private readonly metrics: MetricsAggregatorService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  /** Nightly daily-snapshot pass over every active campaign. */
  @Cron(CronExpression.EVERY_DAY_AT_MIDNIGHT, {
    timeZone: process.env.CRON_TZ ?? 'UTC',
  })
  async handleNightlySnapshot(): Promise<void> {
    if (this.config.cron.metricsSnapshotDisabled) return;

    if (this.tickRunning) {
      this.logger.warn('[cron] previous snapshot still running, skipping this one');
      return;
    }
    this.tickRunning = true;
    const started = Date.now();

    try {
      const { refreshed, failed } = await this.metrics.snapshotActive();
      this.logger.log(`[cron] snapshot done in ${Date.now() - started}ms; refreshed=${refreshed}; failed=${failed}`);
    } catch (err) {
      this.logger.error(`[cron] snapshot error: ${err instanceof Error ? err.message : String(err)}`);
    } finally {
      this.tickRunning = false;
    }
  }
}
