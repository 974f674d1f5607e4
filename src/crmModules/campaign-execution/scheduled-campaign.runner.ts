// src/crmModules/campaign-execution/scheduled-campaign.runner.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';

import { CampaignExecutorService } from './campaign-executor.service';
import { CampaignRepository } from 'src/crmModules/campaign/repository/campaign.repository';
import { APP_CONFIG, AppConfig } from 'src/config/app.config';

export interface RunnerTickResult {
  scanned: number;
  executed: string[];
  failed: Array<{ campaignId: string; error: string }>;
}

/** Starts scheduled campaigns once their start date has passed. */
@Injectable()
export class ScheduledCampaignRunner {
  private readonly logger = new Logger(ScheduledCampaignRunner.name);

  // re-entrancy guard for cron
  private tickRunning = false;

  constructor(
    private readonly campaigns: CampaignRepository,
    private readonly executor: CampaignExecutorService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  @Cron(CronExpression.EVERY_MINUTE, {
    timeZone: process.env.CRON_TZ ?? 'UTC',
  })
  async handleScheduledCampaignsCron(): Promise<void> {
    if (this.config.cron.schedulerDisabled) return;

    if (this.tickRunning) {
      this.logger.warn('[cron] previous tick still running, skipping this one');
      return;
    }
    this.tickRunning = true;
    const started = Date.now();

    try {
      const result = await this.runDue();
      this.logger.log(
        `[cron] tick done in ${Date.now() - started}ms; scanned=${result.scanned}; executed=${result.executed.length}; failed=${result.failed.length}`,
      );
    } catch (err) {
      this.logger.error(`[cron] tick error: ${err instanceof Error ? err.message : String(err)}`);
    } finally {
      this.tickRunning = false;
    }
  }

  /** One failing campaign is logged and the rest still run. */
  async runDue(now: Date = new Date()): Promise<RunnerTickResult> {
    const due = await this.campaigns.findDueScheduled(now);
    const result: RunnerTickResult = { scanned: due.length, executed: [], failed: [] };

    for (const c of due) {
      try {
        await this.executor.execute(c.id);
        result.executed.push(c.id);
      } catch (err) {
        const error = err instanceof Error ? err.message : String(err);
        this.logger.warn(`[cron] campaign ${c.id} not executed: ${error}`);
        result.failed.push({ campaignId: c.id, error });
      }
    }
    return result;
  }
}
