// src/crmModules/campaign-metrics/repository/campaign-metric.repository.ts
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, MoreThanOrEqual, Repository } from 'typeorm';

import { CampaignMetric } from '../entities/campaign-metric.entity';
import { isUniqueViolation } from 'src/common/errors/map-and-throw';

export type DailySnapshot = Omit<CampaignMetric, 'id' | 'campaignId' | 'periodType' | 'periodStart' | 'createdAt'>;

/** UTC midnight of the given instant. */
export const dayStart = (at: Date) => new Date(Date.UTC(at.getUTCFullYear(), at.getUTCMonth(), at.getUTCDate()));

@Injectable()
export class CampaignMetricRepository {
  constructor(@InjectRepository(CampaignMetric) private readonly repo: Repository<CampaignMetric>) {}

  private use(manager?: EntityManager): Repository<CampaignMetric> {
    return manager ? manager.getRepository(CampaignMetric) : this.repo;
  }

  /** One row per campaign and UTC day; later calls the same day overwrite it. */
  async upsertDaily(campaignId: string, values: DailySnapshot, manager?: EntityManager): Promise<void> {
    const repo = this.use(manager);
    const periodStart = dayStart(values.recordedAt);
    const key = { campaignId, periodType: 'daily' as const, periodStart };

    const existing = await repo.findOneBy(key);
    if (existing) {
      await repo.update({ id: existing.id }, values);
      return;
    }
    try {
      await repo.insert({ ...key, ...values });
    } catch (e) {
      if (!isUniqueViolation(e)) throw e;
      await repo.update(key, values);
    }
  }

  findDailySince(campaignId: string, since: Date): Promise<CampaignMetric[]> {
    return this.repo.find({
      where: { campaignId, periodType: 'daily', recordedAt: MoreThanOrEqual(since) },
      order: { periodStart: 'ASC' },
    });
  }
}
