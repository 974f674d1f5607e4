// src/crmModules/campaign/repository/campaign.repository.ts
import { Injectable } from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, In, LessThanOrEqual, Repository, SelectQueryBuilder } from 'typeorm';

import { Campaign, CampaignStatus } from '../entities/campaign.entity';
import { CampaignMember } from 'src/crmModules/campaign-member/entities/campaign-member.entity';
import { CampaignMetric } from 'src/crmModules/campaign-metrics/entities/campaign-metric.entity';
import { ICampaignQuery, CampaignSortBy } from '../interface/campaign-query.interface';
import { ICampaignStatistics } from '../interface/campaign-statistics.interface';
import {
  Paginated,
  SortOrder,
  clampPage,
  toPaginated,
} from 'src/common/pagination/paginated.interface';
import { definedOnly } from 'src/common/utils/defined-only';

export type CampaignCounters = Pick<
  Campaign,
  | 'sentCount'
  | 'deliveredCount'
  | 'openedCount'
  | 'clickedCount'
  | 'respondedCount'
  | 'bouncedCount'
  | 'unsubscribedCount'
  | 'convertedCount'
  | 'prospectsGenerated'
  | 'actualRevenue'
>;

export type CampaignPatch = Partial<Omit<Campaign, 'id' | 'createdAt' | 'updatedAt'>>;

const SORT_COLUMNS: Record<CampaignSortBy, string> = {
  createdAt: 'c.createdAt',
  name: 'c.name',
  startDate: 'c.startDate',
  budget: 'c.budget',
  status: 'c.status',
  lastExecutedAt: 'c.lastExecutedAt',
};

@Injectable()
export class CampaignRepository {
  constructor(
    @InjectRepository(Campaign) private readonly repo: Repository<Campaign>,
    @InjectDataSource() private readonly dataSource: DataSource,
  ) {}

  private use(manager?: EntityManager): Repository<Campaign> {
    return manager ? manager.getRepository(Campaign) : this.repo;
  }

  // ------------------------------------------------------------------
  // Create / Read / Update / Delete
  // ------------------------------------------------------------------

  async create(data: CampaignPatch): Promise<Campaign> {
    return this.repo.save(this.repo.create(data));
  }

  findById(id: string, manager?: EntityManager): Promise<Campaign | null> {
    return this.use(manager).findOneBy({ id });
  }

  async update(id: string, patch: CampaignPatch, manager?: EntityManager): Promise<Campaign | null> {
    const repo = this.use(manager);
    const values = definedOnly(patch);
    if (Object.keys(values).length) await repo.update({ id }, values);
    return repo.findOneBy({ id });
  }

  /** Deletes the campaign with its audience and metric snapshots. */
  async remove(id: string): Promise<boolean> {
    return this.dataSource.transaction(async (manager) => {
      await manager.delete(CampaignMember, { campaignId: id });
      await manager.delete(CampaignMetric, { campaignId: id });
      const res = await manager.delete(Campaign, { id });
      return (res.affected ?? 0) > 0;
    });
  }

  // ------------------------------------------------------------------
  // Actions
  // ------------------------------------------------------------------

  async setStatus(id: string, status: CampaignStatus, extra: CampaignPatch = {}): Promise<Campaign | null> {
    return this.update(id, { ...extra, status });
  }

  async setCounters(id: string, counters: CampaignCounters, manager?: EntityManager): Promise<void> {
    await this.use(manager).update({ id }, counters);
  }

  async setAudienceSize(id: string, size: number, manager?: EntityManager): Promise<void> {
    await this.use(manager).update({ id }, { targetAudienceSize: size });
  }

  // ------------------------------------------------------------------
  // Query / List
  // ------------------------------------------------------------------

  async findMany(query: ICampaignQuery): Promise<Paginated<Campaign>> {
    const { page, limit, skip } = clampPage(query.page, query.limit);

    const qb = this.repo.createQueryBuilder('c');
    this.buildWhere(qb, query);
    this.buildOrderBy(qb, query.sortBy, query.sortOrder);

    const [data, total] = await qb.skip(skip).take(limit).getManyAndCount();
    return toPaginated(data, total, page, limit);
  }

  findDueScheduled(now: Date): Promise<Campaign[]> {
    return this.repo.find({
      where: { status: 'scheduled', startDate: LessThanOrEqual(now) },
      order: { startDate: 'ASC' },
    });
  }

  findByStatus(statuses: CampaignStatus[]): Promise<Campaign[]> {
    return this.repo.findBy({ status: In(statuses) });
  }

  async getStatistics(ownerId?: string): Promise<ICampaignStatistics> {
    const base = () => {
      const qb = this.repo.createQueryBuilder('c');
      if (ownerId) qb.where('c.ownerId = :ownerId', { ownerId });
      return qb;
    };

    const byStatusRows = await base()
      .select('c.status', 'status')
      .addSelect('COUNT(*)', 'count')
      .groupBy('c.status')
      .getRawMany<{ status: string; count: string | number }>();

    const totals = await base()
      .select('COALESCE(SUM(c.budget), 0)', 'budget')
      .addSelect('COALESCE(SUM(c.actualCost), 0)', 'spent')
      .addSelect('COALESCE(SUM(c.actualRevenue), 0)', 'revenue')
      .addSelect('COALESCE(SUM(c.prospectsGenerated), 0)', 'prospects')
      .addSelect('COALESCE(SUM(c.convertedCount), 0)', 'conversions')
      .addSelect('COALESCE(SUM(c.deliveredCount), 0)', 'delivered')
      .getRawOne<Record<'budget' | 'spent' | 'revenue' | 'prospects' | 'conversions' | 'delivered', string | number>>();

    const byStatus: Record<string, number> = {};
    let totalCampaigns = 0;
    for (const row of byStatusRows) {
      const n = Number(row.count);
      byStatus[row.status] = n;
      totalCampaigns += n;
    }

    const num = (v: string | number | undefined) => Number(v ?? 0);
    const totalSpent = num(totals?.spent);
    const totalRevenue = num(totals?.revenue);
    const totalConversions = num(totals?.conversions);
    const totalDelivered = num(totals?.delivered);

    return {
      totalCampaigns,
      byStatus,
      totalBudget: num(totals?.budget),
      totalSpent,
      totalRevenue,
      overallRoi: totalSpent > 0 ? round2(((totalRevenue - totalSpent) / totalSpent) * 100) : 0,
      totalProspects: num(totals?.prospects),
      totalConversions,
      averageConversionRate: totalDelivered > 0 ? round2((totalConversions / totalDelivered) * 100) : 0,
    };
  }

  // ------------------------------------------------------------------
  // Helpers
  // ------------------------------------------------------------------

  private buildWhere(qb: SelectQueryBuilder<Campaign>, query: ICampaignQuery): void {
    if (query.status?.length) qb.andWhere('c.status IN (:...status)', { status: query.status });
    if (query.type) qb.andWhere('c.type = :type', { type: query.type });
    if (query.ownerId) qb.andWhere('c.ownerId = :ownerId', { ownerId: query.ownerId });
    if (query.category) qb.andWhere('c.category = :category', { category: query.category });

    // simple-array stores "a,b,c"; match whole items only
    if (query.tag) {
      qb.andWhere(
        "(c.tags = :tag OR c.tags LIKE :tagStart OR c.tags LIKE :tagEnd OR c.tags LIKE :tagMid)",
        { tag: query.tag, tagStart: `${query.tag},%`, tagEnd: `%,${query.tag}`, tagMid: `%,${query.tag},%` },
      );
    }

    if (query.q && query.q.trim().length) {
      qb.andWhere('(LOWER(c.name) LIKE :q OR LOWER(c.description) LIKE :q)', {
        q: `%${query.q.trim().toLowerCase()}%`,
      });
    }

    // date ranges
    if (query.startFrom) qb.andWhere('c.startDate >= :startFrom', { startFrom: query.startFrom });
    if (query.startTo) qb.andWhere('c.startDate <= :startTo', { startTo: query.startTo });
    if (query.endFrom) qb.andWhere('c.endDate >= :endFrom', { endFrom: query.endFrom });
    if (query.endTo) qb.andWhere('c.endDate <= :endTo', { endTo: query.endTo });

    if (query.minBudget !== undefined) qb.andWhere('c.budget >= :minBudget', { minBudget: query.minBudget });
    if (query.maxBudget !== undefined) qb.andWhere('c.budget <= :maxBudget', { maxBudget: query.maxBudget });
  }

  private buildOrderBy(qb: SelectQueryBuilder<Campaign>, sortBy?: CampaignSortBy, sortOrder?: SortOrder): void {
    const column = SORT_COLUMNS[sortBy ?? 'createdAt'];
    const order = (sortOrder ?? 'desc') === 'asc' ? 'ASC' : 'DESC';
    qb.orderBy(column, order).addOrderBy('c.id', 'ASC');
  }
}

const round2 = (n: number) => Math.round(n * 100) / 100;
