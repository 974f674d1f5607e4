// src/crmModules/prospect/repository/prospect.repository.ts
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DeepPartial, EntityManager, In, Repository, SelectQueryBuilder } from 'typeorm';

import { Prospect } from '../entities/prospect.entity';
import { IProspectQuery, ProspectSortBy, ProspectStatistics } from '../interface/prospect.interface';
import { Paginated, SortOrder, clampPage, toPaginated } from 'src/common/pagination/paginated.interface';
import { definedOnly } from 'src/common/utils/defined-only';

/** Everything but lead_score, which only LeadScoreTrackerService writes. */
export type ProspectPatch = Partial<Omit<Prospect, 'id' | 'leadScore' | 'createdAt' | 'updatedAt'>>;

const SORT_COLUMNS: Record<ProspectSortBy, string> = {
  createdAt: 'p.createdAt',
  leadScore: 'p.leadScore',
  lastName: 'p.lastName',
  companyName: 'p.companyName',
  status: 'p.status',
};

@Injectable()
export class ProspectRepository {
  constructor(@InjectRepository(Prospect) private readonly repo: Repository<Prospect>) {}

  private use(manager?: EntityManager): Repository<Prospect> {
    return manager ? manager.getRepository(Prospect) : this.repo;
  }

  // ------------------------------------------------------------------
  // Create / Read / Update / Delete
  // ------------------------------------------------------------------

  /** Inserts with a zero score; the initial score is applied as a tracked delta. */
  async create(data: ProspectPatch & Pick<Prospect, 'createdBy'>, manager?: EntityManager): Promise<Prospect> {
    const repo = this.use(manager);
    const row: DeepPartial<Prospect> = { ...data, leadScore: 0 };
    return repo.save(repo.create(row));
  }

  /** With `lock`, takes a row lock where the driver supports one. */
  findById(id: string, manager?: EntityManager, lock = false): Promise<Prospect | null> {
    const repo = this.use(manager);
    if (lock && manager && manager.connection.options.type === 'postgres') {
      return repo.createQueryBuilder('p').setLock('pessimistic_write').where('p.id = :id', { id }).getOne();
    }
    return repo.findOneBy({ id });
  }

  findByIds(ids: string[]): Promise<Prospect[]> {
    if (!ids.length) return Promise.resolve([]);
    return this.repo.findBy({ id: In(ids) });
  }

  async findExistingIds(ids: string[]): Promise<Set<string>> {
    if (!ids.length) return new Set();
    const rows = await this.repo.find({ select: { id: true }, where: { id: In(ids) } });
    return new Set(rows.map((r) => r.id));
  }

  /** First prospect holding either the email or the phone, other than `exceptId`. */
  async findDuplicate(
    email: string | null | undefined,
    phone: string | null | undefined,
    exceptId?: string,
  ): Promise<Prospect | null> {
    if (!email && !phone) return null;
    const qb = this.repo.createQueryBuilder('p');
    const ors: string[] = [];
    if (email) ors.push('LOWER(p.email) = :email');
    if (phone) ors.push('p.phone = :phone');
    qb.where(`(${ors.join(' OR ')})`, { email: email?.toLowerCase(), phone });
    if (exceptId) qb.andWhere('p.id != :exceptId', { exceptId });
    return qb.getOne();
  }

  async update(id: string, patch: ProspectPatch, manager?: EntityManager): Promise<Prospect | null> {
    const repo = this.use(manager);
    const values = definedOnly(patch);
    if (Object.keys(values).length) await repo.update({ id }, values);
    return repo.findOneBy({ id });
  }

  async setLeadScore(id: string, score: number, manager?: EntityManager): Promise<void> {
    await this.use(manager).update({ id }, { leadScore: score });
  }

  async markConverted(id: string, contactId: string, at: Date, manager?: EntityManager): Promise<void> {
    await this.use(manager).update({ id }, { status: 'converted', convertedToContactId: contactId, convertedAt: at });
  }

  async remove(id: string, manager?: EntityManager): Promise<void> {
    await this.use(manager).delete({ id });
  }

  countByCampaign(campaignId: string, manager?: EntityManager): Promise<number> {
    return this.use(manager).countBy({ campaignId });
  }

  // ------------------------------------------------------------------
  // Query / List
  // ------------------------------------------------------------------

  async findMany(query: IProspectQuery): Promise<Paginated<Prospect>> {
    const { page, limit, skip } = clampPage(query.page, query.limit);

    const qb = this.repo.createQueryBuilder('p');
    this.buildWhere(qb, query);
    this.buildOrderBy(qb, query.sortBy, query.sortOrder);

    const [data, total] = await qb.skip(skip).take(limit).getManyAndCount();
    return toPaginated(data, total, page, limit);
  }

  async getStatistics(filter: { campaignId?: string; assignedTo?: string }): Promise<ProspectStatistics> {
    const qb = this.repo.createQueryBuilder('p').select('p.status', 'status').addSelect('COUNT(*)', 'count');
    qb.addSelect('COALESCE(SUM(p.leadScore), 0)', 'scoreSum');
    if (filter.campaignId) qb.andWhere('p.campaignId = :campaignId', { campaignId: filter.campaignId });
    if (filter.assignedTo) qb.andWhere('p.assignedTo = :assignedTo', { assignedTo: filter.assignedTo });
    const rows = await qb.groupBy('p.status').getRawMany<{ status: string; count: string | number; scoreSum: string | number }>();

    const byStatus: Record<string, number> = {};
    let total = 0;
    let scoreSum = 0;
    for (const row of rows) {
      const n = Number(row.count);
      byStatus[row.status] = n;
      total += n;
      scoreSum += Number(row.scoreSum);
    }
    const converted = byStatus['converted'] ?? 0;

    return {
      total,
      byStatus,
      converted,
      conversionRate: total > 0 ? round2((converted / total) * 100) : 0,
      averageLeadScore: total > 0 ? round2(scoreSum / total) : 0,
    };
  }

  // ------------------------------------------------------------------
  // Helpers
  // ------------------------------------------------------------------

  private buildWhere(qb: SelectQueryBuilder<Prospect>, query: IProspectQuery): void {
    if (query.status?.length) qb.andWhere('p.status IN (:...status)', { status: query.status });
    if (query.source) qb.andWhere('p.source = :source', { source: query.source });
    if (query.campaignId) qb.andWhere('p.campaignId = :campaignId', { campaignId: query.campaignId });
    if (query.assignedTo) qb.andWhere('p.assignedTo = :assignedTo', { assignedTo: query.assignedTo });
    if (query.minLeadScore !== undefined) qb.andWhere('p.leadScore >= :minLeadScore', { minLeadScore: query.minLeadScore });
    if (query.maxLeadScore !== undefined) qb.andWhere('p.leadScore <= :maxLeadScore', { maxLeadScore: query.maxLeadScore });

    if (query.q && query.q.trim().length) {
      qb.andWhere(
        '(LOWER(p.firstName) LIKE :q OR LOWER(p.lastName) LIKE :q OR LOWER(p.email) LIKE :q OR LOWER(p.companyName) LIKE :q)',
        { q: `%${query.q.trim().toLowerCase()}%` },
      );
    }
  }

  private buildOrderBy(qb: SelectQueryBuilder<Prospect>, sortBy?: ProspectSortBy, sortOrder?: SortOrder): void {
    const column = SORT_COLUMNS[sortBy ?? 'createdAt'];
    const order = (sortOrder ?? 'desc') === 'asc' ? 'ASC' : 'DESC';
    qb.orderBy(column, order).addOrderBy('p.id', 'ASC');
  }
}

const round2 = (n: number) => Math.round(n * 100) / 100;
