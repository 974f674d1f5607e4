// src/crmModules/campaign-member/repository/campaign-member.repository.ts
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, In, IsNull, Not, Repository } from 'typeorm';

import { CampaignMember } from '../entities/campaign-member.entity';
import { AudienceQuery, EngagementAggregate, NewCampaignMember } from '../interface/engagement.interface';
import { validationError } from 'src/common/errors/crm-error';
import { Paginated, clampPage, toPaginated } from 'src/common/pagination/paginated.interface';

type AggregateRow = Record<keyof EngagementAggregate, string | number | null>;

@Injectable()
export class CampaignMemberRepository {
  constructor(@InjectRepository(CampaignMember) private readonly repo: Repository<CampaignMember>) {}

  private use(manager?: EntityManager): Repository<CampaignMember> {
    return manager ? manager.getRepository(CampaignMember) : this.repo;
  }

  // ------------------------------------------------------------------
  // Create / Read / Update / Delete
  // ------------------------------------------------------------------

  /** Rejects records that do not point at exactly one recipient. */
  async create(data: NewCampaignMember, manager?: EntityManager): Promise<CampaignMember> {
    const hasContact = !!data.contactId;
    const hasProspect = !!data.prospectId;
    if (hasContact === hasProspect) {
      throw validationError('An audience member must reference exactly one of contactId or prospectId', {
        contactId: data.contactId ?? null,
        prospectId: data.prospectId ?? null,
      });
    }

    const repo = this.use(manager);
    return repo.save(
      repo.create({
        campaignId: data.campaignId,
        contactId: data.contactId ?? null,
        prospectId: data.prospectId ?? null,
        emailSentTo: data.emailSentTo ?? null,
        notes: data.notes ?? null,
        status: 'pending',
      }),
    );
  }

  findById(id: string, manager?: EntityManager): Promise<CampaignMember | null> {
    return this.use(manager).findOneBy({ id });
  }

  findByContact(campaignId: string, contactId: string, manager?: EntityManager): Promise<CampaignMember | null> {
    return this.use(manager).findOneBy({ campaignId, contactId });
  }

  findByProspect(campaignId: string, prospectId: string, manager?: EntityManager): Promise<CampaignMember | null> {
    return this.use(manager).findOneBy({ campaignId, prospectId });
  }

  findAllForProspect(prospectId: string, manager?: EntityManager): Promise<CampaignMember[]> {
    return this.use(manager).find({ where: { prospectId }, order: { createdAt: 'ASC', id: 'ASC' } });
  }

  findAllForContact(contactId: string): Promise<CampaignMember[]> {
    return this.repo.find({ where: { contactId }, order: { createdAt: 'ASC', id: 'ASC' } });
  }

  save(member: CampaignMember, manager?: EntityManager): Promise<CampaignMember> {
    return this.use(manager).save(member);
  }

  async remove(id: string, manager?: EntityManager): Promise<void> {
    await this.use(manager).delete({ id });
  }

  // ------------------------------------------------------------------
  // Audience selection
  // ------------------------------------------------------------------

  findPending(campaignId: string): Promise<CampaignMember[]> {
    return this.repo.find({
      where: { campaignId, status: 'pending' },
      order: { createdAt: 'ASC', id: 'ASC' },
    });
  }

  countByCampaign(campaignId: string, manager?: EntityManager): Promise<number> {
    return this.use(manager).countBy({ campaignId });
  }

  async findPage(campaignId: string, q: AudienceQuery): Promise<Paginated<CampaignMember>> {
    const { page, limit, skip } = clampPage(q.page, q.limit);
    const [data, total] = await this.repo.findAndCount({
      where: { campaignId, ...(q.status?.length ? { status: In(q.status) } : {}) },
      order: { createdAt: 'ASC', id: 'ASC' },
      skip,
      take: limit,
    });
    return toPaginated(data, total, page, limit);
  }

  /** Converted members, oldest conversion first. */
  findConverted(campaignId: string): Promise<CampaignMember[]> {
    return this.repo.find({
      where: { campaignId, convertedAt: Not(IsNull()) },
      order: { convertedAt: 'ASC', id: 'ASC' },
    });
  }

  /** Ranked by open_count + 2 × click_count; ties broken by id. */
  findTopPerformers(campaignId: string, limit: number): Promise<CampaignMember[]> {
    return this.repo
      .createQueryBuilder('m')
      .where('m.campaignId = :campaignId', { campaignId })
      .addSelect('(m.open_count + m.click_count * 2)', 'weighted_score')
      .orderBy('weighted_score', 'DESC')
      .addOrderBy('m.id', 'ASC')
      .limit(limit)
      .getMany();
  }

  // ------------------------------------------------------------------
  // Aggregation / re-linking
  // ------------------------------------------------------------------

  async aggregate(campaignId: string, manager?: EntityManager): Promise<EngagementAggregate> {
    const row = await this.use(manager)
      .createQueryBuilder('m')
      .select('COUNT(*)', 'total')
      .addSelect('SUM(CASE WHEN m.sentAt IS NOT NULL THEN 1 ELSE 0 END)', 'sent')
      .addSelect('SUM(CASE WHEN m.deliveredAt IS NOT NULL THEN 1 ELSE 0 END)', 'delivered')
      .addSelect('SUM(CASE WHEN m.openedAt IS NOT NULL THEN 1 ELSE 0 END)', 'opened')
      .addSelect('SUM(CASE WHEN m.clickedAt IS NOT NULL THEN 1 ELSE 0 END)', 'clicked')
      .addSelect('SUM(CASE WHEN m.respondedAt IS NOT NULL THEN 1 ELSE 0 END)', 'responded')
      .addSelect("SUM(CASE WHEN m.status = 'bounced' THEN 1 ELSE 0 END)", 'bounced')
      .addSelect("SUM(CASE WHEN m.status = 'unsubscribed' THEN 1 ELSE 0 END)", 'unsubscribed')
      .addSelect('SUM(CASE WHEN m.convertedAt IS NOT NULL THEN 1 ELSE 0 END)', 'converted')
      .addSelect('SUM(CASE WHEN m.convertedAt IS NOT NULL THEN COALESCE(m.conversionValue, 0) ELSE 0 END)', 'conversionValue')
      .where('m.campaignId = :campaignId', { campaignId })
      .getRawOne<AggregateRow>();

    const n = (v: string | number | null | undefined) => Number(v ?? 0);
    return {
      total: n(row?.total),
      sent: n(row?.sent),
      delivered: n(row?.delivered),
      opened: n(row?.opened),
      clicked: n(row?.clicked),
      responded: n(row?.responded),
      bounced: n(row?.bounced),
      unsubscribed: n(row?.unsubscribed),
      converted: n(row?.converted),
      conversionValue: n(row?.conversionValue),
    };
  }

  /** Points every record of a prospect at its new contact. Returns the number moved. */
  async relinkProspectToContact(prospectId: string, contactId: string, manager?: EntityManager): Promise<number> {
    const res = await this.use(manager).update({ prospectId }, { contactId, prospectId: null });
    return res.affected ?? 0;
  }
}
