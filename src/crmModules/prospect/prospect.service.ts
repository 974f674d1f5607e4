// src/crmModules/prospect/prospect.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';

import { ProspectPatch, ProspectRepository } from './repository/prospect.repository';
import { LeadScoreHistoryRepository } from './repository/lead-score-history.repository';
import { LeadScoreTrackerService } from './lead-score-tracker.service';
import { ProspectConverterService } from './prospect-converter.service';
import { Prospect, isConverted } from './entities/prospect.entity';
import { LeadScoreHistory } from './entities/lead-score-history.entity';
import { CreateProspectSchema } from './schema/prospect.schema';
import {
  AdjustLeadScoreDto,
  BulkCreateProspectsDto,
  ConvertProspectDto,
  CreateProspectDto,
  QueryProspectsDto,
  UpdateProspectDto,
} from './dto/prospect.dto';
import {
  BulkCreateResult,
  ConversionResult,
  ProspectStatistics,
  ProspectWithEngagement,
  ScoreChangeResult,
} from './interface/prospect.interface';
import { Actor } from 'src/auth/actor';
import { conflict, invalidState, notFound, validationError } from 'src/common/errors/crm-error';
import { mapAndThrow } from 'src/common/errors/map-and-throw';
import { Paginated } from 'src/common/pagination/paginated.interface';
import { CampaignRepository } from 'src/crmModules/campaign/repository/campaign.repository';
import { CampaignMemberRepository } from 'src/crmModules/campaign-member/repository/campaign-member.repository';
import { CampaignMember } from 'src/crmModules/campaign-member/entities/campaign-member.entity';
import { MetricsAggregatorService } from 'src/crmModules/campaign-metrics/metrics-aggregator.service';

@Injectable()
export class ProspectService {
  private readonly logger = new Logger(ProspectService.name);

  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    private readonly repo: ProspectRepository,
    private readonly history: LeadScoreHistoryRepository,
    private readonly scores: LeadScoreTrackerService,
    private readonly converter: ProspectConverterService,
    private readonly campaigns: CampaignRepository,
    private readonly members: CampaignMemberRepository,
    private readonly metrics: MetricsAggregatorService,
  ) {}

  // ---------------------------------------------------------------------------
  // CRUD
  // ---------------------------------------------------------------------------

  async create(dto: CreateProspectDto, actor: Actor): Promise<Prospect> {
    await this.ensureUnique(dto.email, dto.phone);
    if (dto.campaignId) await this.ensureCampaign(dto.campaignId);

    const { leadScore, ...fields } = dto;
    try {
      const created = await this.dataSource.transaction(async (manager) => {
        const row = await this.repo.create(
          { ...fields, assignedTo: dto.assignedTo ?? actor.id, createdBy: actor.id },
          manager,
        );
        const { prospect } = await this.scores.applyDelta(
          row.id,
          { scoreChange: leadScore, reason: 'Initial prospect creation', activityType: 'created' },
          { campaignId: row.campaignId, changedBy: actor.id },
          manager,
        );
        return prospect;
      });
      this.logger.log(`[create] prospect ${created.id} by ${actor.id}`);
      return created;
    } catch (e) {
      mapAndThrow(this.logger, e, 'creating prospect', { email: dto.email, phone: dto.phone });
    }
  }

  async findMany(q: QueryProspectsDto): Promise<Paginated<Prospect>> {
    try {
      return await this.repo.findMany(q);
    } catch (e) {
      mapAndThrow(this.logger, e, 'listing prospects', { q });
    }
  }

  async findOne(id: string): Promise<Prospect> {
    const found = await this.repo.findById(id);
    if (!found) throw notFound('Prospect', id);
    return found;
  }

  /**
   * Field writes, score changes and a requested conversion share one
   * transaction. Converted prospects are read-only.
   */
  async update(id: string, dto: UpdateProspectDto, actor: Actor): Promise<Prospect> {
    const current = await this.findOne(id);
    if (isConverted(current)) throw invalidState('Converted prospects are read-only', { id });

    const email = dto.email === undefined ? current.email : dto.email;
    const phone = dto.phone === undefined ? current.phone : dto.phone;
    if (!email && !phone) throw validationError('Either email or phone is required', { id });
    if (dto.email !== undefined || dto.phone !== undefined) {
      await this.ensureUnique(dto.email, dto.phone, id);
    }
    if (dto.campaignId) await this.ensureCampaign(dto.campaignId);

    const { leadScore, status, ...fields } = dto;
    const patch: ProspectPatch = { ...fields, ...(status && status !== 'converted' ? { status } : {}) };

    try {
      await this.dataSource.transaction(async (manager) => {
        await this.repo.update(id, patch, manager);

        if (leadScore !== undefined && leadScore !== current.leadScore) {
          await this.scores.setTo(id, leadScore, 'Manual score adjustment', { changedBy: actor.id }, manager);
        }

        if (status === 'converted') {
          await this.converter.convert(
            id,
            { createActivity: true, notes: 'Automatically converted via status update' },
            actor,
            manager,
          );
        }
      });
    } catch (e) {
      mapAndThrow(this.logger, e, 'updating prospect', { id });
    }

    return this.findOne(id);
  }

  /**
   * Deletes the prospect with its score history and every engagement record,
   * then recomputes the counters of each campaign it belonged to.
   */
  async remove(id: string): Promise<void> {
    const current = await this.findOne(id);
    let campaignIds: string[] = [];
    try {
      campaignIds = await this.dataSource.transaction(async (manager) => {
        const memberships = await this.members.findAllForProspect(id, manager);
        for (const m of memberships) await this.members.remove(m.id, manager);
        await this.history.removeForProspect(id, manager);
        await this.repo.remove(id, manager);
        return [...new Set(memberships.map((m) => m.campaignId))];
      });
      this.logger.log(`[remove] prospect ${id} (${current.status}) deleted`);
    } catch (e) {
      mapAndThrow(this.logger, e, 'deleting prospect', { id });
    }

    for (const campaignId of campaignIds) await this.metrics.recompute(campaignId);
  }

  // ---------------------------------------------------------------------------
  // Bulk
  // ---------------------------------------------------------------------------

  /** Row-by-row; a bad or duplicate row never aborts the batch. */
  async bulkCreate(dto: BulkCreateProspectsDto, actor: Actor): Promise<BulkCreateResult> {
    if (dto.campaignId) await this.ensureCampaign(dto.campaignId);

    const result: BulkCreateResult = { createdCount: 0, skippedCount: 0, failedCount: 0, createdIds: [], errors: [] };
    const seenEmails = new Set<string>();
    const seenPhones = new Set<string>();

    for (const [index, raw] of dto.prospects.entries()) {
      const parsed = CreateProspectSchema.safeParse({ ...raw, campaignId: dto.campaignId ?? raw['campaignId'] });
      if (!parsed.success) {
        result.failedCount++;
        result.errors.push({ index, error: parsed.error.issues.map((i) => i.message).join('; ') });
        continue;
      }
      const row = parsed.data;

      const dupInBatch = (!!row.email && seenEmails.has(row.email)) || (!!row.phone && seenPhones.has(row.phone));
      const dup = dupInBatch || !!(await this.repo.findDuplicate(row.email, row.phone));
      if (dup) {
        if (dto.skipDuplicates) {
          result.skippedCount++;
        } else {
          result.failedCount++;
          result.errors.push({ index, email: row.email, phone: row.phone, error: 'Duplicate email or phone' });
        }
        continue;
      }
      if (row.email) seenEmails.add(row.email);
      if (row.phone) seenPhones.add(row.phone);

      try {
        const created = await this.create(row, actor);
        result.createdCount++;
        result.createdIds.push(created.id);
      } catch (e) {
        result.failedCount++;
        result.errors.push({
          index,
          email: row.email,
          phone: row.phone,
          error: e instanceof Error ? e.message : String(e),
        });
      }
    }

    this.logger.log(
      `[bulkCreate] created=${result.createdCount} skipped=${result.skippedCount} failed=${result.failedCount}`,
    );
    return result;
  }

  // ---------------------------------------------------------------------------
  // Lead score / conversion
  // ---------------------------------------------------------------------------

  async adjustLeadScore(id: string, dto: AdjustLeadScoreDto, actor: Actor): Promise<ScoreChangeResult> {
    const current = await this.findOne(id);
    if (isConverted(current)) throw invalidState('Converted prospects are read-only', { id });
    if (dto.campaignId) await this.ensureCampaign(dto.campaignId);

    return this.scores.applyDelta(
      id,
      { scoreChange: dto.scoreChange, reason: dto.reason, activityType: dto.activityType },
      { campaignId: dto.campaignId, changedBy: actor.id, notes: dto.notes },
    );
  }

  getScoreHistory(id: string): Promise<LeadScoreHistory[]> {
    return this.history.findByProspect(id);
  }

  async convert(id: string, dto: ConvertProspectDto, actor: Actor): Promise<ConversionResult> {
    try {
      return await this.converter.convert(id, dto, actor);
    } catch (e) {
      mapAndThrow(this.logger, e, 'converting prospect', { id });
    }
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  getStatistics(filter: { campaignId?: string; assignedTo?: string }): Promise<ProspectStatistics> {
    return this.repo.getStatistics(filter);
  }

  /** Engagement records follow the prospect to its contact after conversion. */
  async getWithEngagement(id: string): Promise<ProspectWithEngagement> {
    const prospect = await this.findOne(id);
    const engagements: CampaignMember[] = prospect.convertedToContactId
      ? await this.members.findAllForContact(prospect.convertedToContactId)
      : await this.members.findAllForProspect(id);
    const scoreHistory = await this.history.findByProspect(id);

    return {
      prospect,
      engagements,
      scoreHistory,
      engagementCount: engagements.length,
      totalOpens: engagements.reduce((sum, m) => sum + m.openCount, 0),
      totalClicks: engagements.reduce((sum, m) => sum + m.clickCount, 0),
    };
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private async ensureUnique(email?: string | null, phone?: string | null, exceptId?: string): Promise<void> {
    const dup = await this.repo.findDuplicate(email, phone, exceptId);
    if (!dup) return;
    const field = email && dup.email?.toLowerCase() === email.toLowerCase() ? 'email' : 'phone';
    throw conflict(`A prospect with this ${field} already exists`, { field, prospectId: dup.id });
  }

  private async ensureCampaign(campaignId: string): Promise<void> {
    const campaign = await this.campaigns.findById(campaignId);
    if (!campaign) throw validationError('Campaign not found', { campaignId });
  }
}

