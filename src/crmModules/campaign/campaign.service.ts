// src/crmModules/campaign/campaign.service.ts
import { Injectable, Logger } from '@nestjs/common';

import { CampaignRepository, CampaignPatch } from './repository/campaign.repository';
import { Campaign, CampaignStatus } from './entities/campaign.entity';
import { CreateCampaignDto } from './dto/create-campaign.dto';
import { UpdateCampaignDto } from './dto/update-campaign.dto';
import { QueryCampaignsDto } from './dto/query-campaigns.dto';
import { ICampaignStatistics } from './interface/campaign-statistics.interface';
import { ALLOWED, TERMINAL } from './campaign-status';
import { Actor } from 'src/auth/actor';
import { invalidState, notFound, validationError } from 'src/common/errors/crm-error';
import { mapAndThrow } from 'src/common/errors/map-and-throw';
import { Paginated } from 'src/common/pagination/paginated.interface';
import { EmailTemplateRepository } from 'src/crmModules/email-template/repository/email-template.repository';

@Injectable()
export class CampaignService {
  private readonly logger = new Logger(CampaignService.name);

  constructor(
    private readonly repo: CampaignRepository,
    private readonly templates: EmailTemplateRepository,
  ) {}

  // ---------------------------------------------------------------------------
  // CRUD
  // ---------------------------------------------------------------------------

  async create(dto: CreateCampaignDto, actor: Actor): Promise<Campaign> {
    if (dto.emailTemplateId) await this.ensureTemplate(dto.emailTemplateId);
    try {
      const created = await this.repo.create({
        ...dto,
        status: 'draft',
        ownerId: dto.ownerId ?? actor.id,
        createdBy: actor.id,
      });
      this.logger.log(`[create] campaign ${created.id} "${created.name}" by ${actor.id}`);
      return created;
    } catch (e) {
      mapAndThrow(this.logger, e, 'creating campaign', { name: dto.name });
    }
  }

  async findMany(q: QueryCampaignsDto): Promise<Paginated<Campaign>> {
    try {
      return await this.repo.findMany(q);
    } catch (e) {
      mapAndThrow(this.logger, e, 'listing campaigns', { q });
    }
  }

  async findOne(id: string): Promise<Campaign> {
    return this.ensureExists(id);
  }

  async update(id: string, dto: UpdateCampaignDto): Promise<Campaign> {
    const current = await this.ensureExists(id);

    if (TERMINAL.has(current.status)) {
      const touched = Object.keys(dto).filter((k) => k !== 'notes');
      if (touched.length) {
        throw invalidState(`Cannot modify a ${current.status} campaign`, { fields: touched });
      }
    }

    const startDate = dto.startDate === undefined ? current.startDate : dto.startDate;
    const endDate = dto.endDate === undefined ? current.endDate : dto.endDate;
    if (startDate && endDate && startDate > endDate) {
      throw validationError('endDate must be >= startDate');
    }
    if (dto.emailTemplateId) await this.ensureTemplate(dto.emailTemplateId);

    try {
      const updated = await this.repo.update(id, dto);
      if (!updated) throw notFound('Campaign', id);
      return updated;
    } catch (e) {
      mapAndThrow(this.logger, e, 'updating campaign', { id, currentStatus: current.status });
    }
  }

  async remove(id: string): Promise<void> {
    await this.ensureExists(id);
    try {
      await this.repo.remove(id);
      this.logger.log(`[remove] campaign ${id} deleted with its audience`);
    } catch (e) {
      mapAndThrow(this.logger, e, 'deleting campaign', { id });
    }
  }

  // ---------------------------------------------------------------------------
  // Actions
  // ---------------------------------------------------------------------------

  async setStatus(id: string, status: CampaignStatus): Promise<Campaign> {
    const current = await this.ensureExists(id);
    this.assertTransition(current.status, status);

    const extra: CampaignPatch = {};
    const now = new Date();
    if (status === 'active' && !current.actualStartDate) extra.actualStartDate = now;
    if (status === 'completed' || status === 'cancelled') extra.actualEndDate = now;

    try {
      const updated = await this.repo.setStatus(id, status, extra);
      if (!updated) throw notFound('Campaign', id);
      return updated;
    } catch (e) {
      mapAndThrow(this.logger, e, 'setting status', { id, from: current.status, to: status });
    }
  }

  async getStatistics(ownerId?: string): Promise<ICampaignStatistics> {
    try {
      return await this.repo.getStatistics(ownerId);
    } catch (e) {
      mapAndThrow(this.logger, e, 'computing campaign statistics', { ownerId });
    }
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  async ensureExists(id: string): Promise<Campaign> {
    const found = await this.repo.findById(id);
    if (!found) throw notFound('Campaign', id);
    return found;
  }

  private async ensureTemplate(templateId: string): Promise<void> {
    const tpl = await this.templates.findById(templateId);
    if (!tpl) throw validationError('Email template not found', { emailTemplateId: templateId });
  }

  private assertTransition(from: CampaignStatus, to: CampaignStatus): void {
    if (!ALLOWED[from].includes(to)) {
      throw invalidState(`Invalid status transition: ${from} → ${to}`, { from, to });
    }
  }
}
