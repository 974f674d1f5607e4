import { Injectable, Logger } from '@nestjs/common';

import { EmailTemplateRepository } from './repository/email-template.repository';
import { EmailTemplate } from './entities/email-template.entity';
import {
  CreateEmailTemplateDto,
  PreviewEmailTemplateDto,
  QueryEmailTemplatesDto,
  UpdateEmailTemplateDto,
} from './dto/email-template.dto';
import { Actor } from 'src/auth/actor';
import { notFound } from 'src/common/errors/crm-error';
import { mapAndThrow } from 'src/common/errors/map-and-throw';
import { Paginated } from 'src/common/pagination/paginated.interface';
import { extractMergeFields, renderTemplate } from 'src/common/templates/template-merge';

@Injectable()
export class EmailTemplateService {
  private readonly logger = new Logger(EmailTemplateService.name);

  constructor(private readonly repo: EmailTemplateRepository) {}

  async create(dto: CreateEmailTemplateDto, actor: Actor): Promise<EmailTemplate> {
    try {
      return await this.repo.create({ ...dto, createdBy: actor.id });
    } catch (e) {
      mapAndThrow(this.logger, e, 'creating email template', { name: dto.name });
    }
  }

  findMany(q: QueryEmailTemplatesDto): Promise<Paginated<EmailTemplate>> {
    return this.repo.findMany(q);
  }

  async findOne(id: string): Promise<EmailTemplate> {
    const tpl = await this.repo.findById(id);
    if (!tpl) throw notFound('Email template', id);
    return tpl;
  }

  async update(id: string, dto: UpdateEmailTemplateDto): Promise<EmailTemplate> {
    await this.findOne(id);
    const updated = await this.repo.update(id, dto);
    if (!updated) throw notFound('Email template', id);
    return updated;
  }

  /** Renders subject and body with the supplied values; unknown fields stay as placeholders. */
  async preview(id: string, dto: PreviewEmailTemplateDto) {
    const tpl = await this.findOne(id);
    const rendered = renderTemplate(tpl, dto.mergeData);
    return {
      templateId: tpl.id,
      subject: rendered.subject,
      body: rendered.body,
      mergeFields: extractMergeFields(`${tpl.subject} ${tpl.body}`),
    };
  }
}
