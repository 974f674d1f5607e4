// src/crmModules/prospect/prospect-converter.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource, EntityManager } from 'typeorm';

import { ProspectRepository } from './repository/prospect.repository';
import { isConverted, prospectFullName } from './entities/prospect.entity';
import { ConversionOptions, ConversionResult } from './interface/prospect.interface';
import { Actor } from 'src/auth/actor';
import { conflict, notFound } from 'src/common/errors/crm-error';
import { isUniqueViolation, mapAndThrow } from 'src/common/errors/map-and-throw';
import { CampaignRepository } from 'src/crmModules/campaign/repository/campaign.repository';
import { CampaignMemberRepository } from 'src/crmModules/campaign-member/repository/campaign-member.repository';
import { ActivityRepository } from 'src/crmModules/crm-records/repository/activity.repository';
import { CompanyRepository } from 'src/crmModules/crm-records/repository/company.repository';
import { ContactRepository } from 'src/crmModules/crm-records/repository/contact.repository';

/**
 * One-time Prospect → Contact conversion. Contact insert, prospect update,
 * activity insert and engagement re-link commit or roll back together.
 */
@Injectable()
export class ProspectConverterService {
  private readonly logger = new Logger(ProspectConverterService.name);

  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    private readonly prospects: ProspectRepository,
    private readonly contacts: ContactRepository,
    private readonly companies: CompanyRepository,
    private readonly activities: ActivityRepository,
    private readonly members: CampaignMemberRepository,
    private readonly campaigns: CampaignRepository,
  ) {}

  async convert(
    prospectId: string,
    options: ConversionOptions,
    actor: Actor,
    manager?: EntityManager,
  ): Promise<ConversionResult> {
    if (!manager) {
      return this.dataSource.transaction((m) => this.convert(prospectId, options, actor, m));
    }

    const prospect = await this.prospects.findById(prospectId, manager, true);
    if (!prospect) throw notFound('Prospect', prospectId);
    if (isConverted(prospect)) {
      throw conflict('Prospect has already been converted', {
        prospectId,
        contactId: prospect.convertedToContactId,
      });
    }

    if (prospect.email) {
      const existing = await this.contacts.findByEmail(prospect.email, manager);
      if (existing) {
        throw conflict('A contact with this email already exists', { email: prospect.email, contactId: existing.id });
      }
    }

    const company = prospect.companyName ? await this.companies.findByName(prospect.companyName, manager) : null;

    let contactId: string;
    try {
      const contact = await this.contacts.create(
        {
          firstName: prospect.firstName,
          lastName: prospect.lastName,
          email: prospect.email,
          phone: prospect.phone,
          mobile: prospect.phone,
          position: prospect.jobTitle,
          companyId: company?.id ?? null,
          status: 'lead',
          notes: `Converted from prospect. Original notes: ${prospect.notes || 'None'}`,
          ownerId: options.assignTo ?? prospect.assignedTo ?? actor.id,
        },
        manager,
      );
      contactId = contact.id;
    } catch (e) {
      // lost the race against a concurrent insert of the same email
      if (isUniqueViolation(e)) throw conflict('A contact with this email already exists', { email: prospect.email });
      mapAndThrow(this.logger, e, 'creating contact from prospect', { prospectId });
    }

    await this.prospects.markConverted(prospectId, contactId, new Date(), manager);

    let activityId: string | undefined;
    if (options.createActivity) {
      const campaign = prospect.campaignId ? await this.campaigns.findById(prospect.campaignId, manager) : null;
      const name = prospectFullName(prospect) || prospect.email || prospect.phone || prospectId;
      const description = [
        `Prospect ${name} was converted to contact ${contactId}.`,
        `Campaign source: ${campaign?.name ?? 'N/A'}.`,
        options.notes,
      ]
        .filter((s): s is string => !!s)
        .join(' ');

      const activity = await this.activities.create(
        {
          type: 'note',
          subject: 'Prospect converted to contact',
          description,
          contactId,
          userId: actor.id,
        },
        manager,
      );
      activityId = activity.id;
    }

    const relinked = await this.members.relinkProspectToContact(prospectId, contactId, manager);

    this.logger.log(
      `[convert] prospect ${prospectId} -> contact ${contactId} by ${actor.id}; ${relinked} engagement record(s) re-linked`,
    );

    return {
      prospectId,
      contactId,
      ...(activityId ? { activityId } : {}),
      relinkedEngagements: relinked,
      message: 'Prospect converted to contact successfully',
    };
  }
}
