// src/crmModules/campaign-audience/audience-manager.service.ts
import { Injectable, Logger } from '@nestjs/common';

import { AddAudienceResult, AddMemberResult, AudienceEntry, BulkAddResult } from './interface/audience.interface';
import { QueryAudienceInput } from './schema/audience.schema';
import { Campaign } from 'src/crmModules/campaign/entities/campaign.entity';
import { TERMINAL } from 'src/crmModules/campaign/campaign-status';
import { CampaignRepository } from 'src/crmModules/campaign/repository/campaign.repository';
import { CampaignMember } from 'src/crmModules/campaign-member/entities/campaign-member.entity';
import { CampaignMemberRepository } from 'src/crmModules/campaign-member/repository/campaign-member.repository';
import { engagementScore } from 'src/crmModules/campaign-member/engagement-tracker.service';
import { MetricsAggregatorService } from 'src/crmModules/campaign-metrics/metrics-aggregator.service';
import { ContactRepository } from 'src/crmModules/crm-records/repository/contact.repository';
import { ProspectRepository } from 'src/crmModules/prospect/repository/prospect.repository';
import { RecipientResolverService } from 'src/crmModules/recipient/recipient-resolver.service';
import { invalidState, notFound, validationError } from 'src/common/errors/crm-error';
import { isUniqueViolation, mapAndThrow } from 'src/common/errors/map-and-throw';
import { Paginated } from 'src/common/pagination/paginated.interface';

type RecipientKind = 'contact' | 'prospect';

/**
 * Audience membership. Adds are idempotent per (campaign, recipient); the
 * campaign's audience size is always re-counted, never incremented.
 */
@Injectable()
export class AudienceManagerService {
  private readonly logger = new Logger(AudienceManagerService.name);

  constructor(
    private readonly campaigns: CampaignRepository,
    private readonly members: CampaignMemberRepository,
    private readonly contacts: ContactRepository,
    private readonly prospects: ProspectRepository,
    private readonly recipients: RecipientResolverService,
    private readonly metrics: MetricsAggregatorService,
  ) {}

  // ---------------------------------------------------------------------------
  // Single add
  // ---------------------------------------------------------------------------

  async addContact(campaignId: string, contactId: string, sendTo?: string, notes?: string): Promise<AddMemberResult> {
    await this.openCampaign(campaignId);
    const contact = await this.contacts.findById(contactId);
    if (!contact) throw notFound('Contact', contactId);

    const result = await this.addOne(campaignId, 'contact', contactId, sendTo, notes);
    await this.syncAudienceSize(campaignId);
    return result;
  }

  async addProspect(campaignId: string, prospectId: string, sendTo?: string, notes?: string): Promise<AddMemberResult> {
    await this.openCampaign(campaignId);
    const prospect = await this.prospects.findById(prospectId);
    if (!prospect) throw notFound('Prospect', prospectId);

    const result = await this.addOne(campaignId, 'prospect', prospectId, sendTo, notes);
    await this.syncAudienceSize(campaignId);
    return result;
  }

  // ---------------------------------------------------------------------------
  // Bulk add
  // ---------------------------------------------------------------------------

  async bulkAddContacts(campaignId: string, contactIds: string[]): Promise<BulkAddResult> {
    await this.openCampaign(campaignId);
    const result = await this.addMany(campaignId, 'contact', contactIds);
    await this.syncAudienceSize(campaignId);
    return result;
  }

  async bulkAddProspects(campaignId: string, prospectIds: string[]): Promise<BulkAddResult> {
    await this.openCampaign(campaignId);
    const result = await this.addMany(campaignId, 'prospect', prospectIds);
    await this.syncAudienceSize(campaignId);
    return result;
  }

  async addAudience(
    campaignId: string,
    input: { contactIds: string[]; prospectIds: string[] },
  ): Promise<AddAudienceResult> {
    await this.openCampaign(campaignId);
    const c = await this.addMany(campaignId, 'contact', input.contactIds);
    const p = await this.addMany(campaignId, 'prospect', input.prospectIds);
    const totalAudience = await this.syncAudienceSize(campaignId);

    const skipped = c.skipped + p.skipped;
    const missing = c.missing + p.missing;
    this.logger.log(
      `[addAudience] campaign ${campaignId}: +${c.added} contacts, +${p.added} prospects, ${skipped} skipped, ${missing} missing`,
    );

    return {
      addedContacts: c.added,
      addedProspects: p.added,
      skipped,
      missing,
      totalAudience,
      message: `Added ${c.added} contacts and ${p.added} prospects to campaign`,
    };
  }

  // ---------------------------------------------------------------------------
  // Remove / list
  // ---------------------------------------------------------------------------

  async remove(campaignId: string, memberId: string): Promise<void> {
    const member = await this.members.findById(memberId);
    if (!member) throw notFound('Campaign member', memberId);
    if (member.campaignId !== campaignId) {
      throw validationError('Campaign member does not belong to this campaign', { campaignId, memberId });
    }

    try {
      await this.members.remove(memberId);
    } catch (e) {
      mapAndThrow(this.logger, e, 'removing campaign member', { campaignId, memberId });
    }
    // counters may include the removed member's engagement
    await this.metrics.recompute(campaignId);
  }

  async listAudience(campaignId: string, q: QueryAudienceInput): Promise<Paginated<AudienceEntry>> {
    await this.ensureCampaign(campaignId);
    const page = await this.members.findPage(campaignId, q);
    const who = await this.recipients.resolve(page.data);

    return {
      ...page,
      data: page.data.map((m): AudienceEntry => {
        const r = who.get(m.id);
        return {
          ...m,
          recipientType: m.contactId ? 'contact' : 'prospect',
          recipientName: r?.fullName || null,
          recipientEmail: m.emailSentTo ?? r?.email ?? null,
          engagementScore: engagementScore(m),
        };
      }),
    };
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private async addOne(
    campaignId: string,
    kind: RecipientKind,
    recipientId: string,
    sendTo?: string,
    notes?: string,
  ): Promise<AddMemberResult> {
    const existing = await this.findExisting(campaignId, kind, recipientId);
    if (existing) return { member: existing, created: false };

    try {
      const member = await this.members.create({
        campaignId,
        ...(kind === 'contact' ? { contactId: recipientId } : { prospectId: recipientId }),
        emailSentTo: sendTo,
        notes,
      });
      return { member, created: true };
    } catch (e) {
      // concurrent add of the same recipient: the store kept one row
      if (isUniqueViolation(e)) {
        const raced = await this.findExisting(campaignId, kind, recipientId);
        if (raced) return { member: raced, created: false };
      }
      mapAndThrow(this.logger, e, 'adding campaign member', { campaignId, kind, recipientId });
    }
  }

  private async addMany(campaignId: string, kind: RecipientKind, ids: string[]): Promise<BulkAddResult> {
    const requested = ids.length;
    const distinct = [...new Set(ids)];
    const known =
      kind === 'contact'
        ? await this.contacts.findExistingIds(distinct)
        : await this.prospects.findExistingIds(distinct);

    let added = 0;
    let skipped = requested - distinct.length; // repeated ids in the request
    let missing = 0;

    for (const id of distinct) {
      if (!known.has(id)) {
        missing++;
        continue;
      }
      const { created } = await this.addOne(campaignId, kind, id);
      if (created) added++;
      else skipped++;
    }
    return { requested, added, skipped, missing };
  }

  private findExisting(campaignId: string, kind: RecipientKind, recipientId: string): Promise<CampaignMember | null> {
    return kind === 'contact'
      ? this.members.findByContact(campaignId, recipientId)
      : this.members.findByProspect(campaignId, recipientId);
  }

  private async syncAudienceSize(campaignId: string): Promise<number> {
    const size = await this.members.countByCampaign(campaignId);
    await this.campaigns.setAudienceSize(campaignId, size);
    return size;
  }

  private async ensureCampaign(campaignId: string): Promise<Campaign> {
    const campaign = await this.campaigns.findById(campaignId);
    if (!campaign) throw notFound('Campaign', campaignId);
    return campaign;
  }

  private async openCampaign(campaignId: string): Promise<Campaign> {
    const campaign = await this.ensureCampaign(campaignId);
    if (TERMINAL.has(campaign.status)) {
      throw invalidState(`Cannot change the audience of a ${campaign.status} campaign`, { campaignId });
    }
    return campaign;
  }
}
