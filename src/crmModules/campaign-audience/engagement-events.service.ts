// src/crmModules/campaign-audience/engagement-events.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource, EntityManager } from 'typeorm';

import { EngagementEventInput, LinkDealInput } from './schema/audience.schema';
import { CampaignRepository } from 'src/crmModules/campaign/repository/campaign.repository';
import { CampaignMember } from 'src/crmModules/campaign-member/entities/campaign-member.entity';
import { CampaignMemberRepository } from 'src/crmModules/campaign-member/repository/campaign-member.repository';
import { EngagementTrackerService } from 'src/crmModules/campaign-member/engagement-tracker.service';
import { MetricsAggregatorService } from 'src/crmModules/campaign-metrics/metrics-aggregator.service';
import { DealRepository } from 'src/crmModules/crm-records/repository/deal.repository';
import { LeadScoreTrackerService } from 'src/crmModules/prospect/lead-score-tracker.service';
import { LeadScoreActivityType } from 'src/crmModules/prospect/entities/lead-score-history.entity';
import { Actor } from 'src/auth/actor';
import { notFound, validationError } from 'src/common/errors/crm-error';

type ScoredEvent = 'opened' | 'clicked' | 'responded';

/** Lead score bump for a prospect's first open, click and response. */
export const ENGAGEMENT_SCORE_DELTAS: Record<ScoredEvent, { delta: number; activityType: LeadScoreActivityType }> = {
  opened: { delta: 2, activityType: 'email_opened' },
  clicked: { delta: 3, activityType: 'email_clicked' },
  responded: { delta: 5, activityType: 'email_responded' },
};

const FIRST_SEEN: Record<ScoredEvent, keyof Pick<CampaignMember, 'openedAt' | 'clickedAt' | 'respondedAt'>> = {
  opened: 'openedAt',
  clicked: 'clickedAt',
  responded: 'respondedAt',
};

const isScored = (event: string): event is ScoredEvent => event in ENGAGEMENT_SCORE_DELTAS;

/**
 * Inbound delivery and engagement events for one audience member. The
 * member update and any lead score change commit together; campaign
 * metrics are recomputed afterwards.
 */
@Injectable()
export class EngagementEventsService {
  private readonly logger = new Logger(EngagementEventsService.name);

  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    private readonly campaigns: CampaignRepository,
    private readonly members: CampaignMemberRepository,
    private readonly tracker: EngagementTrackerService,
    private readonly scores: LeadScoreTrackerService,
    private readonly deals: DealRepository,
    private readonly metrics: MetricsAggregatorService,
  ) {}

  async record(campaignId: string, memberId: string, input: EngagementEventInput, actor: Actor): Promise<CampaignMember> {
    const campaign = await this.campaigns.findById(campaignId);
    if (!campaign) throw notFound('Campaign', campaignId);
    const before = await this.members.findById(memberId);
    if (!before) throw notFound('Campaign member', memberId);
    if (before.campaignId !== campaignId) {
      throw validationError('Campaign member does not belong to this campaign', { campaignId, memberId });
    }

    const updated = await this.dataSource.transaction(async (manager) => {
      let member = await this.apply(memberId, input, manager);

      const event = input.event;
      if (isScored(event) && member.prospectId && before[FIRST_SEEN[event]] === null) {
        const rule = ENGAGEMENT_SCORE_DELTAS[event];
        const { history } = await this.scores.applyDelta(
          member.prospectId,
          { scoreChange: rule.delta, reason: `Email ${event} in campaign "${campaign.name}"`, activityType: rule.activityType },
          { campaignId, campaignMemberId: memberId, changedBy: actor.id },
          manager,
        );
        member.leadScoreChange += history.scoreChange;
        member = await this.members.save(member, manager);
      }
      return member;
    });

    this.logger.log(`[event] ${input.event} on member ${memberId} of campaign ${campaignId}`);
    await this.metrics.recompute(campaignId);
    return updated;
  }

  /** Marks the recipient's member converted against an existing deal. */
  async linkDeal(campaignId: string, input: LinkDealInput): Promise<CampaignMember> {
    const campaign = await this.campaigns.findById(campaignId);
    if (!campaign) throw notFound('Campaign', campaignId);
    const deal = await this.deals.findById(input.dealId);
    if (!deal) throw notFound('Deal', input.dealId);

    const member = input.contactId
      ? await this.members.findByContact(campaignId, input.contactId)
      : input.prospectId
        ? await this.members.findByProspect(campaignId, input.prospectId)
        : null;
    if (!member) throw notFound('Campaign member');

    const converted = await this.tracker.markConverted(member.id, {
      dealId: deal.id,
      conversionValue: input.conversionValue ?? deal.value,
    });
    await this.metrics.recompute(campaignId);
    return converted;
  }

  private apply(memberId: string, input: EngagementEventInput, manager: EntityManager): Promise<CampaignMember> {
    switch (input.event) {
      case 'delivered':
        return this.tracker.markDelivered(memberId, manager);
      case 'opened':
        return this.tracker.markOpened(memberId, manager);
      case 'clicked':
        return this.tracker.markClicked(memberId, manager);
      case 'responded':
        return this.tracker.markResponded(memberId, manager);
      case 'unsubscribed':
        return this.tracker.markUnsubscribed(memberId, manager);
      case 'bounced':
        return this.tracker.markBounced(memberId, { bounceType: input.bounceType, errorMessage: input.errorMessage }, manager);
      case 'converted':
        return this.tracker.markConverted(
          memberId,
          { dealId: input.dealId, conversionValue: input.conversionValue },
          manager,
        );
    }
  }
}
