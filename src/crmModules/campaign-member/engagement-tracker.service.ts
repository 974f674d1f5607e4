// src/crmModules/campaign-member/engagement-tracker.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { EntityManager } from 'typeorm';

import { CampaignMember, EngagementStatus } from './entities/campaign-member.entity';
import { CampaignMemberRepository } from './repository/campaign-member.repository';
import { MarkBouncedOptions, MarkConvertedOptions, MarkSentOptions } from './interface/engagement.interface';
import { invalidState, notFound } from 'src/common/errors/crm-error';

/** Funnel position. bounced and unsubscribed sit outside it. */
const STAGE: Partial<Record<EngagementStatus, number>> = {
  pending: 0,
  sent: 1,
  delivered: 2,
  opened: 3,
  clicked: 4,
  responded: 5,
  converted: 6,
};

/** Weights behind a single member's engagement score. */
export const ENGAGEMENT_WEIGHTS = {
  delivered: 1,
  opened: 2,
  clicked: 3,
  responded: 5,
  converted: 10,
} as const;

export function engagementScore(m: CampaignMember): number {
  let score = 0;
  if (m.deliveredAt) score += ENGAGEMENT_WEIGHTS.delivered;
  if (m.openedAt) score += ENGAGEMENT_WEIGHTS.opened;
  if (m.clickedAt) score += ENGAGEMENT_WEIGHTS.clicked;
  if (m.respondedAt) score += ENGAGEMENT_WEIGHTS.responded;
  if (m.convertedAt) score += ENGAGEMENT_WEIGHTS.converted;
  return score;
}

/**
 * Applies delivery and engagement events to a single audience member.
 *
 * Status only moves forward through the funnel; first-occurrence timestamps
 * are written once; open and click counters count every event.
 */
@Injectable()
export class EngagementTrackerService {
  private readonly logger = new Logger(EngagementTrackerService.name);

  constructor(private readonly members: CampaignMemberRepository) {}

  async markSent(memberId: string, opts: MarkSentOptions = {}, manager?: EntityManager): Promise<CampaignMember> {
    const m = await this.load(memberId, manager);
    const now = new Date();
    m.sentAt ??= now;
    if (opts.subject !== undefined) m.emailSubject = opts.subject;
    if (opts.messageId !== undefined) m.emailMessageId = opts.messageId;
    if (opts.sentTo !== undefined) m.emailSentTo = opts.sentTo;
    m.errorMessage = null;
    advance(m, 'sent');
    return this.members.save(m, manager);
  }

  async markDelivered(memberId: string, manager?: EntityManager): Promise<CampaignMember> {
    const m = await this.load(memberId, manager);
    this.assertSent(m, 'delivered');
    m.deliveredAt ??= new Date();
    advance(m, 'delivered');
    return this.members.save(m, manager);
  }

  async markOpened(memberId: string, manager?: EntityManager): Promise<CampaignMember> {
    const m = await this.load(memberId, manager);
    this.assertSent(m, 'opened');
    m.openedAt ??= new Date();
    m.openCount += 1;
    advance(m, 'opened');
    return this.members.save(m, manager);
  }

  async markClicked(memberId: string, manager?: EntityManager): Promise<CampaignMember> {
    const m = await this.load(memberId, manager);
    this.assertSent(m, 'clicked');
    m.clickedAt ??= new Date();
    m.clickCount += 1;
    advance(m, 'clicked');
    return this.members.save(m, manager);
  }

  /** A reply counts from any state, but never pulls a converted member back. */
  async markResponded(memberId: string, manager?: EntityManager): Promise<CampaignMember> {
    const m = await this.load(memberId, manager);
    m.respondedAt ??= new Date();
    if (m.status !== 'converted') m.status = 'responded';
    return this.members.save(m, manager);
  }

  async markConverted(
    memberId: string,
    opts: MarkConvertedOptions = {},
    manager?: EntityManager,
  ): Promise<CampaignMember> {
    const m = await this.load(memberId, manager);
    m.convertedAt ??= new Date();
    m.status = 'converted';
    if (opts.dealId !== undefined) m.dealId = opts.dealId;
    if (opts.conversionValue !== undefined) m.conversionValue = opts.conversionValue;
    return this.members.save(m, manager);
  }

  async markBounced(memberId: string, opts: MarkBouncedOptions = {}, manager?: EntityManager): Promise<CampaignMember> {
    const m = await this.load(memberId, manager);
    m.bouncedAt ??= new Date();
    m.status = 'bounced';
    m.bounceType = opts.bounceType ?? 'hard';
    if (opts.errorMessage !== undefined) m.errorMessage = opts.errorMessage;
    this.logger.warn(`[bounce] member ${m.id} (${m.bounceType}): ${m.errorMessage ?? 'no reason given'}`);
    return this.members.save(m, manager);
  }

  async markUnsubscribed(memberId: string, manager?: EntityManager): Promise<CampaignMember> {
    const m = await this.load(memberId, manager);
    m.unsubscribedAt ??= new Date();
    m.status = 'unsubscribed';
    return this.members.save(m, manager);
  }

  /** Clears every timestamp, counter and error so the next send picks the member up again. */
  async resetForResend(memberId: string, manager?: EntityManager): Promise<CampaignMember> {
    const m = await this.load(memberId, manager);
    m.status = 'pending';
    m.sentAt = null;
    m.deliveredAt = null;
    m.openedAt = null;
    m.clickedAt = null;
    m.respondedAt = null;
    m.bouncedAt = null;
    m.unsubscribedAt = null;
    m.convertedAt = null;
    m.openCount = 0;
    m.clickCount = 0;
    m.leadScoreChange = 0;
    m.dealId = null;
    m.conversionValue = null;
    m.bounceType = null;
    m.errorMessage = null;
    m.emailMessageId = null;
    m.emailSubject = null;
    return this.members.save(m, manager);
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private async load(memberId: string, manager?: EntityManager): Promise<CampaignMember> {
    const m = await this.members.findById(memberId, manager);
    if (!m) throw notFound('Campaign member', memberId);
    return m;
  }

  private assertSent(m: CampaignMember, event: string): void {
    if (m.status === 'pending' && !m.sentAt) {
      throw invalidState(`Cannot record ${event} for a member that has not been sent to`, { memberId: m.id });
    }
  }
}

function advance(m: CampaignMember, target: EngagementStatus): void {
  const current = STAGE[m.status];
  const next = STAGE[target];
  if (current === undefined || next === undefined) return;
  if (next > current) m.status = target;
}
