// src/crmModules/campaign-execution/campaign-executor.service.ts
import { Inject, Injectable, Logger } from '@nestjs/common';

import {
  ExecuteOptions,
  ExecuteResult,
  ResendResult,
  ScheduledResult,
  SendPendingResult,
  SendTally,
  TestSendResult,
} from './interface/execution-result.interface';
import { Campaign } from 'src/crmModules/campaign/entities/campaign.entity';
import { EXECUTABLE } from 'src/crmModules/campaign/campaign-status';
import { CampaignPatch, CampaignRepository } from 'src/crmModules/campaign/repository/campaign.repository';
import { CampaignMember } from 'src/crmModules/campaign-member/entities/campaign-member.entity';
import { CampaignMemberRepository } from 'src/crmModules/campaign-member/repository/campaign-member.repository';
import { EngagementTrackerService } from 'src/crmModules/campaign-member/engagement-tracker.service';
import { MarkSentOptions } from 'src/crmModules/campaign-member/interface/engagement.interface';
import { MetricsAggregatorService } from 'src/crmModules/campaign-metrics/metrics-aggregator.service';
import { EmailTemplate } from 'src/crmModules/email-template/entities/email-template.entity';
import { EmailTemplateRepository } from 'src/crmModules/email-template/repository/email-template.repository';
import { Recipient, RecipientResolverService, mergeFieldsFor } from 'src/crmModules/recipient/recipient-resolver.service';
import { APP_CONFIG, AppConfig } from 'src/config/app.config';
import { EMAIL_TRANSPORT, EmailSendResult, EmailTransport, OutboundEmail } from 'src/common/mail/email-transport';
import { MergeData, renderTemplate } from 'src/common/templates/template-merge';
import { invalidState, notFound, validationError } from 'src/common/errors/crm-error';
import { sleep } from 'src/common/utils/sleep';

/** Counters are recomputed after every batch of this size. */
export const SEND_BATCH_SIZE = 50;

type SendOutcome = 'sent' | 'failed' | 'skipped';

const errorMessage = (e: unknown) => (e instanceof Error ? e.message : String(e));

const TEST_MERGE_DATA = (email: string): MergeData => ({
  first_name: 'Test',
  last_name: 'Recipient',
  full_name: 'Test Recipient',
  email,
});

/**
 * Send passes over a campaign's pending audience. Recipients are processed
 * one at a time with a fixed pause between sends; a failed recipient is
 * recorded as bounced and the pass continues.
 */
@Injectable()
export class CampaignExecutorService {
  private readonly logger = new Logger(CampaignExecutorService.name);

  constructor(
    private readonly campaigns: CampaignRepository,
    private readonly members: CampaignMemberRepository,
    private readonly tracker: EngagementTrackerService,
    private readonly metrics: MetricsAggregatorService,
    private readonly templates: EmailTemplateRepository,
    private readonly recipients: RecipientResolverService,
    @Inject(EMAIL_TRANSPORT) private readonly transport: EmailTransport,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  // ---------------------------------------------------------------------------
  // Full execute
  // ---------------------------------------------------------------------------

  async execute(campaignId: string, options: ExecuteOptions = {}): Promise<ExecuteResult> {
    const campaign = await this.loadExecutable(campaignId);
    const template = await this.resolveTemplate(campaign);

    const pending = await this.members.findPending(campaignId);
    if (!pending.length) {
      throw validationError('No audience to send to: the campaign has no pending members', { campaignId });
    }

    if (options.sendTestEmail) {
      return this.sendTest(campaign, template, options.testEmailRecipients ?? []);
    }

    if (options.scheduleFor) {
      return this.schedule(campaign, options.scheduleFor);
    }

    const tally = await this.sendPass(campaign, template, pending);

    const now = new Date();
    const stamp: CampaignPatch = { lastExecutedAt: now };
    if (!campaign.actualStartDate) stamp.actualStartDate = now;
    if (campaign.status !== 'active') stamp.status = 'active';
    await this.campaigns.update(campaignId, stamp);

    this.logger.log(
      `[execute] campaign ${campaignId}: attempted=${tally.attempted} sent=${tally.sentCount} failed=${tally.failedCount} skipped=${tally.skippedCount}`,
    );

    return {
      campaignId,
      status: 'executed',
      ...tally,
      message: `Campaign executed: ${tally.sentCount} of ${tally.attempted} sent`,
    };
  }

  // ---------------------------------------------------------------------------
  // Send to pending only
  // ---------------------------------------------------------------------------

  /** Same selection as execute; leaves the campaign status alone. */
  async sendToPending(campaignId: string): Promise<SendPendingResult> {
    const campaign = await this.loadExecutable(campaignId);
    const template = await this.resolveTemplate(campaign);

    const pending = await this.members.findPending(campaignId);
    if (!pending.length) {
      return {
        campaignId,
        status: 'no_pending',
        attempted: 0,
        sentCount: 0,
        failedCount: 0,
        skippedCount: 0,
        message: 'No pending audience members',
      };
    }

    const tally = await this.sendPass(campaign, template, pending);
    await this.campaigns.update(campaignId, { lastExecutedAt: new Date() });

    this.logger.log(`[sendToPending] campaign ${campaignId}: sent=${tally.sentCount}/${tally.attempted}`);
    return {
      campaignId,
      status: 'sent',
      ...tally,
      message: `Sent to ${tally.sentCount} of ${tally.attempted} pending members`,
    };
  }

  // ---------------------------------------------------------------------------
  // Resend to one member
  // ---------------------------------------------------------------------------

  async resendToMember(campaignId: string, memberId: string): Promise<ResendResult> {
    const campaign = await this.loadExecutable(campaignId);
    const member = await this.members.findById(memberId);
    if (!member) throw notFound('Campaign member', memberId);
    if (member.campaignId !== campaignId) {
      throw validationError('Campaign member does not belong to this campaign', { campaignId, memberId });
    }
    const template = await this.resolveTemplate(campaign);

    const reset = await this.tracker.resetForResend(memberId);
    const recipient = await this.recipients.resolveOne(reset);
    const outcome = await this.sendOne(campaign, template, reset, recipient);
    await this.metrics.recompute(campaignId);

    const resent = outcome === 'sent';
    this.logger.log(`[resend] member ${memberId} of campaign ${campaignId}: ${outcome}`);
    return {
      campaignId,
      memberId,
      status: resent ? 'resent' : 'failed',
      message: resent
        ? 'Email resent successfully'
        : outcome === 'skipped'
          ? 'Member has no email address'
          : 'Failed to resend email',
    };
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private async loadExecutable(campaignId: string): Promise<Campaign> {
    const campaign = await this.campaigns.findById(campaignId);
    if (!campaign) throw notFound('Campaign', campaignId);
    if (!EXECUTABLE.has(campaign.status)) {
      throw invalidState(`Cannot send a ${campaign.status} campaign`, { campaignId, status: campaign.status });
    }
    return campaign;
  }

  /** Email campaigns need an active template; other channels send without one. */
  private async resolveTemplate(campaign: Campaign): Promise<EmailTemplate | null> {
    if (campaign.type !== 'email') return null;
    if (!campaign.emailTemplateId) {
      throw validationError('Email campaigns need an email template', { campaignId: campaign.id });
    }
    const template = await this.templates.findById(campaign.emailTemplateId);
    if (!template) {
      throw validationError('Email template not found', { emailTemplateId: campaign.emailTemplateId });
    }
    if (!template.isActive) {
      throw validationError('Email template is inactive', { emailTemplateId: template.id });
    }
    return template;
  }

  private async schedule(campaign: Campaign, when: Date): Promise<ScheduledResult> {
    if (when.getTime() <= Date.now()) {
      throw validationError('scheduleFor must be in the future', { scheduleFor: when.toISOString() });
    }
    await this.campaigns.update(campaign.id, { status: 'scheduled', startDate: when });
    this.logger.log(`[schedule] campaign ${campaign.id} scheduled for ${when.toISOString()}`);
    return {
      campaignId: campaign.id,
      status: 'scheduled',
      scheduledFor: when,
      message: `Campaign scheduled for ${when.toISOString()}`,
    };
  }

  /** Renders with sample values; touches no member or counter. */
  private async sendTest(
    campaign: Campaign,
    template: EmailTemplate | null,
    addresses: string[],
  ): Promise<TestSendResult> {
    if (!addresses.length) throw validationError('testEmailRecipients is required when sendTestEmail is true');
    if (!template) throw validationError('Test emails need an email campaign with a template', { campaignId: campaign.id });

    let sentCount = 0;
    for (const to of addresses) {
      const rendered = renderTemplate(
        { subject: campaign.emailSubject || template.subject, body: template.body },
        TEST_MERGE_DATA(to),
      );
      const result = await this.deliver({ ...this.sender(campaign), to, subject: `[TEST] ${rendered.subject}`, html: rendered.body });
      if (result.success) sentCount++;
      else this.logger.warn(`[test] ${to}: ${result.message}`);
    }

    return {
      campaignId: campaign.id,
      status: 'test_sent',
      sentCount,
      failedCount: addresses.length - sentCount,
      recipients: addresses,
      message: `Test email sent to ${sentCount} of ${addresses.length} recipients`,
    };
  }

  private async sendPass(
    campaign: Campaign,
    template: EmailTemplate | null,
    pending: CampaignMember[],
  ): Promise<SendTally> {
    const tally: SendTally = { attempted: 0, sentCount: 0, failedCount: 0, skippedCount: 0 };

    for (let i = 0; i < pending.length; i += SEND_BATCH_SIZE) {
      const batch = pending.slice(i, i + SEND_BATCH_SIZE);
      const who = await this.recipients.resolve(batch);

      for (const [j, member] of batch.entries()) {
        if (i + j > 0 && this.config.sendThrottleMs > 0) await sleep(this.config.sendThrottleMs);

        const outcome = await this.sendOne(campaign, template, member, who.get(member.id));
        if (outcome === 'skipped') {
          tally.skippedCount++;
          continue;
        }
        tally.attempted++;
        if (outcome === 'sent') tally.sentCount++;
        else tally.failedCount++;
      }

      await this.metrics.recompute(campaign.id);
    }
    return tally;
  }

  private async sendOne(
    campaign: Campaign,
    template: EmailTemplate | null,
    member: CampaignMember,
    recipient: Recipient | undefined,
  ): Promise<SendOutcome> {
    const address = member.emailSentTo ?? recipient?.email ?? null;

    if (!template) {
      await this.tracker.markSent(member.id, { sentTo: address });
      return 'sent';
    }

    if (!address) {
      this.logger.warn(`[send] member ${member.id} has no email address; left pending`);
      return 'skipped';
    }

    let email: OutboundEmail;
    try {
      const data: MergeData = recipient ? mergeFieldsFor(recipient, address) : { email: address };
      const rendered = renderTemplate({ subject: campaign.emailSubject || template.subject, body: template.body }, data);
      email = { ...this.sender(campaign), to: address, subject: rendered.subject, html: rendered.body };
    } catch (e) {
      return this.fail(member.id, errorMessage(e));
    }

    const result = await this.deliver(email);
    if (!result.success) return this.fail(member.id, result.message);

    // The message is out: the member must leave pending even if the first write fails.
    await this.recordSent(member.id, { subject: email.subject, messageId: result.messageId ?? null, sentTo: address });
    return 'sent';
  }

  private async fail(memberId: string, message: string): Promise<SendOutcome> {
    this.logger.warn(`[send] member ${memberId}: ${message}`);
    await this.tracker.markBounced(memberId, { bounceType: 'hard', errorMessage: message });
    return 'failed';
  }

  /** One retry; a second failure stops the pass. */
  private async recordSent(memberId: string, opts: MarkSentOptions): Promise<void> {
    try {
      await this.tracker.markSent(memberId, opts);
    } catch (e) {
      this.logger.warn(`[send] member ${memberId}: recording the send failed, retrying (${errorMessage(e)})`);
      await this.tracker.markSent(memberId, opts);
    }
  }

  /** Transport errors come back as a failed result, never as a throw. */
  private async deliver(email: OutboundEmail): Promise<EmailSendResult> {
    try {
      return await this.transport.send(email);
    } catch (e) {
      return { success: false, message: errorMessage(e) };
    }
  }

  private sender(campaign: Campaign): { fromEmail: string; fromName: string } {
    return {
      fromEmail: campaign.emailFromEmail || this.config.mail.fromEmail,
      fromName: campaign.emailFromName || this.config.mail.fromName,
    };
  }
}
