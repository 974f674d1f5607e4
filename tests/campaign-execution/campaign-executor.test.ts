import { createTestApp, TestApp } from '../helpers/test-app';
import { CampaignExecutorService } from '../../src/crmModules/campaign-execution/campaign-executor.service';
import { ExecuteCampaignSchema } from '../../src/crmModules/campaign-execution/schema/execute-campaign.schema';
import { AudienceManagerService } from '../../src/crmModules/campaign-audience/audience-manager.service';
import { CampaignRepository } from '../../src/crmModules/campaign/repository/campaign.repository';
import { CampaignService } from '../../src/crmModules/campaign/campaign.service';
import { Campaign } from '../../src/crmModules/campaign/entities/campaign.entity';
import { CampaignMember } from '../../src/crmModules/campaign-member/entities/campaign-member.entity';
import { CampaignMemberRepository } from '../../src/crmModules/campaign-member/repository/campaign-member.repository';
import { MetricsAggregatorService } from '../../src/crmModules/campaign-metrics/metrics-aggregator.service';
import { EngagementTrackerService } from '../../src/crmModules/campaign-member/engagement-tracker.service';

describe('CampaignExecutorService', () => {
  let app: TestApp;
  let executor: CampaignExecutorService;
  let audience: AudienceManagerService;
  let campaigns: CampaignRepository;
  let members: CampaignMemberRepository;

  beforeAll(async () => {
    app = await createTestApp();
    executor = app.moduleRef.get(CampaignExecutorService);
    audience = app.moduleRef.get(AudienceManagerService);
    campaigns = app.moduleRef.get(CampaignRepository);
    members = app.moduleRef.get(CampaignMemberRepository);
  });

  beforeEach(() => app.mail.reset());

  afterAll(async () => {
    await app.moduleRef.close();
  });

  const reloadCampaign = async (id: string): Promise<Campaign> => {
    const c = await campaigns.findById(id);
    if (!c) throw new Error(`campaign ${id} vanished`);
    return c;
  };

  const reloadMember = async (id: string): Promise<CampaignMember> => {
    const m = await members.findById(id);
    if (!m) throw new Error(`member ${id} vanished`);
    return m;
  };

  const options = (raw: unknown) => ExecuteCampaignSchema.parse(raw);

  describe('execute', () => {
    it('sends to every pending member, records a failure as a bounce and activates the campaign', async () => {
      const acme = await app.seed.company({ name: 'Acme' });
      const campaign = await app.seed.campaign();
      const ana = await app.seed.contact({ firstName: 'Ana', companyId: acme.id });
      const ben = await app.seed.contact({ firstName: 'Ben' });
      const cy = await app.seed.contact({ firstName: 'Cy' });
      await audience.addAudience(campaign.id, { contactIds: [ana.id, ben.id, cy.id], prospectIds: [] });
      app.mail.failFor.add(cy.email ?? '');

      const result = await executor.execute(campaign.id);

      expect(result).toEqual({
        campaignId: campaign.id,
        status: 'executed',
        attempted: 3,
        sentCount: 2,
        failedCount: 1,
        skippedCount: 0,
        message: 'Campaign executed: 2 of 3 sent',
      });

      const toAna = app.mail.sent.find((e) => e.to === ana.email);
      expect(toAna).toEqual({
        to: ana.email,
        subject: 'Hello Ana',
        html: '<p>Hi Ana from Acme</p>',
        fromEmail: 'noreply@example.com',
        fromName: 'CRM System',
      });
      expect(app.mail.sent.find((e) => e.to === ben.email)?.html).toBe('<p>Hi Ben from {{company_name}}</p>');

      const anaMember = await members.findByContact(campaign.id, ana.id);
      expect(anaMember).toMatchObject({ status: 'sent', emailSubject: 'Hello Ana', emailSentTo: ana.email });
      expect(anaMember?.emailMessageId).toMatch(/^<msg-\d+@test\.local>$/);

      const cyMember = await members.findByContact(campaign.id, cy.id);
      expect(cyMember).toMatchObject({
        status: 'bounced',
        bounceType: 'hard',
        errorMessage: `Mailbox unavailable: ${cy.email}`,
        sentAt: null,
      });

      const after = await reloadCampaign(campaign.id);
      expect(after).toMatchObject({ status: 'active', sentCount: 2, bouncedCount: 1, targetAudienceSize: 3 });
      expect(after.lastExecutedAt).toBeInstanceOf(Date);
      expect(after.actualStartDate).toBeInstanceOf(Date);
    });

    it('uses the campaign subject, sender and a per-member address override', async () => {
      const campaign = await app.seed.campaign({
        emailSubject: 'Special for {{first_name}}',
        emailFromName: 'Growth Team',
        emailFromEmail: 'growth@example.com',
      });
      const contact = await app.seed.contact({ firstName: 'Ida' });
      await audience.addContact(campaign.id, contact.id, 'ida.alt@example.com');

      await executor.execute(campaign.id);

      expect(app.mail.sent).toEqual([
        {
          to: 'ida.alt@example.com',
          subject: 'Special for Ida',
          html: '<p>Hi Ida from </p>',
          fromEmail: 'growth@example.com',
          fromName: 'Growth Team',
        },
      ]);
    });

    it('merges prospect fields for prospect recipients', async () => {
      const campaign = await app.seed.campaign();
      const prospect = await app.seed.prospect({ firstName: 'Liu', companyName: 'Globex' });
      await audience.addProspect(campaign.id, prospect.id);

      await executor.execute(campaign.id);

      expect(app.mail.sent.map((e) => e.html)).toEqual(['<p>Hi Liu from Globex</p>']);
    });

    it('skips members without an address and leaves them pending', async () => {
      const campaign = await app.seed.campaign();
      const withEmail = await app.seed.contact();
      const noEmail = await app.seed.contact({ email: null, phone: '+15550001111' });
      await audience.addAudience(campaign.id, { contactIds: [withEmail.id, noEmail.id], prospectIds: [] });

      const result = await executor.execute(campaign.id);

      expect(result).toMatchObject({ attempted: 1, sentCount: 1, failedCount: 0, skippedCount: 1 });
      expect((await members.findByContact(campaign.id, noEmail.id))?.status).toBe('pending');
    });

    it('marks members sent without the transport for non-email campaigns', async () => {
      const campaign = await app.seed.campaign({ type: 'phone' });
      const contact = await app.seed.contact();
      const { member } = await audience.addContact(campaign.id, contact.id);

      const result = await executor.execute(campaign.id);

      expect(result).toMatchObject({ attempted: 1, sentCount: 1 });
      expect(app.mail.sent).toHaveLength(0);
      expect(await reloadMember(member.id)).toMatchObject({ status: 'sent', emailSentTo: contact.email });
    });

    it('recomputes counters after every batch of 50', async () => {
      const campaign = await app.seed.campaign({ type: 'event' });
      const ids: string[] = [];
      for (let i = 0; i < 51; i++) ids.push((await app.seed.contact()).id);
      await audience.bulkAddContacts(campaign.id, ids);

      const recompute = jest.spyOn(app.moduleRef.get(MetricsAggregatorService), 'recompute');
      try {
        const result = await executor.execute(campaign.id);
        expect(result).toMatchObject({ attempted: 51, sentCount: 51 });
        expect(recompute).toHaveBeenCalledTimes(2);
      } finally {
        recompute.mockRestore();
      }
      expect((await reloadCampaign(campaign.id)).sentCount).toBe(51);
    }, 20_000);

    it('retries recording a delivered send so the member is never mailed twice', async () => {
      const campaign = await app.seed.campaign();
      const contact = await app.seed.contact();
      const { member } = await audience.addContact(campaign.id, contact.id);

      const markSent = jest
        .spyOn(app.moduleRef.get(EngagementTrackerService), 'markSent')
        .mockRejectedValueOnce(new Error('write timeout'));
      try {
        const result = await executor.execute(campaign.id);
        expect(result).toMatchObject({ attempted: 1, sentCount: 1, failedCount: 0 });
        expect(markSent).toHaveBeenCalledTimes(2);
      } finally {
        markSent.mockRestore();
      }

      expect(await reloadMember(member.id)).toMatchObject({ status: 'sent', emailSentTo: contact.email });
      expect((await executor.sendToPending(campaign.id)).status).toBe('no_pending');
      expect(app.mail.sent.filter((e) => e.to === contact.email)).toHaveLength(1);
    });

    it('stops the pass when a delivered send cannot be recorded', async () => {
      const campaign = await app.seed.campaign();
      const a = await app.seed.contact();
      const b = await app.seed.contact();
      await audience.addAudience(campaign.id, { contactIds: [a.id, b.id], prospectIds: [] });

      const markSent = jest
        .spyOn(app.moduleRef.get(EngagementTrackerService), 'markSent')
        .mockRejectedValue(new Error('write timeout'));
      try {
        await expect(executor.execute(campaign.id)).rejects.toThrow('write timeout');
      } finally {
        markSent.mockRestore();
      }
      expect(app.mail.sent).toHaveLength(1);
    });

    it('rejects a campaign with no pending audience', async () => {
      const campaign = await app.seed.campaign();
      await expect(executor.execute(campaign.id)).rejects.toMatchObject({ kind: 'VALIDATION' });
    });

    it('rejects email campaigns without a usable template', async () => {
      const contact = await app.seed.contact();
      const noTemplate = await app.seed.campaign({ emailTemplateId: undefined });
      await audience.addContact(noTemplate.id, contact.id);
      const inactive = await app.seed.template({ isActive: false });
      const withInactive = await app.seed.campaign({ emailTemplateId: inactive.id });
      await audience.addContact(withInactive.id, contact.id);

      await expect(executor.execute(noTemplate.id)).rejects.toMatchObject({
        kind: 'VALIDATION',
        message: 'Email campaigns need an email template',
      });
      await expect(executor.execute(withInactive.id)).rejects.toMatchObject({
        kind: 'VALIDATION',
        message: 'Email template is inactive',
      });
    });

    it('refuses paused, completed and cancelled campaigns', async () => {
      const service = app.moduleRef.get(CampaignService);
      const paused = await app.seed.campaign();
      await service.setStatus(paused.id, 'active');
      await service.setStatus(paused.id, 'paused');
      const cancelled = await app.seed.campaign();
      await service.setStatus(cancelled.id, 'cancelled');

      await expect(executor.execute(paused.id)).rejects.toMatchObject({ kind: 'INVALID_STATE' });
      await expect(executor.execute(cancelled.id)).rejects.toMatchObject({ kind: 'INVALID_STATE' });
    });

    it('fails with NOT_FOUND for an unknown campaign', async () => {
      await expect(executor.execute('99999999-9999-4999-8999-999999999999')).rejects.toMatchObject({
        kind: 'NOT_FOUND',
      });
    });
  });

  describe('test sends', () => {
    it('renders sample data with a [TEST] prefix and changes nothing', async () => {
      const campaign = await app.seed.campaign();
      const { member } = await audience.addContact(campaign.id, (await app.seed.contact()).id);

      const result = await executor.execute(
        campaign.id,
        options({ sendTestEmail: true, testEmailRecipients: ['QA@Example.com'] }),
      );

      expect(result).toEqual({
        campaignId: campaign.id,
        status: 'test_sent',
        sentCount: 1,
        failedCount: 0,
        recipients: ['qa@example.com'],
        message: 'Test email sent to 1 of 1 recipients',
      });
      expect(app.mail.sent).toEqual([
        {
          to: 'qa@example.com',
          subject: '[TEST] Hello Test',
          html: '<p>Hi Test from {{company_name}}</p>',
          fromEmail: 'noreply@example.com',
          fromName: 'CRM System',
        },
      ]);
      expect((await reloadMember(member.id)).status).toBe('pending');
      expect(await reloadCampaign(campaign.id)).toMatchObject({ status: 'draft', lastExecutedAt: null, sentCount: 0 });
    });
  });

  describe('scheduling', () => {
    it('moves the campaign to scheduled with the requested start', async () => {
      const campaign = await app.seed.campaign();
      await audience.addContact(campaign.id, (await app.seed.contact()).id);
      const when = new Date(Date.now() + 24 * 60 * 60 * 1000);

      const result = await executor.execute(campaign.id, { scheduleFor: when });

      expect(result).toMatchObject({ status: 'scheduled', scheduledFor: when });
      const after = await reloadCampaign(campaign.id);
      expect(after.status).toBe('scheduled');
      expect(after.startDate?.toISOString()).toBe(when.toISOString());
      expect(app.mail.sent).toHaveLength(0);
    });

    it('rejects a start in the past', async () => {
      const campaign = await app.seed.campaign();
      await audience.addContact(campaign.id, (await app.seed.contact()).id);

      await expect(
        executor.execute(campaign.id, { scheduleFor: new Date(Date.now() - 60_000) }),
      ).rejects.toMatchObject({ kind: 'VALIDATION' });
    });
  });

  describe('sendToPending', () => {
    it('sends only to members still pending and keeps the campaign status', async () => {
      const campaign = await app.seed.campaign();
      const first = await app.seed.contact();
      await audience.addContact(campaign.id, first.id);
      await executor.execute(campaign.id);
      await campaigns.update(campaign.id, { status: 'scheduled' });

      const late = await app.seed.contact();
      await audience.addContact(campaign.id, late.id);
      app.mail.reset();

      const result = await executor.sendToPending(campaign.id);

      expect(result).toEqual({
        campaignId: campaign.id,
        status: 'sent',
        attempted: 1,
        sentCount: 1,
        failedCount: 0,
        skippedCount: 0,
        message: 'Sent to 1 of 1 pending members',
      });
      expect(app.mail.sent.map((e) => e.to)).toEqual([late.email]);
      expect((await reloadCampaign(campaign.id)).status).toBe('scheduled');
    });

    it('reports when there is nothing pending', async () => {
      const campaign = await app.seed.campaign();
      const result = await executor.sendToPending(campaign.id);
      expect(result).toMatchObject({ status: 'no_pending', attempted: 0, message: 'No pending audience members' });
    });
  });

  describe('resendToMember', () => {
    it('resets a bounced member and sends again', async () => {
      const campaign = await app.seed.campaign();
      const contact = await app.seed.contact();
      const { member } = await audience.addContact(campaign.id, contact.id);
      app.mail.failFor.add(contact.email ?? '');
      await executor.execute(campaign.id);
      expect((await reloadMember(member.id)).status).toBe('bounced');

      app.mail.reset();
      const result = await executor.resendToMember(campaign.id, member.id);

      expect(result).toEqual({
        campaignId: campaign.id,
        memberId: member.id,
        status: 'resent',
        message: 'Email resent successfully',
      });
      expect(await reloadMember(member.id)).toMatchObject({ status: 'sent', bounceType: null, errorMessage: null });
      expect(await reloadCampaign(campaign.id)).toMatchObject({ sentCount: 1, bouncedCount: 0 });
    });

    it('reports a failed resend', async () => {
      const campaign = await app.seed.campaign();
      const contact = await app.seed.contact();
      const { member } = await audience.addContact(campaign.id, contact.id);
      app.mail.failFor.add(contact.email ?? '');

      const result = await executor.resendToMember(campaign.id, member.id);

      expect(result).toMatchObject({ status: 'failed', message: 'Failed to resend email' });
      expect((await reloadMember(member.id)).status).toBe('bounced');
    });

    it('applies the same campaign status guard as execute', async () => {
      const campaign = await app.seed.campaign();
      const { member } = await audience.addContact(campaign.id, (await app.seed.contact()).id);
      await app.moduleRef.get(CampaignService).setStatus(campaign.id, 'cancelled');

      await expect(executor.resendToMember(campaign.id, member.id)).rejects.toMatchObject({ kind: 'INVALID_STATE' });
    });

    it('rejects a member of another campaign', async () => {
      const a = await app.seed.campaign();
      const b = await app.seed.campaign();
      const { member } = await audience.addContact(a.id, (await app.seed.contact()).id);

      await expect(executor.resendToMember(b.id, member.id)).rejects.toMatchObject({ kind: 'VALIDATION' });
    });
  });
});
