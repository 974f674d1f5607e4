import { ADMIN, REP, createTestApp, TestApp, uniqueEmail, uniquePhone } from '../helpers/test-app';
import { ProspectService } from '../../src/crmModules/prospect/prospect.service';
import {
  AdjustLeadScoreSchema,
  BulkCreateProspectsSchema,
  CreateProspectSchema,
  QueryProspectsSchema,
  UpdateProspectSchema,
} from '../../src/crmModules/prospect/schema/prospect.schema';
import { LeadScoreHistoryRepository } from '../../src/crmModules/prospect/repository/lead-score-history.repository';
import { AudienceManagerService } from '../../src/crmModules/campaign-audience/audience-manager.service';
import { CampaignMemberRepository } from '../../src/crmModules/campaign-member/repository/campaign-member.repository';
import { EngagementTrackerService } from '../../src/crmModules/campaign-member/engagement-tracker.service';
import { CampaignRepository } from '../../src/crmModules/campaign/repository/campaign.repository';
import { ContactRepository } from '../../src/crmModules/crm-records/repository/contact.repository';
import { ActivityRepository } from '../../src/crmModules/crm-records/repository/activity.repository';
import { CampaignExecutorService } from '../../src/crmModules/campaign-execution/campaign-executor.service';

const MISSING_ID = '99999999-9999-4999-8999-999999999999';

describe('ProspectService', () => {
  let app: TestApp;
  let service: ProspectService;
  let history: LeadScoreHistoryRepository;

  beforeAll(async () => {
    app = await createTestApp();
    service = app.moduleRef.get(ProspectService);
    history = app.moduleRef.get(LeadScoreHistoryRepository);
  });

  afterAll(async () => {
    await app.moduleRef.close();
  });

  const update = (id: string, raw: unknown) => service.update(id, UpdateProspectSchema.parse(raw), ADMIN);

  describe('create', () => {
    it('applies the initial score as a tracked change', async () => {
      const p = await service.create(CreateProspectSchema.parse({ email: uniqueEmail(), leadScore: 25 }), ADMIN);

      expect(p).toMatchObject({ leadScore: 25, status: 'new', source: 'manual_entry', assignedTo: ADMIN.id, createdBy: ADMIN.id });
      const rows = await history.findByProspect(p.id);
      expect(rows).toHaveLength(1);
      expect(rows[0]).toMatchObject({
        oldScore: 0,
        newScore: 25,
        scoreChange: 25,
        reason: 'Initial prospect creation',
        activityType: 'created',
        changedBy: ADMIN.id,
      });
    });

    it('assigns the prospect to the caller by default', async () => {
      const p = await service.create(CreateProspectSchema.parse({ phone: uniquePhone() }), REP);
      expect(p.assignedTo).toBe(REP.id);
    });

    it('rejects a duplicate email or phone, naming the field', async () => {
      const email = uniqueEmail();
      const phone = uniquePhone();
      await service.create(CreateProspectSchema.parse({ email, phone }), ADMIN);

      await expect(
        service.create(CreateProspectSchema.parse({ email: email.toUpperCase() }), ADMIN),
      ).rejects.toMatchObject({ kind: 'CONFLICT', message: 'A prospect with this email already exists' });
      await expect(
        service.create(CreateProspectSchema.parse({ email: uniqueEmail(), phone }), ADMIN),
      ).rejects.toMatchObject({ kind: 'CONFLICT', message: 'A prospect with this phone already exists' });
    });

    it('rejects an unknown campaign', async () => {
      await expect(
        service.create(CreateProspectSchema.parse({ email: uniqueEmail(), campaignId: MISSING_ID }), ADMIN),
      ).rejects.toMatchObject({ kind: 'VALIDATION' });
    });

    it('requires an email or a phone and never accepts a converted status', () => {
      expect(CreateProspectSchema.safeParse({ firstName: 'Nobody' }).success).toBe(false);
      expect(CreateProspectSchema.safeParse({ email: uniqueEmail(), status: 'converted' }).success).toBe(false);
    });
  });

  describe('bulkCreate', () => {
    it('creates valid rows, skips duplicates and reports invalid ones', async () => {
      const existing = await app.seed.prospect();
      const email = uniqueEmail();

      const result = await service.bulkCreate(
        BulkCreateProspectsSchema.parse({
          prospects: [
            { email },
            { email },
            { email: existing.email },
            { firstName: 'NoContact' },
            { phone: uniquePhone() },
          ],
        }),
        ADMIN,
      );

      expect(result.createdCount).toBe(2);
      expect(result.skippedCount).toBe(2);
      expect(result.failedCount).toBe(1);
      expect(result.createdIds).toHaveLength(2);
      expect(result.errors).toEqual([{ index: 3, error: 'Either email or phone is required' }]);
    });

    it('reports duplicates as failures when asked not to skip them', async () => {
      const existing = await app.seed.prospect();

      const result = await service.bulkCreate(
        BulkCreateProspectsSchema.parse({
          prospects: [{ email: existing.email }, { email: uniqueEmail() }],
          skipDuplicates: false,
        }),
        ADMIN,
      );

      expect(result).toMatchObject({ createdCount: 1, skippedCount: 0, failedCount: 1 });
      expect(result.errors[0]).toMatchObject({ index: 0, email: existing.email, error: 'Duplicate email or phone' });
    });

    it('tags every row with the batch campaign', async () => {
      const campaign = await app.seed.campaign();
      const result = await service.bulkCreate(
        BulkCreateProspectsSchema.parse({ prospects: [{ email: uniqueEmail() }], campaignId: campaign.id }),
        ADMIN,
      );
      expect((await service.findOne(result.createdIds[0])).campaignId).toBe(campaign.id);
    });
  });

  describe('update', () => {
    it('changes fields and status', async () => {
      const p = await app.seed.prospect();
      const after = await update(p.id, { firstName: 'Renamed', status: 'qualified' });
      expect(after).toMatchObject({ firstName: 'Renamed', status: 'qualified' });
    });

    it('moves the lead score through the tracker', async () => {
      const p = await app.seed.prospect();
      const after = await update(p.id, { leadScore: 40 });

      expect(after.leadScore).toBe(40);
      const manual = (await history.findByProspect(p.id)).filter((h) => h.activityType === 'manual_adjustment');
      expect(manual).toHaveLength(1);
      expect(manual[0]).toMatchObject({ oldScore: 0, newScore: 40, reason: 'Manual score adjustment' });
    });

    it('refuses to drop the last contact channel', async () => {
      const p = await app.seed.prospect();
      await expect(update(p.id, { email: null })).rejects.toMatchObject({ kind: 'VALIDATION' });
    });

    it('refuses an email another prospect holds', async () => {
      const a = await app.seed.prospect();
      const b = await app.seed.prospect();
      await expect(update(b.id, { email: a.email })).rejects.toMatchObject({ kind: 'CONFLICT' });
    });

    it('converts the prospect when its status is set to converted', async () => {
      const p = await app.seed.prospect();
      const after = await update(p.id, { status: 'converted' });

      expect(after.status).toBe('converted');
      const contact = await app.moduleRef.get(ContactRepository).findByEmail(p.email ?? '');
      expect(after.convertedToContactId).toBe(contact?.id);
      const activities = await app.moduleRef.get(ActivityRepository).findByContact(contact?.id ?? '');
      expect(activities[0].description).toBe(
        `Prospect Pat Prospect was converted to contact ${contact?.id}. Campaign source: N/A. Automatically converted via status update`,
      );
    });

    it('treats converted prospects as read-only', async () => {
      const p = await app.seed.prospect();
      await update(p.id, { status: 'converted' });

      await expect(update(p.id, { firstName: 'Late' })).rejects.toMatchObject({ kind: 'INVALID_STATE' });
      await expect(
        service.adjustLeadScore(p.id, AdjustLeadScoreSchema.parse({ scoreChange: 5, reason: 'Late call' }), ADMIN),
      ).rejects.toMatchObject({ kind: 'INVALID_STATE' });
    });
  });

  describe('adjustLeadScore', () => {
    it('applies a manual delta with its reason', async () => {
      const p = await app.seed.prospect({ leadScore: 10 });
      const { prospect, history: row } = await service.adjustLeadScore(
        p.id,
        AdjustLeadScoreSchema.parse({ scoreChange: 15, reason: 'Demo booked', notes: 'via phone' }),
        REP,
      );

      expect(prospect.leadScore).toBe(25);
      expect(row).toMatchObject({
        oldScore: 10,
        newScore: 25,
        scoreChange: 15,
        reason: 'Demo booked',
        activityType: 'manual_adjustment',
        changedBy: REP.id,
        notes: 'via phone',
      });
    });

    it('rejects a zero change at the boundary', () => {
      expect(AdjustLeadScoreSchema.safeParse({ scoreChange: 0, reason: 'noop' }).success).toBe(false);
    });
  });

  it('deletes a prospect with its history and audience records', async () => {
    const campaign = await app.seed.campaign();
    const p = await app.seed.prospect({ leadScore: 5 });
    await app.moduleRef.get(AudienceManagerService).addProspect(campaign.id, p.id);

    await service.remove(p.id);

    await expect(service.findOne(p.id)).rejects.toMatchObject({ kind: 'NOT_FOUND' });
    expect(await history.findByProspect(p.id)).toHaveLength(0);
    expect(await app.moduleRef.get(CampaignMemberRepository).findAllForProspect(p.id)).toHaveLength(0);
    expect((await app.moduleRef.get(CampaignRepository).findById(campaign.id))?.targetAudienceSize).toBe(0);
  });

  it('recomputes campaign counters after deleting a prospect that was sent to', async () => {
    const campaign = await app.seed.campaign();
    const p = await app.seed.prospect();
    await app.moduleRef.get(AudienceManagerService).addProspect(campaign.id, p.id);
    await app.moduleRef.get(CampaignExecutorService).execute(campaign.id);
    const campaigns = app.moduleRef.get(CampaignRepository);
    expect((await campaigns.findById(campaign.id))?.sentCount).toBe(1);

    await service.remove(p.id);

    expect(await campaigns.findById(campaign.id)).toMatchObject({ sentCount: 0, targetAudienceSize: 0 });
  });

  it('lists with filters and sorting', async () => {
    const campaign = await app.seed.campaign();
    await app.seed.prospect({ campaignId: campaign.id, leadScore: 10 });
    const mid = await app.seed.prospect({ campaignId: campaign.id, leadScore: 50, companyName: 'Umbrella Corp' });
    const high = await app.seed.prospect({ campaignId: campaign.id, leadScore: 80 });

    const scored = await service.findMany(
      QueryProspectsSchema.parse({ campaignId: campaign.id, minLeadScore: '40', sortBy: 'leadScore', sortOrder: 'asc' }),
    );
    expect(scored.data.map((p) => p.id)).toEqual([mid.id, high.id]);
    expect(scored.total).toBe(2);

    const searched = await service.findMany(QueryProspectsSchema.parse({ campaignId: campaign.id, q: 'umbrella' }));
    expect(searched.data.map((p) => p.id)).toEqual([mid.id]);
  });

  it('summarises prospects by status', async () => {
    const campaign = await app.seed.campaign();
    await app.seed.prospect({ campaignId: campaign.id, leadScore: 10 });
    await app.seed.prospect({ campaignId: campaign.id, leadScore: 20 });
    const won = await app.seed.prospect({ campaignId: campaign.id, leadScore: 60, status: 'qualified' });
    await update(won.id, { status: 'converted' });

    expect(await service.getStatistics({ campaignId: campaign.id })).toEqual({
      total: 3,
      byStatus: { new: 2, converted: 1 },
      converted: 1,
      conversionRate: 33.33,
      averageLeadScore: 30,
    });
  });

  it('follows engagement records to the contact after conversion', async () => {
    const audience = app.moduleRef.get(AudienceManagerService);
    const tracker = app.moduleRef.get(EngagementTrackerService);
    const a = await app.seed.campaign();
    const b = await app.seed.campaign();
    const p = await app.seed.prospect();
    const { member } = await audience.addProspect(a.id, p.id);
    await audience.addProspect(b.id, p.id);
    await tracker.markSent(member.id);
    await tracker.markOpened(member.id);

    const before = await service.getWithEngagement(p.id);
    expect(before).toMatchObject({ engagementCount: 2, totalOpens: 1, totalClicks: 0 });

    await service.convert(p.id, { createActivity: false }, ADMIN);
    const after = await service.getWithEngagement(p.id);

    expect(after.prospect.status).toBe('converted');
    expect(after).toMatchObject({ engagementCount: 2, totalOpens: 1 });
    expect(after.engagements.every((m) => m.prospectId === null)).toBe(true);
  });
});
