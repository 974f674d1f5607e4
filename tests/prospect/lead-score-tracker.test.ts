import { ADMIN, createTestApp, TestApp, uniqueEmail } from '../helpers/test-app';
import { LeadScoreTrackerService, clampScore } from '../../src/crmModules/prospect/lead-score-tracker.service';
import { ProspectRepository } from '../../src/crmModules/prospect/repository/prospect.repository';
import { LeadScoreHistoryRepository } from '../../src/crmModules/prospect/repository/lead-score-history.repository';
import { Prospect } from '../../src/crmModules/prospect/entities/prospect.entity';

describe('LeadScoreTrackerService', () => {
  let app: TestApp;
  let scores: LeadScoreTrackerService;
  let prospects: ProspectRepository;
  let history: LeadScoreHistoryRepository;

  beforeAll(async () => {
    app = await createTestApp();
    scores = app.moduleRef.get(LeadScoreTrackerService);
    prospects = app.moduleRef.get(ProspectRepository);
    history = app.moduleRef.get(LeadScoreHistoryRepository);
  });

  afterAll(async () => {
    await app.moduleRef.close();
  });

  // a bare row: no creation entry in the history
  const bareProspect = (): Promise<Prospect> => prospects.create({ email: uniqueEmail(), createdBy: ADMIN.id });

  const bump = (id: string, scoreChange: number) =>
    scores.applyDelta(id, { scoreChange, reason: 'Webinar attended', activityType: 'manual_adjustment' }, { changedBy: ADMIN.id });

  it('keeps a consistent audit trail across repeated deltas', async () => {
    const p = await bareProspect();

    await bump(p.id, 10);
    await bump(p.id, 10);
    const last = await bump(p.id, 10);

    expect(last.prospect.leadScore).toBe(30);
    expect((await prospects.findById(p.id))?.leadScore).toBe(30);

    const rows = (await history.findByProspect(p.id)).sort((a, b) => a.oldScore - b.oldScore);
    expect(rows.map((r) => [r.oldScore, r.newScore, r.scoreChange])).toEqual([
      [0, 10, 10],
      [10, 20, 10],
      [20, 30, 10],
    ]);
    expect(rows.reduce((sum, r) => sum + r.scoreChange, 0)).toBe(30);
    expect(rows[1].oldScore).toBe(rows[0].newScore);
    expect(rows[2].oldScore).toBe(rows[1].newScore);
    expect(rows[0]).toMatchObject({ reason: 'Webinar attended', activityType: 'manual_adjustment', changedBy: ADMIN.id });
  });

  it('clamps to 0..100 and records the change actually applied', async () => {
    const p = await bareProspect();

    await bump(p.id, 95);
    const top = await bump(p.id, 10);
    expect(top.prospect.leadScore).toBe(100);
    expect(top.history).toMatchObject({ oldScore: 95, newScore: 100, scoreChange: 5 });

    const bottom = await bump(p.id, -150);
    expect(bottom.prospect.leadScore).toBe(0);
    expect(bottom.history).toMatchObject({ oldScore: 100, newScore: 0, scoreChange: -100 });
  });

  it('still writes a history row when the score is already at the bound', async () => {
    const p = await bareProspect();
    const result = await bump(p.id, -5);

    expect(result.history).toMatchObject({ oldScore: 0, newScore: 0, scoreChange: 0 });
    expect(await history.findByProspect(p.id)).toHaveLength(1);
  });

  it('stores the campaign context with the change', async () => {
    const p = await bareProspect();
    const campaign = await app.seed.campaign();

    const { history: row } = await scores.applyDelta(
      p.id,
      { scoreChange: 3, reason: 'Email clicked', activityType: 'email_clicked' },
      { campaignId: campaign.id, notes: 'from newsletter' },
    );
    expect(row).toMatchObject({ campaignId: campaign.id, campaignMemberId: null, notes: 'from newsletter', changedBy: null });
  });

  it('fails with NOT_FOUND for an unknown prospect', async () => {
    await expect(bump('99999999-9999-4999-8999-999999999999', 5)).rejects.toMatchObject({ kind: 'NOT_FOUND' });
  });

  it('clampScore bounds any integer', () => {
    expect([clampScore(-1), clampScore(0), clampScore(55), clampScore(100), clampScore(101)]).toEqual([0, 0, 55, 100, 100]);
  });
});
