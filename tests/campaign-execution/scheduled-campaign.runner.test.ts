import { createTestApp, TestApp } from '../helpers/test-app';
import { ScheduledCampaignRunner } from '../../src/crmModules/campaign-execution/scheduled-campaign.runner';
import { AudienceManagerService } from '../../src/crmModules/campaign-audience/audience-manager.service';
import { CampaignRepository } from '../../src/crmModules/campaign/repository/campaign.repository';

describe('ScheduledCampaignRunner', () => {
  let app: TestApp;
  let runner: ScheduledCampaignRunner;
  let audience: AudienceManagerService;
  let campaigns: CampaignRepository;

  beforeAll(async () => {
    app = await createTestApp();
    runner = app.moduleRef.get(ScheduledCampaignRunner);
    audience = app.moduleRef.get(AudienceManagerService);
    campaigns = app.moduleRef.get(CampaignRepository);
  });

  afterAll(async () => {
    await app.moduleRef.close();
  });

  it('executes due campaigns, reports failures and leaves future ones alone', async () => {
    const now = new Date();
    const hourAgo = new Date(now.getTime() - 60 * 60 * 1000);
    const tomorrow = new Date(now.getTime() + 24 * 60 * 60 * 1000);

    const due = await app.seed.campaign();
    const contact = await app.seed.contact();
    await audience.addContact(due.id, contact.id);
    await campaigns.update(due.id, { status: 'scheduled', startDate: hourAgo });

    const empty = await app.seed.campaign();
    await campaigns.update(empty.id, { status: 'scheduled', startDate: hourAgo });

    const later = await app.seed.campaign();
    await audience.addContact(later.id, contact.id);
    await campaigns.update(later.id, { status: 'scheduled', startDate: tomorrow });

    const result = await runner.runDue(now);

    expect(result.scanned).toBe(2);
    expect(result.executed).toEqual([due.id]);
    expect(result.failed).toEqual([
      { campaignId: empty.id, error: 'No audience to send to: the campaign has no pending members' },
    ]);
    expect(app.mail.sent.map((e) => e.to)).toEqual([contact.email]);
    expect((await campaigns.findById(due.id))?.status).toBe('active');
    expect((await campaigns.findById(empty.id))?.status).toBe('scheduled');
    expect((await campaigns.findById(later.id))?.status).toBe('scheduled');
  });

  it('does nothing on a cron tick while the scheduler is disabled', async () => {
    const spy = jest.spyOn(runner, 'runDue');
    await runner.handleScheduledCampaignsCron();
    expect(spy).not.toHaveBeenCalled();
    spy.mockRestore();
  });
});
