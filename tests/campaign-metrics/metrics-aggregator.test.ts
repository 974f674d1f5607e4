import { createTestApp, TestApp } from '../helpers/test-app';
import { MetricsAggregatorService } from '../../src/crmModules/campaign-metrics/metrics-aggregator.service';
import { AudienceManagerService } from '../../src/crmModules/campaign-audience/audience-manager.service';
import { EngagementTrackerService } from '../../src/crmModules/campaign-member/engagement-tracker.service';
import { CampaignService } from '../../src/crmModules/campaign/campaign.service';
import { Campaign } from '../../src/crmModules/campaign/entities/campaign.entity';
import { Contact } from '../../src/crmModules/crm-records/entities/contact.entity';
import { Company } from '../../src/crmModules/crm-records/entities/company.entity';
import { Deal } from '../../src/crmModules/crm-records/entities/deal.entity';

const MISSING_ID = '99999999-9999-4999-8999-999999999999';

describe('MetricsAggregatorService', () => {
  let app: TestApp;
  let metrics: MetricsAggregatorService;
  let tracker: EngagementTrackerService;

  let campaign: Campaign;
  let company: Company;
  let contact: Contact;
  let deal: Deal;
  const ids: Record<'closer' | 'reader' | 'clicker' | 'bounced' | 'waiting', string> = {
    closer: '',
    reader: '',
    clicker: '',
    bounced: '',
    waiting: '',
  };

  beforeAll(async () => {
    app = await createTestApp();
    metrics = app.moduleRef.get(MetricsAggregatorService);
    tracker = app.moduleRef.get(EngagementTrackerService);
    const audience = app.moduleRef.get(AudienceManagerService);

    campaign = await app.seed.campaign({ actualCost: 100 });
    company = await app.seed.company({ name: 'Acme Holdings' });
    contact = await app.seed.contact({ companyId: company.id });
    deal = await app.seed.deal({ contactId: contact.id });

    ids.closer = (await audience.addContact(campaign.id, contact.id)).member.id;
    const reader = await app.seed.prospect({ campaignId: campaign.id });
    ids.reader = (await audience.addProspect(campaign.id, reader.id)).member.id;
    ids.clicker = (await audience.addProspect(campaign.id, (await app.seed.prospect()).id)).member.id;
    ids.bounced = (await audience.addProspect(campaign.id, (await app.seed.prospect()).id)).member.id;
    ids.waiting = (await audience.addProspect(campaign.id, (await app.seed.prospect()).id)).member.id;

    for (const id of [ids.closer, ids.reader, ids.clicker, ids.bounced]) await tracker.markSent(id);
    for (const id of [ids.closer, ids.reader, ids.clicker]) {
      await tracker.markDelivered(id);
      await tracker.markOpened(id);
    }
    await tracker.markOpened(ids.reader);
    await tracker.markClicked(ids.clicker);
    await tracker.markClicked(ids.closer);
    await tracker.markClicked(ids.closer);
    await tracker.markConverted(ids.closer, { dealId: deal.id, conversionValue: 500 });
    await tracker.markBounced(ids.bounced);
  });

  afterAll(async () => {
    await app.moduleRef.close();
  });

  it('derives counters and rates from the engagement records', async () => {
    const view = await metrics.recompute(campaign.id);

    expect(view.audienceSize).toBe(5);
    expect(view.prospectsGenerated).toBe(1);
    expect(view.counts).toEqual({
      sent: 4,
      delivered: 3,
      opened: 3,
      clicked: 2,
      responded: 0,
      bounced: 1,
      unsubscribed: 0,
      converted: 1,
    });
    expect(view.actualRevenue).toBe(500);
    expect(view.rates).toEqual({
      deliveryRate: 75,
      openRate: 100,
      clickRate: 66.67,
      responseRate: 0,
      conversionRate: 33.33,
      bounceRate: 25,
      roi: 400,
    });

    const stored = await app.moduleRef.get(CampaignService).findOne(campaign.id);
    expect(stored).toMatchObject({ sentCount: 4, openedCount: 3, convertedCount: 1, actualRevenue: 500, targetAudienceSize: 5 });
  });

  it('keeps one snapshot per day', async () => {
    await metrics.recompute(campaign.id);
    await metrics.recompute(campaign.id);

    const timeline = await metrics.getTimeline(campaign.id, 7);
    expect(timeline).toHaveLength(1);
    expect(timeline[0]).toMatchObject({
      date: new Date().toISOString().slice(0, 10),
      sent: 4,
      converted: 1,
      openRate: 100,
      clickRate: 66.67,
    });
  });

  it('ranks top performers by opens plus twice the clicks', async () => {
    const top = await metrics.getTopPerformers(campaign.id, 3);

    expect(top.map((t) => t.memberId)).toEqual([ids.closer, ids.clicker, ids.reader]);
    expect(top.map((t) => t.weightedScore)).toEqual([5, 3, 2]);
    expect(top.map((t) => t.engagementScore)).toEqual([16, 6, 3]);
    expect(top[0]).toMatchObject({ contactId: contact.id, name: 'Casey Contact', email: contact.email });
  });

  it('lists conversions with their deal, contact and company', async () => {
    const rows = await metrics.getConversions(campaign.id);

    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({
      memberId: ids.closer,
      conversionValue: 500,
      deal: { id: deal.id, name: deal.name, value: 1000, stage: 'qualification' },
      contact: { id: contact.id, name: 'Casey Contact', email: contact.email },
      company: { id: company.id, name: 'Acme Holdings' },
      prospectId: null,
    });
  });

  it('builds the funnel inside the analytics bundle', async () => {
    const analytics = await metrics.getAnalytics(campaign.id, 7);

    expect(analytics.conversionFunnel).toEqual([
      { stage: 'sent', count: 4, stepRate: 100 },
      { stage: 'delivered', count: 3, stepRate: 75 },
      { stage: 'opened', count: 3, stepRate: 100 },
      { stage: 'clicked', count: 2, stepRate: 66.67 },
      { stage: 'responded', count: 0, stepRate: 0 },
      { stage: 'converted', count: 1, stepRate: 0 },
    ]);
    expect(analytics.timeSeries).toHaveLength(1);
    expect(analytics.topPerformers).toHaveLength(5);
  });

  it('refreshes active campaigns on the snapshot pass', async () => {
    const active = await app.seed.campaign();
    const p = await app.seed.prospect();
    const { member } = await app.moduleRef.get(AudienceManagerService).addProspect(active.id, p.id);
    await tracker.markSent(member.id);
    await app.moduleRef.get(CampaignService).setStatus(active.id, 'active');

    const result = await metrics.snapshotActive();

    expect(result.failed).toBe(0);
    expect(result.refreshed).toBeGreaterThanOrEqual(1);
    expect((await app.moduleRef.get(CampaignService).findOne(active.id)).sentCount).toBe(1);
  });

  it('reports a missing campaign', async () => {
    await expect(metrics.getMetrics(MISSING_ID)).rejects.toMatchObject({ kind: 'NOT_FOUND' });
    await expect(metrics.getTimeline(MISSING_ID)).rejects.toMatchObject({ kind: 'NOT_FOUND' });
  });
});
