// src/crmModules/campaign-metrics/metrics-aggregator.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { EntityManager } from 'typeorm';

import { CampaignMetricRepository } from './repository/campaign-metric.repository';
import {
  CampaignAnalytics,
  CampaignMetricsView,
  CampaignRates,
  ConversionRow,
  FunnelCounts,
  FunnelStage,
  TimelinePoint,
  TopPerformer,
} from './interface/campaign-metrics.interface';
import { CampaignRepository } from 'src/crmModules/campaign/repository/campaign.repository';
import { CampaignMemberRepository } from 'src/crmModules/campaign-member/repository/campaign-member.repository';
import { engagementScore } from 'src/crmModules/campaign-member/engagement-tracker.service';
import { ProspectRepository } from 'src/crmModules/prospect/repository/prospect.repository';
import { RecipientResolverService } from 'src/crmModules/recipient/recipient-resolver.service';
import { ContactRepository } from 'src/crmModules/crm-records/repository/contact.repository';
import { CompanyRepository } from 'src/crmModules/crm-records/repository/company.repository';
import { DealRepository } from 'src/crmModules/crm-records/repository/deal.repository';
import { notFound } from 'src/common/errors/crm-error';

const round2 = (n: number) => Math.round(n * 100) / 100;
const pct = (num: number, den: number) => (den > 0 ? round2((num / den) * 100) : 0);

export function computeRates(c: FunnelCounts, actualCost: number, actualRevenue: number): CampaignRates {
  return {
    deliveryRate: pct(c.delivered, c.sent),
    openRate: pct(c.opened, c.delivered),
    clickRate: pct(c.clicked, c.opened),
    responseRate: pct(c.responded, c.delivered),
    conversionRate: pct(c.converted, c.delivered),
    bounceRate: pct(c.bounced, c.sent),
    roi: actualCost > 0 ? round2(((actualRevenue - actualCost) / actualCost) * 100) : 0,
  };
}

/**
 * Campaign counters are a cache over the engagement records. `recompute`
 * is the only code path that writes them.
 */
@Injectable()
export class MetricsAggregatorService {
  private readonly logger = new Logger(MetricsAggregatorService.name);

  constructor(
    private readonly campaigns: CampaignRepository,
    private readonly members: CampaignMemberRepository,
    private readonly prospects: ProspectRepository,
    private readonly snapshots: CampaignMetricRepository,
    private readonly recipients: RecipientResolverService,
    private readonly contacts: ContactRepository,
    private readonly companies: CompanyRepository,
    private readonly deals: DealRepository,
  ) {}

  /** Re-derives counters, revenue and audience size, then writes today's snapshot. */
  async recompute(campaignId: string, manager?: EntityManager): Promise<CampaignMetricsView> {
    const campaign = await this.campaigns.findById(campaignId, manager);
    if (!campaign) throw notFound('Campaign', campaignId);

    const agg = await this.members.aggregate(campaignId, manager);
    const prospectsGenerated = await this.prospects.countByCampaign(campaignId, manager);

    const counts: FunnelCounts = {
      sent: agg.sent,
      delivered: agg.delivered,
      opened: agg.opened,
      clicked: agg.clicked,
      responded: agg.responded,
      bounced: agg.bounced,
      unsubscribed: agg.unsubscribed,
      converted: agg.converted,
    };
    const actualRevenue = round2(agg.conversionValue);

    await this.campaigns.setCounters(
      campaignId,
      {
        sentCount: counts.sent,
        deliveredCount: counts.delivered,
        openedCount: counts.opened,
        clickedCount: counts.clicked,
        respondedCount: counts.responded,
        bouncedCount: counts.bounced,
        unsubscribedCount: counts.unsubscribed,
        convertedCount: counts.converted,
        prospectsGenerated,
        actualRevenue,
      },
      manager,
    );
    await this.campaigns.setAudienceSize(campaignId, agg.total, manager);

    const rates = computeRates(counts, campaign.actualCost, actualRevenue);
    await this.snapshots.upsertDaily(
      campaignId,
      {
        recordedAt: new Date(),
        sentCount: counts.sent,
        deliveredCount: counts.delivered,
        openedCount: counts.opened,
        clickedCount: counts.clicked,
        respondedCount: counts.responded,
        bouncedCount: counts.bounced,
        unsubscribedCount: counts.unsubscribed,
        convertedCount: counts.converted,
        deliveryRate: rates.deliveryRate,
        openRate: rates.openRate,
        clickRate: rates.clickRate,
        conversionRate: rates.conversionRate,
        bounceRate: rates.bounceRate,
        costToDate: campaign.actualCost,
        revenueToDate: actualRevenue,
        roi: rates.roi,
        prospectsGenerated,
      },
      manager,
    );

    this.logger.debug(`[recompute] campaign ${campaignId}: sent=${counts.sent} converted=${counts.converted}`);

    return {
      campaignId,
      status: campaign.status,
      audienceSize: agg.total,
      counts,
      prospectsGenerated,
      rates,
      budget: campaign.budget,
      actualCost: campaign.actualCost,
      actualRevenue,
      lastExecutedAt: campaign.lastExecutedAt,
    };
  }

  getMetrics(campaignId: string): Promise<CampaignMetricsView> {
    return this.recompute(campaignId);
  }

  async getTimeline(campaignId: string, days = 30): Promise<TimelinePoint[]> {
    await this.ensureCampaign(campaignId);
    const since = new Date(Date.now() - days * 24 * 60 * 60 * 1000);
    const rows = await this.snapshots.findDailySince(campaignId, since);
    return rows.map((r) => ({
      date: r.periodStart.toISOString().slice(0, 10),
      sent: r.sentCount,
      delivered: r.deliveredCount,
      opened: r.openedCount,
      clicked: r.clickedCount,
      converted: r.convertedCount,
      openRate: r.openRate,
      clickRate: r.clickRate,
      conversionRate: r.conversionRate,
    }));
  }

  async getTopPerformers(campaignId: string, limit = 10): Promise<TopPerformer[]> {
    await this.ensureCampaign(campaignId);
    const top = await this.members.findTopPerformers(campaignId, limit);
    const who = await this.recipients.resolve(top);

    return top.map((m) => {
      const r = who.get(m.id);
      return {
        memberId: m.id,
        contactId: m.contactId,
        prospectId: m.prospectId,
        name: r?.fullName || null,
        email: m.emailSentTo ?? r?.email ?? null,
        status: m.status,
        openCount: m.openCount,
        clickCount: m.clickCount,
        weightedScore: m.openCount + m.clickCount * 2,
        engagementScore: engagementScore(m),
      };
    });
  }

  async getConversions(campaignId: string): Promise<ConversionRow[]> {
    await this.ensureCampaign(campaignId);
    const converted = await this.members.findConverted(campaignId);

    const deals = await this.deals.findByIds(uniq(converted.map((m) => m.dealId)));
    const contacts = await this.contacts.findByIds(uniq(converted.map((m) => m.contactId)));
    const companies = await this.companies.findByIds(uniq(contacts.map((c) => c.companyId)));

    const dealById = new Map(deals.map((d) => [d.id, d]));
    const contactById = new Map(contacts.map((c) => [c.id, c]));
    const companyById = new Map(companies.map((co) => [co.id, co]));

    return converted.map((m) => {
      const deal = m.dealId ? dealById.get(m.dealId) : undefined;
      const contact = m.contactId ? contactById.get(m.contactId) : undefined;
      const company = contact?.companyId ? companyById.get(contact.companyId) : undefined;
      return {
        memberId: m.id,
        convertedAt: m.convertedAt,
        conversionValue: m.conversionValue,
        deal: deal ? { id: deal.id, name: deal.name, value: deal.value, stage: deal.stage } : null,
        contact: contact
          ? {
              id: contact.id,
              name: [contact.firstName, contact.lastName].filter((s): s is string => !!s).join(' '),
              email: contact.email,
            }
          : null,
        company: company ? { id: company.id, name: company.name } : null,
        prospectId: m.prospectId,
      };
    });
  }

  async getAnalytics(campaignId: string, days = 30): Promise<CampaignAnalytics> {
    const metrics = await this.recompute(campaignId);
    const timeSeries = await this.getTimeline(campaignId, days);
    const topPerformers = await this.getTopPerformers(campaignId, 10);
    return { metrics, timeSeries, topPerformers, conversionFunnel: funnel(metrics.counts) };
  }

  /** Recomputes every active campaign; one failure does not stop the rest. */
  async snapshotActive(): Promise<{ refreshed: number; failed: number }> {
    const active = await this.campaigns.findByStatus(['active']);
    let refreshed = 0;
    let failed = 0;
    for (const c of active) {
      try {
        await this.recompute(c.id);
        refreshed++;
      } catch (e) {
        failed++;
        this.logger.error(`[snapshot] campaign ${c.id}: ${e instanceof Error ? e.message : String(e)}`);
      }
    }
    return { refreshed, failed };
  }

  private async ensureCampaign(campaignId: string): Promise<void> {
    const c = await this.campaigns.findById(campaignId);
    if (!c) throw notFound('Campaign', campaignId);
  }
}

export function funnel(c: FunnelCounts): FunnelStage[] {
  const stages: FunnelStage['stage'][] = ['sent', 'delivered', 'opened', 'clicked', 'responded', 'converted'];
  return stages.map((stage, i) => ({
    stage,
    count: c[stage],
    stepRate: i === 0 ? (c.sent > 0 ? 100 : 0) : pct(c[stage], c[stages[i - 1]]),
  }));
}

function uniq(ids: (string | null)[]): string[] {
  return [...new Set(ids.filter((id): id is string => !!id))];
}
