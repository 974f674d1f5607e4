// src/crmModules/campaign-metrics/campaign-metrics.controller.ts
import { BadRequestException, Controller, Get, Param, Query } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { z } from 'zod';

import { MetricsAggregatorService } from './metrics-aggregator.service';
import { CampaignService } from 'src/crmModules/campaign/campaign.service';
import { AnyUuidPipe } from 'src/common/pipes/any-uuid.pipe';
import { CurrentActor, RequirePermissions } from 'src/auth/permissions.guard';
import { Actor, assertCanAccess } from 'src/auth/actor';

const DaysQuerySchema = z.object({ days: z.coerce.number().int().min(1).max(365).default(30) }).strict();
const LimitQuerySchema = z.object({ limit: z.coerce.number().int().min(1).max(100).default(10) }).strict();

@ApiTags('Campaign metrics')
@Controller('campaigns/:id')
@RequirePermissions('campaigns.view_all', 'campaigns.view_own')
export class CampaignMetricsController {
  constructor(
    private readonly metrics: MetricsAggregatorService,
    private readonly campaigns: CampaignService,
  ) {}

  // Helper: Zod → 400
  private validate<S extends z.ZodTypeAny>(schema: S, data: unknown): z.infer<S> {
    const parsed = schema.safeParse(data);
    if (!parsed.success) throw new BadRequestException(parsed.error.flatten());
    return parsed.data;
  }

  private async visible(id: string, actor: Actor): Promise<void> {
    const campaign = await this.campaigns.findOne(id);
    assertCanAccess(actor, campaign.ownerId, 'campaigns.view_all', 'campaigns.view_own');
  }

  @Get('metrics')
  @ApiOperation({ summary: 'Recompute and return counters, rates, revenue and ROI' })
  async getMetrics(@Param('id', new AnyUuidPipe()) id: string, @CurrentActor() actor: Actor) {
    await this.visible(id, actor);
    return this.metrics.getMetrics(id);
  }

  @Get('timeline')
  @ApiOperation({ summary: 'Daily snapshots within the last N days' })
  async getTimeline(@Param('id', new AnyUuidPipe()) id: string, @Query() query: unknown, @CurrentActor() actor: Actor) {
    const { days } = this.validate(DaysQuerySchema, query);
    await this.visible(id, actor);
    return this.metrics.getTimeline(id, days);
  }

  @Get('top-performers')
  @ApiOperation({ summary: 'Audience members ranked by opens + 2 × clicks' })
  async getTopPerformers(
    @Param('id', new AnyUuidPipe()) id: string,
    @Query() query: unknown,
    @CurrentActor() actor: Actor,
  ) {
    const { limit } = this.validate(LimitQuerySchema, query);
    await this.visible(id, actor);
    return this.metrics.getTopPerformers(id, limit);
  }

  @Get('conversions')
  @ApiOperation({ summary: 'Converted members with their deal, contact and company' })
  async getConversions(@Param('id', new AnyUuidPipe()) id: string, @CurrentActor() actor: Actor) {
    await this.visible(id, actor);
    return this.metrics.getConversions(id);
  }

  @Get('analytics')
  @ApiOperation({ summary: 'Metrics, time series, top performers and conversion funnel' })
  async getAnalytics(@Param('id', new AnyUuidPipe()) id: string, @Query() query: unknown, @CurrentActor() actor: Actor) {
    const { days } = this.validate(DaysQuerySchema, query);
    await this.visible(id, actor);
    return this.metrics.getAnalytics(id, days);
  }
}
