// src/crmModules/campaign/campaign.controller.ts
import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Patch,
  Post,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { z } from 'zod';

import { CampaignService } from './campaign.service';
import { CreateCampaignSchema, SetCampaignStatusSchema, UpdateCampaignSchema } from './schema/campaign.schema';
import { QueryCampaignsSchema } from './schema/query-campaigns.schema';
import { AnyUuidPipe, ANY_UUID } from 'src/common/pipes/any-uuid.pipe';
import { CurrentActor, RequirePermissions } from 'src/auth/permissions.guard';
import { Actor, assertCanAccess, ownerScope } from 'src/auth/actor';

const StatisticsQuerySchema = z
  .object({ ownerId: z.string().regex(ANY_UUID, 'Invalid UUID').optional() })
  .strict();

@ApiTags('Campaigns')
@Controller('campaigns')
export class CampaignController {
  constructor(private readonly svc: CampaignService) {}

  // Helper: Zod → 400
  private validate<S extends z.ZodTypeAny>(schema: S, data: unknown): z.infer<S> {
    const parsed = schema.safeParse(data);
    if (!parsed.success) throw new BadRequestException(parsed.error.flatten());
    return parsed.data;
  }

  // ---------------------------------------------------------------------------
  // CREATE / READ
  // ---------------------------------------------------------------------------

  @Post()
  @RequirePermissions('campaigns.create')
  @ApiOperation({ summary: 'Create a campaign (starts in draft)' })
  @ApiResponse({ status: 201, description: 'The campaign has been created.' })
  create(@Body() body: unknown, @CurrentActor() actor: Actor) {
    const dto = this.validate(CreateCampaignSchema, body);
    return this.svc.create(dto, actor);
  }

  @Get()
  @RequirePermissions('campaigns.view_all', 'campaigns.view_own')
  @ApiOperation({ summary: 'Search campaigns with filters and pagination' })
  findMany(@Query() query: unknown, @CurrentActor() actor: Actor) {
    const dto = this.validate(QueryCampaignsSchema, query);
    return this.svc.findMany({ ...dto, ownerId: ownerScope(actor, 'campaigns.view_all', dto.ownerId) });
  }

  @Get('statistics')
  @RequirePermissions('campaigns.view_all', 'campaigns.view_own')
  @ApiOperation({ summary: 'Aggregate statistics across campaigns' })
  statistics(@Query() query: unknown, @CurrentActor() actor: Actor) {
    const dto = this.validate(StatisticsQuerySchema, query);
    return this.svc.getStatistics(ownerScope(actor, 'campaigns.view_all', dto.ownerId));
  }

  @Get(':id')
  @RequirePermissions('campaigns.view_all', 'campaigns.view_own')
  @ApiOperation({ summary: 'Get a campaign' })
  @ApiResponse({ status: 404, description: 'Campaign not found.' })
  async findOne(@Param('id', new AnyUuidPipe()) id: string, @CurrentActor() actor: Actor) {
    const campaign = await this.svc.findOne(id);
    assertCanAccess(actor, campaign.ownerId, 'campaigns.view_all', 'campaigns.view_own');
    return campaign;
  }

  // ---------------------------------------------------------------------------
  // UPDATE / DELETE
  // ---------------------------------------------------------------------------

  @Patch(':id')
  @RequirePermissions('campaigns.edit_all', 'campaigns.edit_own')
  @ApiOperation({ summary: 'Update a campaign' })
  async update(@Param('id', new AnyUuidPipe()) id: string, @Body() body: unknown, @CurrentActor() actor: Actor) {
    const dto = this.validate(UpdateCampaignSchema, body);
    const campaign = await this.svc.findOne(id);
    assertCanAccess(actor, campaign.ownerId, 'campaigns.edit_all', 'campaigns.edit_own');
    return this.svc.update(id, dto);
  }

  @Patch(':id/status')
  @RequirePermissions('campaigns.edit_all', 'campaigns.edit_own')
  @ApiOperation({ summary: 'Pause, resume, complete or cancel a campaign' })
  @ApiResponse({ status: 409, description: 'Transition not allowed from the current status.' })
  async setStatus(@Param('id', new AnyUuidPipe()) id: string, @Body() body: unknown, @CurrentActor() actor: Actor) {
    const dto = this.validate(SetCampaignStatusSchema, body);
    const campaign = await this.svc.findOne(id);
    assertCanAccess(actor, campaign.ownerId, 'campaigns.edit_all', 'campaigns.edit_own');
    return this.svc.setStatus(id, dto.status);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @RequirePermissions('campaigns.delete_all', 'campaigns.delete_own')
  @ApiOperation({ summary: 'Delete a campaign with its audience' })
  async remove(@Param('id', new AnyUuidPipe()) id: string, @CurrentActor() actor: Actor): Promise<void> {
    const campaign = await this.svc.findOne(id);
    assertCanAccess(actor, campaign.ownerId, 'campaigns.delete_all', 'campaigns.delete_own');
    await this.svc.remove(id);
  }
}
