// src/crmModules/campaign-audience/campaign-audience.controller.ts
import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { z } from 'zod';

import { AudienceManagerService } from './audience-manager.service';
import { EngagementEventsService } from './engagement-events.service';
import {
  AddAudienceSchema,
  AddMemberSchema,
  EngagementEventSchema,
  LinkDealSchema,
  QueryAudienceSchema,
} from './schema/audience.schema';
import { CampaignService } from 'src/crmModules/campaign/campaign.service';
import { AnyUuidPipe } from 'src/common/pipes/any-uuid.pipe';
import { CurrentActor, RequirePermissions } from 'src/auth/permissions.guard';
import { Actor, assertCanAccess } from 'src/auth/actor';

@ApiTags('Campaign audience')
@Controller('campaigns/:id')
export class CampaignAudienceController {
  constructor(
    private readonly audience: AudienceManagerService,
    private readonly events: EngagementEventsService,
    private readonly campaigns: CampaignService,
  ) {}

  // Helper: Zod → 400
  private validate<S extends z.ZodTypeAny>(schema: S, data: unknown): z.infer<S> {
    const parsed = schema.safeParse(data);
    if (!parsed.success) throw new BadRequestException(parsed.error.flatten());
    return parsed.data;
  }

  private async editable(id: string, actor: Actor): Promise<void> {
    const campaign = await this.campaigns.findOne(id);
    assertCanAccess(actor, campaign.ownerId, 'campaigns.edit_all', 'campaigns.edit_own');
  }

  @Post('audience')
  @RequirePermissions('campaigns.edit_all', 'campaigns.edit_own')
  @ApiOperation({ summary: 'Add one contact or prospect (no-op if already present)' })
  @ApiResponse({ status: 404, description: 'Campaign or recipient not found.' })
  @ApiResponse({ status: 409, description: 'Campaign is completed or cancelled.' })
  async addMember(@Param('id', new AnyUuidPipe()) id: string, @Body() body: unknown, @CurrentActor() actor: Actor) {
    const dto = this.validate(AddMemberSchema, body);
    await this.editable(id, actor);
    if (dto.contactId) return this.audience.addContact(id, dto.contactId, dto.emailSentTo, dto.notes);
    if (dto.prospectId) return this.audience.addProspect(id, dto.prospectId, dto.emailSentTo, dto.notes);
    throw new BadRequestException('Provide exactly one of contactId or prospectId');
  }

  @Post('audience/bulk')
  @RequirePermissions('campaigns.edit_all', 'campaigns.edit_own')
  @ApiOperation({ summary: 'Add many contacts and prospects; duplicates are skipped' })
  async addAudience(@Param('id', new AnyUuidPipe()) id: string, @Body() body: unknown, @CurrentActor() actor: Actor) {
    const dto = this.validate(AddAudienceSchema, body);
    await this.editable(id, actor);
    return this.audience.addAudience(id, dto);
  }

  @Get('audience')
  @RequirePermissions('campaigns.view_all', 'campaigns.view_own')
  @ApiOperation({ summary: 'List audience members with recipient details and engagement score' })
  async listAudience(@Param('id', new AnyUuidPipe()) id: string, @Query() query: unknown, @CurrentActor() actor: Actor) {
    const dto = this.validate(QueryAudienceSchema, query);
    const campaign = await this.campaigns.findOne(id);
    assertCanAccess(actor, campaign.ownerId, 'campaigns.view_all', 'campaigns.view_own');
    return this.audience.listAudience(id, dto);
  }

  @Delete('audience/:memberId')
  @HttpCode(HttpStatus.NO_CONTENT)
  @RequirePermissions('campaigns.edit_all', 'campaigns.edit_own')
  @ApiOperation({ summary: 'Remove an audience member' })
  async removeMember(
    @Param('id', new AnyUuidPipe()) id: string,
    @Param('memberId', new AnyUuidPipe()) memberId: string,
    @CurrentActor() actor: Actor,
  ): Promise<void> {
    await this.editable(id, actor);
    await this.audience.remove(id, memberId);
  }

  @Post('audience/:memberId/events')
  @HttpCode(HttpStatus.OK)
  @RequirePermissions('campaigns.edit_all', 'campaigns.edit_own')
  @ApiOperation({ summary: 'Record a delivery or engagement event for a member' })
  async recordEvent(
    @Param('id', new AnyUuidPipe()) id: string,
    @Param('memberId', new AnyUuidPipe()) memberId: string,
    @Body() body: unknown,
    @CurrentActor() actor: Actor,
  ) {
    const dto = this.validate(EngagementEventSchema, body);
    await this.editable(id, actor);
    return this.events.record(id, memberId, dto, actor);
  }

  @Post('link-deal')
  @HttpCode(HttpStatus.OK)
  @RequirePermissions('campaigns.edit_all', 'campaigns.edit_own')
  @ApiOperation({ summary: 'Attribute a deal to a campaign recipient' })
  async linkDeal(@Param('id', new AnyUuidPipe()) id: string, @Body() body: unknown, @CurrentActor() actor: Actor) {
    const dto = this.validate(LinkDealSchema, body);
    await this.editable(id, actor);
    return this.events.linkDeal(id, dto);
  }
}
