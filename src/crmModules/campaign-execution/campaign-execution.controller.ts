// src/crmModules/campaign-execution/campaign-execution.controller.ts
import { BadRequestException, Body, Controller, HttpCode, HttpStatus, Param, Post } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { z } from 'zod';

import { CampaignExecutorService } from './campaign-executor.service';
import { ExecuteCampaignSchema } from './schema/execute-campaign.schema';
import { CampaignService } from 'src/crmModules/campaign/campaign.service';
import { AnyUuidPipe } from 'src/common/pipes/any-uuid.pipe';
import { CurrentActor, RequirePermissions } from 'src/auth/permissions.guard';
import { Actor, assertCanAccess } from 'src/auth/actor';

@ApiTags('Campaign execution')
@Controller('campaigns/:id')
@RequirePermissions('campaigns.execute')
export class CampaignExecutionController {
  constructor(
    private readonly executor: CampaignExecutorService,
    private readonly campaigns: CampaignService,
  ) {}

  // Helper: Zod → 400
  private validate<S extends z.ZodTypeAny>(schema: S, data: unknown): z.infer<S> {
    const parsed = schema.safeParse(data);
    if (!parsed.success) throw new BadRequestException(parsed.error.flatten());
    return parsed.data;
  }

  // executing needs the execute permission plus edit rights on this campaign
  private async executable(id: string, actor: Actor): Promise<void> {
    const campaign = await this.campaigns.findOne(id);
    assertCanAccess(actor, campaign.ownerId, 'campaigns.edit_all', 'campaigns.edit_own');
  }

  @Post('execute')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Send to the pending audience, send a test email, or schedule' })
  @ApiResponse({ status: 400, description: 'No template or no pending audience.' })
  @ApiResponse({ status: 409, description: 'Campaign status does not allow sending.' })
  async execute(@Param('id', new AnyUuidPipe()) id: string, @Body() body: unknown, @CurrentActor() actor: Actor) {
    const dto = this.validate(ExecuteCampaignSchema, body ?? {});
    await this.executable(id, actor);
    return this.executor.execute(id, dto);
  }

  @Post('send-pending')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Send to pending members without changing campaign status' })
  async sendPending(@Param('id', new AnyUuidPipe()) id: string, @CurrentActor() actor: Actor) {
    await this.executable(id, actor);
    return this.executor.sendToPending(id);
  }

  @Post('audience/:memberId/resend')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Reset one member and send again' })
  async resend(
    @Param('id', new AnyUuidPipe()) id: string,
    @Param('memberId', new AnyUuidPipe()) memberId: string,
    @CurrentActor() actor: Actor,
  ) {
    await this.executable(id, actor);
    return this.executor.resendToMember(id, memberId);
  }
}
