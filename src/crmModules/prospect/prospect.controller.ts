// src/crmModules/prospect/prospect.controller.ts
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

import { ProspectService } from './prospect.service';
import {
  AdjustLeadScoreSchema,
  BulkCreateProspectsSchema,
  ConvertProspectSchema,
  CreateProspectSchema,
  ProspectStatisticsQuerySchema,
  QueryProspectsSchema,
  UpdateProspectSchema,
} from './schema/prospect.schema';
import { AnyUuidPipe } from 'src/common/pipes/any-uuid.pipe';
import { CurrentActor, RequirePermissions } from 'src/auth/permissions.guard';
import { Actor, assertCanAccess, ownerScope } from 'src/auth/actor';

@ApiTags('Prospects')
@Controller('prospects')
export class ProspectController {
  constructor(private readonly svc: ProspectService) {}

  // Helper: Zod → 400
  private validate<S extends z.ZodTypeAny>(schema: S, data: unknown): z.infer<S> {
    const parsed = schema.safeParse(data);
    if (!parsed.success) throw new BadRequestException(parsed.error.flatten());
    return parsed.data;
  }

  private async accessible(id: string, actor: Actor, mode: 'view' | 'edit' | 'delete') {
    const prospect = await this.svc.findOne(id);
    if (mode === 'view') assertCanAccess(actor, prospect.assignedTo, 'prospects.view_all', 'prospects.view_own');
    if (mode === 'edit') assertCanAccess(actor, prospect.assignedTo, 'prospects.edit_all', 'prospects.edit_own');
    if (mode === 'delete') assertCanAccess(actor, prospect.assignedTo, 'prospects.delete_all', 'prospects.delete_own');
    return prospect;
  }

  // ---------------------------------------------------------------------------
  // CREATE
  // ---------------------------------------------------------------------------

  @Post()
  @RequirePermissions('prospects.create')
  @ApiOperation({ summary: 'Create a prospect' })
  @ApiResponse({ status: 409, description: 'Email or phone already used by another prospect.' })
  create(@Body() body: unknown, @CurrentActor() actor: Actor) {
    const dto = this.validate(CreateProspectSchema, body);
    return this.svc.create(dto, actor);
  }

  @Post('bulk')
  @RequirePermissions('prospects.import')
  @ApiOperation({ summary: 'Create many prospects; duplicates are skipped or reported' })
  bulkCreate(@Body() body: unknown, @CurrentActor() actor: Actor) {
    const dto = this.validate(BulkCreateProspectsSchema, body);
    return this.svc.bulkCreate(dto, actor);
  }

  // ---------------------------------------------------------------------------
  // READ
  // ---------------------------------------------------------------------------

  @Get()
  @RequirePermissions('prospects.view_all', 'prospects.view_own')
  @ApiOperation({ summary: 'Search prospects with filters and pagination' })
  findMany(@Query() query: unknown, @CurrentActor() actor: Actor) {
    const dto = this.validate(QueryProspectsSchema, query);
    return this.svc.findMany({ ...dto, assignedTo: ownerScope(actor, 'prospects.view_all', dto.assignedTo) });
  }

  @Get('statistics')
  @RequirePermissions('prospects.view_all', 'prospects.view_own')
  @ApiOperation({ summary: 'Prospect totals by status, conversion rate and average lead score' })
  statistics(@Query() query: unknown, @CurrentActor() actor: Actor) {
    const dto = this.validate(ProspectStatisticsQuerySchema, query);
    return this.svc.getStatistics({
      campaignId: dto.campaignId,
      assignedTo: ownerScope(actor, 'prospects.view_all', dto.assignedTo),
    });
  }

  @Get(':id')
  @RequirePermissions('prospects.view_all', 'prospects.view_own')
  @ApiOperation({ summary: 'Get a prospect' })
  @ApiResponse({ status: 404, description: 'Prospect not found.' })
  findOne(@Param('id', new AnyUuidPipe()) id: string, @CurrentActor() actor: Actor) {
    return this.accessible(id, actor, 'view');
  }

  @Get(':id/engagement')
  @RequirePermissions('prospects.view_all', 'prospects.view_own')
  @ApiOperation({ summary: 'Prospect with its campaign engagement and score history' })
  async engagement(@Param('id', new AnyUuidPipe()) id: string, @CurrentActor() actor: Actor) {
    await this.accessible(id, actor, 'view');
    return this.svc.getWithEngagement(id);
  }

  @Get(':id/lead-score-history')
  @RequirePermissions('prospects.view_all', 'prospects.view_own')
  @ApiOperation({ summary: 'Lead score audit trail, oldest first' })
  async scoreHistory(@Param('id', new AnyUuidPipe()) id: string, @CurrentActor() actor: Actor) {
    await this.accessible(id, actor, 'view');
    return this.svc.getScoreHistory(id);
  }

  // ---------------------------------------------------------------------------
  // UPDATE / DELETE
  // ---------------------------------------------------------------------------

  @Patch(':id')
  @RequirePermissions('prospects.edit_all', 'prospects.edit_own')
  @ApiOperation({ summary: 'Update a prospect; status "converted" runs the conversion' })
  async update(@Param('id', new AnyUuidPipe()) id: string, @Body() body: unknown, @CurrentActor() actor: Actor) {
    const dto = this.validate(UpdateProspectSchema, body);
    await this.accessible(id, actor, 'edit');
    return this.svc.update(id, dto, actor);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @RequirePermissions('prospects.delete_all', 'prospects.delete_own')
  @ApiOperation({ summary: 'Delete a prospect' })
  async remove(@Param('id', new AnyUuidPipe()) id: string, @CurrentActor() actor: Actor): Promise<void> {
    await this.accessible(id, actor, 'delete');
    await this.svc.remove(id);
  }

  // ---------------------------------------------------------------------------
  // Actions
  // ---------------------------------------------------------------------------

  @Post(':id/lead-score')
  @RequirePermissions('prospects.edit_all', 'prospects.edit_own')
  @ApiOperation({ summary: 'Apply a lead score delta' })
  async adjustLeadScore(
    @Param('id', new AnyUuidPipe()) id: string,
    @Body() body: unknown,
    @CurrentActor() actor: Actor,
  ) {
    const dto = this.validate(AdjustLeadScoreSchema, body);
    await this.accessible(id, actor, 'edit');
    return this.svc.adjustLeadScore(id, dto, actor);
  }

  @Post(':id/convert')
  @RequirePermissions('prospects.convert')
  @ApiOperation({ summary: 'Convert a prospect into a contact' })
  @ApiResponse({ status: 409, description: 'Already converted, or a contact with this email exists.' })
  async convert(@Param('id', new AnyUuidPipe()) id: string, @Body() body: unknown, @CurrentActor() actor: Actor) {
    const dto = this.validate(ConvertProspectSchema, body ?? {});
    await this.accessible(id, actor, 'edit');
    return this.svc.convert(id, dto, actor);
  }
}
