import { Body, Controller, Get, Param, Patch, Post, Query } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';

import { EmailTemplateService } from './email-template.service';
import {
  CreateEmailTemplateSchema,
  PreviewEmailTemplateSchema,
  QueryEmailTemplatesSchema,
  UpdateEmailTemplateSchema,
} from './schema/email-template.schema';
import {
  CreateEmailTemplateDto,
  PreviewEmailTemplateDto,
  QueryEmailTemplatesDto,
  UpdateEmailTemplateDto,
} from './dto/email-template.dto';
import { ZodValidationPipe } from 'src/common/pipes/zod.validation.pipe';
import { AnyUuidPipe } from 'src/common/pipes/any-uuid.pipe';
import { CurrentActor, RequirePermissions } from 'src/auth/permissions.guard';
import { Actor } from 'src/auth/actor';

@ApiTags('Email Templates')
@Controller('email-templates')
export class EmailTemplateController {
  constructor(private readonly svc: EmailTemplateService) {}

  @Post()
  @RequirePermissions('email_templates.manage')
  @ApiOperation({ summary: 'Create an email template' })
  @ApiResponse({ status: 201, description: 'The template has been created.' })
  create(
    @Body(new ZodValidationPipe(CreateEmailTemplateSchema)) dto: CreateEmailTemplateDto,
    @CurrentActor() actor: Actor,
  ) {
    return this.svc.create(dto, actor);
  }

  @Get()
  @RequirePermissions('email_templates.view')
  @ApiOperation({ summary: 'List email templates' })
  findMany(@Query(new ZodValidationPipe(QueryEmailTemplatesSchema)) q: QueryEmailTemplatesDto) {
    return this.svc.findMany(q);
  }

  @Get(':id')
  @RequirePermissions('email_templates.view')
  @ApiOperation({ summary: 'Get an email template' })
  @ApiResponse({ status: 404, description: 'Template not found.' })
  findOne(@Param('id', new AnyUuidPipe()) id: string) {
    return this.svc.findOne(id);
  }

  @Patch(':id')
  @RequirePermissions('email_templates.manage')
  @ApiOperation({ summary: 'Update an email template' })
  update(
    @Param('id', new AnyUuidPipe()) id: string,
    @Body(new ZodValidationPipe(UpdateEmailTemplateSchema)) dto: UpdateEmailTemplateDto,
  ) {
    return this.svc.update(id, dto);
  }

  @Post(':id/preview')
  @RequirePermissions('email_templates.view')
  @ApiOperation({ summary: 'Render a template with sample merge data' })
  preview(
    @Param('id', new AnyUuidPipe()) id: string,
    @Body(new ZodValidationPipe(PreviewEmailTemplateSchema)) dto: PreviewEmailTemplateDto,
  ) {
    return this.svc.preview(id, dto);
  }
}
