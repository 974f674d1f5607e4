import { z } from 'zod';
import {
  CreateEmailTemplateSchema,
  PreviewEmailTemplateSchema,
  QueryEmailTemplatesSchema,
  UpdateEmailTemplateSchema,
} from '../schema/email-template.schema';

export type CreateEmailTemplateDto = z.infer<typeof CreateEmailTemplateSchema>;
export type UpdateEmailTemplateDto = z.infer<typeof UpdateEmailTemplateSchema>;
export type QueryEmailTemplatesDto = z.infer<typeof QueryEmailTemplatesSchema>;
export type PreviewEmailTemplateDto = z.infer<typeof PreviewEmailTemplateSchema>;
