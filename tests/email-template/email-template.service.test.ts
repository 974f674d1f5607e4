import { ADMIN, createTestApp, TestApp } from '../helpers/test-app';
import { EmailTemplateService } from '../../src/crmModules/email-template/email-template.service';
import {
  CreateEmailTemplateSchema,
  PreviewEmailTemplateSchema,
  QueryEmailTemplatesSchema,
  UpdateEmailTemplateSchema,
} from '../../src/crmModules/email-template/schema/email-template.schema';

describe('EmailTemplateService', () => {
  let app: TestApp;
  let service: EmailTemplateService;

  beforeAll(async () => {
    app = await createTestApp();
    service = app.moduleRef.get(EmailTemplateService);
  });

  afterAll(async () => {
    await app.moduleRef.close();
  });

  it('creates an active template owned by the caller', async () => {
    const tpl = await service.create(
      CreateEmailTemplateSchema.parse({ name: ' Follow-up ', subject: 'Checking in', body: '<p>Hi</p>', category: 'sales' }),
      ADMIN,
    );
    expect(tpl).toMatchObject({ name: 'Follow-up', isActive: true, category: 'sales', createdBy: ADMIN.id });
  });

  it('previews with the supplied values and lists the fields used', async () => {
    const tpl = await app.seed.template({
      subject: 'Hello {{first_name}}',
      body: '<p>{{first_name}} at {{company_name}}, ref {{ticket}}</p>',
    });

    const preview = await service.preview(
      tpl.id,
      PreviewEmailTemplateSchema.parse({ mergeData: { first_name: 'Robin', company_name: null } }),
    );

    expect(preview).toEqual({
      templateId: tpl.id,
      subject: 'Hello Robin',
      body: '<p>Robin at , ref {{ticket}}</p>',
      mergeFields: ['first_name', 'company_name', 'ticket'],
    });
  });

  it('deactivates a template and filters on the flag', async () => {
    const tpl = await app.seed.template({ name: 'Retired quarterly digest' });
    const updated = await service.update(tpl.id, UpdateEmailTemplateSchema.parse({ isActive: false }));
    expect(updated.isActive).toBe(false);

    const inactive = await service.findMany(QueryEmailTemplatesSchema.parse({ isActive: 'false', search: 'quarterly' }));
    expect(inactive.data.map((t) => t.id)).toEqual([tpl.id]);
    const active = await service.findMany(QueryEmailTemplatesSchema.parse({ isActive: 'true', search: 'quarterly' }));
    expect(active.total).toBe(0);
  });

  it('reports a missing template', async () => {
    const missing = '99999999-9999-4999-8999-999999999999';
    await expect(service.findOne(missing)).rejects.toMatchObject({ kind: 'NOT_FOUND' });
    await expect(service.update(missing, UpdateEmailTemplateSchema.parse({ name: 'x' }))).rejects.toMatchObject({
      kind: 'NOT_FOUND',
    });
  });
});
