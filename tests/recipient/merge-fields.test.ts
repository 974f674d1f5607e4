import { renderText } from '../../src/common/templates/template-merge';
import { Recipient, mergeFieldsFor } from '../../src/crmModules/recipient/recipient-resolver.service';

const recipient = (overrides: Partial<Recipient> = {}): Recipient => ({
  kind: 'contact',
  id: 'c-1',
  firstName: 'Ada',
  lastName: 'Lovelace',
  fullName: 'Ada Lovelace',
  email: 'ada@example.com',
  phone: null,
  position: null,
  companyName: null,
  companyAddress: null,
  companyPhone: null,
  ...overrides,
});

describe('mergeFieldsFor', () => {
  it('leaves company placeholders as written when no company is known', () => {
    const data = mergeFieldsFor(recipient(), 'ada@example.com');

    expect(Object.keys(data)).toEqual(['first_name', 'last_name', 'full_name', 'email', 'phone', 'position']);
    expect(renderText('{{first_name}} at {{company_name}} ({{company_phone}})', data)).toBe(
      'Ada at {{company_name}} ({{company_phone}})',
    );
  });

  it('fills company fields when a company is attached', () => {
    const data = mergeFieldsFor(
      recipient({ companyName: 'Acme', companyAddress: '1 Main St', companyPhone: null }),
      'ada@example.com',
    );

    expect(data).toMatchObject({ company_name: 'Acme', company_address: '1 Main St', company_phone: null });
    expect(renderText('{{company_name}}, {{company_address}}, [{{company_phone}}]', data)).toBe('Acme, 1 Main St, []');
  });
});
