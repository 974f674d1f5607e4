import { extractMergeFields, renderTemplate, renderText } from '../../src/common/templates/template-merge';

describe('template merge', () => {
  it('substitutes known fields, tolerating spaces inside the braces', () => {
    expect(renderText('Hi {{first_name}} / {{ last_name }}', { first_name: 'Ada', last_name: 'Lovelace' })).toBe(
      'Hi Ada / Lovelace',
    );
  });

  it('keeps the placeholder for keys that were not supplied', () => {
    expect(renderText('Hi {{nickname}}', { first_name: 'Ada' })).toBe('Hi {{nickname}}');
  });

  it('renders null and undefined values as empty strings', () => {
    expect(renderText('[{{a}}][{{b}}]', { a: null, b: undefined })).toBe('[][]');
  });

  it('stringifies numbers and booleans', () => {
    expect(renderText('{{n}} {{flag}}', { n: 42, flag: false })).toBe('42 false');
  });

  it('returns empty text unchanged', () => {
    expect(renderText('', { a: 'x' })).toBe('');
  });

  it('renders subject and body together', () => {
    const out = renderTemplate(
      { subject: 'Offer for {{company_name}}', body: '<p>Dear {{full_name}}</p>' },
      { company_name: 'Acme', full_name: 'Ada Lovelace' },
    );
    expect(out).toEqual({ subject: 'Offer for Acme', body: '<p>Dear Ada Lovelace</p>' });
  });

  it('lists distinct merge fields in order of first appearance', () => {
    expect(extractMergeFields('{{first_name}} {{ email }} {{first_name}} {{company_name}}')).toEqual([
      'first_name',
      'email',
      'company_name',
    ]);
  });
});
