// src/auth/permissions.ts

export const PERMISSIONS = [
  'campaigns.view_all',
  'campaigns.view_own',
  'campaigns.create',
  'campaigns.edit_all',
  'campaigns.edit_own',
  'campaigns.delete_all',
  'campaigns.delete_own',
  'campaigns.execute',
  'prospects.view_all',
  'prospects.view_own',
  'prospects.create',
  'prospects.edit_all',
  'prospects.edit_own',
  'prospects.delete_all',
  'prospects.delete_own',
  'prospects.convert',
  'prospects.import',
  'email_templates.view',
  'email_templates.manage',
] as const;

export type Permission = (typeof PERMISSIONS)[number];

export const ROLES = ['admin', 'manager', 'sales_rep', 'viewer'] as const;
export type Role = (typeof ROLES)[number];

const ALL = new Set<Permission>(PERMISSIONS);

export const ROLE_PERMISSIONS: Record<Role, ReadonlySet<Permission>> = {
  admin: ALL,
  manager: new Set<Permission>(PERMISSIONS.filter((p) => !p.endsWith('_own'))),
  sales_rep: new Set<Permission>([
    'campaigns.view_own',
    'campaigns.create',
    'campaigns.edit_own',
    'campaigns.delete_own',
    'campaigns.execute',
    'prospects.view_own',
    'prospects.create',
    'prospects.edit_own',
    'prospects.delete_own',
    'prospects.convert',
    'email_templates.view',
  ]),
  viewer: new Set<Permission>(['campaigns.view_all', 'prospects.view_all', 'email_templates.view']),
};

export function isRole(value: string): value is Role {
  return (ROLES as readonly string[]).includes(value);
}
