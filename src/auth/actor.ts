// src/auth/actor.ts
import { forbidden } from 'src/common/errors/crm-error';
import { Permission, ROLE_PERMISSIONS, Role } from './permissions';

/** The already-authenticated caller, passed explicitly into core operations. */
export interface Actor {
  id: string;
  role: Role;
  permissions: ReadonlySet<Permission>;
}

export function actorFor(id: string, role: Role): Actor {
  return { id, role, permissions: ROLE_PERMISSIONS[role] };
}

export function hasPermission(actor: Actor, permission: Permission): boolean {
  return actor.permissions.has(permission);
}

export function canAccess(
  actor: Actor,
  ownerId: string | null,
  allPermission: Permission,
  ownPermission: Permission,
): boolean {
  if (hasPermission(actor, allPermission)) return true;
  return hasPermission(actor, ownPermission) && ownerId === actor.id;
}

export function assertCanAccess(
  actor: Actor,
  ownerId: string | null,
  allPermission: Permission,
  ownPermission: Permission,
): void {
  if (!canAccess(actor, ownerId, allPermission, ownPermission)) {
    throw forbidden(`Permission denied: requires ${allPermission} or ownership with ${ownPermission}`);
  }
}

/** Owner scope for list queries: undefined means "everyone's". */
export function ownerScope(actor: Actor, allPermission: Permission, requested?: string): string | undefined {
  return hasPermission(actor, allPermission) ? requested : actor.id;
}
