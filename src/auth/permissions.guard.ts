// src/auth/permissions.guard.ts
import {
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Injectable,
  SetMetadata,
  UnauthorizedException,
  createParamDecorator,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { ANY_UUID } from 'src/common/pipes/any-uuid.pipe';
import { Actor, actorFor } from './actor';
import { Permission, isRole } from './permissions';

export const PERMISSIONS_KEY = 'requiredPermissions';

/** Any one of the listed permissions grants access to the route. */
export const RequirePermissions = (...permissions: Permission[]) =>
  SetMetadata(PERMISSIONS_KEY, permissions);

interface ActorRequest {
  headers: Record<string, string | string[] | undefined>;
  actor?: Actor;
}

const header = (req: ActorRequest, name: string): string | undefined => {
  const v = req.headers[name];
  return Array.isArray(v) ? v[0] : v;
};

/**
 * Session handling lives upstream; the gateway forwards the caller as
 * `x-user-id` / `x-user-role`. This guard turns them into an Actor and checks
 * the route's permission list.
 */
@Injectable()
export class PermissionsGuard implements CanActivate {
  constructor(private readonly reflector: Reflector) {}

  canActivate(context: ExecutionContext): boolean {
    const required =
      this.reflector.getAllAndOverride<Permission[] | undefined>(PERMISSIONS_KEY, [
        context.getHandler(),
        context.getClass(),
      ]) ?? [];

    const req = context.switchToHttp().getRequest<ActorRequest>();
    const id = header(req, 'x-user-id')?.trim();
    const role = header(req, 'x-user-role')?.trim().toLowerCase();

    if (!id || !ANY_UUID.test(id) || !role || !isRole(role)) {
      throw new UnauthorizedException('Missing or invalid caller identity');
    }

    const actor = actorFor(id, role);
    req.actor = actor;

    if (required.length && !required.some((p) => actor.permissions.has(p))) {
      throw new ForbiddenException(`Permission denied: requires one of ${required.join(', ')}`);
    }
    return true;
  }
}

export const CurrentActor = createParamDecorator((_: unknown, ctx: ExecutionContext): Actor => {
  const req = ctx.switchToHttp().getRequest<ActorRequest>();
  if (!req.actor) throw new UnauthorizedException('Missing caller identity');
  return req.actor;
});
