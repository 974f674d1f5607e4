// src/common/errors/crm-error.ts

export type CrmErrorKind =
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'VALIDATION'
  | 'INVALID_STATE'
  | 'FORBIDDEN';

/**
 * Single error type for every domain failure. Callers branch on `kind`,
 * never on the message.
 */
export class CrmError extends Error {
  constructor(
    readonly kind: CrmErrorKind,
    message: string,
    readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CrmError';
  }
}

export const notFound = (entity: string, id?: string) =>
  new CrmError('NOT_FOUND', `${entity} not found`, id ? { entity, id } : { entity });

export const conflict = (message: string, details?: Record<string, unknown>) =>
  new CrmError('CONFLICT', message, details);

export const validationError = (message: string, details?: Record<string, unknown>) =>
  new CrmError('VALIDATION', message, details);

export const invalidState = (message: string, details?: Record<string, unknown>) =>
  new CrmError('INVALID_STATE', message, details);

export const forbidden = (message = 'Permission denied') => new CrmError('FORBIDDEN', message);

export function isCrmError(e: unknown, kind?: CrmErrorKind): e is CrmError {
  return e instanceof CrmError && (kind === undefined || e.kind === kind);
}
