// src/common/errors/map-and-throw.ts
import { Logger } from '@nestjs/common';
import { QueryFailedError } from 'typeorm';
import { CrmError, conflict, validationError } from './crm-error';

const UNIQUE_CODES = new Set(['23505', 'SQLITE_CONSTRAINT_UNIQUE', 'SQLITE_CONSTRAINT_PRIMARYKEY']);
const CHECK_CODES = new Set(['23514', '23502', 'SQLITE_CONSTRAINT_CHECK', 'SQLITE_CONSTRAINT_NOTNULL']);
const FK_CODES = new Set(['23503', 'SQLITE_CONSTRAINT_FOREIGNKEY']);

export function driverErrorCode(error: unknown): string | undefined {
  if (!(error instanceof QueryFailedError)) return undefined;
  const driverError: unknown = error.driverError;
  if (typeof driverError === 'object' && driverError !== null && 'code' in driverError) {
    const { code } = driverError;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export const isUniqueViolation = (error: unknown) => UNIQUE_CODES.has(driverErrorCode(error) ?? '');

/**
 * Logs and rethrows. Domain errors pass through untouched; store constraint
 * failures become domain errors; anything else propagates as is.
 */
export function mapAndThrow(
  logger: Logger,
  error: unknown,
  when: string,
  meta: Record<string, unknown> = {},
): never {
  if (error instanceof CrmError) throw error;

  const message = error instanceof Error ? error.message : String(error);
  logger.error(`[${when}] ${message}`, meta);

  const code = driverErrorCode(error) ?? '';
  if (UNIQUE_CODES.has(code)) throw conflict('A record with the same unique field already exists', meta);
  if (CHECK_CODES.has(code)) throw validationError('Record violates a store constraint', meta);
  if (FK_CODES.has(code)) throw validationError('Invalid reference provided', meta);
  throw error;
}
