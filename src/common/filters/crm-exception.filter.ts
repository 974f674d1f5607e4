// src/common/filters/crm-exception.filter.ts
import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus } from '@nestjs/common';
import { CrmError, CrmErrorKind } from '../errors/crm-error';

interface JsonResponse {
  status(code: number): JsonResponse;
  json(body: unknown): unknown;
}

export const HTTP_STATUS_BY_KIND: Record<CrmErrorKind, HttpStatus> = {
  NOT_FOUND: HttpStatus.NOT_FOUND,
  CONFLICT: HttpStatus.CONFLICT,
  VALIDATION: HttpStatus.BAD_REQUEST,
  INVALID_STATE: HttpStatus.CONFLICT,
  FORBIDDEN: HttpStatus.FORBIDDEN,
};

/** Maps domain errors to HTTP responses; everything else falls through to Nest. */
@Catch(CrmError)
export class CrmExceptionFilter implements ExceptionFilter {
  catch(exception: CrmError, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<JsonResponse>();
    const statusCode = HTTP_STATUS_BY_KIND[exception.kind];

    response.status(statusCode).json({
      statusCode,
      error: exception.kind,
      message: exception.message,
      ...(exception.details ? { details: exception.details } : {}),
    });
  }
}
