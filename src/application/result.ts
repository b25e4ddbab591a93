/**
 * Discriminated result for use cases with more than one failure reason.
 * Routes map `code` to an HTTP status.
 */

export type ServiceErrorCode = 'VALIDATION_ERROR' | 'NOT_FOUND' | 'CONFLICT';

export interface ServiceError {
  code: ServiceErrorCode;
  message: string;
}

export type ServiceResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ServiceError };

export function ok<T>(value: T): ServiceResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(code: ServiceErrorCode, message: string): ServiceResult<T> {
  return { ok: false, error: { code, message } };
}

export function notFound<T = never>(resource: string, id: string): ServiceResult<T> {
  return fail('NOT_FOUND', `${resource} with ID ${id} not found`);
}
