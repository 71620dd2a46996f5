/**
 * Service Result Utility
 * Outcome of a service operation that reports failures instead of throwing them
 */

export type ServiceErrorCode =
  | 'VALIDATION_FAILED'
  | 'NOT_FOUND'
  | 'INVALID_STATE'
  | 'CANCELLED'
  | 'PERSISTENCE_FAILED';

export interface ServiceError {
  code: ServiceErrorCode;
  message: string;
}

export interface ServiceSuccess<T> {
  success: true;
  data: T;
}

export interface ServiceFailure {
  success: false;
  error: ServiceError;
}

export type ServiceResult<T> = ServiceSuccess<T> | ServiceFailure;

export class ServiceResultUtil {
  static success<T>(data: T): ServiceSuccess<T> {
    return { success: true, data };
  }

  static failure(code: ServiceErrorCode, message: string): ServiceFailure {
    return { success: false, error: { code, message } };
  }
}

export function errorMessageOf(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

export function errorStackOf(error: unknown): string | undefined {
  return error instanceof Error ? error.stack : undefined;
}
