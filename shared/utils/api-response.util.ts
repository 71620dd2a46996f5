/**
 * API Response Utility
 */

import { HttpException, HttpStatus } from '@nestjs/common';
import { ServiceErrorCode, ServiceResult } from './service-result.util';

export interface ApiError {
  code: string;
  message: string;
  details?: unknown;
}

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: ApiError;
}

const STATUS_BY_CODE: Record<ServiceErrorCode, HttpStatus> = {
  VALIDATION_FAILED: HttpStatus.BAD_REQUEST,
  NOT_FOUND: HttpStatus.NOT_FOUND,
  INVALID_STATE: HttpStatus.CONFLICT,
  // 499 (client closed request) is not a standard status
  CANCELLED: HttpStatus.BAD_REQUEST,
  PERSISTENCE_FAILED: HttpStatus.INTERNAL_SERVER_ERROR,
};

export class ApiResponseUtil {
  static success<T>(data: T): ApiResponse<T> {
    return {
      success: true,
      data,
    };
  }

  static error(code: string, message: string, details?: unknown): ApiResponse<never> {
    return {
      success: false,
      error: {
        code,
        message,
        ...(details !== undefined ? { details } : {}),
      },
    };
  }

  /** Unwraps a service result into a response body, throwing an HttpException for failures. */
  static fromResult<T, R>(result: ServiceResult<T>, view: (data: T) => R): ApiResponse<R> {
    if (!result.success) {
      throw new HttpException(
        ApiResponseUtil.error(result.error.code, result.error.message),
        STATUS_BY_CODE[result.error.code],
      );
    }
    return ApiResponseUtil.success(view(result.data));
  }
}
