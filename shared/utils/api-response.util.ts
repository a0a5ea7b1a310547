/**
 * API Response Utility
 */

import { HttpException, HttpStatus } from '@nestjs/common';

export interface ApiErrorBody {
  code: string;
  message: string;
  details?: unknown;
}

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: ApiErrorBody;
}

const CODES_BY_STATUS: Partial<Record<number, string>> = {
  [HttpStatus.BAD_REQUEST]: 'VALIDATION_ERROR',
  [HttpStatus.UNAUTHORIZED]: 'UNAUTHORIZED',
  [HttpStatus.NOT_FOUND]: 'NOT_FOUND',
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
        details,
      },
    };
  }

  /**
   * Wraps a thrown error in an HttpException carrying the error envelope.
   * HttpExceptions keep their status (and their body, when it already is an
   * envelope); anything else becomes a 500 with `fallbackCode`.
   */
  static toHttpException(error: unknown, fallbackCode: string): HttpException {
    if (error instanceof HttpException) {
      const body = error.getResponse();
      if (typeof body === 'object' && body !== null && 'success' in body) {
        return error;
      }
      const status = error.getStatus();
      return new HttpException(ApiResponseUtil.error(CODES_BY_STATUS[status] ?? fallbackCode, error.message), status);
    }
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    return new HttpException(ApiResponseUtil.error(fallbackCode, errorMessage), HttpStatus.INTERNAL_SERVER_ERROR);
  }
}
