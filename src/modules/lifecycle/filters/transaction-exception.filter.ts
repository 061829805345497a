import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { TransactionError, TransactionErrorCode } from '../../../core';

/**
 * Error code to HTTP status code mapping
 */
export const errorCodeToStatus: Record<TransactionErrorCode, HttpStatus> = {
  INVALID_ARGUMENT: HttpStatus.BAD_REQUEST,
  TRANSACTION_NOT_FOUND: HttpStatus.NOT_FOUND,
  INVALID_STATE: HttpStatus.CONFLICT,
  INVALID_REFUND_AMOUNT: HttpStatus.UNPROCESSABLE_ENTITY,
};

export interface TransactionErrorBody {
  statusCode: HttpStatus;
  error: TransactionErrorCode;
  message: string;
  details: Record<string, unknown>;
}

/**
 * Translates lifecycle rejections into HTTP responses
 */
@Catch(TransactionError)
export class TransactionExceptionFilter implements ExceptionFilter<TransactionError> {
  private readonly logger = new Logger(TransactionExceptionFilter.name);

  catch(exception: TransactionError, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const statusCode = errorCodeToStatus[exception.code];

    this.logger.warn(`${exception.code}: ${exception.message}`);

    const body: TransactionErrorBody = {
      statusCode,
      error: exception.code,
      message: exception.message,
      details: exception.details,
    };

    response.status(statusCode).json(body);
  }
}
