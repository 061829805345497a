import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiParam, ApiBody } from '@nestjs/swagger';
import {
  CreateTransactionDto,
  RefundTransactionDto,
  TransactionResponseDto,
} from '../../dto/transaction.dto';

const transactionIdParam = () =>
  ApiParam({
    name: 'id',
    description: 'Transaction ID (UUID)',
    example: '550e8400-e29b-41d4-a716-446655440000',
  });

const errorResponse = (status: number, description: string) =>
  ApiResponse({
    status,
    description,
    schema: {
      type: 'object',
      properties: {
        statusCode: { type: 'number', example: status },
        error: { type: 'string' },
        message: { type: 'string' },
        details: { type: 'object' },
      },
    },
  });

/**
 * Swagger decorator for creating transactions
 */
export const ApiCreateTransaction = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Create a new transaction',
      description: 'Creates a new transaction in CREATED state with nothing refunded',
    }),
    ApiBody({ type: CreateTransactionDto }),
    ApiResponse({
      status: 201,
      description: 'Transaction created successfully',
      type: TransactionResponseDto,
    }),
    errorResponse(400, 'Empty owner id or non-positive amount'),
  );
};

/**
 * Swagger decorator for getting a transaction
 */
export const ApiGetTransaction = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Get transaction by ID',
      description: 'Current record, including the amount still refundable',
    }),
    transactionIdParam(),
    ApiResponse({
      status: 200,
      description: 'Request successful',
      type: TransactionResponseDto,
    }),
    errorResponse(404, 'Transaction not found'),
  );
};

/**
 * Swagger decorator for status-only transitions (authorize, capture)
 */
export const ApiTransitionTransaction = (options: {
  action: 'authorize' | 'capture';
  from: string;
  to: string;
}) => {
  return applyDecorators(
    ApiOperation({
      summary: `${options.action[0].toUpperCase()}${options.action.slice(1)} a transaction`,
      description: `Moves a transaction from ${options.from} to ${options.to}`,
    }),
    transactionIdParam(),
    ApiResponse({
      status: 200,
      description: `Transaction is now ${options.to}`,
      type: TransactionResponseDto,
    }),
    errorResponse(404, 'Transaction not found'),
    errorResponse(409, `Transaction is not ${options.from}`),
  );
};

/**
 * Swagger decorator for refunds
 */
export const ApiRefundTransaction = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Refund a captured transaction',
      description:
        'Adds to the refunded total. The transaction becomes REFUNDED once the total reaches the captured amount.',
    }),
    transactionIdParam(),
    ApiBody({ type: RefundTransactionDto }),
    ApiResponse({
      status: 200,
      description: 'Refund recorded',
      type: TransactionResponseDto,
    }),
    errorResponse(400, 'Non-positive amount'),
    errorResponse(404, 'Transaction not found'),
    errorResponse(409, 'Transaction is not CAPTURED'),
    errorResponse(422, 'Amount exceeds the refundable amount'),
  );
};
