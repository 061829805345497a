import { IsString, IsNumber, IsNotEmpty, IsPositive, Length } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import { TransactionStatus } from '../../core/domain/enums';

/**
 * DTO for creating a new transaction
 */
export class CreateTransactionDto {
  @ApiProperty({
    description: 'Identifier of the paying party',
    example: 'user-123',
    minLength: 1,
    maxLength: 255,
  })
  @IsNotEmpty()
  @IsString()
  @Length(1, 255)
  ownerId!: string;

  @ApiProperty({
    description: 'Amount to charge; fixed for the life of the transaction',
    example: 100,
    exclusiveMinimum: true,
    minimum: 0,
  })
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @IsPositive()
  amount!: number;
}

/**
 * DTO for refunding part or all of a captured transaction
 */
export class RefundTransactionDto {
  @ApiProperty({
    description: 'Amount to refund; at most the current refundable amount',
    example: 30,
    exclusiveMinimum: true,
    minimum: 0,
  })
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @IsPositive()
  amount!: number;
}

/**
 * Response shape for every transaction endpoint
 */
export class TransactionResponseDto {
  @ApiProperty({
    description: 'Transaction ID (UUID)',
    example: '550e8400-e29b-41d4-a716-446655440000',
    format: 'uuid',
  })
  id!: string;

  @ApiProperty({ example: 'user-123' })
  ownerId!: string;

  @ApiProperty({ example: 100 })
  capturedAmount!: number;

  @ApiProperty({ example: 30 })
  refundedAmount!: number;

  @ApiProperty({
    description: 'capturedAmount - refundedAmount',
    example: 70,
  })
  refundableAmount!: number;

  @ApiProperty({ enum: TransactionStatus, example: TransactionStatus.CAPTURED })
  status!: TransactionStatus;

  @ApiProperty({ type: String, format: 'date-time' })
  createdAt!: Date;

  @ApiProperty({ type: String, format: 'date-time' })
  updatedAt!: Date;
}
