import {
  Controller,
  Get,
  Post,
  Param,
  Body,
  HttpCode,
  HttpStatus,
  Inject,
  Logger,
  ParseUUIDPipe,
  UseFilters,
  UseGuards,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { TransactionService, TransactionSnapshot } from '../../../core';
import {
  ApiCreateTransaction,
  ApiGetTransaction,
  ApiRefundTransaction,
  ApiTransitionTransaction,
} from '../../../_shared/swagger/decorators';
import { CreateTransactionDto, RefundTransactionDto } from '../../../_shared/dto';
import { TransactionExceptionFilter } from '../filters/transaction-exception.filter';
import { LifecycleRateLimitGuard } from '../middleware/rate-limit.guard';

/**
 * Transaction Controller
 * Thin HTTP surface over the lifecycle service; rejections are mapped by
 * TransactionExceptionFilter
 */
@ApiTags('Transactions')
@Controller('transactions')
@UseGuards(LifecycleRateLimitGuard)
@UseFilters(TransactionExceptionFilter)
export class TransactionController {
  private readonly logger = new Logger(TransactionController.name);

  constructor(
    @Inject(TransactionService)
    private readonly transactionService: TransactionService,
  ) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiCreateTransaction()
  createTransaction(@Body() dto: CreateTransactionDto): TransactionSnapshot {
    this.logger.log(`Creating transaction for ${dto.ownerId}`);
    return this.transactionService
      .createTransaction(dto.ownerId, dto.amount)
      .toPlainObject();
  }

  @Get(':id')
  @ApiGetTransaction()
  getTransaction(@Param('id', ParseUUIDPipe) id: string): TransactionSnapshot {
    return this.transactionService.getTransaction(id).toPlainObject();
  }

  @Post(':id/authorize')
  @HttpCode(HttpStatus.OK)
  @ApiTransitionTransaction({
    action: 'authorize',
    from: 'CREATED',
    to: 'AUTHORIZED',
  })
  authorize(@Param('id', ParseUUIDPipe) id: string): TransactionSnapshot {
    this.logger.log(`Authorizing transaction ${id}`);
    return this.transactionService.authorize(id).toPlainObject();
  }

  @Post(':id/capture')
  @HttpCode(HttpStatus.OK)
  @ApiTransitionTransaction({
    action: 'capture',
    from: 'AUTHORIZED',
    to: 'CAPTURED',
  })
  capture(@Param('id', ParseUUIDPipe) id: string): TransactionSnapshot {
    this.logger.log(`Capturing transaction ${id}`);
    return this.transactionService.capture(id).toPlainObject();
  }

  @Post(':id/refund')
  @HttpCode(HttpStatus.OK)
  @ApiRefundTransaction()
  refund(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: RefundTransactionDto,
  ): TransactionSnapshot {
    this.logger.log(`Refunding ${dto.amount} on transaction ${id}`);
    return this.transactionService.refund(id, dto.amount).toPlainObject();
  }
}
