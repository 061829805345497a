import { Controller, Get, Inject, HttpStatus, HttpCode } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import type { StateTransition, TransactionStatus } from '../../../core';
import { TransactionStateMachine } from '../../../core';
import { TRANSACTION_STATE_MACHINE } from '../constants';
import { ConfigurationService } from '../services/configuration.service';
import {
  ApiHealthCheck,
  ApiLifecycleDescription,
} from '../../../_shared/swagger/decorators';

/**
 * Health Controller
 * Using shared Swagger decorators for cleaner code and better maintainability
 */
@ApiTags('Health')
@Controller('health')
export class HealthController {
  constructor(
    @Inject(TRANSACTION_STATE_MACHINE)
    private readonly stateMachine: TransactionStateMachine,
    private readonly configuration: ConfigurationService,
  ) {}

  @Get()
  @HttpCode(HttpStatus.OK)
  @ApiHealthCheck()
  health(): {
    status: string;
    timestamp: Date;
    uptime: number;
    storage: string;
  } {
    return {
      status: 'healthy',
      timestamp: new Date(),
      uptime: process.uptime(),
      storage: this.configuration.getStorageType(),
    };
  }

  @Get('lifecycle')
  @ApiLifecycleDescription()
  lifecycle(): {
    initialState: TransactionStatus;
    transitions: Array<Omit<StateTransition, 'conditions'>>;
    diagram: string;
  } {
    return {
      initialState: this.stateMachine.getInitialState(),
      transitions: this.stateMachine
        .getAllTransitions()
        .map(({ from, to, action, description }) => ({
          from,
          to,
          action,
          description,
        })),
      diagram: this.stateMachine.toMermaidDiagram(),
    };
  }
}
