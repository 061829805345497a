import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiResponse } from '@nestjs/swagger';

/**
 * Swagger decorator for basic health check
 */
export const ApiHealthCheck = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Basic health check',
      description: 'Returns service health status, uptime and storage type',
    }),
    ApiResponse({
      status: 200,
      description: 'Service is healthy',
      schema: {
        type: 'object',
        properties: {
          status: { type: 'string', example: 'healthy' },
          timestamp: { type: 'string', format: 'date-time' },
          uptime: { type: 'number', description: 'Uptime in seconds' },
          storage: { type: 'string', enum: ['memory', 'custom'] },
        },
      },
    }),
  );
};

/**
 * Swagger decorator for the state machine description
 */
export const ApiLifecycleDescription = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Describe the transaction lifecycle',
      description:
        'Initial state, transition table and a Mermaid state diagram of the lifecycle',
    }),
    ApiResponse({
      status: 200,
      description: 'Lifecycle description',
      schema: {
        type: 'object',
        properties: {
          initialState: { type: 'string', example: 'CREATED' },
          transitions: {
            type: 'array',
            items: {
              type: 'object',
              properties: {
                from: { type: 'string' },
                to: { type: 'string' },
                action: { type: 'string' },
                description: { type: 'string' },
              },
            },
          },
          diagram: { type: 'string' },
        },
      },
    }),
  );
};
