import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { ConfigurationService } from './modules';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const logger = new Logger('Bootstrap');

  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));

  if (app.get(ConfigurationService).isSwaggerEnabled()) {
    const config = new DocumentBuilder()
      .setTitle('Transaction Lifecycle')
      .setDescription(
        'Create, authorize, capture and refund payment transactions. Refunds accumulate until the captured amount is returned.',
      )
      .setVersion('0.1.0')
      .addTag('Transactions', 'Lifecycle commands and queries')
      .addTag('Health', 'Liveness and lifecycle description')
      .build();

    const document = SwaggerModule.createDocument(app, config);
    SwaggerModule.setup('api', app, document);
    logger.log('OpenAPI documentation mounted at /api');
  }

  const port = app.get(ConfigService).getOrThrow<number>('app.port');
  await app.listen(port);
  logger.log(`Transaction lifecycle service is running on http://localhost:${port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    `Failed to start: ${error instanceof Error ? error.message : String(error)}`,
  );
  process.exit(1);
});
