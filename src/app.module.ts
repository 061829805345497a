import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { LifecycleModule, LifecycleModuleConfig } from './modules';
import lifecycleConfig, { appConfig } from './config/env.config';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig, lifecycleConfig],
    }),
    LifecycleModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService): LifecycleModuleConfig =>
        configService.getOrThrow<LifecycleModuleConfig>('lifecycle'),
    }),
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
