import { Global, Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import { WorkerConfigService } from './config.service';
import { validateEnv } from './env.validation';
import { SUPPLIER_CONFIG, loadSupplierConfig } from './supplier-config';

/**
 * Configuration module
 * Handles environment variables and the supplier configuration file
 */
@Global()
@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
      validate: validateEnv,
    }),
  ],
  providers: [
    WorkerConfigService,
    {
      provide: SUPPLIER_CONFIG,
      inject: [WorkerConfigService],
      useFactory: (config: WorkerConfigService) => loadSupplierConfig(config.configPath),
    },
  ],
  exports: [WorkerConfigService, SUPPLIER_CONFIG],
})
export class ConfigModule {}
