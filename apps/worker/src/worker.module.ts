import { Module } from '@nestjs/common';
import { KeywordAuthVerifier } from '@supplier-watch/extractor';
import type { SupplierConfig } from '@supplier-watch/shared';
import { ConfigModule } from './config/config.module';
import { SUPPLIER_CONFIG } from './config/supplier-config';
import { AUTH_VERIFIER, SupplierSessionService } from './services/supplier-session.service';
import { StateStoreService } from './services/state-store.service';
import { NotifierService } from './services/notifier.service';
import { RunService } from './services/run.service';

/**
 * Main worker module
 * Wires the supplier session, state file and notifier into one run
 */
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: AUTH_VERIFIER,
      inject: [SUPPLIER_CONFIG],
      useFactory: (supplier: SupplierConfig) =>
        new KeywordAuthVerifier(supplier.login.successMarkers, supplier.login.failureMarkers),
    },
    SupplierSessionService,
    StateStoreService,
    NotifierService,
    RunService,
  ],
  exports: [RunService],
})
export class WorkerModule {}
