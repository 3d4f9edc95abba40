/**
 * Public API for @supplier-watch/worker
 */

export { WorkerModule } from './worker.module';
export { RunService } from './services/run.service';
export { WorkerConfigService } from './config/config.service';
export { parseSupplierConfig, loadSupplierConfig } from './config/supplier-config';
export { composeReport } from './utils/report';

// Export types
export type { ProductOutcome, RunReport } from './types/run';
