import { Inject, Injectable, Logger } from '@nestjs/common';
import { FetchError, detectChanges, takeSnapshot } from '@supplier-watch/extractor';
import { getErrorMessage, type ProductRule, type SupplierConfig } from '@supplier-watch/shared';
import { WorkerConfigService } from '../config/config.service';
import { SUPPLIER_CONFIG } from '../config/supplier-config';
import { SupplierSessionService } from './supplier-session.service';
import { StateStoreService, type SnapshotState } from './state-store.service';
import { NotifierService } from './notifier.service';
import { composeLoginFailure, composeReport, composeStateFailure } from '../utils/report';
import { sleep } from '../utils/sleep';
import type { ProductOutcome, RunReport } from '../types/run';

/**
 * One monitoring run: login → fetch + snapshot + diff per product →
 * save state → notify.
 *
 * Products are processed one at a time in configuration order with a
 * fixed pause between fetches. A failing product is reported and skipped;
 * nothing is retried, the next scheduled run is the retry.
 */
@Injectable()
export class RunService {
  private readonly logger = new Logger(RunService.name);

  constructor(
    private readonly config: WorkerConfigService,
    @Inject(SUPPLIER_CONFIG) private readonly supplier: SupplierConfig,
    private readonly session: SupplierSessionService,
    private readonly stateStore: StateStoreService,
    private readonly notifier: NotifierService,
  ) {}

  async run(): Promise<RunReport> {
    const { label, login, products } = this.supplier;

    // Step 1: Login
    const auth = await this.session.ensureAuthenticated();
    if (auth === 'failed' || (auth === 'unconfirmed' && login.onUnconfirmed === 'abort')) {
      this.logger.error(`Login to ${label} ${auth === 'failed' ? 'failed' : 'could not be confirmed'}, aborting run`);
      const message = composeLoginFailure(label);
      await this.notifier.send(message);
      return { auth, outcomes: [], message };
    }
    if (auth === 'unconfirmed') {
      this.logger.warn(`Login to ${label} could not be confirmed, continuing`);
    }

    // Step 2: Products
    let state: SnapshotState;
    try {
      state = await this.stateStore.load();
    } catch (error) {
      const reason = errorMessage(error);
      this.logger.error(`Could not load state, aborting run: ${reason}`);
      const message = composeStateFailure(label, 'load', reason);
      await this.notifier.send(message);
      return { auth, outcomes: [], message };
    }

    const outcomes: ProductOutcome[] = [];

    for (const [index, product] of products.entries()) {
      if (index > 0) {
        await sleep(this.config.requestDelayMs);
      }
      outcomes.push(await this.processProduct(product, state));
    }

    // Step 3: Persist once, whatever failed
    const problems: string[] = [];
    try {
      await this.stateStore.save(state);
    } catch (error) {
      const reason = errorMessage(error);
      this.logger.error(`Could not save state: ${reason}`);
      problems.push(composeStateFailure(label, 'save', reason));
    }

    const counts = countOutcomes(outcomes);
    this.logger.log(
      `Run finished: ${counts.changed} changed, ${counts.unchanged} unchanged, ${counts.failed} failed`,
    );

    // Step 4: Notify
    const message = composeReport(label, outcomes, problems);
    await this.notifier.send(message);

    return { auth, outcomes, message };
  }

  private async processProduct(product: ProductRule, state: SnapshotState): Promise<ProductOutcome> {
    try {
      const html = await this.session.fetchDocument(product.url);
      const snapshot = takeSnapshot(html, product);
      const events = detectChanges(state.get(product.url), snapshot);

      // Absent fields are observations too, so the entry is always replaced
      state.set(product.url, snapshot);

      this.logger.debug(
        `[${product.name}] price=${snapshot.price ?? 'n/a'} raw="${snapshot.rawPrice ?? ''}" stock=${snapshot.stock ?? 'n/a'}`,
      );

      if (events.length === 0) {
        return { status: 'unchanged', product, snapshot };
      }

      this.logger.log(`[${product.name}] ${events.length} change(s): ${events.map((e) => e.kind).join(', ')}`);
      return { status: 'changed', product, snapshot, events };
    } catch (error) {
      const message = errorMessage(error);
      const errorCode = error instanceof FetchError ? error.code : null;
      const hint = getErrorMessage(errorCode);
      this.logger.error(
        `[${product.name}] Failed to read ${product.url}: ${message}${hint ? ` (${hint})` : ''}`,
      );
      return { status: 'failed', product, error: message, errorCode };
    }
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function countOutcomes(outcomes: ProductOutcome[]): Record<ProductOutcome['status'], number> {
  const counts = { changed: 0, unchanged: 0, failed: 0 };
  for (const outcome of outcomes) {
    counts[outcome.status]++;
  }
  return counts;
}
