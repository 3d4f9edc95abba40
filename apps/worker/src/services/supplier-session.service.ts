import { Inject, Injectable } from '@nestjs/common';
import { SupplierSession, login, type AuthVerifier } from '@supplier-watch/extractor';
import type { AuthStatus, SupplierConfig } from '@supplier-watch/shared';
import { WorkerConfigService } from '../config/config.service';
import { SUPPLIER_CONFIG } from '../config/supplier-config';

/** Injection token for the {@link AuthVerifier} judging the login */
export const AUTH_VERIFIER = Symbol('AUTH_VERIFIER');

/**
 * The authenticated HTTP session shared by every product of a run
 */
@Injectable()
export class SupplierSessionService {
  private readonly session: SupplierSession;

  constructor(
    private readonly config: WorkerConfigService,
    @Inject(SUPPLIER_CONFIG) private readonly supplier: SupplierConfig,
    @Inject(AUTH_VERIFIER) private readonly verifier: AuthVerifier,
  ) {
    this.session = new SupplierSession({
      userAgent: config.userAgent,
      timeout: config.requestTimeoutMs,
    });
  }

  ensureAuthenticated(): Promise<AuthStatus> {
    return login(this.session, this.supplier.login, this.config.credentials, this.verifier);
  }

  /**
   * @throws FetchError when the page cannot be retrieved
   */
  fetchDocument(url: string): Promise<string> {
    return this.session.fetchDocument(url);
  }
}
