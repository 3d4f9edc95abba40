import type {
  AuthStatus,
  ChangeEvent,
  ErrorCode,
  ProductRule,
  Snapshot,
} from '@supplier-watch/shared';

/**
 * What happened to one product during a run
 */
export type ProductOutcome =
  | { status: 'changed'; product: ProductRule; snapshot: Snapshot; events: ChangeEvent[] }
  | { status: 'unchanged'; product: ProductRule; snapshot: Snapshot }
  | { status: 'failed'; product: ProductRule; error: string; errorCode: ErrorCode | null };

export interface RunReport {
  auth: AuthStatus;
  outcomes: ProductOutcome[];
  /** Notification text sent at the end of the run */
  message: string;
}
