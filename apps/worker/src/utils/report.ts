import { describeChange } from '@supplier-watch/extractor';
import { getErrorInfo } from '@supplier-watch/shared';
import type { ProductOutcome } from '../types/run';

/**
 * Compose the run notification (Discord markdown).
 *
 * One block per product with changes or a failure, in configuration order,
 * then one line per run-level problem; a single "no changes" line when
 * there is nothing to report.
 */
export function composeReport(label: string, outcomes: ProductOutcome[], problems: string[] = []): string {
  const blocks: string[] = [];

  for (const outcome of outcomes) {
    if (outcome.status === 'changed') {
      const changes = outcome.events.map(describeChange).join('; ');
      blocks.push(`**[${outcome.snapshot.name}]**\n${outcome.snapshot.url}\nChanges: ${changes}`);
    } else if (outcome.status === 'failed') {
      blocks.push(`:x: Failed to read ${outcome.product.name}: ${describeFailure(outcome)}`);
    }
  }

  blocks.push(...problems);

  if (blocks.length === 0) {
    return `:white_check_mark: No price/stock changes (${label}).`;
  }

  return `:bell: **Changes detected (${label})**\n\n${blocks.join('\n\n')}`;
}

export function composeLoginFailure(label: string): string {
  return `:warning: Login to supplier (${label}) failed. Check credentials.`;
}

export function composeStateFailure(label: string, operation: 'load' | 'save', reason: string): string {
  return `:x: Could not ${operation} the state file (${label}): ${reason}`;
}

function describeFailure(outcome: Extract<ProductOutcome, { status: 'failed' }>): string {
  const info = getErrorInfo(outcome.errorCode);
  return info ? `${info.title} (${outcome.error})` : outcome.error;
}
