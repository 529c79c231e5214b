import { logger } from '../../../shared/logger';
import type {
  ExtractionStrategy,
  ExtractorContext,
  PageSession,
} from '../core/types';

const log = logger.child('extractor');

export interface ChainResult<T> {
  /** Name of the strategy that produced `items`, `null` when none did */
  strategy: string | null;
  items: T[];
}

/**
 * Try each strategy in order and stop at the first non-empty result. Errors
 * thrown by a strategy propagate; later strategies are not attempted.
 */
export async function runStrategyChain<T>(
  strategies: readonly ExtractionStrategy<T>[],
  session: PageSession,
  context: ExtractorContext
): Promise<ChainResult<T>> {
  for (const strategy of strategies) {
    const items = await strategy.extract(session, context);
    if (items.length > 0) {
      log.debug(`Strategy ${strategy.name} matched ${items.length} items`, {
        pageUrl: context.pageUrl,
      });
      return { strategy: strategy.name, items };
    }
    log.debug(`Strategy ${strategy.name} found nothing`);
  }

  return { strategy: null, items: [] };
}
