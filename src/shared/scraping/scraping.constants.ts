import { StrategyName } from './interfaces/strategy.interface';

export const NETWORK_TRANSPORT = 'NETWORK_TRANSPORT';
export const BROWSER_AUTOMATION_CLIENT = 'BROWSER_AUTOMATION_CLIENT';
export const PAYLOAD_INSPECTOR = 'PAYLOAD_INSPECTOR';
export const CRAWL_RESULT_SINK = 'CRAWL_RESULT_SINK';
export const ACQUISITION_STRATEGIES = 'ACQUISITION_STRATEGIES';
export const RETRY_RANDOM = 'RETRY_RANDOM';

/** Fixed execution order of the strategy chain. */
export const STRATEGY_ORDER: readonly StrategyName[] = [
  'structured-database',
  'search-engine',
  'browser-automation',
  'direct-url',
];

/** Dispatcher for direct egress; undici's global dispatcher when absent. */
export const DIRECT_DISPATCHER = 'DIRECT_DISPATCHER';
