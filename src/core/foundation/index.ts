/**
 * Foundation generator exports barrel file.
 */
export { generateFoundation } from './generator.js';
export type { FoundationOptions, FoundationResult } from './generator.js';
export {
  DEFAULT_FETCH_STRATEGIES,
  fetchStrategyBody,
  strategyBlock,
  tableStrategy,
  viewStrategy,
} from './fetch-strategies.js';
export type { CascadeFetchStrategy } from './fetch-strategies.js';
