/**
 * @potkeeper/balances: Account group balance aggregation.
 *
 * @packageDocumentation
 */

export { BalanceAggregator, balanceEntityId } from "./balance-aggregator.js";
export type { GroupSnapshots } from "./balance-aggregator.js";

export {
  AccountSourceError,
  BalanceAggregatorError,
  DEFAULT_ENTITY_PREFIX,
} from "./types.js";
export type {
  AccountSource,
  AccountSourceFailureKind,
  MemberBalance,
  PublishedState,
  StateSink,
  BalanceAggregatorOptions,
  BalanceAggregatorErrorCode,
} from "./types.js";
