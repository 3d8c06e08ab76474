/**
 * @potkeeper/types: Shared domain types.
 *
 * Everything is readonly, and amounts are integer minor units
 * throughout.
 */

// Bank types
export { BANK_REFS } from "./bank.js";
export type {
  BankRef,
  Currency,
  AccountMember,
  AccountMemberKind,
  AccountGroup,
  BalanceSnapshot,
} from "./bank.js";

// Transfer types
export { TRANSFER_STATUSES } from "./transfer.js";
export type {
  Pot,
  TransferDirection,
  TransferIntent,
  TransferStatus,
  TransferRecord,
} from "./transfer.js";

// Event types
export { EVENT_SOURCES } from "./event.js";
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

// Runtime type guards
export {
  isBankRef,
  parseBankRef,
  isMinorUnits,
  isBalanceSnapshot,
  isTransferStatus,
  isTransferIntent,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
