/**
 * @potkeeper/automation: Rules that propose transfers.
 *
 * PotManager keeps pots at their targets; AutoSaver turns triggers into
 * small deposits; SavingsSweep deposits what the savings calculator
 * adds up. All return intents for the money mover and never move money
 * themselves.
 *
 * @packageDocumentation
 */

export { PotManager } from "./pot-manager.js";
export {
  AutoSaver,
  withinActiveHours,
  DEFAULT_AMOUNT_PER_TRIGGER,
  DEFAULT_DEBOUNCE_MS,
} from "./auto-saver.js";
export {
  calculateSavings,
  roundUp,
  SAVINGS_CATEGORIES,
} from "./savings-calculator.js";
export type {
  SavingsCalculation,
  SavingsCategory,
  SavingsInputs,
  SavingsRules,
  SavingsTransaction,
} from "./savings-calculator.js";
export { SavingsSweep, DEFAULT_SWEEP_LOOKBACK_MS } from "./savings-sweep.js";
export type { SavingsSweepConfig, SavingsSweepOptions, SweepWindow } from "./savings-sweep.js";
export {
  dayStamp,
  hourOfDay,
  potKeyPrefix,
  potTransferKey,
  autoSaveKey,
  sweepKey,
  sweepKeyPrefix,
} from "./keys.js";

export { PotManagerError, AutoSaverError } from "./types.js";
export type {
  ReconcileOptions,
  PotManagerOptions,
  PotManagerErrorCode,
  TriggerEvent,
  ActiveHours,
  AutoSaverConfig,
  AutoSaverOptions,
  AutoSaverErrorCode,
  LikedTrackFeed,
} from "./types.js";
