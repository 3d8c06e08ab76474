/**
 * @potkeeper/node: HTTP service, scheduler and workflows.
 *
 * @packageDocumentation
 */

export { createApp } from "./app.js";
export type { CreateAppOptions } from "./app.js";

export {
  ConfigError,
  ConfigSchema,
  AppsConfigSchema,
  loadConfig,
  loadAppsConfig,
  parseAppsConfig,
  accountGroups,
  deepFreeze,
} from "./config.js";
export type {
  AppConfig,
  AppsConfig,
  FrozenAppsConfig,
  CreditCardPotConfig,
  FrozenCreditCardPotConfig,
  AutoSaverAppConfig,
  SavingsSweepAppConfig,
  FrozenSavingsSweepConfig,
  GroupRef,
  ConfigErrorCode,
} from "./config.js";

export { PotkeeperService } from "./services/potkeeper-service.js";
export type { PotkeeperServiceOptions } from "./services/potkeeper-service.js";
export {
  CreditCardPotWorkflow,
  combineSnapshots,
  TOP_UP_ACTION,
  SKIP_NOTICE_THRESHOLD_MINOR_UNITS,
} from "./services/credit-card-pot.js";
export type {
  CreditCardPotWorkflowOptions,
  CreditCardRunResult,
  PotBalanceReader,
  TransferExecutor,
} from "./services/credit-card-pot.js";
export { SavingsSweepWorkflow, SAVINGS_ENTITY_ID, basisPoints } from "./services/savings-sweep.js";
export type {
  AccountTransactionReader,
  CardTransactionReader,
  SavingsEstimate,
  SavingsSweepResult,
  SavingsSweepWorkflowOptions,
} from "./services/savings-sweep.js";
export { NotificationService, transferAlert, formatAmount } from "./services/notifications.js";
export type { NotificationServiceOptions } from "./services/notifications.js";
export { Scheduler, SchedulerError, msUntilLocalTime, parseTimeOfDay } from "./services/scheduler.js";
export type { SchedulerOptions, TaskOutcome, TaskRun, SchedulerErrorCode } from "./services/scheduler.js";
export { ServiceError } from "./services/errors.js";
export type { ServiceErrorCode } from "./services/errors.js";

export * from "./types/index.js";
