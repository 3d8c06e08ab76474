/**
 * Route barrel: re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createBalanceRoutes } from "./balances.js";
export { createTransferRoutes } from "./transfers.js";
export { createTriggerRoutes } from "./triggers.js";
export { createActionRoutes } from "./actions.js";
export { createSavingsRoutes } from "./savings.js";
