/**
 * Type barrel: re-exports all public types from @potkeeper/node.
 */

// DTOs
export {
  ListTransfersQuerySchema,
  ResolveTransferSchema,
  TrackTriggerSchema,
  ActionSchema,
} from "./dto.js";
export type {
  ListTransfersQuery,
  ResolveTransferDto,
  TrackTriggerDto,
  ActionDto,
} from "./dto.js";

// Error
export { errorEnvelope } from "./error.js";
export type { HttpErrorCode, DomainErrorCode, ErrorCode, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv } from "./api-contract.js";
