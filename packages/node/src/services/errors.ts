/**
 * Errors raised by the service layer.
 */

export type ServiceErrorCode =
  | "NOT_CONFIGURED"
  | "NO_PENDING_TOP_UP"
  | "UNKNOWN_ACTION"
  | "SAVINGS_INPUT_UNAVAILABLE";

export class ServiceError extends Error {
  public readonly code: ServiceErrorCode;

  constructor(code: ServiceErrorCode, message: string) {
    super(message);
    this.name = "ServiceError";
    this.code = code;
  }
}
