/**
 * @potkeeper/clients: Client configuration and error types.
 */

import type { Logger } from "pino";
import type { SleepFn } from "@potkeeper/mover";

// =============================================================================
// HTTP Client
// =============================================================================

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface HttpClientConfig {
  /** Base URL of the API (e.g., "https://api.truelayer.com") */
  readonly baseUrl: string;
  /** Request timeout in milliseconds (default: 30000) */
  readonly timeout?: number | undefined;
  /** Retries after a 5xx, timeout or network error (default: 0) */
  readonly retries?: number | undefined;
  /** Custom fetch function (for testing) */
  readonly fetchFn?: FetchFn | undefined;
  /** Sleep between retries (injectable for testing) */
  readonly sleepFn?: SleepFn | undefined;
  readonly logger?: Logger | undefined;
}

export interface RequestOptions {
  /** Bearer token for the Authorization header */
  readonly token?: string | undefined;
  /** Sent as application/json */
  readonly json?: unknown;
  /** Sent as application/x-www-form-urlencoded */
  readonly form?: Readonly<Record<string, string>> | undefined;
}

export interface HttpResponse {
  /** Parsed JSON body; `{ raw }` when the body is not JSON */
  readonly body: unknown;
  readonly status: number;
  /** Selected response headers */
  readonly headers: Readonly<Record<string, string>>;
}

// =============================================================================
// Errors
// =============================================================================

/**
 * - UNAUTHORIZED: 401 or 403
 * - RATE_LIMITED: 429
 * - CLIENT_ERROR: any other 4xx
 * - SERVER_ERROR: 5xx
 * - TIMEOUT: no response within the timeout
 * - NETWORK_ERROR: the request never completed
 * - INVALID_RESPONSE: a 2xx whose body does not match the expected shape
 */
export type ApiErrorCode =
  | "UNAUTHORIZED"
  | "RATE_LIMITED"
  | "CLIENT_ERROR"
  | "SERVER_ERROR"
  | "TIMEOUT"
  | "NETWORK_ERROR"
  | "INVALID_RESPONSE";

export class ApiError extends Error {
  public readonly code: ApiErrorCode;
  /** HTTP status code; 0 when no response arrived */
  public readonly statusCode: number;
  /** Error body returned by the API */
  public readonly details?: unknown;

  constructor(code: ApiErrorCode, message: string, statusCode: number, details?: unknown) {
    super(message);
    this.name = "ApiError";
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

// =============================================================================
// Credentials
// =============================================================================

/**
 * Reads access tokens issued and refreshed by an external process.
 */
export interface CredentialProvider {
  accessToken(provider: string, name: string): Promise<string>;
}

export type CredentialErrorCode = "MISSING_CREDENTIALS" | "INVALID_CREDENTIALS";

export class CredentialError extends Error {
  public readonly code: CredentialErrorCode;

  constructor(code: CredentialErrorCode, message: string) {
    super(message);
    this.name = "CredentialError";
    this.code = code;
  }
}

// =============================================================================
// Notifications
// =============================================================================

export interface NotificationAction {
  /** Action identifier sent back when the user taps the button */
  readonly action: string;
  readonly title: string;
  /** Opens a URI instead of sending the action back */
  readonly uri?: string | undefined;
}

export interface MobileNotification {
  readonly title: string;
  readonly message: string;
  /** Replaces an earlier notification with the same tag */
  readonly tag?: string | undefined;
  readonly actions?: readonly NotificationAction[] | undefined;
}

export interface PersistentAlert {
  readonly notificationId: string;
  readonly title: string;
  readonly message: string;
}

/**
 * Delivers messages to a human.
 */
export interface Notifier {
  notify(notification: MobileNotification): Promise<void>;
  alert(alert: PersistentAlert): Promise<void>;
}
