/**
 * @potkeeper/clients: HTTP clients for the bank, transfer, music and
 * home automation APIs.
 *
 * Uses native fetch; each client implements one of the ports defined
 * by the balances, mover and automation packages.
 *
 * @packageDocumentation
 */

export { HttpClient } from "./http-client.js";

export { FileCredentialProvider } from "./credentials.js";
export type { FileCredentialProviderOptions } from "./credentials.js";

export {
  TrueLayerAccountSource,
  TRUELAYER_CREDENTIALS,
  TRUELAYER_RETRIES,
  balancePath,
} from "./truelayer.js";
export type { TrueLayerAccountSourceOptions } from "./truelayer.js";

export { MonzoClient, MonzoError, MONZO_CREDENTIALS } from "./monzo.js";
export type { MonzoClientOptions, MonzoPot, MonzoErrorCode } from "./monzo.js";

export { SpotifyClient, SPOTIFY_CREDENTIALS, SPOTIFY_PAGE_SIZE } from "./spotify.js";
export type { SpotifyClientOptions } from "./spotify.js";

export { HomeAssistantClient } from "./home-assistant.js";
export type { HomeAssistantClientOptions } from "./home-assistant.js";

export { ApiError, CredentialError } from "./types.js";
export type {
  ApiErrorCode,
  CredentialErrorCode,
  CredentialProvider,
  FetchFn,
  HttpClientConfig,
  HttpResponse,
  MobileNotification,
  NotificationAction,
  Notifier,
  PersistentAlert,
  RequestOptions,
} from "./types.js";
