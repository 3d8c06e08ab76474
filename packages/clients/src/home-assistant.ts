/**
 * Home Assistant Client: State publishing and notifications over the
 * Home Assistant REST API.
 */

import type { PublishedState, StateSink } from "@potkeeper/balances";
import { HttpClient } from "./http-client.js";
import type {
  HttpClientConfig,
  MobileNotification,
  Notifier,
  PersistentAlert,
} from "./types.js";

export interface HomeAssistantClientOptions extends HttpClientConfig {
  /** Long-lived access token */
  readonly token: string;
  /** Notify service for mobile notifications, e.g. "mobile_app_phone" */
  readonly notifyService: string;
}

export class HomeAssistantClient implements StateSink, Notifier {
  private readonly http: HttpClient;
  private readonly token: string;
  private readonly notifyService: string;

  constructor(options: HomeAssistantClientOptions) {
    const { token, notifyService, ...httpConfig } = options;
    this.http = new HttpClient(httpConfig);
    this.token = token;
    this.notifyService = notifyService;
  }

  async publish(state: PublishedState): Promise<void> {
    await this.http.post(`/api/states/${encodeURIComponent(state.entityId)}`, {
      token: this.token,
      json: { state: state.value, attributes: state.attributes },
    });
  }

  async notify(notification: MobileNotification): Promise<void> {
    const data: Record<string, unknown> = {};
    if (notification.tag !== undefined) {
      data["tag"] = notification.tag;
    }
    if (notification.actions !== undefined && notification.actions.length > 0) {
      data["actions"] = notification.actions.map((a) =>
        a.uri !== undefined
          ? { action: "URI", title: a.title, uri: a.uri }
          : { action: a.action, title: a.title },
      );
    }

    await this.http.post(`/api/services/notify/${encodeURIComponent(this.notifyService)}`, {
      token: this.token,
      json: {
        title: notification.title,
        message: notification.message,
        ...(Object.keys(data).length > 0 ? { data } : {}),
      },
    });
  }

  async alert(alert: PersistentAlert): Promise<void> {
    await this.http.post("/api/services/persistent_notification/create", {
      token: this.token,
      json: {
        notification_id: alert.notificationId,
        title: alert.title,
        message: alert.message,
      },
    });
  }
}
