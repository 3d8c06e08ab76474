/**
 * Notification Service: Tells the household what happened.
 *
 * Failed and abandoned transfers and expired bank tokens raise a
 * persistent alert; workflow results go to the phone. Delivery failures
 * are logged and never reach the money path, so every method resolves.
 */

import { formatMinorUnits } from "@potkeeper/ledger";
import type { MobileNotification, Notifier, PersistentAlert } from "@potkeeper/clients";
import type { BankRef, TransferRecord } from "@potkeeper/types";
import type { Logger } from "pino";

export interface NotificationServiceOptions {
  /** Without a notifier everything is logged only */
  readonly notifier?: Notifier | undefined;
  readonly logger: Logger;
}

function slug(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9_]+/g, "_");
}

export function formatAmount(amountMinorUnits: number, currency: string): string {
  return `${formatMinorUnits(amountMinorUnits)} ${currency}`;
}

export function transferAlert(record: TransferRecord): PersistentAlert | null {
  const { intent } = record;
  const amount = formatAmount(intent.amountMinorUnits, intent.currency);
  const notificationId = `potkeeper_transfer_${slug(record.idempotencyKey)}`;

  switch (record.status) {
    case "failed":
      return {
        notificationId,
        title: "Transfer failed",
        message: `${intent.reason} (${amount}) was not made: ${record.lastError ?? "unknown error"}`,
      };
    case "abandoned":
      return {
        notificationId,
        title: "Transfer needs review",
        message:
          `${intent.reason} (${amount}) may or may not have gone through after ` +
          `${record.attempts} attempts: ${record.lastError ?? "unknown error"}. ` +
          `Check the bank, then resolve ${record.idempotencyKey}.`,
      };
    default:
      return null;
  }
}

export class NotificationService {
  private readonly notifier: Notifier | undefined;
  private readonly logger: Logger;

  constructor(options: NotificationServiceOptions) {
    this.notifier = options.notifier;
    this.logger = options.logger;
  }

  /** Alert on transfers that did not commit. */
  async transferOutcome(record: TransferRecord): Promise<void> {
    const alert = transferAlert(record);
    if (alert === null) {
      return;
    }
    this.logger.warn({ idempotencyKey: record.idempotencyKey, status: record.status }, alert.title);
    await this.deliver("alert", (notifier) => notifier.alert(alert));
  }

  async tokenExpired(bankRef: BankRef): Promise<void> {
    const alert: PersistentAlert = {
      notificationId: `truelayer_access_token_${slug(bankRef)}_expired`,
      title: "Access token expired",
      message: `TrueLayer access token for ${bankRef} has expired!`,
    };
    await this.deliver("alert", (notifier) => notifier.alert(alert));
  }

  async notify(notification: MobileNotification): Promise<void> {
    await this.deliver("notification", (notifier) => notifier.notify(notification));
  }

  private async deliver(kind: string, send: (notifier: Notifier) => Promise<void>): Promise<void> {
    if (this.notifier === undefined) {
      return;
    }
    try {
      await send(this.notifier);
    } catch (err: unknown) {
      this.logger.warn(
        { kind, error: err instanceof Error ? err.message : String(err) },
        "Notification could not be delivered",
      );
    }
  }
}
