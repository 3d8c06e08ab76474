/**
 * Auto Saver: Saves a fixed amount whenever a trigger fires.
 *
 * Each qualifying trigger (e.g. liking a track) proposes a deposit into
 * the savings pot. Triggers are delivered at least once, so repeats of
 * the same track within the debounce window collapse into one transfer.
 */

import type { TransferHistory } from "@potkeeper/ledger";
import type { TransferIntent, TransferRecord } from "@potkeeper/types";
import type { Logger } from "pino";
import { autoSaveKey, hourOfDay } from "./keys.js";
import { AutoSaverError } from "./types.js";
import type { ActiveHours, AutoSaverOptions, TriggerEvent } from "./types.js";

export const DEFAULT_AMOUNT_PER_TRIGGER = 79;
export const DEFAULT_DEBOUNCE_MS = 60_000;

interface ResolvedConfig {
  readonly potId: string;
  readonly fundingAccountRef: string;
  readonly amountPerTriggerMinorUnits: number;
  readonly currency: string;
  readonly debounceMs: number;
  readonly activeHours: ActiveHours | undefined;
  readonly timeZone: string;
}

export function withinActiveHours(hour: number, hours: ActiveHours): boolean {
  const { startHour, endHour } = hours;
  if (startHour === endHour) {
    return true;
  }
  return startHour < endHour
    ? hour >= startHour && hour < endHour
    : hour >= startHour || hour < endHour;
}

export class AutoSaver {
  private readonly config: ResolvedConfig;
  private readonly history: TransferHistory;
  private readonly logger: Logger;

  constructor(options: AutoSaverOptions) {
    const { config } = options;
    this.config = {
      potId: config.potId,
      fundingAccountRef: config.fundingAccountRef,
      amountPerTriggerMinorUnits: config.amountPerTriggerMinorUnits ?? DEFAULT_AMOUNT_PER_TRIGGER,
      currency: config.currency ?? "GBP",
      debounceMs: config.debounceMs ?? DEFAULT_DEBOUNCE_MS,
      activeHours: config.activeHours,
      timeZone: config.timeZone ?? "UTC",
    };
    this.history = options.history;
    this.logger = options.logger;
  }

  /**
   * Propose a deposit for a trigger, or null when it does not qualify
   * or duplicates a recent one.
   *
   * @throws AutoSaverError INVALID_TRIGGER if the timestamp is unreadable
   */
  onTrigger(event: TriggerEvent): TransferIntent | null {
    const log = this.logger.child({ eventId: event.eventId });
    const { trackId } = event.payload;

    if (typeof trackId !== "string" || trackId.length === 0) {
      log.debug("Trigger has no track id; ignoring");
      return null;
    }

    const at = Date.parse(event.timestamp);
    if (Number.isNaN(at)) {
      throw new AutoSaverError("INVALID_TRIGGER", `Trigger ${event.eventId} has an invalid timestamp "${event.timestamp}"`);
    }

    const { activeHours, timeZone, debounceMs } = this.config;
    if (activeHours !== undefined) {
      const hour = hourOfDay(new Date(at), timeZone);
      if (!withinActiveHours(hour, activeHours)) {
        log.debug({ hour }, "Trigger outside active hours; ignoring");
        return null;
      }
    }

    const bucket = Math.floor(at / debounceMs);
    const recent = this.recentSave(trackId, bucket, at);
    if (recent !== undefined) {
      log.info(
        { trackId, previousKey: recent.idempotencyKey },
        "Trigger repeats a recent save; ignoring",
      );
      return null;
    }

    const intent: TransferIntent = {
      idempotencyKey: autoSaveKey(trackId, bucket),
      sourceAccountRef: this.config.fundingAccountRef,
      destinationPotOrAccountRef: this.config.potId,
      direction: "deposit",
      amountMinorUnits: this.config.amountPerTriggerMinorUnits,
      currency: this.config.currency,
      reason: `Auto-save for track ${trackId}`,
      createdAt: new Date(at).toISOString(),
    };

    log.info({ idempotencyKey: intent.idempotencyKey, trackId }, "Auto-save proposed");
    return intent;
  }

  /**
   * A save for the track in a neighbouring bucket within the debounce
   * window. Triggers may arrive out of order, so both neighbours count.
   */
  private recentSave(trackId: string, bucket: number, at: number): TransferRecord | undefined {
    const { debounceMs } = this.config;
    return [bucket - 1, bucket + 1]
      .map((b) => this.history.get(autoSaveKey(trackId, b)))
      .find(
        (record) =>
          record !== undefined &&
          record.status !== "failed" &&
          Math.abs(at - Date.parse(record.intent.createdAt)) < debounceMs,
      );
  }
}
