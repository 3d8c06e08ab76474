/**
 * Idempotency keys.
 *
 * Every key is derived from the triggering event, never from a clock
 * reading at execution time, so a retried or redelivered trigger
 * produces the same key.
 */

import type { BankRef } from "@potkeeper/types";

/**
 * Calendar date in a time zone as yyyymmdd.
 */
export function dayStamp(date: Date, timeZone = "UTC"): string {
  const parts = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  }).formatToParts(date);

  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? "";
  return `${part("year")}${part("month")}${part("day")}`;
}

/**
 * Hour of day (0-23) in a time zone.
 */
export function hourOfDay(date: Date, timeZone = "UTC"): number {
  const hour = new Intl.DateTimeFormat("en-GB", {
    timeZone,
    hour: "numeric",
    hourCycle: "h23",
  })
    .formatToParts(date)
    .find((p) => p.type === "hour")?.value;
  return Number(hour);
}

/** Prefix shared by every transfer of one pot. */
export function potKeyPrefix(bankRef: BankRef, potId: string): string {
  return `pot:${bankRef}:${potId}:`;
}

/** `pot:<bank>:<potId>:<yyyymmdd>:<seq>` */
export function potTransferKey(bankRef: BankRef, potId: string, day: string, seq: number): string {
  return `${potKeyPrefix(bankRef, potId)}${day}:${String(seq)}`;
}

/** `autosave:<trackId>:<bucket>` */
export function autoSaveKey(trackId: string, bucket: number): string {
  return `autosave:${trackId}:${String(bucket)}`;
}

/** Prefix shared by every savings sweep into one pot. */
export function sweepKeyPrefix(potId: string): string {
  return `sweep:${potId}:`;
}

/**
 * `sweep:<potId>:<since>`: one sweep per window, named by the time the
 * window opened (the previous sweep), or "initial" for the first.
 */
export function sweepKey(potId: string, since: Date | undefined): string {
  return `${sweepKeyPrefix(potId)}${since === undefined ? "initial" : String(since.getTime())}`;
}
