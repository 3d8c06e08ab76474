/**
 * @potkeeper/ledger: Intent fingerprints.
 *
 * SHA-256 over the RFC 8785 canonical form of the fields that decide
 * where money goes and how much of it. Reason text and timestamps are
 * excluded: two intents with the same key and fingerprint move the
 * same money.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { TransferIntent } from "@potkeeper/types";

export function fingerprintIntent(intent: TransferIntent): string {
  const content = canonicalize({
    idempotencyKey: intent.idempotencyKey,
    sourceAccountRef: intent.sourceAccountRef,
    destinationPotOrAccountRef: intent.destinationPotOrAccountRef,
    direction: intent.direction,
    amountMinorUnits: intent.amountMinorUnits,
    currency: intent.currency,
  });
  return createHash("sha256").update(content).digest("hex");
}
