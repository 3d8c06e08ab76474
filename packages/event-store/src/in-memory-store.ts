/**
 * @potkeeper/event-store: In-memory EventStore implementation.
 *
 * Suitable for unit tests and short-lived tooling. All state is lost
 * on process exit, so it cannot back a production transfer ledger.
 */

import { IndexedEventStore } from "./base-store.js";
import type { StoredEvent } from "./types.js";

export class InMemoryEventStore extends IndexedEventStore {
  protected override persist(_batch: readonly StoredEvent[]): void {
    // Nothing to write: the indexes are the only copy.
  }
}
