import type { DomainEvent } from "@potkeeper/types";

let counter = 0;

export function makeEvent(type: string, payload: Record<string, unknown> = {}): DomainEvent {
  counter += 1;
  return {
    type,
    metadata: {
      eventId: `evt-${counter}`,
      timestamp: "2026-03-01T21:00:00.000Z",
      actor: "test",
      correlationId: `corr-${counter}`,
      source: "ledger",
    },
    payload,
  };
}
