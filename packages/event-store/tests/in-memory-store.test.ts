/**
 * Tests for InMemoryEventStore: appends, reads, version checks and
 * hash chaining.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { EventStoreError } from "../src/types.js";
import { GENESIS_HASH } from "../src/hash-chain.js";
import { makeEvent } from "./helpers.js";

const APPENDED_AT = new Date("2026-03-01T21:00:05.000Z");

let store: InMemoryEventStore;

beforeEach(() => {
  store = new InMemoryEventStore({ now: () => APPENDED_AT });
});

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err: unknown) {
    return err;
  }
  throw new Error("Expected the call to throw");
}

// =============================================================================
// Append
// =============================================================================

describe("append", () => {
  it("numbers events within a transfer stream", () => {
    const first = store.append("transfer:k1", [makeEvent("transfer.reserved"), makeEvent("transfer.attempted")]);
    const second = store.append("transfer:k1", [makeEvent("transfer.committed")]);

    expect(first).toMatchObject({ fromVersion: 1, toVersion: 2 });
    expect(second).toMatchObject({ fromVersion: 3, toVersion: 3 });
    expect(store.streamVersion("transfer:k1")).toBe(3);
  });

  it("numbers events across streams", () => {
    store.append("transfer:k1", [makeEvent("transfer.reserved")]);
    const result = store.append("transfer:k2", [makeEvent("transfer.reserved")]);

    expect(result.events[0]?.globalPosition).toBe(2);
    expect(store.globalPosition()).toBe(2);
  });

  it("stamps events with the store clock", () => {
    const result = store.append("transfer:k1", [makeEvent("transfer.reserved")]);

    expect(result.events[0]?.appendedAt).toBe("2026-03-01T21:00:05.000Z");
  });

  it("rejects an empty batch", () => {
    expect(thrown(() => store.append("transfer:k1", []))).toMatchObject({ code: "EMPTY_APPEND" });
  });

  it("rejects an empty stream id", () => {
    const err = thrown(() => store.append("", [makeEvent("transfer.reserved")]));

    expect(err).toBeInstanceOf(EventStoreError);
    expect(err).toMatchObject({ code: "INVALID_STREAM_ID" });
  });

  it("chains each event to the one before", () => {
    const [first, second] = store.append("transfer:k1", [
      makeEvent("transfer.reserved"),
      makeEvent("transfer.committed"),
    ]).events;

    expect(first?.previousHash).toBe(GENESIS_HASH);
    expect(second?.previousHash).toBe(first?.hash);
    expect(first?.hash).toMatch(/^[0-9a-f]{64}$/);
  });
});

// =============================================================================
// Expected version
// =============================================================================

describe("expected version", () => {
  it("accepts no_stream for a new stream", () => {
    const result = store.append("transfer:k1", [makeEvent("transfer.reserved")], { expectedVersion: "no_stream" });

    expect(result.toVersion).toBe(1);
  });

  it("rejects no_stream for a key already reserved", () => {
    store.append("transfer:k1", [makeEvent("transfer.reserved")]);

    expect(() =>
      store.append("transfer:k1", [makeEvent("transfer.reserved")], { expectedVersion: "no_stream" }),
    ).toThrow('Stream "transfer:k1" already exists (version 1), expected no_stream');
  });

  it("rejects a stale version and leaves the store unchanged", () => {
    store.append("transfer:k1", [makeEvent("transfer.reserved"), makeEvent("transfer.attempted")]);

    expect(() =>
      store.append("transfer:k1", [makeEvent("transfer.committed")], { expectedVersion: 1 }),
    ).toThrow('Stream "transfer:k1" is at version 2, expected 1');
    expect(store.streamVersion("transfer:k1")).toBe(2);
    expect(store.globalPosition()).toBe(2);
  });

  it("lets one of two writers at the same version win", () => {
    store.append("transfer:k1", [makeEvent("transfer.reserved")]);

    store.append("transfer:k1", [makeEvent("transfer.committed")], { expectedVersion: 1 });
    const err = thrown(() => store.append("transfer:k1", [makeEvent("transfer.failed")], { expectedVersion: 1 }));

    expect(err).toMatchObject({ code: "CONCURRENCY_CONFLICT", streamId: "transfer:k1" });
    expect(store.read("transfer:k1").map((e) => e.event.type)).toEqual(["transfer.reserved", "transfer.committed"]);
  });
});

// =============================================================================
// Read
// =============================================================================

describe("read", () => {
  it("returns an empty list for an unknown stream", () => {
    expect(store.read("transfer:nope")).toEqual([]);
    expect(store.streamVersion("transfer:nope")).toBe(0);
  });

  it("returns one stream or all of them", () => {
    store.append("transfer:k1", [makeEvent("a")]);
    store.append("transfer:k2", [makeEvent("b")]);

    expect(store.read("transfer:k2").map((e) => e.event.type)).toEqual(["b"]);
    expect(store.readAll().map((e) => e.event.type)).toEqual(["a", "b"]);
  });
});

describe("verifyIntegrity", () => {
  it("is valid for an empty store", () => {
    expect(store.verifyIntegrity()).toEqual({ valid: true, lastVerifiedPosition: 0, errors: [] });
  });

  it("is valid after appends", () => {
    store.append("transfer:k1", [makeEvent("a")]);
    store.append("transfer:k2", [makeEvent("b")]);

    expect(store.verifyIntegrity()).toEqual({ valid: true, lastVerifiedPosition: 2, errors: [] });
  });
});
