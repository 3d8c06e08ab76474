/**
 * @potkeeper/event-store: File-based JSONL EventStore implementation.
 *
 * Stores events as one JSON object per line in a `.jsonl` file.
 *
 * Crash safety:
 * - Each append is written in a single call and fsynced before returning
 * - In-memory indexes are updated only after the write succeeds
 * - A torn final line (unclean shutdown) is skipped on load and cut
 *   from the file, so the next append starts on a fresh line
 * - The file is the source of truth; in-memory state is derived
 *
 * File format:
 * {"event":{...},"streamId":"...","version":1,"globalPosition":1,"appendedAt":"...","hash":"...","previousHash":"..."}
 */

import {
  appendFileSync,
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  truncateSync,
} from "node:fs";
import { dirname } from "node:path";
import { isDomainEvent } from "@potkeeper/types";
import type { Logger } from "pino";
import { IndexedEventStore } from "./base-store.js";
import type { EventStoreOptions, StoredEvent } from "./types.js";

export interface JsonlEventStoreOptions extends EventStoreOptions {
  readonly filePath: string;
  /** Told about lines skipped while loading */
  readonly logger?: Logger | undefined;
}

function parseLine(line: string): StoredEvent | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return undefined;
  }

  if (raw === null || typeof raw !== "object") {
    return undefined;
  }

  const record: Record<string, unknown> = { ...raw };
  const { event, streamId, version, globalPosition, appendedAt, hash, previousHash } = record;
  if (
    !isDomainEvent(event) ||
    typeof streamId !== "string" ||
    typeof version !== "number" ||
    typeof globalPosition !== "number" ||
    typeof appendedAt !== "string" ||
    typeof hash !== "string" ||
    typeof previousHash !== "string"
  ) {
    return undefined;
  }

  return { event, streamId, version, globalPosition, appendedAt, hash, previousHash };
}

/**
 * File-based JSONL event store.
 *
 * The in-memory index is rebuilt from the file on construction.
 */
export class JsonlEventStore extends IndexedEventStore {
  private readonly _filePath: string;

  /** Number of unreadable lines skipped while loading */
  private _skippedLines = 0;

  /** Bytes of torn final line removed while loading */
  private _truncatedBytes = 0;

  /**
   * If the file exists, events are loaded from it.
   * Otherwise it is created on first append; the parent directory
   * is created immediately.
   */
  constructor(options: JsonlEventStoreOptions) {
    super(options);
    this._filePath = options.filePath;
    mkdirSync(dirname(this._filePath), { recursive: true });
    this.load();

    if (this._skippedLines > 0) {
      options.logger?.warn(
        { filePath: this._filePath, skippedLines: this._skippedLines },
        "Skipped unreadable ledger lines",
      );
    }
    if (this._truncatedBytes > 0) {
      options.logger?.warn(
        { filePath: this._filePath, truncatedBytes: this._truncatedBytes },
        "Cut torn final ledger line",
      );
    }
  }

  get filePath(): string {
    return this._filePath;
  }

  get skippedLines(): number {
    return this._skippedLines;
  }

  get truncatedBytes(): number {
    return this._truncatedBytes;
  }

  protected override persist(batch: readonly StoredEvent[]): void {
    const data = batch.map((stored) => JSON.stringify(stored) + "\n").join("");
    const fd = openSync(this._filePath, "a");
    try {
      appendFileSync(fd, data, "utf-8");
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
  }

  private load(): void {
    if (!existsSync(this._filePath)) {
      return;
    }

    const raw = readFileSync(this._filePath);
    const end = raw.lastIndexOf(0x0a) + 1;
    if (end < raw.length) {
      truncateSync(this._filePath, end);
      this._truncatedBytes = raw.length - end;
      this._skippedLines += 1;
    }

    const content = raw.subarray(0, end).toString("utf-8");
    for (const line of content.split("\n")) {
      const trimmed = line.trim();
      if (trimmed.length === 0) {
        continue;
      }

      const stored = parseLine(trimmed);
      if (stored === undefined) {
        this._skippedLines += 1;
        continue;
      }

      this.index([stored]);
    }
  }
}
