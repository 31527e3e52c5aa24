/**
 * @tokenledger/archive — File-based JSONL archive node.
 *
 * Stores one transaction per line in a `.jsonl` file.
 *
 * Crash safety:
 * - Each batch is written with a single write + fsync before it is
 *   acknowledged to the ledger
 * - A torn last line is cut off the file on load, so the next batch
 *   starts on a fresh line
 * - The file is the source of truth; in-memory state is derived
 *
 * File format:
 * {"index":0,"kind":"mint","to":{"owner":"alice"},"amount":"1000","timestamp":1700000000000}
 */

import {
  openSync,
  closeSync,
  appendFileSync,
  readFileSync,
  existsSync,
  fsyncSync,
  truncateSync,
  mkdirSync,
} from "node:fs";
import { dirname } from "node:path";
import type { Transaction } from "@tokenledger/types";
import { transactionFromJson, transactionToJson } from "@tokenledger/types";
import { InMemoryArchive } from "./in-memory-archive.js";
import type { ArchiveOptions } from "./types.js";
import { ArchiveError } from "./types.js";

/**
 * Options for creating a JsonlArchive.
 */
export interface JsonlArchiveOptions extends ArchiveOptions {
  /** Path to the JSONL file */
  readonly filePath: string;
}

/**
 * Durable archive.
 *
 * Transactions are persisted as newline-delimited JSON. The in-memory
 * index is rebuilt from the file on construction.
 */
export class JsonlArchive extends InMemoryArchive {
  private readonly _filePath: string;

  /**
   * If the file exists, transactions are loaded from it; otherwise it is
   * created on first append. The parent directory is created if missing.
   *
   * @throws {ArchiveError} CORRUPT_ARCHIVE if a complete line breaks the
   *   index sequence
   */
  constructor(options: JsonlArchiveOptions) {
    super(options);
    this._filePath = options.filePath;

    mkdirSync(dirname(this._filePath), { recursive: true });
    this._loadFromFile();
  }

  /**
   * Get the file path this archive writes to.
   */
  get filePath(): string {
    return this._filePath;
  }

  protected override _persist(batch: readonly Transaction[]): void {
    const lines = batch
      .map((tx) => JSON.stringify(transactionToJson(tx)) + "\n")
      .join("");

    const fd = openSync(this._filePath, "a");
    try {
      appendFileSync(fd, lines, "utf-8");
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
  }

  /**
   * Load transactions from the JSONL file into memory.
   *
   * A final line that does not parse is a torn write from an unclean
   * shutdown; it is truncated away.
   */
  private _loadFromFile(): void {
    if (!existsSync(this._filePath)) {
      return;
    }

    const content = readFileSync(this._filePath, "utf-8");
    const rawLines = content.split("\n");

    let lastRecord = rawLines.length - 1;
    while (lastRecord >= 0 && (rawLines[lastRecord] ?? "").trim() === "") {
      lastRecord--;
    }

    // Byte offset of the end of the last complete line
    let completeEnd = 0;
    let offset = 0;

    for (let i = 0; i <= lastRecord; i++) {
      const raw = rawLines[i] ?? "";
      const lineEnd = offset + Buffer.byteLength(raw, "utf-8");
      const nextOffset = i < rawLines.length - 1 ? lineEnd + 1 : lineEnd;
      const line = raw.trim();

      if (line === "") {
        offset = nextOffset;
        completeEnd = nextOffset;
        continue;
      }

      let tx: Transaction;
      try {
        tx = transactionFromJson(JSON.parse(line));
      } catch (err: unknown) {
        if (i === lastRecord) {
          truncateSync(this._filePath, completeEnd);
          return;
        }
        throw new ArchiveError(
          "CORRUPT_ARCHIVE",
          `Unreadable record on line ${i + 1} of "${this._filePath}": ${err instanceof Error ? err.message : String(err)}`,
        );
      }

      if (tx.index !== this._transactions.length) {
        throw new ArchiveError(
          "CORRUPT_ARCHIVE",
          `Line ${i + 1} of "${this._filePath}" holds index ${tx.index}, expected ${this._transactions.length}`,
        );
      }
      this._transactions.push(tx);
      offset = nextOffset;
      completeEnd = nextOffset;
    }

    if (content.length > 0 && !content.endsWith("\n")) {
      appendFileSync(this._filePath, "\n", "utf-8");
    }
  }
}
