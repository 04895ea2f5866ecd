import { readFileSync, writeFileSync, renameSync, mkdirSync } from "fs";
import { dirname } from "path";
import { logger } from "../../logger.js";
import { parseLedger, serializeLedger, recordSession, type GameStats } from "./ledger.js";

const log = logger.child({ module: "stats" });

// ---------------------------------------------------------------------------
// Storage seam
// ---------------------------------------------------------------------------

/**
 * Where the ledger text lives. The file store is used at run time; tests
 * substitute an in-memory one.
 */
export interface LedgerStore {
  /** Returns the ledger text, or null when there is none yet. */
  read(): string | null;
  /** Replaces the whole ledger. */
  write(content: string): void;
}

/**
 * Ledger stored in a single TSV file. Writes go to a sibling temp file that
 * is then renamed over the ledger, so a crash never leaves half a file.
 */
export class FileLedgerStore implements LedgerStore {
  constructor(readonly path: string) {}

  read(): string | null {
    try {
      return readFileSync(this.path, "utf-8");
    } catch (err) {
      // Missing or unreadable: start from an empty ledger
      log.debug({ path: this.path, err }, "No readable stats file");
      return null;
    }
  }

  write(content: string): void {
    mkdirSync(dirname(this.path), { recursive: true });
    const tmpPath = `${this.path}.tmp`;
    writeFileSync(tmpPath, content, "utf-8");
    renameSync(tmpPath, this.path);
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/** Reads and parses the ledger. Throws LedgerFormatError on a malformed line. */
export function loadLedger(store: LedgerStore): GameStats[] {
  const content = store.read();
  return content === null ? [] : parseLedger(content);
}

/**
 * Read-modify-write of one finished session. Returns the ledger as written.
 * Throws if the existing ledger is malformed, the play time would overflow,
 * or the write fails; nothing is written in those cases.
 */
export function savePlaySession(
  store: LedgerStore,
  gameId: string,
  elapsedSeconds: number,
  startedAt: Date
): GameStats[] {
  const updated = recordSession(loadLedger(store), gameId, elapsedSeconds, startedAt);
  store.write(serializeLedger(updated));
  log.debug({ gameId, elapsedSeconds, records: updated.length }, "Recorded play session");
  return updated;
}
