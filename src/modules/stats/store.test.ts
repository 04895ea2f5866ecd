/**
 * ============================================================
 *  store — Unit Tests
 * ============================================================
 *
 * Tests savePlaySession() against an in-memory store, and the
 * FileLedgerStore against a fresh temporary directory that is
 * removed after the suite.
 *
 * Module under test: src/modules/stats/store.ts
 * ============================================================
 */
import { test, describe, after } from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, rmSync, readFileSync, existsSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { FileLedgerStore, loadLedger, savePlaySession } from "./store.js";
import { LedgerFormatError } from "./ledger.js";
import { MemoryLedgerStore, at } from "../../tests/helpers/index.js";

const START = at(2025, 11, 3, 19, 7, 0);

// ---------------------------------------------------------------------------
// savePlaySession
// ---------------------------------------------------------------------------

describe("savePlaySession — read-modify-write", () => {
  test("a missing ledger is treated as empty", () => {
    const store = new MemoryLedgerStore(null);
    savePlaySession(store, "doom", 90, START);
    assert.equal(store.content, "doom\t90\t2025-11-03 19:07:00\n");
  });

  test("a second session adds to the existing record", () => {
    const store = new MemoryLedgerStore("doom\t90\t2025-11-01 08:00:00\n");
    savePlaySession(store, "doom", 30, START);
    assert.equal(store.content, "doom\t120\t2025-11-03 19:07:00\n");
  });

  test("records for games no longer configured pass through", () => {
    const store = new MemoryLedgerStore("retired\t5\t2020-01-01 00:00:00\n");
    savePlaySession(store, "doom", 30, START);
    assert.equal(store.content, "retired\t5\t2020-01-01 00:00:00\ndoom\t30\t2025-11-03 19:07:00\n");
  });

  test("a malformed ledger is not overwritten", () => {
    const store = new MemoryLedgerStore("garbage\n");
    assert.throws(() => savePlaySession(store, "doom", 30, START), LedgerFormatError);
    assert.deepEqual(store.writes, []);
  });

  test("write failures propagate", () => {
    const store = new MemoryLedgerStore(null, { failWrites: true });
    assert.throws(() => savePlaySession(store, "doom", 30, START), /EACCES/);
  });
});

// ---------------------------------------------------------------------------
// FileLedgerStore
// ---------------------------------------------------------------------------

describe("FileLedgerStore — on disk", () => {
  const dir = mkdtempSync(join(tmpdir(), "game-launch-stats-"));
  after(() => rmSync(dir, { recursive: true, force: true }));

  test("reads a missing file as null", () => {
    const store = new FileLedgerStore(join(dir, "missing.tsv"));
    assert.equal(store.read(), null);
    assert.deepEqual(loadLedger(store), []);
  });

  test("creates parent directories and replaces the whole file", () => {
    const path = join(dir, "nested", "game_stats.tsv");
    const store = new FileLedgerStore(path);
    savePlaySession(store, "doom", 60, START);
    savePlaySession(store, "quake", 5, START);
    assert.equal(
      readFileSync(path, "utf-8"),
      "doom\t60\t2025-11-03 19:07:00\nquake\t5\t2025-11-03 19:07:00\n"
    );
    assert.equal(existsSync(`${path}.tmp`), false);
  });
});
