/**
 * ============================================================
 *  CLI commands — Unit Tests
 * ============================================================
 *
 * Every command runs against a hand-built Catalog, an in-memory
 * ledger and a fake executor. Output lines are collected into
 * an array and compared exactly.
 *
 * Module under test: src/cli/commands.ts
 * ============================================================
 */
import { test, describe } from "node:test";
import assert from "node:assert/strict";
import {
  listCommand,
  tagsCommand,
  playCommand,
  playRandomCommand,
  statsCommand,
  editCommand,
  formatSessionTime,
  describeCliError,
  type CommandContext,
} from "./commands.js";
import { Catalog } from "../modules/catalog/index.js";
import type { ExitOutcome } from "../modules/launcher/index.js";
import {
  FakeClock,
  FakeExecutor,
  MemoryLedgerStore,
  at,
  makeGame,
} from "../tests/helpers/index.js";

const START = at(2025, 11, 3, 19, 7, 0);

const CATALOG = new Catalog([
  makeGame("quake", { name: "Quake", tags: ["fps", "retro"] }),
  makeGame("doom", { name: "Doom", tags: ["fps", "retro"] }),
  makeGame("bg3", { name: "Baldur's Gate 3", tags: ["rpg"] }),
  makeGame("halflife", { name: "Half-Life", tags: ["fps"], installed: false }),
]);

const LEDGER = "doom\t5415\t2025-11-01 10:00:00\nquake\t2700\t2025-11-02 11:30:00\n";

function context(
  opts: { ledger?: string | null; outcome?: ExitOutcome; playSeconds?: number; random?: () => number } = {}
) {
  const lines: string[] = [];
  const clock = new FakeClock(START);
  const executor = new FakeExecutor(opts.outcome, () => clock.advance(opts.playSeconds ?? 0));
  const store = new MemoryLedgerStore(opts.ledger === undefined ? LEDGER : opts.ledger);
  const ctx: CommandContext = {
    catalog: CATALOG,
    store,
    executor,
    output: (line) => lines.push(line),
    now: clock.now,
    random: opts.random,
  };
  return { ctx, lines, executor, store };
}

// ---------------------------------------------------------------------------
// list / tags
// ---------------------------------------------------------------------------

describe("listCommand", () => {
  test("lists installed games sorted by id", () => {
    const { ctx, lines } = context();
    listCommand(ctx, []);
    assert.deepEqual(lines, ["bg3 - Baldur's Gate 3", "doom - Doom", "quake - Quake"]);
  });

  test("filters by selectors and hides uninstalled games", () => {
    const { ctx, lines } = context();
    listCommand(ctx, ["fps"]);
    assert.deepEqual(lines, ["doom - Doom", "quake - Quake"]);
  });

  test("a game id works as a selector", () => {
    const { ctx, lines } = context();
    listCommand(ctx, ["bg3", "fps,!retro"]);
    assert.deepEqual(lines, ["bg3 - Baldur's Gate 3"]);
  });
});

describe("tagsCommand", () => {
  test("prints every distinct tag sorted, including those of uninstalled games", () => {
    const { ctx, lines } = context();
    tagsCommand(ctx);
    assert.deepEqual(lines, ["fps", "retro", "rpg"]);
  });
});

// ---------------------------------------------------------------------------
// play / play-random
// ---------------------------------------------------------------------------

describe("playCommand", () => {
  test("requires a game id", async () => {
    const { ctx } = context();
    assert.deepEqual(await playCommand(ctx, undefined), { ok: false, error: { kind: "no-game-id" } });
  });

  test("an unknown id is an error", async () => {
    const { ctx, executor } = context();
    assert.deepEqual(await playCommand(ctx, "portal"), {
      ok: false,
      error: { kind: "no-such-game", gameId: "portal" },
    });
    assert.equal(executor.requests.length, 0);
  });

  test("prints the session and records it", async () => {
    const { ctx, lines, store } = context({ playSeconds: 3725 });
    const result = await playCommand(ctx, "bg3");

    assert.deepEqual(result, { ok: true, value: undefined });
    assert.deepEqual(lines, ["Game: Baldur's Gate 3 (bg3)", "Play Time: 1h2m5s (3725sec)"]);
    assert.equal(store.content, LEDGER + "bg3\t3725\t2025-11-03 19:07:00\n");
  });

  test("an uninstalled game is refused", async () => {
    const { ctx, lines } = context();
    const result = await playCommand(ctx, "halflife");
    assert.deepEqual(result, {
      ok: false,
      error: { kind: "play-failed", error: { kind: "not-installed", gameId: "halflife" } },
    });
    assert.deepEqual(lines, []);
  });

  test("a failed command prints nothing", async () => {
    const { ctx, lines } = context({ outcome: { kind: "exited", code: 2 } });
    const result = await playCommand(ctx, "doom");
    assert.equal(result.ok, false);
    assert.deepEqual(lines, []);
  });

  test("a failed stats write still prints the session", async () => {
    const { ctx, lines } = context({ ledger: "broken\n", playSeconds: 61 });
    const result = await playCommand(ctx, "doom");
    assert.equal(result.ok ? "ok" : result.error.kind, "play-failed");
    assert.deepEqual(lines, ["Game: Doom (doom)", "Play Time: 0h1m1s (61sec)"]);
  });
});

describe("playRandomCommand", () => {
  test("picks among installed games selected by the tags", async () => {
    // select(["fps"]) → [doom, quake]; 0.99 picks the last
    const { ctx, lines } = context({ random: () => 0.99 });
    await playRandomCommand(ctx, ["fps"]);
    assert.equal(lines[0], "Game: Quake (quake)");
  });

  test("no selectors picks among every installed game", async () => {
    // select([]) → [bg3, doom, quake]; 0 picks the first
    const { ctx, lines } = context({ random: () => 0 });
    await playRandomCommand(ctx, []);
    assert.equal(lines[0], "Game: Baldur's Gate 3 (bg3)");
  });

  test("nothing matching is an error", async () => {
    const { ctx, executor } = context();
    assert.deepEqual(await playRandomCommand(ctx, ["racing"]), {
      ok: false,
      error: { kind: "no-matching-games" },
    });
    assert.equal(executor.requests.length, 0);
  });
});

// ---------------------------------------------------------------------------
// stats
// ---------------------------------------------------------------------------

describe("statsCommand", () => {
  test("requires at least one id", () => {
    const { ctx } = context();
    assert.deepEqual(statsCommand(ctx, []), { ok: false, error: { kind: "no-game-id" } });
  });

  test("prints one block for a single game", () => {
    const { ctx, lines } = context();
    statsCommand(ctx, ["doom"]);
    assert.deepEqual(lines, [
      "Doom (doom) Statistics",
      "Play Time: 1h30m15s",
      "Last Played: 2025-11-01 10:00:00",
    ]);
  });

  test("prints blocks separated by blank lines and a total", () => {
    const { ctx, lines } = context();
    statsCommand(ctx, ["quake", "doom"]);
    assert.deepEqual(lines, [
      "Quake (quake) Statistics",
      "Play Time: 45m",
      "Last Played: 2025-11-02 11:30:00",
      "",
      "Doom (doom) Statistics",
      "Play Time: 1h30m15s",
      "Last Played: 2025-11-01 10:00:00",
      "",
      "Total Play Time: 2h15m15s",
    ]);
  });

  test("a single game without a record prints 'No stats found'", () => {
    const { ctx, lines } = context();
    statsCommand(ctx, ["bg3"]);
    assert.deepEqual(lines, ["No stats found"]);
  });

  test("games without a record are skipped when several are requested", () => {
    const { ctx, lines } = context();
    statsCommand(ctx, ["bg3", "doom"]);
    assert.deepEqual(lines, [
      "Doom (doom) Statistics",
      "Play Time: 1h30m15s",
      "Last Played: 2025-11-01 10:00:00",
    ]);
  });

  test("an unknown id fails before anything is printed", () => {
    const { ctx, lines } = context();
    assert.deepEqual(statsCommand(ctx, ["doom", "portal"]), {
      ok: false,
      error: { kind: "no-such-game", gameId: "portal" },
    });
    assert.deepEqual(lines, []);
  });

  test("a malformed ledger is reported", () => {
    const { ctx } = context({ ledger: "doom\tlots\t2025-11-01 10:00:00\n" });
    const result = statsCommand(ctx, ["doom"]);
    assert.equal(result.ok ? "ok" : result.error.kind, "stats-unreadable");
  });

  test("a missing ledger means no stats", () => {
    const { ctx, lines } = context({ ledger: null });
    statsCommand(ctx, ["doom"]);
    assert.deepEqual(lines, ["No stats found"]);
  });
});

// ---------------------------------------------------------------------------
// edit
// ---------------------------------------------------------------------------

describe("editCommand", () => {
  const CONFIG = "/home/test/.config/game-launch/games.toml";

  test("fails without $EDITOR", async () => {
    const executor = new FakeExecutor();
    assert.deepEqual(await editCommand(executor, CONFIG, undefined), { ok: false, error: { kind: "no-editor" } });
    assert.deepEqual(await editCommand(executor, CONFIG, "  "), { ok: false, error: { kind: "no-editor" } });
    assert.equal(executor.requests.length, 0);
  });

  test("runs the editor with its arguments and the config path", async () => {
    const executor = new FakeExecutor();
    const result = await editCommand(executor, CONFIG, "code --wait");
    assert.deepEqual(result, { ok: true, value: undefined });
    assert.deepEqual(executor.requests[0].argv, ["code", "--wait", CONFIG]);
  });

  test("an editor that cannot start is reported", async () => {
    const executor = new FakeExecutor({ kind: "spawn-failed", message: "spawn vim ENOENT" });
    assert.deepEqual(await editCommand(executor, CONFIG, "vim"), {
      ok: false,
      error: { kind: "editor-failed", message: "spawn vim ENOENT" },
    });
  });
});

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

describe("formatSessionTime / describeCliError", () => {
  test("shows every component even when zero", () => {
    assert.equal(formatSessionTime(0), "0h0m0s (0sec)");
    assert.equal(formatSessionTime(3661), "1h1m1s (3661sec)");
  });

  test("wraps play errors with their own message", () => {
    assert.equal(
      describeCliError({ kind: "play-failed", error: { kind: "not-installed", gameId: "halflife" } }),
      'Game "halflife" is not installed'
    );
  });

  test("names the missing game", () => {
    assert.equal(describeCliError({ kind: "no-such-game", gameId: "portal" }), "No such game: portal");
  });
});
