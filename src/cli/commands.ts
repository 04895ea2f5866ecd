/**
 * ============================================================
 *  CLI commands
 * ============================================================
 *
 * One function per subcommand. Each writes its lines through
 * `ctx.output` and returns a Result; main.ts owns argument
 * parsing, printing errors and the process exit code.
 *
 *   list [selectors...]         installed games as "id - name"
 *   tags                        every tag in the catalog
 *   play <id>                   run one game and record its play time
 *   play-random [selectors...]  run a random installed game
 *   stats <id...>               play time and last-played per game
 *   edit                        open the config file in $EDITOR
 * ============================================================
 */
import { formatGame, splitCommandWords, type Catalog, type GameRecord } from "../modules/catalog/index.js";
import {
  formatPlayTime,
  formatTimestamp,
  loadLedger,
  summarizeStats,
  type GameStats,
  type LedgerStore,
} from "../modules/stats/index.js";
import {
  describePlayError,
  playGame,
  type Executor,
  type PlayError,
  type PlaySession,
} from "../modules/launcher/index.js";
import { err, ok, type Result } from "../result.js";

export interface CommandContext {
  catalog: Catalog;
  store: LedgerStore;
  executor: Executor;
  output: (line: string) => void;
  now?: () => Date;
  random?: () => number;
}

export type CliError =
  | { kind: "no-game-id" }
  | { kind: "no-such-game"; gameId: string }
  | { kind: "no-matching-games" }
  | { kind: "no-editor" }
  | { kind: "editor-failed"; message: string }
  | { kind: "stats-unreadable"; message: string }
  | { kind: "play-failed"; error: PlayError };

export function describeCliError(error: CliError): string {
  switch (error.kind) {
    case "no-game-id":
      return "A game ID is required";
    case "no-such-game":
      return `No such game: ${error.gameId}`;
    case "no-matching-games":
      return "No installed game matches the given tags";
    case "no-editor":
      return "No default editor in $EDITOR";
    case "editor-failed":
      return `Could not edit the config file: ${error.message}`;
    case "stats-unreadable":
      return `Could not read game stats: ${error.message}`;
    case "play-failed":
      return describePlayError(error.error);
  }
}

// ---------------------------------------------------------------------------
// Listing
// ---------------------------------------------------------------------------

export function listCommand(ctx: CommandContext, selectors: ReadonlyArray<string>): Result<void, CliError> {
  for (const game of ctx.catalog.select(selectors)) {
    ctx.output(formatGame(game));
  }
  return ok(undefined);
}

export function tagsCommand(ctx: CommandContext): Result<void, CliError> {
  for (const tag of ctx.catalog.tags()) {
    ctx.output(tag);
  }
  return ok(undefined);
}

// ---------------------------------------------------------------------------
// Playing
// ---------------------------------------------------------------------------

/** "<H>h<M>m<S>s (<N>sec)" with every component shown, even when zero. */
export function formatSessionTime(elapsedSeconds: number): string {
  const hours = Math.floor(elapsedSeconds / 3600);
  const minutes = Math.floor((elapsedSeconds % 3600) / 60);
  const seconds = elapsedSeconds % 60;
  return `${hours}h${minutes}m${seconds}s (${elapsedSeconds}sec)`;
}

function reportSession(ctx: CommandContext, session: PlaySession): void {
  ctx.output(`Game: ${session.game.name} (${session.game.id})`);
  ctx.output(`Play Time: ${formatSessionTime(session.elapsedSeconds)}`);
}

async function runGame(ctx: CommandContext, game: GameRecord): Promise<Result<void, CliError>> {
  const result = await playGame(game, { executor: ctx.executor, store: ctx.store, now: ctx.now });
  if (result.ok) {
    reportSession(ctx, result.value);
    return ok(undefined);
  }
  // The game did run; show the session before reporting the failed write
  if (result.error.kind === "stats-write-failed") {
    reportSession(ctx, result.error.session);
  }
  return err({ kind: "play-failed", error: result.error });
}

export async function playCommand(
  ctx: CommandContext,
  gameId: string | undefined
): Promise<Result<void, CliError>> {
  if (gameId === undefined) return err({ kind: "no-game-id" });

  const game = ctx.catalog.find(gameId);
  if (!game) return err({ kind: "no-such-game", gameId });

  return runGame(ctx, game);
}

export async function playRandomCommand(
  ctx: CommandContext,
  selectors: ReadonlyArray<string>
): Promise<Result<void, CliError>> {
  const game = ctx.catalog.pickRandom(selectors, ctx.random);
  if (!game) return err({ kind: "no-matching-games" });

  return runGame(ctx, game);
}

// ---------------------------------------------------------------------------
// Stats
// ---------------------------------------------------------------------------

function readLedger(store: LedgerStore): Result<GameStats[], CliError> {
  try {
    return ok(loadLedger(store));
  } catch (error) {
    return err({ kind: "stats-unreadable", message: error instanceof Error ? error.message : String(error) });
  }
}

/**
 * Prints a block per requested game that has a record, separated by blank
 * lines, then a total when more than one block was printed. Every id must
 * name a configured game (installed or not); that is checked before
 * anything is printed.
 */
export function statsCommand(ctx: CommandContext, gameIds: ReadonlyArray<string>): Result<void, CliError> {
  if (gameIds.length === 0) return err({ kind: "no-game-id" });

  const games: GameRecord[] = [];
  for (const gameId of gameIds) {
    const game = ctx.catalog.find(gameId);
    if (!game) return err({ kind: "no-such-game", gameId });
    games.push(game);
  }

  const ledger = readLedger(ctx.store);
  if (!ledger.ok) return ledger;
  const summary = summarizeStats(ledger.value, gameIds);

  if (summary.entries.length === 0 && gameIds.length === 1) {
    ctx.output("No stats found");
    return ok(undefined);
  }

  summary.entries.forEach((stats, index) => {
    const name = games.find((game) => game.id === stats.id)?.name ?? stats.id;
    if (index > 0) ctx.output("");
    ctx.output(`${name} (${stats.id}) Statistics`);
    ctx.output(`Play Time: ${formatPlayTime(stats.playTimeSeconds)}`);
    ctx.output(`Last Played: ${formatTimestamp(stats.lastPlayed)}`);
  });

  if (summary.entries.length > 1) {
    ctx.output("");
    ctx.output(`Total Play Time: ${formatPlayTime(summary.totalSeconds)}`);
  }
  return ok(undefined);
}

// ---------------------------------------------------------------------------
// Edit
// ---------------------------------------------------------------------------

/**
 * Opens `configFile` in `$EDITOR`. The variable may carry arguments
 * ("code --wait"), split the same way as a game's `cmd`.
 */
export async function editCommand(
  executor: Executor,
  configFile: string,
  editor: string | undefined
): Promise<Result<void, CliError>> {
  if (editor === undefined || editor.trim() === "") return err({ kind: "no-editor" });

  const words = splitCommandWords(editor) ?? [editor];
  const outcome = await executor.execute({ argv: [...words, configFile], env: {} });

  switch (outcome.kind) {
    case "spawn-failed":
      return err({ kind: "editor-failed", message: outcome.message });
    case "exited":
      return outcome.code === 0
        ? ok(undefined)
        : err({ kind: "editor-failed", message: `editor exited with code ${outcome.code}` });
    case "signaled":
      return err({ kind: "editor-failed", message: `editor terminated by ${outcome.signal}` });
  }
}
