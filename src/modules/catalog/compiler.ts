import { parse } from "smol-toml";
import { ok, err, type Result } from "../../result.js";
import { logger } from "../../logger.js";
import { Catalog } from "./catalog.js";
import { newGameDraft, finalizeGame } from "./game-builder.js";
import { OPTION_HANDLERS, isOptionKey } from "./options.js";
import {
  SettingsSchema,
  DirectoriesSchema,
  formatIssues,
  type BuildContext,
} from "./settings.js";
import type { ConfigError, GameRecord } from "./types.js";

const log = logger.child({ module: "compiler" });

type Table = Record<string, unknown>;

function isTable(value: unknown): value is Table {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

// ---------------------------------------------------------------------------
// Per-game compilation
// ---------------------------------------------------------------------------

/**
 * Compiles one [games.<id>] table. Every key must be a registered option;
 * the first unknown key fails with `unrecognized-option`. Because every
 * handler only sets its own field, key order never changes the result.
 */
export function compileGame(
  gameId: string,
  table: Table,
  context: BuildContext
): Result<GameRecord, ConfigError> {
  let draft = newGameDraft(gameId);
  for (const [key, value] of Object.entries(table)) {
    if (!isOptionKey(key)) {
      return err({ kind: "unrecognized-option", gameId, option: key });
    }
    draft = OPTION_HANDLERS[key](draft, value);
  }
  return finalizeGame(draft, context);
}

// ---------------------------------------------------------------------------
// Whole-document compilation
// ---------------------------------------------------------------------------

function readContext(document: Table): Result<BuildContext, ConfigError> {
  const settings = SettingsSchema.safeParse(
    isTable(document["settings"]) ? document["settings"] : {}
  );
  if (!settings.success) {
    return err({ kind: "invalid-settings", message: formatIssues("settings", settings.error) });
  }

  // A [directories] value that is not a table is treated as empty
  const directories = DirectoriesSchema.safeParse(document["directories"] ?? {});

  return ok({
    settings: settings.data,
    directories: directories.success ? directories.data : new Map<string, string>(),
  });
}

/**
 * Parses the TOML document and compiles every game into a Catalog.
 * The first error aborts compilation; no partial catalog is returned.
 */
export function compileConfig(text: string): Result<Catalog, ConfigError> {
  let document: Table;
  try {
    document = parse(text);
  } catch (e) {
    return err({ kind: "toml", message: e instanceof Error ? e.message : String(e) });
  }

  const context = readContext(document);
  if (!context.ok) return context;

  const gamesTable = document["games"];
  if (gamesTable === undefined) return err({ kind: "missing-game-table" });
  if (!isTable(gamesTable)) return err({ kind: "game-not-table", gameId: "games" });

  const games: GameRecord[] = [];
  for (const [gameId, gameTable] of Object.entries(gamesTable)) {
    if (!isTable(gameTable)) return err({ kind: "game-not-table", gameId });

    const game = compileGame(gameId, gameTable, context.value);
    if (!game.ok) return game;
    games.push(game.value);
  }

  log.debug(
    { games: games.length, compositor: context.value.settings.useCompositor },
    "Compiled game catalog"
  );
  return ok(new Catalog(games));
}
