#!/usr/bin/env node
import { readFileSync } from "fs";
import { Command } from "commander";
import { logger } from "../logger.js";
import type { Result } from "../result.js";
import { compileConfig, describeConfigError, type Catalog } from "../modules/catalog/index.js";
import { FileLedgerStore } from "../modules/stats/index.js";
import { SpawnExecutor } from "../modules/launcher/index.js";
import { ensureDirectories, resolvePaths, CONFIG_FILE_NAME, type AppPaths } from "../modules/paths/index.js";
import {
  describeCliError,
  editCommand,
  listCommand,
  playCommand,
  playRandomCommand,
  statsCommand,
  tagsCommand,
  type CliError,
  type CommandContext,
} from "./commands.js";

const log = logger.child({ module: "cli" });

type CommandResult = Result<void, CliError> | Promise<Result<void, CliError>>;

function fail(message: string): void {
  console.error(message);
  process.exitCode = 1;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ---------------------------------------------------------------------------
// Bootstrapping
// ---------------------------------------------------------------------------

function preparePaths(): AppPaths | null {
  const paths = resolvePaths();
  try {
    ensureDirectories(paths);
  } catch (error) {
    fail(`Could not create directories: ${errorMessage(error)}`);
    return null;
  }
  return paths;
}

function loadCatalog(paths: AppPaths): Catalog | null {
  let text: string;
  try {
    text = readFileSync(paths.configFile, "utf-8");
  } catch (error) {
    log.debug({ path: paths.configFile, err: errorMessage(error) }, "Config file unreadable");
    fail(`Error: No ${CONFIG_FILE_NAME} config file found (expected at ${paths.configFile})`);
    return null;
  }

  const compiled = compileConfig(text);
  if (!compiled.ok) {
    fail(describeConfigError(compiled.error));
    return null;
  }
  return compiled.value;
}

function report(result: Result<void, CliError>): void {
  if (!result.ok) fail(describeCliError(result.error));
}

/** Loads the catalog and runs `command` against the real file store and executor. */
async function withCatalog(command: (ctx: CommandContext) => CommandResult): Promise<void> {
  const paths = preparePaths();
  if (!paths) return;
  const catalog = loadCatalog(paths);
  if (!catalog) return;

  report(
    await command({
      catalog,
      store: new FileLedgerStore(paths.statsFile),
      executor: new SpawnExecutor(),
      output: (line) => console.log(line),
    })
  );
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

const program = new Command();

program
  .name("game")
  .description("Launch games from a TOML catalog and track play time")
  .version("0.1.0");

program
  .command("list")
  .description('List games in the format "game_id - name"')
  .argument("[tags...]", "tag queries; a game is listed when any query matches (e.g. fps,!retro)")
  .action((tags: string[]) => withCatalog((ctx) => listCommand(ctx, tags)));

program
  .command("tags")
  .description("List all tags")
  .action(() => withCatalog((ctx) => tagsCommand(ctx)));

program
  .command("play")
  .description("Play a game, specified by its game ID")
  .argument("[game_id]", "id of the game to play")
  .action((gameId: string | undefined) => withCatalog((ctx) => playCommand(ctx, gameId)));

program
  .command("play-random")
  .description("Play a random game")
  .argument("[tags...]", "only pick among games matching any of these tag queries")
  .action((tags: string[]) => withCatalog((ctx) => playRandomCommand(ctx, tags)));

program
  .command("stats")
  .description("Show game statistics")
  .argument("[game_ids...]", "ids of the games to report on")
  .action((gameIds: string[]) => withCatalog((ctx) => statsCommand(ctx, gameIds)));

program
  .command("edit")
  .description("Edit the config file")
  .action(async () => {
    const paths = preparePaths();
    if (!paths) return;
    report(await editCommand(new SpawnExecutor(), paths.configFile, process.env["EDITOR"]));
  });

await program.parseAsync(process.argv);
