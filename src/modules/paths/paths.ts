/**
 * ============================================================
 *  Paths — where the config and the stats ledger live
 * ============================================================
 *
 * Layout (defaults):
 *   ~/.config/game-launch/
 *   └── games.toml              ← $GAME_LAUNCH_CONFIG overrides the file
 *   ~/.local/share/game-launch/
 *   └── game_stats.tsv          ← $GAME_LAUNCH_DATA_DIR overrides the dir
 *
 * resolvePaths() is pure: environment and home directory are passed
 * in, so it is testable without touching the real ones.
 * ============================================================
 */
import { mkdirSync } from "fs";
import { dirname, join, resolve } from "path";
import { homedir } from "os";
import { logger } from "../../logger.js";

const log = logger.child({ module: "paths" });

export const APP_NAME = "game-launch";
export const CONFIG_FILE_NAME = "games.toml";
export const STATS_FILE_NAME = "game_stats.tsv";

export interface AppPaths {
  configFile: string;
  dataDir: string;
  statsFile: string;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === "" ? undefined : value;
}

export function resolvePaths(
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir()
): AppPaths {
  const configOverride = nonEmpty(env["GAME_LAUNCH_CONFIG"]);
  const dataOverride = nonEmpty(env["GAME_LAUNCH_DATA_DIR"]);

  const configFile = configOverride
    ? resolve(configOverride)
    : join(home, ".config", APP_NAME, CONFIG_FILE_NAME);
  const dataDir = dataOverride ? resolve(dataOverride) : join(home, ".local", "share", APP_NAME);

  return { configFile, dataDir, statsFile: join(dataDir, STATS_FILE_NAME) };
}

/**
 * Creates the config and data directories if they do not already exist.
 * Throws if either cannot be created.
 */
export function ensureDirectories(paths: AppPaths): void {
  for (const dir of [dirname(paths.configFile), paths.dataDir]) {
    mkdirSync(dir, { recursive: true });
    log.debug({ dir }, "Ensured directory");
  }
}
