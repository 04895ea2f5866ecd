import { statSync } from "fs";
import { quote } from "shell-quote";
import type { GameRecord } from "../catalog/index.js";
import { savePlaySession, type LedgerStore } from "../stats/index.js";
import { logger } from "../../logger.js";
import { err, ok, type Result } from "../../result.js";
import type { Executor, PlayError, PlayedGame, PlaySession } from "./types.js";

const log = logger.child({ module: "play" });

export interface PlayDependencies {
  executor: Executor;
  store: LedgerStore;
  /** Clock; defaults to the wall clock. */
  now?: () => Date;
  /** Defaults to a stat() of the path. */
  directoryExists?: (path: string) => boolean;
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

/** Shell-quoted rendering of a game's command, for error messages. */
export function renderCommand(argv: ReadonlyArray<string>): string {
  return quote([...argv]);
}

// ---------------------------------------------------------------------------
// Play
// ---------------------------------------------------------------------------

/**
 * Runs one game to completion and records the session in the stats ledger.
 *
 * Flow:
 *   1. Refuse uninstalled games and games whose working directory is gone
 *   2. Note the start time and run the command, waiting for it to exit
 *   3. A non-zero exit code is a failure and nothing is recorded;
 *      exit code 0 or termination by a signal counts as a played session
 *   4. Add the whole seconds elapsed to the game's ledger record
 *
 * A failure in step 4 still reports how long the game ran, through the
 * `session` carried by the "stats-write-failed" error.
 */
export async function playGame(
  game: GameRecord,
  deps: PlayDependencies
): Promise<Result<PlayedGame, PlayError>> {
  const now = deps.now ?? (() => new Date());
  const directoryExists = deps.directoryExists ?? isDirectory;

  if (!game.installed) {
    return err({ kind: "not-installed", gameId: game.id });
  }
  if (game.workingDirectory !== undefined && !directoryExists(game.workingDirectory)) {
    return err({ kind: "no-such-directory", gameId: game.id, directory: game.workingDirectory });
  }

  const startedAt = now();
  const outcome = await deps.executor.execute({
    argv: game.argv,
    env: game.env,
    cwd: game.workingDirectory,
  });
  const finishedAt = now();

  switch (outcome.kind) {
    case "spawn-failed":
      return err({
        kind: "spawn-failed",
        gameId: game.id,
        command: renderCommand(game.argv),
        message: outcome.message,
      });
    case "exited":
      if (outcome.code !== 0) {
        return err({
          kind: "command-failed",
          gameId: game.id,
          command: renderCommand(game.argv),
          code: outcome.code,
        });
      }
      break;
    case "signaled":
      log.info({ gameId: game.id, signal: outcome.signal }, "Game terminated by signal");
      break;
  }

  const elapsedSeconds = Math.max(0, Math.floor((finishedAt.getTime() - startedAt.getTime()) / 1000));
  const session: PlaySession = { game, startedAt, elapsedSeconds };

  try {
    const ledger = savePlaySession(deps.store, game.id, elapsedSeconds, startedAt);
    const stats = ledger.find((entry) => entry.id === game.id);
    if (!stats) {
      return err({ kind: "stats-write-failed", session, message: "record missing after write" });
    }
    return ok({ ...session, stats });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.error({ gameId: game.id, err: message }, "Failed to record play session");
    return err({ kind: "stats-write-failed", session, message });
  }
}

export function describePlayError(error: PlayError): string {
  switch (error.kind) {
    case "not-installed":
      return `Game "${error.gameId}" is not installed`;
    case "no-such-directory":
      return `Directory "${error.directory}" for game "${error.gameId}" does not exist`;
    case "spawn-failed":
      return `Failed to start "${error.command}": ${error.message}`;
    case "command-failed":
      return `Command "${error.command}" failed with exit code ${error.code}`;
    case "stats-write-failed":
      return `Failed to record play time for "${error.session.game.id}": ${error.message}`;
  }
}
