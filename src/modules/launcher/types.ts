/**
 * Shared types for the launcher module.
 * Imported by runner and play directly, never through index.ts.
 */

import type { GameRecord } from "../catalog/index.js";
import type { GameStats } from "../stats/index.js";

export interface LaunchRequest {
  /** Program followed by its arguments. Never empty. */
  argv: ReadonlyArray<string>;
  /** Variables set on top of the inherited environment */
  env: Readonly<Record<string, string>>;
  /** Directory to start the program in; inherits ours when absent */
  cwd?: string;
}

export type ExitOutcome =
  | { kind: "exited"; code: number }
  | { kind: "signaled"; signal: string }
  | { kind: "spawn-failed"; message: string };

/**
 * Runs a program to completion. The real implementation spawns a child
 * process; tests substitute a fake.
 */
export interface Executor {
  execute(request: LaunchRequest): Promise<ExitOutcome>;
}

export interface PlaySession {
  game: GameRecord;
  startedAt: Date;
  elapsedSeconds: number;
}

export interface PlayedGame extends PlaySession {
  /** The game's ledger record after this session was added. */
  stats: GameStats;
}

export type PlayError =
  | { kind: "not-installed"; gameId: string }
  | { kind: "no-such-directory"; gameId: string; directory: string }
  | { kind: "spawn-failed"; gameId: string; command: string; message: string }
  | { kind: "command-failed"; gameId: string; command: string; code: number }
  | { kind: "stats-write-failed"; session: PlaySession; message: string };
