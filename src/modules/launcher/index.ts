// Re-export all types
export type {
  LaunchRequest,
  ExitOutcome,
  Executor,
  PlaySession,
  PlayedGame,
  PlayError,
} from "./types.js";

// Re-export env-builder
export { buildLaunchEnv } from "./env-builder.js";

// Re-export runner
export { SpawnExecutor } from "./runner.js";

// Re-export play
export { playGame, describePlayError, renderCommand, type PlayDependencies } from "./play.js";
