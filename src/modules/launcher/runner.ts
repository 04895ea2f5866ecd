import { spawn, type ChildProcess } from "child_process";
import { logger } from "../../logger.js";
import { buildLaunchEnv } from "./env-builder.js";
import type { Executor, ExitOutcome, LaunchRequest } from "./types.js";

const log = logger.child({ module: "launcher" });

// ---------------------------------------------------------------------------
// Spawn executor
// ---------------------------------------------------------------------------

/**
 * Runs a game as a child process and waits for it to finish.
 *
 * The game inherits our stdin/stdout/stderr so console output and
 * prompts reach the terminal. Environment is the inherited one with
 * the game's overlay applied (see buildLaunchEnv).
 *
 * Never rejects: a spawn failure (missing binary, bad cwd, an argument or
 * variable spawn() refuses) resolves as { kind: "spawn-failed" }.
 */
export class SpawnExecutor implements Executor {
  execute(request: LaunchRequest): Promise<ExitOutcome> {
    const [file, ...args] = request.argv;

    return new Promise<ExitOutcome>((resolve) => {
      if (file === undefined) {
        resolve({ kind: "spawn-failed", message: "empty command" });
        return;
      }

      log.info({ argv: request.argv, cwd: request.cwd }, "Spawning game process");

      let child: ChildProcess;
      try {
        child = spawn(file, args, {
          cwd: request.cwd,
          env: buildLaunchEnv(request.env),
          stdio: "inherit",
        });
      } catch (err) {
        // Arguments spawn() refuses outright (e.g. a NUL byte) throw here instead of emitting "error"
        resolve({ kind: "spawn-failed", message: err instanceof Error ? err.message : String(err) });
        return;
      }

      // "error" fires instead of "exit" when the process could not be started
      child.once("error", (err) => {
        resolve({ kind: "spawn-failed", message: err.message });
      });

      child.once("exit", (code, signal) => {
        log.debug({ pid: child.pid, code, signal }, "Game process exited");
        if (code !== null) {
          resolve({ kind: "exited", code });
        } else {
          resolve({ kind: "signaled", signal: signal ?? "unknown" });
        }
      });
    });
  }
}
