import { isAbsolute, join } from "path";
import { ok, err, type Result } from "../../result.js";
import type { BuildContext } from "./settings.js";
import type { CommandKey, ConfigError, GameRecord } from "./types.js";

// ---------------------------------------------------------------------------
// Wrapper constants
// ---------------------------------------------------------------------------

/** First token of a command run through the Windows compatibility layer. */
export const WINE = "wine";

/** Performance overlay launcher, used when the compositor is off. */
export const MANGOHUD = "mangohud";

export const MANGOHUD_CONFIG = "MANGOHUD_CONFIG";

/** Forces the builtin DirectX implementations instead of DXVK/VKD3D. */
export const WINEDLLOVERRIDES = "WINEDLLOVERRIDES";
export const BUILTIN_DIRECTX_OVERRIDES = "*d3d9,*d3d10,*d3d10_1,*d3d10core,*d3d11,*dxgi=b";

/** Fixed gamescope invocation, before the optional -r / --mangoapp flags. */
export function gamescopePrefix(width: number, height: number): string[] {
  return ["gamescope", "-W", String(width), "-H", String(height), "-f", "--force-grab-cursor"];
}

// ---------------------------------------------------------------------------
// Draft
// ---------------------------------------------------------------------------

/**
 * One command-producing option as it was applied. `argv` is null when the
 * option's text could not be split into words.
 */
export interface CommandSource {
  key: CommandKey;
  text: string;
  argv: string[] | null;
}

/**
 * Everything collected for one game before finalizing. Every field except the
 * id is optional; nothing is validated until finalizeGame().
 */
export interface GameDraft {
  readonly id: string;
  readonly name?: string;
  readonly commands: ReadonlyArray<CommandSource>;
  readonly dir?: string;
  readonly dirPrefix?: string;
  readonly env?: Readonly<Record<string, string>>;
  readonly tags?: ReadonlyArray<string>;
  /** use_mangohud; unset means "on for wine commands". */
  readonly overlay?: boolean;
  readonly fpsLimit?: number;
  /** Per-game use_gamescope; unset means "follow settings". */
  readonly compositor?: boolean;
  /** use_vk; only an explicit false has an effect. */
  readonly nativeGraphics?: boolean;
  readonly installed?: boolean;
}

export function newGameDraft(id: string): GameDraft {
  return { id, commands: [] };
}

// ---------------------------------------------------------------------------
// Setters: each returns a new draft and never fails
// ---------------------------------------------------------------------------

export function withName(draft: GameDraft, name: string): GameDraft {
  return { ...draft, name };
}

export function withCommand(
  draft: GameDraft,
  key: CommandKey,
  text: string,
  argv: string[] | null
): GameDraft {
  return { ...draft, commands: [...draft.commands, { key, text, argv }] };
}

export function withDir(draft: GameDraft, dir: string): GameDraft {
  return { ...draft, dir };
}

export function withDirPrefix(draft: GameDraft, dirPrefix: string): GameDraft {
  return { ...draft, dirPrefix };
}

export function withEnv(draft: GameDraft, env: Record<string, string>): GameDraft {
  return { ...draft, env };
}

export function withTags(draft: GameDraft, tags: string[]): GameDraft {
  return { ...draft, tags };
}

export function withOverlay(draft: GameDraft, overlay: boolean): GameDraft {
  return { ...draft, overlay };
}

export function withFpsLimit(draft: GameDraft, fpsLimit: number): GameDraft {
  return { ...draft, fpsLimit };
}

export function withCompositor(draft: GameDraft, compositor: boolean): GameDraft {
  return { ...draft, compositor };
}

export function withNativeGraphics(draft: GameDraft, nativeGraphics: boolean): GameDraft {
  return { ...draft, nativeGraphics };
}

export function withInstalled(draft: GameDraft, installed: boolean): GameDraft {
  return { ...draft, installed };
}

// ---------------------------------------------------------------------------
// Finalize
// ---------------------------------------------------------------------------

export function isWineCommand(argv: ReadonlyArray<string>): boolean {
  return argv.length > 0 && argv[0] === WINE;
}

/**
 * Joins the resolved prefix and dir. An absolute dir replaces the prefix;
 * an empty result means "no working directory".
 */
function joinGameDir(prefix: string, dir: string): string {
  if (prefix === "") return dir;
  if (dir === "") return prefix;
  return isAbsolute(dir) ? dir : join(prefix, dir);
}

function resolveWorkingDirectory(
  draft: GameDraft,
  context: BuildContext
): Result<string | undefined, ConfigError> {
  let prefix = "";
  if (draft.dirPrefix !== undefined) {
    const aliased = context.directories.get(draft.dirPrefix);
    if (aliased === undefined) {
      return err({ kind: "no-such-directory-prefix", gameId: draft.id, prefix: draft.dirPrefix });
    }
    prefix = aliased;
  }

  // dir may name an alias directly, without a separate dir_prefix
  const rawDir = draft.dir ?? "";
  const dir = context.directories.get(rawDir) ?? rawDir;

  const joined = joinGameDir(prefix, dir);
  return ok(joined === "" ? undefined : joined);
}

function resolveBaseCommand(draft: GameDraft): Result<string[], ConfigError> {
  if (draft.commands.length > 1) {
    const keys = draft.commands.map((c) => c.key).sort();
    return err({ kind: "conflicting-commands", gameId: draft.id, keys });
  }
  const [source] = draft.commands;
  if (source !== undefined && source.argv === null) {
    return err({ kind: "invalid-command", gameId: draft.id, option: source.key, text: source.text });
  }
  const argv = source?.argv ?? [];
  if (argv.length === 0) {
    return err({ kind: "missing-command", gameId: draft.id });
  }
  return ok(argv);
}

/**
 * Validates the draft and resolves it into an immutable GameRecord:
 *
 *   1. name and exactly one usable command are required
 *   2. an unset overlay flag defaults to "is this a wine command"
 *   3. dir_prefix / dir are resolved against the [directories] aliases
 *   4. the command is wrapped in gamescope (outermost) or mangohud
 *   5. MANGOHUD_CONFIG / WINEDLLOVERRIDES are added to the environment
 */
export function finalizeGame(draft: GameDraft, context: BuildContext): Result<GameRecord, ConfigError> {
  if (draft.name === undefined || draft.name === "") {
    return err({ kind: "missing-name", gameId: draft.id });
  }

  const base = resolveBaseCommand(draft);
  if (!base.ok) return base;
  const command = base.value;

  const overlay = draft.overlay ?? isWineCommand(command);

  const workingDirectory = resolveWorkingDirectory(draft, context);
  if (!workingDirectory.ok) return workingDirectory;

  const { settings } = context;
  const compositor = draft.compositor ?? settings.useCompositor;

  let argv: string[];
  if (compositor) {
    argv = gamescopePrefix(settings.width, settings.height);
    if (draft.fpsLimit !== undefined) argv.push("-r", String(draft.fpsLimit));
    if (overlay) argv.push("--mangoapp");
    argv.push("--", ...command);
  } else if (overlay) {
    argv = [MANGOHUD, ...command];
  } else {
    argv = command;
  }

  const env: Record<string, string> = { ...draft.env };
  if (overlay && draft.fpsLimit !== undefined) {
    env[MANGOHUD_CONFIG] = `fps_limit=${draft.fpsLimit}`;
  }
  if (draft.nativeGraphics === false) {
    env[WINEDLLOVERRIDES] = BUILTIN_DIRECTX_OVERRIDES;
  }

  const record: GameRecord = {
    id: draft.id,
    name: draft.name,
    argv,
    env,
    tags: [...(draft.tags ?? [])],
    installed: draft.installed ?? true,
    ...(workingDirectory.value !== undefined ? { workingDirectory: workingDirectory.value } : {}),
  };
  return ok(Object.freeze(record));
}
