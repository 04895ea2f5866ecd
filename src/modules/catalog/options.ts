import { z } from "zod";
import { splitCommandWords } from "./command-words.js";
import {
  type GameDraft,
  withName,
  withCommand,
  withDir,
  withDirPrefix,
  withEnv,
  withTags,
  withOverlay,
  withFpsLimit,
  withCompositor,
  withNativeGraphics,
  withInstalled,
} from "./game-builder.js";

// ---------------------------------------------------------------------------
// Option handlers
// ---------------------------------------------------------------------------

/** Applies one per-game key to a draft. */
export type OptionHandler = (draft: GameDraft, raw: unknown) => GameDraft;

/**
 * Pairs a value shape with the setter it feeds. A value that does not match
 * the shape leaves the draft untouched, exactly as if the key were absent.
 */
function option<T>(
  shape: z.ZodType<T, z.ZodTypeDef, unknown>,
  apply: (draft: GameDraft, value: T) => GameDraft
): OptionHandler {
  return (draft, raw) => {
    const parsed = shape.safeParse(raw);
    return parsed.success ? apply(draft, parsed.data) : draft;
  };
}

function isString(value: unknown): value is string {
  return typeof value === "string";
}

function stringValues(table: Record<string, unknown>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(table)) {
    if (isString(value)) result[key] = value;
  }
  return result;
}

/**
 * Every key a [games.<id>] table may contain. Anything else is rejected by
 * the compiler, so a typo such as `use_manohud` fails loudly.
 */
export const OPTION_HANDLERS = {
  cmd: option(z.string(), (draft, text) =>
    withCommand(draft, "cmd", text, splitCommandWords(text))
  ),
  dir: option(z.string(), withDir),
  dir_prefix: option(z.string(), (draft, prefix) =>
    prefix === "" ? draft : withDirPrefix(draft, prefix)
  ),
  dosbox_config: option(z.string(), (draft, conf) =>
    withCommand(draft, "dosbox_config", conf, ["dosbox", "-conf", conf])
  ),
  env: option(z.record(z.string(), z.unknown()), (draft, table) =>
    withEnv(draft, stringValues(table))
  ),
  fps_limit: option(z.number().int(), withFpsLimit),
  installed: option(z.boolean(), withInstalled),
  name: option(z.string(), withName),
  scummvm_id: option(z.string(), (draft, id) =>
    withCommand(draft, "scummvm_id", id, ["scummvm", id])
  ),
  tags: option(z.array(z.unknown()), (draft, tags) => withTags(draft, tags.filter(isString))),
  use_gamescope: option(z.boolean(), withCompositor),
  use_mangohud: option(z.boolean(), withOverlay),
  use_vk: option(z.boolean(), withNativeGraphics),
  wine_exe: option(z.string(), (draft, exe) => {
    const words = splitCommandWords(exe);
    return withCommand(draft, "wine_exe", exe, words && ["wine", ...words]);
  }),
} as const satisfies Record<string, OptionHandler>;

export type OptionKey = keyof typeof OPTION_HANDLERS;

export function isOptionKey(key: string): key is OptionKey {
  return Object.hasOwn(OPTION_HANDLERS, key);
}

export const OPTION_KEYS: ReadonlyArray<OptionKey> = Object.keys(OPTION_HANDLERS)
  .filter(isOptionKey)
  .sort();
