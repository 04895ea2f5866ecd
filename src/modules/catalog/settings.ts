import { z } from "zod";

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_WIDTH = 1280;
export const DEFAULT_HEIGHT = 720;

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

/** A pixel size. Values that are not numbers at all read as absent. */
function dimension(fallback: number) {
  return z.preprocess(
    (value) => (typeof value === "number" ? value : undefined),
    z
      .number()
      .int("Must be a whole number of pixels")
      .positive("Must be greater than 0")
      .default(fallback)
  );
}

const Flag = z.boolean().optional().catch(undefined);

/**
 * The optional [settings] table. Every field has a default, so an absent
 * table parses to 1280×720 with the compositor off. A field of the wrong type
 * takes its default; a number that is no usable size is still an error.
 *
 * `use_compositor` is accepted as an alias of `use_gamescope`; when both are
 * given, `use_gamescope` wins.
 */
export const SettingsSchema = z
  .object({
    width: dimension(DEFAULT_WIDTH),
    height: dimension(DEFAULT_HEIGHT),
    use_gamescope: Flag,
    use_compositor: Flag,
  })
  .transform((raw) => ({
    width: raw.width,
    height: raw.height,
    useCompositor: raw.use_gamescope ?? raw.use_compositor ?? false,
  }));

export type Settings = z.infer<typeof SettingsSchema>;

/**
 * The optional [directories] table: alias name → path. Entries whose value is
 * not a string are dropped, so referencing one fails like an unknown alias.
 */
export const DirectoriesSchema = z
  .record(z.string(), z.unknown())
  .transform((table) => {
    const aliases = new Map<string, string>();
    for (const [name, value] of Object.entries(table)) {
      if (typeof value === "string") aliases.set(name, value);
    }
    return aliases;
  });

export type DirectoryAliases = ReadonlyMap<string, string>;

/** Global inputs every game is finalized against. */
export interface BuildContext {
  settings: Settings;
  directories: DirectoryAliases;
}

export const DEFAULT_SETTINGS: Settings = SettingsSchema.parse({});

/** Joins zod issues into one line, each prefixed with its path under `root`. */
export function formatIssues(root: string, error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = [root, ...issue.path].join(".");
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}
