/**
 * Shared types for the catalog module.
 * Imported by game-builder, options, compiler and catalog directly, never
 * through index.ts, so the sub-modules have no circular imports.
 */

export interface GameRecord {
  /** Key under [games] in the config file. Also acts as an implicit tag. */
  readonly id: string;
  readonly name: string;
  /** Resolved at compile time; absent when neither dir nor dir_prefix is set. */
  readonly workingDirectory?: string;
  /** Fully wrapped command. Never empty. */
  readonly argv: ReadonlyArray<string>;
  /** Overlay merged on top of the inherited environment at launch. */
  readonly env: Readonly<Record<string, string>>;
  readonly tags: ReadonlyArray<string>;
  readonly installed: boolean;
}

/** Per-game keys that each produce a base command. */
export type CommandKey = "cmd" | "wine_exe" | "dosbox_config" | "scummvm_id";

export type ConfigError =
  | { kind: "toml"; message: string }
  | { kind: "missing-game-table" }
  | { kind: "game-not-table"; gameId: string }
  | { kind: "invalid-settings"; message: string }
  | { kind: "unrecognized-option"; gameId: string; option: string }
  | { kind: "missing-name"; gameId: string }
  | { kind: "missing-command"; gameId: string }
  | { kind: "conflicting-commands"; gameId: string; keys: CommandKey[] }
  | { kind: "invalid-command"; gameId: string; option: CommandKey; text: string }
  | { kind: "no-such-directory-prefix"; gameId: string; prefix: string };

export function describeConfigError(error: ConfigError): string {
  switch (error.kind) {
    case "toml":
      return error.message;
    case "missing-game-table":
      return "A 'games' table is required";
    case "game-not-table":
      return `Game "${error.gameId}" must be a table`;
    case "invalid-settings":
      return `Invalid settings: ${error.message}`;
    case "unrecognized-option":
      return `Unrecognized option for game "${error.gameId}": ${error.option}`;
    case "missing-name":
      return `Game missing name: ${error.gameId}`;
    case "missing-command":
      return `Game missing cmd: ${error.gameId}`;
    case "conflicting-commands":
      return `Game "${error.gameId}" sets more than one command: ${error.keys.join(", ")}`;
    case "invalid-command":
      return `Game "${error.gameId}" has an unsupported ${error.option}: ${error.text}`;
    case "no-such-directory-prefix":
      return `Game ${error.gameId} has nonexistent directory prefix: ${error.prefix}`;
  }
}
