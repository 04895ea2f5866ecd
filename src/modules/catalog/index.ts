// Re-export all types
export type { GameRecord, CommandKey, ConfigError } from "./types.js";
export type { Settings, BuildContext, DirectoryAliases } from "./settings.js";
export type { GameDraft, CommandSource } from "./game-builder.js";
export type { OptionKey, OptionHandler } from "./options.js";

export { describeConfigError } from "./types.js";
export { SettingsSchema, DirectoriesSchema, DEFAULT_SETTINGS, DEFAULT_WIDTH, DEFAULT_HEIGHT } from "./settings.js";
export { newGameDraft, finalizeGame, isWineCommand } from "./game-builder.js";
export { OPTION_HANDLERS, OPTION_KEYS, isOptionKey } from "./options.js";
export { compileGame, compileConfig } from "./compiler.js";
export { Catalog, formatGame } from "./catalog.js";
export { splitCommandWords } from "./command-words.js";
