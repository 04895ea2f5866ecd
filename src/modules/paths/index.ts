export type { AppPaths } from "./paths.js";
export {
  APP_NAME,
  CONFIG_FILE_NAME,
  STATS_FILE_NAME,
  resolvePaths,
  ensureDirectories,
} from "./paths.js";
