// Re-export all types
export type { GameStats, StatsSummary } from "./ledger.js";
export type { LedgerStore } from "./store.js";

// Re-export ledger codec and reporting
export {
  MAX_PLAY_TIME_SECONDS,
  LedgerFormatError,
  PlayTimeOverflowError,
  formatTimestamp,
  parseTimestamp,
  formatStatsLine,
  parseStatsLine,
  parseLedger,
  serializeLedger,
  addPlayTime,
  recordSession,
  findStats,
  summarizeStats,
  formatPlayTime,
} from "./ledger.js";

// Re-export store
export { FileLedgerStore, loadLedger, savePlaySession } from "./store.js";
