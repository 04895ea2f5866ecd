/**
 * ============================================================
 *  Stats ledger — play time per game
 * ============================================================
 *
 * One line per game, three tab-separated fields:
 *
 *   <game id>\t<total seconds>\t<YYYY-MM-DD HH:MM:SS>
 *
 * The timestamp is written in local time without an offset and read
 * back as local time for that calendar date. Records therefore shift
 * if the machine's time zone changes between writes and reads.
 *
 * Blank lines are ignored. Everything here is pure; reading and
 * writing the file lives in store.ts.
 * ============================================================
 */

/** Play time is stored as an unsigned 32-bit count of seconds. */
export const MAX_PLAY_TIME_SECONDS = 0xffff_ffff;

const FIELD_SEPARATOR = "\t";
const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;
const SECONDS_PATTERN = /^\d+$/;

export interface GameStats {
  /** Game id; may name a game no longer in the config. */
  readonly id: string;
  readonly playTimeSeconds: number;
  readonly lastPlayed: Date;
}

export class LedgerFormatError extends Error {
  constructor(
    readonly lineNumber: number,
    readonly reason: string
  ) {
    super(`Malformed stats line ${lineNumber}: ${reason}`);
    this.name = "LedgerFormatError";
  }
}

export class PlayTimeOverflowError extends Error {
  constructor(
    readonly gameId: string,
    readonly current: number,
    readonly added: number
  ) {
    super(
      `Play time for "${gameId}" would exceed ${MAX_PLAY_TIME_SECONDS} seconds ` +
      `(${current} + ${added})`
    );
    this.name = "PlayTimeOverflowError";
  }
}

// ---------------------------------------------------------------------------
// Timestamps
// ---------------------------------------------------------------------------

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/** Formats `date` in local time as "YYYY-MM-DD HH:MM:SS". */
export function formatTimestamp(date: Date): string {
  return (
    `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Parses "YYYY-MM-DD HH:MM:SS" as a local time. Returns null when the text
 * does not match the format or names a calendar date or clock time that
 * does not exist (Feb 30, 24:00:00).
 *
 * A wall-clock time skipped by a daylight-saving change is accepted and
 * moved forward by the gap, the way Date resolves it.
 */
export function parseTimestamp(text: string): Date | null {
  const match = TIMESTAMP_PATTERN.exec(text);
  if (!match) return null;

  const [, year, month, day, hour, minute, second] = match.map(Number);

  // Validate in UTC, which has no gaps. setUTCFullYear keeps years 0-99 literal
  const check = new Date(0);
  check.setUTCFullYear(year, month - 1, day);
  check.setUTCHours(hour, minute, second, 0);
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day ||
    check.getUTCHours() !== hour ||
    check.getUTCMinutes() !== minute ||
    check.getUTCSeconds() !== second
  ) {
    return null;
  }

  const date = new Date(0);
  date.setFullYear(year, month - 1, day);
  date.setHours(hour, minute, second, 0);
  return date;
}

// ---------------------------------------------------------------------------
// Line codec
// ---------------------------------------------------------------------------

export function formatStatsLine(stats: GameStats): string {
  if (/[\t\r\n]/.test(stats.id)) {
    throw new RangeError(`Game id ${JSON.stringify(stats.id)} cannot be stored: it contains a tab or newline`);
  }
  return [stats.id, String(stats.playTimeSeconds), formatTimestamp(stats.lastPlayed)].join(FIELD_SEPARATOR);
}

/**
 * Parses one non-blank ledger line.
 * Throws LedgerFormatError (tagged with `lineNumber`) on any malformed field.
 */
export function parseStatsLine(line: string, lineNumber = 1): GameStats {
  const fields = line.split(FIELD_SEPARATOR);
  if (fields.length !== 3) {
    throw new LedgerFormatError(lineNumber, `expected 3 tab-separated fields, got ${fields.length}`);
  }
  const [id, seconds, timestamp] = fields;

  if (!SECONDS_PATTERN.test(seconds) || Number(seconds) > MAX_PLAY_TIME_SECONDS) {
    throw new LedgerFormatError(lineNumber, `invalid play time "${seconds}"`);
  }

  const lastPlayed = parseTimestamp(timestamp);
  if (!lastPlayed) {
    throw new LedgerFormatError(lineNumber, `invalid timestamp "${timestamp}"`);
  }

  return { id, playTimeSeconds: Number(seconds), lastPlayed };
}

// ---------------------------------------------------------------------------
// Whole ledger
// ---------------------------------------------------------------------------

export function parseLedger(content: string): GameStats[] {
  const records: GameStats[] = [];
  content.split(/\r?\n/).forEach((line, index) => {
    if (line.trim() === "") return;
    records.push(parseStatsLine(line, index + 1));
  });
  return records;
}

/** One line per record, each terminated by a newline. */
export function serializeLedger(records: ReadonlyArray<GameStats>): string {
  return records.map((stats) => formatStatsLine(stats) + "\n").join("");
}

// ---------------------------------------------------------------------------
// Updates
// ---------------------------------------------------------------------------

/**
 * Adds `seconds` to the record's play time.
 * Throws PlayTimeOverflowError rather than wrapping past MAX_PLAY_TIME_SECONDS.
 */
export function addPlayTime(stats: GameStats, seconds: number): GameStats {
  if (!Number.isInteger(seconds) || seconds < 0) {
    throw new RangeError(`Play time must be a non-negative whole number of seconds, got ${seconds}`);
  }
  const total = stats.playTimeSeconds + seconds;
  if (total > MAX_PLAY_TIME_SECONDS) {
    throw new PlayTimeOverflowError(stats.id, stats.playTimeSeconds, seconds);
  }
  return { ...stats, playTimeSeconds: total };
}

/**
 * Merges one finished session into the ledger:
 *   • the record for `gameId` gets `elapsedSeconds` added and `startedAt`
 *     as its last-played time
 *   • every other record passes through unchanged
 *   • if no record matched, a new one is appended
 */
export function recordSession(
  ledger: ReadonlyArray<GameStats>,
  gameId: string,
  elapsedSeconds: number,
  startedAt: Date
): GameStats[] {
  let found = false;
  const updated = ledger.map((stats) => {
    if (stats.id !== gameId) return stats;
    found = true;
    return { ...addPlayTime(stats, elapsedSeconds), lastPlayed: startedAt };
  });

  if (!found) {
    updated.push(addPlayTime({ id: gameId, playTimeSeconds: 0, lastPlayed: startedAt }, elapsedSeconds));
  }
  return updated;
}

// ---------------------------------------------------------------------------
// Reporting
// ---------------------------------------------------------------------------

export function findStats(ledger: ReadonlyArray<GameStats>, gameId: string): GameStats | undefined {
  return ledger.find((stats) => stats.id === gameId);
}

export interface StatsSummary {
  /** Records for the requested ids that have one, in request order. */
  entries: GameStats[];
  totalSeconds: number;
}

export function summarizeStats(ledger: ReadonlyArray<GameStats>, gameIds: ReadonlyArray<string>): StatsSummary {
  const entries: GameStats[] = [];
  for (const id of gameIds) {
    const stats = findStats(ledger, id);
    if (stats) entries.push(stats);
  }
  const totalSeconds = entries.reduce((sum, stats) => sum + stats.playTimeSeconds, 0);
  return { entries, totalSeconds };
}

/**
 * Renders seconds as the non-zero parts of "<H>h<M>m<S>s".
 *
 * @example
 *   formatPlayTime(5415) → "1h30m15s"
 *   formatPlayTime(2700) → "45m"
 *   formatPlayTime(0)    → ""
 */
export function formatPlayTime(totalSeconds: number): string {
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  let formatted = "";
  if (hours > 0) formatted += `${hours}h`;
  if (minutes > 0) formatted += `${minutes}m`;
  if (seconds > 0) formatted += `${seconds}s`;
  return formatted;
}
