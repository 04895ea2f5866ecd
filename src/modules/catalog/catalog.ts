import { gameMatchesSelectors } from "../tags/index.js";
import type { GameRecord } from "./types.js";

/** "<id> - <name>", the line format used by `list`. */
export function formatGame(game: GameRecord): string {
  return `${game.id} - ${game.name}`;
}

/**
 * The compiled, read-only set of games for one invocation.
 */
export class Catalog {
  private readonly games: ReadonlyMap<string, GameRecord>;

  constructor(games: Iterable<GameRecord>) {
    this.games = new Map([...games].map((game) => [game.id, game]));
  }

  get size(): number {
    return this.games.size;
  }

  find(id: string): GameRecord | undefined {
    return this.games.get(id);
  }

  /** Every game, sorted by id. */
  all(): GameRecord[] {
    return [...this.games.values()].sort((a, b) => compareIds(a.id, b.id));
  }

  /**
   * Installed games selected by `selectors`, sorted by id.
   * No selectors selects every installed game.
   */
  select(selectors: ReadonlyArray<string>): GameRecord[] {
    return this.all()
      .filter((game) => game.installed)
      .filter((game) => selectors.length === 0 || gameMatchesSelectors(game, selectors));
  }

  /** Distinct tags across the whole catalog, sorted. */
  tags(): string[] {
    const tags = new Set<string>();
    for (const game of this.games.values()) {
      for (const tag of game.tags) tags.add(tag);
    }
    return [...tags].sort();
  }

  /**
   * Picks one installed game selected by `selectors` uniformly at random.
   * `random` must return a value in [0, 1), like Math.random.
   */
  pickRandom(
    selectors: ReadonlyArray<string>,
    random: () => number = Math.random
  ): GameRecord | undefined {
    const candidates = this.select(selectors);
    if (candidates.length === 0) return undefined;
    return candidates[Math.floor(random() * candidates.length)];
  }
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
