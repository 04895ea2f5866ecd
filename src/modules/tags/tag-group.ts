/**
 * tag-group.ts — Conjunctive tag queries
 *
 * A query is a comma-separated list of literals, each optionally prefixed
 * with "!" for negation:
 *
 *   "rpg,!finished"   → has "rpg" AND does not have "finished"
 *
 * Disjunction is expressed by the caller passing several queries; a game is
 * selected when any one of them matches.
 *
 * There is no escaping: a tag name containing "," or a leading "!" cannot be
 * expressed.
 */

const NOT_PREFIX = "!";
const SEPARATOR = ",";

export interface Tag {
  name: string;
  negated: boolean;
}

export type TagGroup = ReadonlyArray<Tag>;

/**
 * Parses a query string into a TagGroup. Never fails: an empty segment
 * becomes a tag with an empty name, which only matches a game carrying the
 * empty tag.
 */
export function parseTagGroup(query: string): TagGroup {
  return query.split(SEPARATOR).map((segment) =>
    segment.startsWith(NOT_PREFIX)
      ? { name: segment.slice(NOT_PREFIX.length), negated: true }
      : { name: segment, negated: false }
  );
}

/** True when every tag in the group is satisfied by `candidateTags`. */
export function matchesTagGroup(group: TagGroup, candidateTags: Iterable<string>): boolean {
  const tagSet = new Set(candidateTags);
  return group.every((tag) => tagSet.has(tag.name) !== tag.negated);
}

/** The minimum a game needs to be matched against selectors. */
export interface Taggable {
  id: string;
  tags: ReadonlyArray<string>;
}

/**
 * Returns true when any selector matches the game's tags, or matches the
 * singleton set holding the game's own id (so an id works as a selector).
 */
export function gameMatchesSelectors(game: Taggable, selectors: ReadonlyArray<string>): boolean {
  return selectors
    .map(parseTagGroup)
    .some((group) => matchesTagGroup(group, game.tags) || matchesTagGroup(group, [game.id]));
}
