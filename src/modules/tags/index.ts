export type { Tag, TagGroup, Taggable } from "./tag-group.js";
export { parseTagGroup, matchesTagGroup, gameMatchesSelectors } from "./tag-group.js";
