/** Bumped whenever the persisted entry layout changes */
export const INDEX_FORMAT_VERSION = 1;
