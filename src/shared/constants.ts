/** Default page size for title searches when ?limit is absent. */
export const DEFAULT_SEARCH_PAGE_SIZE = 10;

/** Default page size for the catalogue listing. */
export const DEFAULT_PAGE_SIZE = 20;

/** Requests above this are clamped, not rejected. */
export const MAX_PAGE_SIZE = 100;

export const MAX_TITLE_LENGTH = 255;

export const MIN_RATING = 0;
export const MAX_RATING = 5;

export const SONGS_TABLE = 'music_data';
