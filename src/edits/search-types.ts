import { NotFoundError } from '../errors.js';

/** Server search type number for each variant type name. */
export const SEARCH_TYPES: Readonly<Record<string, number>> = {
  movie: 1,
  show: 2,
  season: 3,
  episode: 4,
  trailer: 5,
  comic: 6,
  person: 7,
  artist: 8,
  album: 9,
  track: 10,
  picture: 11,
  clip: 12,
  photo: 13,
  photoalbum: 14,
  playlist: 15,
  playlistFolder: 16,
  collection: 18,
  optimizedVersion: 42,
  userPlaylistItem: 1001,
};

/**
 * Search type number for a type name. A known number, or its string
 * form, is returned as a number.
 */
export function searchType(type: string | number): number {
  const known = Object.values(SEARCH_TYPES);
  const numeric = typeof type === 'number' ? type : Number(type);
  if (String(type).trim() !== '' && known.includes(numeric)) return numeric;

  const value = typeof type === 'string' && Object.hasOwn(SEARCH_TYPES, type) ? SEARCH_TYPES[type] : undefined;
  if (value === undefined) {
    throw new NotFoundError(`Unknown search type: ${type}`);
  }
  return value;
}
