import { InvalidUriError } from './types.js';

export type SpotifyObjectType = 'track' | 'album' | 'artist' | 'episode' | 'show' | 'playlist' | 'user';

const URI_PATTERN = /^spotify:([a-z]+):([^:]+)$/;
const OPEN_URL_PATTERN = /^https?:\/\/open\.spotify\.com\/(?:intl-[a-z-]+\/)?([a-z]+)\/([^/?#]+)/;

/**
 * toSpotifyId: accepts a bare id, a `spotify:<type>:<id>` URI or an
 * open.spotify.com link and returns the id.
 *
 * A URI or link for a different object type, or one with a malformed
 * percent-escape, fails with InvalidUriError.
 */
export function toSpotifyId(type: SpotifyObjectType, input: string): string {
  const trimmed = input.trim();
  const match = URI_PATTERN.exec(trimmed) ?? OPEN_URL_PATTERN.exec(trimmed);
  if (!match) {
    if (trimmed.length === 0 || trimmed.includes(':') || trimmed.includes('/')) {
      throw new InvalidUriError(input, type);
    }
    return trimmed;
  }
  const [, foundType, id] = match;
  if (foundType !== type) {
    throw new InvalidUriError(input, type);
  }
  try {
    return decodeURIComponent(id);
  } catch (error) {
    if (error instanceof URIError) throw new InvalidUriError(input, type);
    throw error;
  }
}
