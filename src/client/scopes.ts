/**
 * scopes.ts: Authorization scopes the Spotify Web API grants to a user token.
 *
 * Endpoint methods declare the scopes they need and call requireScopes()
 * before any request is issued.
 */

export const SpotifyScope = {
  UgcImageUpload: 'ugc-image-upload',
  UserReadPlaybackState: 'user-read-playback-state',
  UserModifyPlaybackState: 'user-modify-playback-state',
  UserReadCurrentlyPlaying: 'user-read-currently-playing',
  AppRemoteControl: 'app-remote-control',
  Streaming: 'streaming',
  PlaylistReadPrivate: 'playlist-read-private',
  PlaylistReadCollaborative: 'playlist-read-collaborative',
  PlaylistModifyPrivate: 'playlist-modify-private',
  PlaylistModifyPublic: 'playlist-modify-public',
  UserFollowModify: 'user-follow-modify',
  UserFollowRead: 'user-follow-read',
  UserReadPlaybackPosition: 'user-read-playback-position',
  UserTopRead: 'user-top-read',
  UserReadRecentlyPlayed: 'user-read-recently-played',
  UserLibraryModify: 'user-library-modify',
  UserLibraryRead: 'user-library-read',
  UserReadEmail: 'user-read-email',
  UserReadPrivate: 'user-read-private',
} as const;

export type Scope = (typeof SpotifyScope)[keyof typeof SpotifyScope];

const KNOWN_SCOPES: ReadonlySet<string> = new Set<string>(Object.values(SpotifyScope));

export function isScope(value: string): value is Scope {
  return KNOWN_SCOPES.has(value);
}

/**
 * Parses the space-separated `scope` string Spotify returns alongside a token.
 * Unknown scope names are dropped.
 */
export function parseScopes(raw: string): Scope[] {
  return raw
    .split(/\s+/)
    .filter((s) => s.length > 0)
    .filter(isScope);
}
