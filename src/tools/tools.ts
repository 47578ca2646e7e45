/**
 * tools.ts: createTools() factory for the MCP tools.
 *
 * createTools(client) is called once per server; every tool shares the
 * client and therefore its token, scopes and concurrency limit.
 *
 * Tool pattern:
 *   1. Parse and validate inputs with zod (inputSchema)
 *   2. Call the appropriate client method
 *   3. Return toolSuccess(result) or classifyError(error)
 *
 * Multi-page tools take max_pages and walk forward from the first page with
 * collectForward(); has_more tells the agent whether the walk stopped early.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { SpotifyClient } from '../client/SpotifyClient.js';
import { flattenItems } from '../client/paging.js';
import type { Artist, SavedTrack, Track } from '../client/schemas/index.js';
import { classifyError, toolSuccess } from './errors.js';

const MAX_PAGES_LIMIT = 20;

function summarizeTrack(track: Track) {
  return {
    id: track.id,
    name: track.name,
    artists: track.artists.map((a) => a.name),
    album: track.album.name,
    duration_ms: track.duration_ms,
    uri: track.uri,
  };
}

function summarizeSavedTrack(saved: SavedTrack) {
  return { ...summarizeTrack(saved.track), added_at: saved.added_at };
}

function summarizeArtist(artist: Artist) {
  return {
    id: artist.id,
    name: artist.name,
    genres: artist.genres,
    popularity: artist.popularity,
    uri: artist.uri,
  };
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createTools(client: SpotifyClient): McpServer {
  const server = new McpServer({
    name: 'spotify-web-client',
    version: '0.1.0',
  });

  // -------------------------------------------------------------------------
  // get_profile
  // -------------------------------------------------------------------------
  server.registerTool(
    'get_profile',
    {
      description: 'Get the Spotify profile of the user the access token belongs to: id, display name, country and subscription level.',
      inputSchema: {},
    },
    async () => {
      try {
        const profile = await client.getCurrentUserProfile();
        return toolSuccess({
          id: profile.id,
          display_name: profile.display_name,
          country: profile.country ?? null,
          product: profile.product ?? null,
        });
      } catch (error) {
        return classifyError(error);
      }
    },
  );

  // -------------------------------------------------------------------------
  // list_saved_tracks
  // -------------------------------------------------------------------------
  server.registerTool(
    'list_saved_tracks',
    {
      description: 'List tracks saved in the user\'s library, most recently saved first. Fetches up to max_pages pages of `limit` tracks starting at `offset`. Check has_more and next_offset to continue.',
      inputSchema: {
        limit: z.number().int().min(1).max(50).optional().default(50).describe('Tracks per page (1-50)'),
        offset: z.number().int().min(0).optional().default(0).describe('Index of the first track to return'),
        max_pages: z.number().int().min(1).max(MAX_PAGES_LIMIT).optional().default(1).describe(
          `Number of pages to fetch in one call (1-${MAX_PAGES_LIMIT})`,
        ),
      },
    },
    async ({ limit, offset, max_pages }) => {
      try {
        const first = await client.getSavedTracks({ limit, offset });
        const pages = await first.collectForward(max_pages);
        const last = pages[pages.length - 1];
        const items = flattenItems(pages);
        return toolSuccess({
          items: items.map(summarizeSavedTrack),
          total: first.total,
          has_more: last.next !== null,
          next_offset: last.next !== null ? last.offset + last.size : null,
        });
      } catch (error) {
        return classifyError(error);
      }
    },
  );

  // -------------------------------------------------------------------------
  // check_saved
  // -------------------------------------------------------------------------
  server.registerTool(
    'check_saved',
    {
      description: 'Check whether tracks, albums, episodes or shows are saved in the user\'s library. Accepts ids, spotify: URIs or open.spotify.com links.',
      inputSchema: {
        type: z.enum(['tracks', 'albums', 'episodes', 'shows']).describe('Kind of item the ids refer to'),
        ids: z.array(z.string().min(1)).min(1).describe('Ids, URIs or links of the items to check'),
      },
    },
    async ({ type, ids }) => {
      try {
        const saved = await client.libraryContains(type, ids);
        return toolSuccess(ids.map((id, i) => ({ id, saved: saved[i] })));
      } catch (error) {
        return classifyError(error);
      }
    },
  );

  // -------------------------------------------------------------------------
  // list_followed_artists
  // -------------------------------------------------------------------------
  server.registerTool(
    'list_followed_artists',
    {
      description: 'List artists the user follows. Cursor-paged: pass next_after from a previous response as `after` to continue.',
      inputSchema: {
        limit: z.number().int().min(1).max(50).optional().default(50).describe('Artists per page (1-50)'),
        after: z.string().optional().describe('Cursor from next_after of a previous call'),
        max_pages: z.number().int().min(1).max(MAX_PAGES_LIMIT).optional().default(1).describe(
          `Number of pages to fetch in one call (1-${MAX_PAGES_LIMIT})`,
        ),
      },
    },
    async ({ limit, after, max_pages }) => {
      try {
        const first = await client.getFollowedArtists({ limit, after });
        const pages = await first.collectForward(max_pages);
        const last = pages[pages.length - 1];
        return toolSuccess({
          items: flattenItems(pages).map(summarizeArtist),
          total: first.total,
          has_more: last.next !== null,
          next_after: last.next !== null ? last.cursor.after : null,
        });
      } catch (error) {
        return classifyError(error);
      }
    },
  );

  // -------------------------------------------------------------------------
  // list_top_items
  // -------------------------------------------------------------------------
  server.registerTool(
    'list_top_items',
    {
      description: 'List the user\'s top artists or tracks for a time range (short_term ≈ 4 weeks, medium_term ≈ 6 months, long_term ≈ years).',
      inputSchema: {
        type: z.enum(['artists', 'tracks']).describe('Whether to list top artists or top tracks'),
        time_range: z.enum(['short_term', 'medium_term', 'long_term']).optional().default('medium_term'),
        limit: z.number().int().min(1).max(50).optional().default(20).describe('Items to return (1-50)'),
        offset: z.number().int().min(0).optional().default(0),
      },
    },
    async ({ type, time_range, limit, offset }) => {
      try {
        if (type === 'artists') {
          const page = await client.getTopArtists({ limit, offset, timeRange: time_range });
          return toolSuccess({ items: page.items.map(summarizeArtist), total: page.total, has_more: page.next !== null });
        }
        const page = await client.getTopTracks({ limit, offset, timeRange: time_range });
        return toolSuccess({ items: page.items.map(summarizeTrack), total: page.total, has_more: page.next !== null });
      } catch (error) {
        return classifyError(error);
      }
    },
  );

  // -------------------------------------------------------------------------
  // get_episodes
  // -------------------------------------------------------------------------
  server.registerTool(
    'get_episodes',
    {
      description: 'Get podcast episodes by id, URI or link, including the user\'s resume position. Unknown ids return null in their position.',
      inputSchema: {
        ids: z.array(z.string().min(1)).min(1).describe('Episode ids, URIs or links'),
        market: z.string().length(2).optional().describe('ISO 3166-1 alpha-2 country code'),
      },
    },
    async ({ ids, market }) => {
      try {
        const episodes = await client.getEpisodes(ids, market);
        return toolSuccess(
          episodes.map((episode) =>
            episode === null
              ? null
              : {
                  id: episode.id,
                  name: episode.name,
                  show: episode.show?.name ?? null,
                  duration_ms: episode.duration_ms,
                  release_date: episode.release_date,
                  resume_position_ms: episode.resume_point?.resume_position_ms ?? null,
                  fully_played: episode.resume_point?.fully_played ?? null,
                },
          ),
        );
      } catch (error) {
        return classifyError(error);
      }
    },
  );

  return server;
}
