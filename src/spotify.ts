import { AuthFailure } from './errors.js';
import { isRecord, readArray, readNumber, readString } from './library.js';
import type { FetchLibraryOptions, LibraryService } from './library.js';
import { isExpired } from './tokens.js';
import type { AuthTokens, TokenStore } from './tokens.js';
import type { LibrarySnapshot, Playlist, StreamingTrack } from './types.js';

const TOKEN_URL = 'https://accounts.spotify.com/api/token';
const API_BASE_URL = 'https://api.spotify.com/v1';
const SERVICE = 'spotify';

export interface SpotifyLibraryOptions {
  readonly clientId: string;
  readonly clientSecret?: string;
  readonly tokenStore: TokenStore;
  readonly fetchImpl?: typeof fetch;
  readonly now?: () => Date;
}

/**
 * Picks the widest image, which Spotify lists as album artwork in several sizes.
 */
export const selectImage = (images: unknown): string | undefined => {
  let best: { url: string; width: number } | undefined;
  for (const image of readArray(images)) {
    if (!isRecord(image)) {
      continue;
    }
    const url = readString(image.url);
    const width = readNumber(image.width) ?? 0;
    if (url && (!best || width > best.width)) {
      best = { url, width };
    }
  }
  return best?.url;
};

/**
 * Converts a saved-track or playlist-item payload into a streaming track.
 * Local files, podcast episodes and entries without an id are skipped.
 */
export const mapSpotifyTrack = (item: unknown): StreamingTrack | undefined => {
  const track = isRecord(item) && isRecord(item.track) ? item.track : item;
  if (!isRecord(track) || track.is_local === true) {
    return undefined;
  }
  const type = readString(track.type);
  if (type && type.toLowerCase() !== 'track') {
    return undefined;
  }

  const trackId = readString(track.id);
  const title = readString(track.name);
  const artists = readArray(track.artists).flatMap((artist) => (isRecord(artist) ? readString(artist.name) ?? [] : []));
  if (!trackId || !title) {
    return undefined;
  }

  const album: Record<string, unknown> = isRecord(track.album) ? track.album : {};
  const externalIds: Record<string, unknown> = isRecord(track.external_ids) ? track.external_ids : {};
  const durationMs = readNumber(track.duration_ms);

  return {
    service: SERVICE,
    trackId,
    title,
    artist: artists[0] ?? 'Unknown Artist',
    artists,
    album: readString(album.name) ?? '',
    trackNumber: readNumber(track.track_number),
    durationSeconds: durationMs ? Math.round(durationMs / 1000) : 0,
    isrc: readString(externalIds.isrc),
    artworkUrl: selectImage(album.images),
    releaseDate: readString(album.release_date),
    explicit: typeof track.explicit === 'boolean' ? track.explicit : undefined,
  };
};

/**
 * Spotify Web API library client. Token acquisition happens elsewhere; this client refreshes
 * expired tokens and retries a request once after a 401.
 */
export class SpotifyLibrary implements LibraryService {
  readonly name = SERVICE;
  private tokens: AuthTokens | undefined;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => Date;

  constructor(private readonly options: SpotifyLibraryOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? (() => new Date());
  }

  async fetchLibrary(options: FetchLibraryOptions): Promise<LibrarySnapshot> {
    await this.ensureAccessToken();

    const playlists: Playlist[] = [];
    if (options.includePlaylists) {
      for await (const entry of this.paginate('/me/playlists?limit=50')) {
        if (!isRecord(entry)) {
          continue;
        }
        const id = readString(entry.id);
        if (!id) {
          continue;
        }
        const owner = isRecord(entry.owner) ? readString(entry.owner.display_name) ?? readString(entry.owner.id) : undefined;
        playlists.push({
          id,
          name: readString(entry.name) ?? 'Untitled Playlist',
          owner,
          tracks: await this.collectTracks(`/playlists/${encodeURIComponent(id)}/tracks?limit=100`),
        });
      }
    }

    const likedTracks = options.includeLiked ? await this.collectTracks('/me/tracks?limit=50') : [];

    console.info(`Fetched Spotify library: ${playlists.length} playlists, ${likedTracks.length} liked tracks`);
    return { service: SERVICE, fetchedAt: this.now(), playlists, likedTracks };
  }

  /**
   * Exchanges the stored refresh token for a new access token and persists it.
   */
  async refreshTokens(): Promise<AuthTokens> {
    const current = this.tokens ?? (await this.options.tokenStore.load(SERVICE));
    if (!current?.refreshToken) {
      throw new AuthFailure(SERVICE, 'refresh token is not available');
    }

    const body = new URLSearchParams({
      grant_type: 'refresh_token',
      refresh_token: current.refreshToken,
      client_id: this.options.clientId,
    });
    if (this.options.clientSecret) {
      body.set('client_secret', this.options.clientSecret);
    }

    let response: Response;
    try {
      response = await this.fetchImpl(TOKEN_URL, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body,
      });
    } catch (error) {
      throw new AuthFailure(SERVICE, 'token refresh request failed', error);
    }
    if (!response.ok) {
      throw new AuthFailure(SERVICE, `token refresh rejected (${response.status})`);
    }

    const payload: unknown = await response.json();
    const accessToken = isRecord(payload) ? readString(payload.access_token) : undefined;
    if (!isRecord(payload) || !accessToken) {
      throw new AuthFailure(SERVICE, 'token refresh returned no access token');
    }

    const expiresIn = readNumber(payload.expires_in) ?? 3600;
    const tokens: AuthTokens = {
      accessToken,
      refreshToken: readString(payload.refresh_token) ?? current.refreshToken,
      expiresAt: new Date(this.now().getTime() + expiresIn * 1000),
      scope: readString(payload.scope),
      tokenType: readString(payload.token_type) ?? 'Bearer',
    };
    this.tokens = tokens;
    await this.options.tokenStore.save(SERVICE, tokens);
    console.info('Spotify access token refreshed');
    return tokens;
  }

  private async ensureAccessToken(): Promise<AuthTokens> {
    this.tokens ??= await this.options.tokenStore.load(SERVICE);
    if (!this.tokens) {
      throw new AuthFailure(SERVICE, 'client is not authenticated');
    }
    if (isExpired(this.tokens, this.now())) {
      return this.refreshTokens();
    }
    return this.tokens;
  }

  private async collectTracks(pathWithQuery: string): Promise<StreamingTrack[]> {
    const tracks: StreamingTrack[] = [];
    for await (const item of this.paginate(pathWithQuery)) {
      const track = mapSpotifyTrack(item);
      if (track) {
        tracks.push(track);
      }
    }
    return tracks;
  }

  private async *paginate(pathWithQuery: string): AsyncGenerator<unknown> {
    let next: string | undefined = `${API_BASE_URL}${pathWithQuery}`;
    while (next) {
      const page = await this.get(next);
      yield* readArray(page.items);
      next = readString(page.next);
    }
  }

  private async get(url: string): Promise<Record<string, unknown>> {
    for (let attempt = 0; attempt < 2; attempt += 1) {
      const tokens = await this.ensureAccessToken();
      const response = await this.fetchImpl(url, {
        headers: { Authorization: `${tokens.tokenType} ${tokens.accessToken}` },
      });
      if (response.status === 401) {
        if (attempt === 0) {
          console.info('Spotify request unauthorized, refreshing token');
          await this.refreshTokens();
          continue;
        }
        break;
      }
      if (!response.ok) {
        throw new Error(`Spotify API error ${response.status}: ${await response.text()}`);
      }
      const payload: unknown = await response.json();
      return isRecord(payload) ? payload : {};
    }
    throw new AuthFailure(SERVICE, 'request still unauthorized after token refresh');
  }
}
