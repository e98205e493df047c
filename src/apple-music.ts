import { AuthFailure } from './errors.js';
import { isRecord, readArray, readNumber, readString } from './library.js';
import type { FetchLibraryOptions, LibraryService } from './library.js';
import type { AuthTokens, TokenStore } from './tokens.js';
import type { LibrarySnapshot, Playlist, StreamingTrack } from './types.js';

const API_ORIGIN = 'https://api.music.apple.com';
const SERVICE = 'apple-music';
const ARTWORK_SIZE = 512;

export interface AppleMusicLibraryOptions {
  /** MusicKit developer token (a signed JWT minted outside this tool). */
  readonly developerToken: string;
  /** Music User Token to seed the store with when it holds none yet. */
  readonly musicUserToken?: string;
  readonly tokenStore: TokenStore;
  readonly fetchImpl?: typeof fetch;
  readonly now?: () => Date;
}

/**
 * Fills the `{w}x{h}` placeholders of an Apple Music artwork template.
 */
export const formatArtwork = (artwork: unknown, size = ARTWORK_SIZE): string | undefined => {
  const url = isRecord(artwork) ? readString(artwork.url) : undefined;
  return url?.replaceAll('{w}', String(size)).replaceAll('{h}', String(size));
};

/**
 * Converts a library song resource into a streaming track. Resources without attributes are skipped.
 */
export const mapAppleMusicTrack = (resource: unknown): StreamingTrack | undefined => {
  if (!isRecord(resource) || !isRecord(resource.attributes)) {
    return undefined;
  }
  const attributes = resource.attributes;
  const trackId = readString(resource.id);
  if (!trackId) {
    return undefined;
  }

  const artist = readString(attributes.artistName);
  const durationMs = readNumber(attributes.durationInMillis);
  return {
    service: SERVICE,
    trackId,
    title: readString(attributes.name) ?? 'Unknown Track',
    artist: artist ?? 'Unknown Artist',
    artists: artist ? [artist] : [],
    album: readString(attributes.albumName) ?? '',
    trackNumber: readNumber(attributes.trackNumber),
    durationSeconds: durationMs ? Math.round(durationMs / 1000) : 0,
    isrc: readString(attributes.isrc),
    artworkUrl: formatArtwork(attributes.artwork),
    releaseDate: readString(attributes.releaseDate),
    explicit: attributes.contentRating === undefined ? undefined : attributes.contentRating === 'explicit',
  };
};

/**
 * Apple Music library client. Needs a developer token and a Music User Token; the latter is
 * long-lived and cannot be refreshed through the API, so a rejected request is an auth failure.
 */
export class AppleMusicLibrary implements LibraryService {
  readonly name = SERVICE;
  private tokens: AuthTokens | undefined;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => Date;

  constructor(private readonly options: AppleMusicLibraryOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? (() => new Date());
  }

  async fetchLibrary(options: FetchLibraryOptions): Promise<LibrarySnapshot> {
    await this.ensureUserToken();

    const playlists: Playlist[] = [];
    if (options.includePlaylists) {
      for await (const entry of this.paginate('/v1/me/library/playlists?limit=100')) {
        if (!isRecord(entry)) {
          continue;
        }
        const id = readString(entry.id);
        if (!id) {
          continue;
        }
        const attributes: Record<string, unknown> = isRecord(entry.attributes) ? entry.attributes : {};
        playlists.push({
          id,
          name: readString(attributes.name) ?? 'Untitled Playlist',
          owner: readString(attributes.curatorName),
          tracks: await this.collectTracks(`/v1/me/library/playlists/${encodeURIComponent(id)}/tracks?limit=100`),
        });
      }
    }

    const likedTracks = options.includeLiked ? await this.collectTracks('/v1/me/library/songs?limit=100') : [];

    console.info(`Fetched Apple Music library: ${playlists.length} playlists, ${likedTracks.length} library songs`);
    return { service: SERVICE, fetchedAt: this.now(), playlists, likedTracks };
  }

  private async ensureUserToken(): Promise<AuthTokens> {
    if (!this.options.developerToken) {
      throw new AuthFailure(SERVICE, 'developer token is required');
    }
    this.tokens ??= await this.options.tokenStore.load(SERVICE);
    if (!this.tokens && this.options.musicUserToken) {
      this.tokens = { accessToken: this.options.musicUserToken, tokenType: 'Music-User-Token' };
      await this.options.tokenStore.save(SERVICE, this.tokens);
    }
    if (!this.tokens) {
      throw new AuthFailure(SERVICE, 'Music User Token is missing');
    }
    return this.tokens;
  }

  private async collectTracks(pathWithQuery: string): Promise<StreamingTrack[]> {
    const tracks: StreamingTrack[] = [];
    for await (const resource of this.paginate(pathWithQuery)) {
      const track = mapAppleMusicTrack(resource);
      if (track) {
        tracks.push(track);
      }
    }
    return tracks;
  }

  // `next` comes back as a path relative to the API origin.
  private async *paginate(pathWithQuery: string): AsyncGenerator<unknown> {
    let next: string | undefined = pathWithQuery;
    while (next) {
      const page = await this.get(new URL(next, API_ORIGIN).href);
      yield* readArray(page.data);
      next = readString(page.next);
    }
  }

  private async get(url: string): Promise<Record<string, unknown>> {
    const tokens = await this.ensureUserToken();
    const response = await this.fetchImpl(url, {
      headers: {
        Authorization: `Bearer ${this.options.developerToken}`,
        'Music-User-Token': tokens.accessToken,
      },
    });
    if (response.status === 401 || response.status === 403) {
      throw new AuthFailure(SERVICE, `request rejected (${response.status})`);
    }
    if (!response.ok) {
      throw new Error(`Apple Music API error ${response.status}: ${await response.text()}`);
    }
    const payload: unknown = await response.json();
    return isRecord(payload) ? payload : {};
  }
}
