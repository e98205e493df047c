import fs from 'fs-extra';
import type { LibrarySnapshot, Playlist, StreamingTrack } from './types.js';

export interface FetchLibraryOptions {
  readonly includeLiked: boolean;
  readonly includePlaylists: boolean;
}

/**
 * A streaming-service library the sync can enumerate. Implementations own their own
 * authentication and refresh; a rejected fetch should be an `AuthFailure` when credentials are the cause.
 */
export interface LibraryService {
  readonly name: string;
  fetchLibrary(options: FetchLibraryOptions): Promise<LibrarySnapshot>;
}

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const readString = (value: unknown): string | undefined =>
  typeof value === 'string' && value.length > 0 ? value : undefined;

export const readNumber = (value: unknown): number | undefined =>
  typeof value === 'number' && Number.isFinite(value) ? value : undefined;

export const readArray = (value: unknown): unknown[] => (Array.isArray(value) ? value : []);

/**
 * Playlist tracks first, in playlist order, then liked tracks; each identity appears once.
 */
export const flattenLibrary = (snapshot: LibrarySnapshot, options: FetchLibraryOptions): StreamingTrack[] => {
  const seen = new Set<string>();
  const tracks: StreamingTrack[] = [];
  const sources = [
    ...(options.includePlaylists ? snapshot.playlists.map((playlist) => playlist.tracks) : []),
    ...(options.includeLiked ? [snapshot.likedTracks] : []),
  ];
  for (const source of sources) {
    for (const track of source) {
      const key = `${track.service}:${track.trackId}`;
      if (!seen.has(key)) {
        seen.add(key);
        tracks.push(track);
      }
    }
  }
  return tracks;
};

/**
 * Parses a track record as written in an exported library file.
 */
export const parseTrack = (service: string, value: unknown): StreamingTrack | undefined => {
  if (!isRecord(value)) {
    return undefined;
  }
  const trackId = readString(value.trackId);
  const title = readString(value.title);
  const artists = readArray(value.artists).flatMap((name) => readString(name) ?? []);
  const artist = readString(value.artist) ?? artists[0];
  if (!trackId || !title || !artist) {
    return undefined;
  }
  return {
    service,
    trackId,
    title,
    artist,
    artists: artists.length > 0 ? artists : [artist],
    album: readString(value.album) ?? '',
    trackNumber: readNumber(value.trackNumber),
    durationSeconds: readNumber(value.durationSeconds) ?? 0,
    isrc: readString(value.isrc),
    artworkUrl: readString(value.artworkUrl),
    releaseDate: readString(value.releaseDate),
    explicit: typeof value.explicit === 'boolean' ? value.explicit : undefined,
  };
};

/**
 * Library backed by an exported JSON file: `{ "playlists": [{ "id", "name", "tracks": [] }], "likedTracks": [] }`.
 */
export class JsonLibrary implements LibraryService {
  constructor(
    readonly name: string,
    private readonly filePath: string,
  ) {}

  async fetchLibrary(options: FetchLibraryOptions): Promise<LibrarySnapshot> {
    const raw: unknown = await fs.readJson(this.filePath);
    if (!isRecord(raw)) {
      throw new Error(`Library file ${this.filePath} does not contain an object`);
    }

    const toTracks = (list: unknown): StreamingTrack[] =>
      readArray(list).flatMap((entry) => parseTrack(this.name, entry) ?? []);

    const playlists: Playlist[] = options.includePlaylists
      ? readArray(raw.playlists).flatMap((entry, index) =>
          isRecord(entry)
            ? [
                {
                  id: readString(entry.id) ?? `playlist-${index + 1}`,
                  name: readString(entry.name) ?? 'Untitled Playlist',
                  owner: readString(entry.owner),
                  tracks: toTracks(entry.tracks),
                },
              ]
            : [],
        )
      : [];

    return {
      service: this.name,
      fetchedAt: new Date(),
      playlists,
      likedTracks: options.includeLiked ? toTracks(raw.likedTracks) : [],
    };
  }
}
