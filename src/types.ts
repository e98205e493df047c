import type { SearchFailure } from './errors.js';

export type Quality = 'best' | 'high' | 'medium' | 'standard' | 'low';

export type DuplicateStrategy = 'skip' | 'overwrite' | 'rename';

export type OverflowPolicy = 'reject' | 'wait';

/**
 * A track as enumerated from a streaming-service library.
 * Identity is the pair (service, trackId).
 */
export interface StreamingTrack {
  readonly service: string;
  readonly trackId: string;
  readonly title: string;
  readonly artist: string;
  readonly artists: readonly string[];
  readonly album: string;
  readonly trackNumber?: number;
  readonly durationSeconds: number;
  readonly isrc?: string;
  readonly artworkUrl?: string;
  readonly releaseDate?: string;
  readonly explicit?: boolean;
}

export interface Playlist {
  readonly id: string;
  readonly name: string;
  readonly owner?: string;
  readonly tracks: readonly StreamingTrack[];
}

export interface LibrarySnapshot {
  readonly service: string;
  readonly fetchedAt: Date;
  readonly playlists: readonly Playlist[];
  readonly likedTracks: readonly StreamingTrack[];
}

/**
 * A search result considered as a possible source for a streaming track.
 */
export interface Candidate {
  readonly sourceId: string;
  readonly url: string;
  readonly title: string;
  readonly channel: string;
  readonly durationSeconds: number;
  readonly viewCount: number;
  readonly official: boolean;
  readonly isrc?: string;
}

export interface MatchScore {
  readonly confidence: number;
  readonly reason: string;
}

export interface ScoredCandidate extends MatchScore {
  readonly candidate: Candidate;
  readonly rank: number;
}

export type QueryTier = 'primary' | 'relaxed';

export type ResolutionResult =
  | {
      readonly kind: 'matched';
      readonly candidate: Candidate;
      readonly confidence: number;
      readonly matchedBy: 'isrc' | 'heuristic';
      readonly query: QueryTier;
      readonly reason: string;
    }
  | {
      readonly kind: 'ambiguous';
      readonly candidates: readonly ScoredCandidate[];
      readonly query: QueryTier;
    }
  | {
      readonly kind: 'not-found';
      readonly reason: 'no-candidates' | 'below-threshold' | 'search-failed';
      readonly best?: ScoredCandidate;
      readonly cause?: SearchFailure;
    };

export type QueueStatus =
  | 'queued'
  | 'downloading'
  | 'processing'
  | 'paused'
  | 'complete'
  | 'error'
  | 'cancelled';

export const TERMINAL_STATUSES: ReadonlySet<QueueStatus> = new Set(['complete', 'error', 'cancelled']);

export type DownloadPhase = 'downloading' | 'processing';

export interface TransferProgress {
  readonly bytesDone: number;
  readonly bytesTotal: number;
  /** Bytes per second. */
  readonly speed: number;
  readonly phase: DownloadPhase;
}

export interface DownloadRequest {
  readonly itemId: string;
  readonly source: string;
  readonly title: string;
  readonly artist: string;
  readonly album?: string;
  readonly trackNumber?: number;
  readonly quality: Quality;
}

export interface DownloadOutcome {
  readonly filePath: string;
  readonly skipped: boolean;
}

/**
 * Cooperative pause/cancel signal shared between the queue and a running job.
 */
export interface JobControl {
  readonly paused: boolean;
  readonly cancelled: boolean;
  /** Resolves immediately when running, parks while paused, rejects once cancelled. */
  checkpoint(): Promise<void>;
  onChange(listener: () => void): () => void;
}

export type ProgressCallback = (progress: TransferProgress) => void;

/**
 * Whether a paused job continues or restarts from zero is decided here, not by the queue.
 */
export type DownloadCapability = (
  request: DownloadRequest,
  onProgress: ProgressCallback,
  control: JobControl,
) => Promise<DownloadOutcome>;

export type SearchCapability = (query: string, limit: number) => Promise<Candidate[]>;

export interface DownloadJob {
  readonly source: string;
  readonly title: string;
  readonly artist: string;
  readonly album?: string;
  readonly trackNumber?: number;
  readonly quality: Quality;
}

export interface QueueItem extends DownloadJob {
  readonly id: string;
  readonly status: QueueStatus;
  readonly progress: number;
  readonly speed: number;
  readonly eta: number | null;
  readonly error?: string;
  readonly attempts: number;
  readonly filePath?: string;
  readonly createdAt: Date;
  readonly startedAt?: Date;
  readonly finishedAt?: Date;
}

export type QueueEvent =
  | 'queued'
  | 'started'
  | 'progress'
  | 'paused'
  | 'resumed'
  | 'retrying'
  | 'completed'
  | 'error'
  | 'cancelled'
  | 'removed';

export type QueueListener = (event: QueueEvent, item: QueueItem) => void;

export interface SyncOptions {
  readonly autoMatch: boolean;
  readonly includeLiked: boolean;
  readonly includePlaylists: boolean;
  readonly quality: Quality;
}

export type SyncState = 'fetching' | 'resolving' | 'completed' | 'failed';

export interface SyncCounts {
  readonly resolved: number;
  readonly unresolved: number;
  readonly queued: number;
  readonly failed: number;
  readonly ambiguous: number;
  readonly skipped: number;
}

export interface SyncJob {
  readonly id: string;
  readonly service: string;
  readonly options: SyncOptions;
  readonly state: SyncState;
  readonly total: number;
  readonly processed: number;
  readonly counts: SyncCounts;
  readonly error?: string;
  readonly startedAt: Date;
  readonly finishedAt?: Date;
}
