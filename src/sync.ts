import pLimit from 'p-limit';
import { v4 as uuidv4 } from 'uuid';
import { describeError } from './errors.js';
import { MemoryLedger, trackKey } from './ledger.js';
import type { SyncLedger } from './ledger.js';
import { flattenLibrary } from './library.js';
import type { LibraryService } from './library.js';
import type { QueueManager } from './queue.js';
import { TERMINAL_STATUSES } from './types.js';
import type {
  Candidate,
  Quality,
  QueueEvent,
  QueueItem,
  ResolutionResult,
  ScoredCandidate,
  StreamingTrack,
  SyncCounts,
  SyncJob,
  SyncOptions,
  SyncState,
} from './types.js';

export const DEFAULT_SYNC_OPTIONS: SyncOptions = {
  autoMatch: true,
  includeLiked: true,
  includePlaylists: true,
  quality: 'best',
};

export interface Resolver {
  resolve(track: StreamingTrack): Promise<ResolutionResult>;
}

export interface SyncEvents {
  onSyncProgress?: (job: SyncJob) => void;
  /** A track needs a manual choice: several close candidates, or auto-match is off. */
  onAmbiguousMatch?: (track: StreamingTrack, candidates: readonly ScoredCandidate[]) => void;
}

export interface SyncOrchestratorOptions {
  readonly resolver: Resolver;
  readonly queue: QueueManager;
  readonly services?: readonly LibraryService[];
  readonly ledger?: SyncLedger;
  readonly events?: SyncEvents;
  /** Tracks resolved in parallel; outcomes are still applied in library order. */
  readonly resolveConcurrency?: number;
}

type MutableCounts = { -readonly [K in keyof SyncCounts]: number };

interface JobState {
  readonly id: string;
  readonly service: string;
  readonly options: SyncOptions;
  state: SyncState;
  total: number;
  processed: number;
  counts: MutableCounts;
  error?: string;
  readonly startedAt: Date;
  finishedAt?: Date;
}

type ResolveOutcome = { readonly result: ResolutionResult } | { readonly error: unknown };

const LEDGER_OUTCOMES: Partial<Record<QueueEvent, 'complete' | 'failed' | 'cancelled'>> = {
  completed: 'complete',
  error: 'failed',
  cancelled: 'cancelled',
};

/**
 * Drives "enumerate library, resolve each track, enqueue download" for registered services.
 */
export class SyncOrchestrator {
  private readonly services = new Map<string, LibraryService>();
  private readonly resolver: Resolver;
  private readonly queue: QueueManager;
  private readonly ledger: SyncLedger;
  private readonly events: SyncEvents;
  private readonly resolveConcurrency: number;
  private readonly itemKeys = new Map<string, string>();
  private readonly unsubscribe: () => void;

  /** Queue items whose final outcome has not reached the ledger yet. */
  get trackedItemCount(): number {
    return this.itemKeys.size;
  }

  constructor(options: SyncOrchestratorOptions) {
    this.resolver = options.resolver;
    this.queue = options.queue;
    this.ledger = options.ledger ?? new MemoryLedger();
    this.events = options.events ?? {};
    this.resolveConcurrency = Math.max(1, options.resolveConcurrency ?? 1);
    options.services?.forEach((service) => this.register(service));
    this.unsubscribe = this.queue.subscribe((event, item) => this.onQueueEvent(event, item));
  }

  register(service: LibraryService): void {
    this.services.set(service.name, service);
  }

  listServices(): string[] {
    return [...this.services.keys()].sort();
  }

  /**
   * Syncs one service. Rejects only when the service is unknown or the library fetch fails;
   * per-track problems are counted on the returned job.
   */
  async run(serviceName: string, overrides: Partial<SyncOptions> = {}): Promise<SyncJob> {
    const service = this.services.get(serviceName);
    if (!service) {
      throw new Error(`Service '${serviceName}' is not registered`);
    }

    const options: SyncOptions = { ...DEFAULT_SYNC_OPTIONS, ...overrides };
    const job: JobState = {
      id: uuidv4(),
      service: serviceName,
      options,
      state: 'fetching',
      total: 0,
      processed: 0,
      counts: { resolved: 0, unresolved: 0, queued: 0, failed: 0, ambiguous: 0, skipped: 0 },
      startedAt: new Date(),
    };
    this.emitProgress(job);

    let tracks: StreamingTrack[];
    try {
      const snapshot = await service.fetchLibrary(options);
      tracks = flattenLibrary(snapshot, options);
    } catch (error) {
      job.state = 'failed';
      job.error = describeError(error);
      job.finishedAt = new Date();
      this.emitProgress(job);
      throw error;
    }

    job.total = tracks.length;
    job.state = 'resolving';
    this.emitProgress(job);

    const limit = pLimit(this.resolveConcurrency);
    const pending = tracks.map((track) =>
      this.isSettledBefore(track)
        ? undefined
        : limit(() => this.resolver.resolve(track)).then(
            (result): ResolveOutcome => ({ result }),
            (error: unknown): ResolveOutcome => ({ error }),
          ),
    );

    for (const [index, track] of tracks.entries()) {
      const task = pending[index];
      if (!task) {
        job.counts.skipped += 1;
      } else {
        const outcome = await task;
        if ('error' in outcome) {
          job.counts.failed += 1;
          console.warn(`Resolving "${track.artist} - ${track.title}" failed: ${describeError(outcome.error)}`);
        } else {
          await this.apply(job, track, outcome.result);
        }
      }
      job.processed += 1;
      this.emitProgress(job);
    }

    job.state = 'completed';
    job.finishedAt = new Date();
    this.emitProgress(job);
    await this.ledger.flush();
    return snapshotJob(job);
  }

  /**
   * Enqueues a candidate the caller picked for a track, typically after an ambiguous match.
   */
  async accept(track: StreamingTrack, candidate: Candidate, quality: Quality = DEFAULT_SYNC_OPTIONS.quality): Promise<string> {
    return this.enqueueTrack(track, candidate, quality);
  }

  /**
   * Persists the ledger, e.g. once the queue has drained.
   */
  async flush(): Promise<void> {
    await this.ledger.flush();
  }

  dispose(): void {
    this.unsubscribe();
  }

  private isSettledBefore(track: StreamingTrack): boolean {
    const entry = this.ledger.get(trackKey(track));
    if (!entry) {
      return false;
    }
    if (entry.outcome === 'complete') {
      return true;
    }
    if (entry.outcome !== 'queued' || !entry.itemId) {
      return false;
    }
    const item = this.queue.status(entry.itemId);
    return item !== undefined && !TERMINAL_STATUSES.has(item.status);
  }

  private async apply(job: JobState, track: StreamingTrack, result: ResolutionResult): Promise<void> {
    switch (result.kind) {
      case 'matched': {
        job.counts.resolved += 1;
        if (!job.options.autoMatch) {
          this.emitAmbiguous(track, [
            { candidate: result.candidate, confidence: result.confidence, reason: result.reason, rank: 0 },
          ]);
          return;
        }
        try {
          await this.enqueueTrack(track, result.candidate, job.options.quality);
          job.counts.queued += 1;
        } catch (error) {
          job.counts.failed += 1;
          console.warn(`Could not queue "${track.artist} - ${track.title}": ${describeError(error)}`);
        }
        return;
      }
      case 'ambiguous':
        job.counts.ambiguous += 1;
        this.emitAmbiguous(track, result.candidates);
        return;
      case 'not-found':
        job.counts.unresolved += 1;
        if (result.cause) {
          console.warn(`Unresolved "${track.artist} - ${track.title}": ${result.cause.message}`);
        }
        return;
    }
  }

  private async enqueueTrack(track: StreamingTrack, candidate: Candidate, quality: Quality): Promise<string> {
    const id = await this.queue.enqueue({
      source: candidate.url,
      title: track.title,
      artist: track.artist,
      album: track.album || undefined,
      trackNumber: track.trackNumber,
      quality,
    });
    const key = trackKey(track);
    this.itemKeys.set(id, key);
    this.ledger.record(key, { outcome: 'queued', itemId: id, source: candidate.url });
    return id;
  }

  private onQueueEvent(event: QueueEvent, item: QueueItem): void {
    if (event === 'removed') {
      this.itemKeys.delete(item.id);
      return;
    }
    const outcome = LEDGER_OUTCOMES[event];
    const key = this.itemKeys.get(item.id);
    if (!outcome || !key) {
      return;
    }
    this.itemKeys.delete(item.id);
    this.ledger.record(key, { outcome, itemId: item.id, source: item.source, filePath: item.filePath });
  }

  private emitProgress(job: JobState): void {
    const listener = this.events.onSyncProgress;
    if (!listener) {
      return;
    }
    try {
      listener(snapshotJob(job));
    } catch (error) {
      console.warn(`Sync progress listener failed: ${describeError(error)}`);
    }
  }

  private emitAmbiguous(track: StreamingTrack, candidates: readonly ScoredCandidate[]): void {
    const listener = this.events.onAmbiguousMatch;
    if (!listener) {
      return;
    }
    try {
      listener(track, candidates);
    } catch (error) {
      console.warn(`Ambiguous match listener failed: ${describeError(error)}`);
    }
  }
}

const snapshotJob = (job: JobState): SyncJob =>
  Object.freeze({ ...job, counts: Object.freeze({ ...job.counts }) });
