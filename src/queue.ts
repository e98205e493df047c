import pLimit from 'p-limit';
import { v4 as uuidv4 } from 'uuid';
import {
  CapacityExceededError,
  DownloadCancelledError,
  DownloadFailure,
  describeError,
} from './errors.js';
import { TERMINAL_STATUSES } from './types.js';
import type {
  DownloadCapability,
  DownloadJob,
  JobControl,
  OverflowPolicy,
  QueueEvent,
  QueueItem,
  QueueListener,
  QueueStatus,
  TransferProgress,
} from './types.js';
import { DEFAULT_CONCURRENCY } from './utils.js';

export interface QueueOptions {
  readonly concurrency: number;
  /** Maximum number of unfinished items; `Infinity` disables backpressure. */
  readonly maxPending: number;
  readonly overflow: OverflowPolicy;
  /** Extra attempts after a failed download before the item settles in `error`. */
  readonly retries: number;
}

export const DEFAULT_QUEUE_OPTIONS: QueueOptions = {
  concurrency: DEFAULT_CONCURRENCY,
  maxPending: 500,
  overflow: 'reject',
  retries: 0,
};

type MutableQueueItem = { -readonly [K in keyof QueueItem]: QueueItem[K] };

/**
 * Pause/cancel flags for one item. Jobs poll them through `checkpoint()`.
 */
class ItemControl implements JobControl {
  private pausedFlag = false;
  private cancelledFlag = false;
  private readonly listeners = new Set<() => void>();
  private waiters: Array<{ resolve: () => void; reject: (error: Error) => void }> = [];

  constructor(private readonly itemId: string) {}

  get paused(): boolean {
    return this.pausedFlag;
  }

  get cancelled(): boolean {
    return this.cancelledFlag;
  }

  async checkpoint(): Promise<void> {
    if (this.cancelledFlag) {
      throw new DownloadCancelledError(this.itemId);
    }
    if (!this.pausedFlag) {
      return;
    }
    await new Promise<void>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  onChange(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  setPaused(paused: boolean): void {
    this.pausedFlag = paused;
    if (!paused) {
      this.release();
    }
    this.notify();
  }

  cancel(): void {
    this.cancelledFlag = true;
    this.release();
    this.notify();
  }

  private release(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      if (this.cancelledFlag) {
        waiter.reject(new DownloadCancelledError(this.itemId));
      } else {
        waiter.resolve();
      }
    }
  }

  private notify(): void {
    for (const listener of [...this.listeners]) {
      try {
        listener();
      } catch (error) {
        console.warn(`Control listener for ${this.itemId} failed: ${describeError(error)}`);
      }
    }
  }
}

interface QueueEntry {
  readonly item: MutableQueueItem;
  readonly control: ItemControl;
  /** Submitted to the pool and waiting for a worker. */
  scheduled: boolean;
  running: boolean;
}

/**
 * Bounded-concurrency download queue with cooperative pause, resume and cancel.
 *
 * All state lives in this instance and is only mutated from its own synchronous code paths,
 * so the event loop serialises every transition. Callers only receive frozen snapshots.
 *
 * Whether a resumed download continues or restarts from zero depends on the
 * {@link DownloadCapability}; the queue only parks and wakes the job.
 */
export class QueueManager {
  private readonly options: QueueOptions;
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly entries = new Map<string, QueueEntry>();
  private readonly listeners = new Set<QueueListener>();
  private readonly inflight = new Set<Promise<void>>();
  private capacityWaiters: Array<() => void> = [];
  private idleWaiters: Array<() => void> = [];
  private started = false;

  constructor(
    private readonly download: DownloadCapability,
    options: Partial<QueueOptions> = {},
  ) {
    this.options = { ...DEFAULT_QUEUE_OPTIONS, ...options };
    if (!Number.isInteger(this.options.concurrency) || this.options.concurrency < 1) {
      throw new Error(`Queue concurrency must be a positive integer, got ${this.options.concurrency}`);
    }
    this.limit = pLimit(this.options.concurrency);
  }

  get concurrency(): number {
    return this.options.concurrency;
  }

  get isStarted(): boolean {
    return this.started;
  }

  /**
   * Records a job as `queued` and returns its id. When the queue is full the promise either
   * rejects with {@link CapacityExceededError} or waits for room, depending on `overflow`.
   */
  async enqueue(job: DownloadJob): Promise<string> {
    while (this.pendingCount() >= this.options.maxPending) {
      if (this.options.overflow === 'reject') {
        throw new CapacityExceededError(this.options.maxPending);
      }
      await new Promise<void>((resolve) => {
        this.capacityWaiters.push(resolve);
      });
    }

    const id = uuidv4();
    const entry: QueueEntry = {
      item: {
        ...job,
        id,
        status: 'queued',
        progress: 0,
        speed: 0,
        eta: null,
        attempts: 0,
        createdAt: new Date(),
      },
      control: new ItemControl(id),
      scheduled: false,
      running: false,
    };
    this.entries.set(id, entry);
    this.emit('queued', entry);

    if (this.started) {
      this.schedule(entry);
    }
    return id;
  }

  /**
   * Activates the worker pool. Items enqueued before this call start now.
   */
  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;
    for (const entry of this.entries.values()) {
      if (entry.item.status === 'queued' && !entry.scheduled) {
        this.schedule(entry);
      }
    }
  }

  pause(id: string): boolean {
    const entry = this.entries.get(id);
    if (!entry || this.isSettled(entry)) {
      return false;
    }
    if (entry.item.status === 'paused') {
      return true;
    }
    entry.control.setPaused(true);
    entry.item.status = 'paused';
    entry.item.speed = 0;
    entry.item.eta = null;
    this.emit('paused', entry);
    return true;
  }

  resume(id: string): boolean {
    const entry = this.entries.get(id);
    if (!entry || entry.item.status !== 'paused' || entry.control.cancelled) {
      return false;
    }
    entry.item.status = entry.running ? 'downloading' : 'queued';
    entry.control.setPaused(false);
    this.emit('resumed', entry);

    if (!entry.running && !entry.scheduled && this.started) {
      this.schedule(entry);
    }
    return true;
  }

  /**
   * Cancels an item. Items that have not started settle immediately; running jobs are
   * signalled and settle at their next checkpoint.
   */
  cancel(id: string): boolean {
    const entry = this.entries.get(id);
    if (!entry || this.isSettled(entry) || entry.control.cancelled) {
      return false;
    }
    entry.control.cancel();
    if (!entry.running) {
      this.settle(entry, 'cancelled');
    }
    return true;
  }

  status(id: string): QueueItem | undefined {
    const entry = this.entries.get(id);
    return entry ? snapshot(entry) : undefined;
  }

  list(): QueueItem[] {
    return [...this.entries.values()].map(snapshot);
  }

  subscribe(listener: QueueListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Evicts items in a terminal state and returns how many were removed.
   */
  clear(): number {
    let removed = 0;
    for (const entry of [...this.entries.values()]) {
      if (this.isSettled(entry)) {
        this.entries.delete(entry.item.id);
        this.emit('removed', entry);
        removed += 1;
      }
    }
    return removed;
  }

  /**
   * Resolves once nothing is waiting for or holding a worker. Paused items that never
   * started do not count; paused running jobs do.
   */
  onIdle(): Promise<void> {
    if (this.inflight.size === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Cancels every unfinished item and waits for running jobs to wind down.
   */
  async shutdown(): Promise<void> {
    for (const entry of this.entries.values()) {
      if (!this.isSettled(entry)) {
        this.cancel(entry.item.id);
      }
    }
    await this.onIdle();
    this.started = false;
  }

  private pendingCount(): number {
    let count = 0;
    for (const entry of this.entries.values()) {
      if (!this.isSettled(entry)) {
        count += 1;
      }
    }
    return count;
  }

  private isSettled(entry: QueueEntry): boolean {
    return TERMINAL_STATUSES.has(entry.item.status);
  }

  private schedule(entry: QueueEntry): void {
    entry.scheduled = true;
    const task: Promise<void> = this.limit(() => this.run(entry)).then(() => {
      this.inflight.delete(task);
      if (this.inflight.size === 0) {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        waiters.forEach((resolve) => resolve());
      }
    });
    this.inflight.add(task);
  }

  private async run(entry: QueueEntry): Promise<void> {
    entry.scheduled = false;
    if (entry.item.status !== 'queued' || entry.control.cancelled || !this.entries.has(entry.item.id)) {
      return;
    }
    entry.running = true;
    try {
      await this.execute(entry);
    } finally {
      entry.running = false;
    }
  }

  private async execute(entry: QueueEntry): Promise<void> {
    const { item, control } = entry;
    const maxAttempts = Math.max(0, this.options.retries) + 1;

    for (;;) {
      item.attempts += 1;
      item.status = 'downloading';
      item.startedAt ??= new Date();
      this.emit(item.attempts === 1 ? 'started' : 'retrying', entry);

      try {
        const outcome = await this.download(
          {
            itemId: item.id,
            source: item.source,
            title: item.title,
            artist: item.artist,
            album: item.album,
            trackNumber: item.trackNumber,
            quality: item.quality,
          },
          (progress) => this.onProgress(entry, progress),
          control,
        );
        item.progress = 1;
        item.filePath = outcome.filePath;
        this.settle(entry, 'complete');
        return;
      } catch (error) {
        if (error instanceof DownloadCancelledError || control.cancelled) {
          this.settle(entry, 'cancelled');
          return;
        }
        if (item.attempts >= maxAttempts) {
          item.error = new DownloadFailure(item.id, error).message;
          this.settle(entry, 'error');
          return;
        }
        console.warn(`Retrying "${item.title}" after attempt ${item.attempts} failed: ${describeError(error)}`);
      }

      item.progress = 0;
      item.speed = 0;
      item.eta = null;
      try {
        await control.checkpoint();
      } catch {
        this.settle(entry, 'cancelled');
        return;
      }
    }
  }

  private onProgress(entry: QueueEntry, progress: TransferProgress): void {
    const { item, control } = entry;
    if (this.isSettled(entry) || control.cancelled) {
      return;
    }
    if (progress.bytesTotal > 0) {
      item.progress = Math.min(1, Math.max(0, progress.bytesDone / progress.bytesTotal));
    }
    item.speed = progress.speed;
    item.eta =
      progress.speed > 0 && progress.bytesTotal > 0
        ? Math.max(0, (progress.bytesTotal - progress.bytesDone) / progress.speed)
        : null;
    if (item.status !== 'paused') {
      item.status = progress.phase;
    }
    this.emit('progress', entry);
  }

  private settle(entry: QueueEntry, status: Extract<QueueStatus, 'complete' | 'error' | 'cancelled'>): void {
    const { item } = entry;
    item.status = status;
    item.speed = 0;
    item.eta = status === 'complete' ? 0 : null;
    item.finishedAt = new Date();
    this.emit(status === 'complete' ? 'completed' : status, entry);

    const waiters = this.capacityWaiters;
    this.capacityWaiters = [];
    waiters.forEach((resolve) => resolve());
  }

  private emit(event: QueueEvent, entry: QueueEntry): void {
    const item = snapshot(entry);
    for (const listener of [...this.listeners]) {
      try {
        listener(event, item);
      } catch (error) {
        console.warn(`Queue listener failed on "${event}": ${describeError(error)}`);
      }
    }
  }
}

const snapshot = (entry: QueueEntry): QueueItem => Object.freeze({ ...entry.item });
