import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CapacityExceededError, DownloadCancelledError } from './errors.js';
import { QueueManager } from './queue.js';
import type {
  DownloadCapability,
  DownloadJob,
  DownloadOutcome,
  DownloadRequest,
  JobControl,
  ProgressCallback,
  QueueEvent,
  QueueStatus,
} from './types.js';

interface PendingDownload {
  readonly request: DownloadRequest;
  readonly onProgress: ProgressCallback;
  readonly control: JobControl;
  resolve(outcome: DownloadOutcome): void;
  reject(error: Error): void;
}

/**
 * Download stand-in whose calls are settled by the test.
 */
class ManualDownloads {
  readonly calls: PendingDownload[] = [];

  readonly capability: DownloadCapability = (request, onProgress, control) =>
    new Promise<DownloadOutcome>((resolve, reject) => {
      this.calls.push({ request, onProgress, control, resolve, reject });
    });

  complete(index: number): void {
    this.call(index).resolve({ filePath: `/music/${index}.mp3`, skipped: false });
  }

  call(index: number): PendingDownload {
    const call = this.calls[index];
    if (!call) {
      throw new Error(`Download ${index} has not started`);
    }
    return call;
  }
}

const job = (title: string): DownloadJob => ({
  source: `https://www.youtube.com/watch?v=${title}`,
  title,
  artist: 'Test Artist',
  quality: 'best',
});

const tick = async (): Promise<void> => {
  for (let i = 0; i < 10; i += 1) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
};

const enqueueAll = async (queue: QueueManager, count: number): Promise<string[]> => {
  const ids: string[] = [];
  for (let i = 0; i < count; i += 1) {
    ids.push(await queue.enqueue(job(`song-${i}`)));
  }
  return ids;
};

describe('QueueManager', () => {
  let downloads: ManualDownloads;

  beforeEach(() => {
    downloads = new ManualDownloads();
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('rejects an invalid concurrency', () => {
    expect(() => new QueueManager(downloads.capability, { concurrency: 0 })).toThrow(
      'Queue concurrency must be a positive integer, got 0',
    );
  });

  it('keeps items queued until started', async () => {
    const queue = new QueueManager(downloads.capability);
    const [id] = await enqueueAll(queue, 1);
    await tick();

    expect(downloads.calls).toHaveLength(0);
    expect(queue.status(id)).toMatchObject({ status: 'queued', progress: 0, attempts: 0, eta: null });

    queue.start();
    await tick();
    expect(downloads.calls).toHaveLength(1);
    expect(queue.status(id)?.status).toBe('downloading');
  });

  it('never runs more downloads than the concurrency limit', async () => {
    const queue = new QueueManager(downloads.capability, { concurrency: 3 });
    let active = 0;
    let peak = 0;
    queue.subscribe((event) => {
      if (event === 'started') {
        active += 1;
        peak = Math.max(peak, active);
      }
      if (event === 'completed') {
        active -= 1;
      }
    });

    await enqueueAll(queue, 10);
    queue.start();
    for (let i = 0; i < 10; i += 1) {
      await tick();
      expect(downloads.calls.length - i).toBeLessThanOrEqual(3);
      downloads.complete(i);
    }
    await queue.onIdle();

    expect(peak).toBe(3);
    expect(queue.list().every((item) => item.status === 'complete')).toBe(true);
  });

  it('isolates a failure from the rest of the batch', async () => {
    const queue = new QueueManager(downloads.capability, { concurrency: 3 });
    const ids = await enqueueAll(queue, 10);
    queue.start();

    for (let i = 0; i < 10; i += 1) {
      await tick();
      const call = downloads.call(i);
      if (i === 1) {
        call.onProgress({ bytesDone: 40, bytesTotal: 100, speed: 10, phase: 'downloading' });
        call.reject(new Error('network reset'));
      } else {
        downloads.complete(i);
      }
    }
    await queue.onIdle();

    const failed = queue.status(ids[1]);
    expect(failed).toMatchObject({ status: 'error', error: 'network reset', progress: 0.4, attempts: 1, eta: null });
    expect(queue.list().filter((item) => item.status === 'complete')).toHaveLength(9);
    expect(queue.status(ids[9])?.filePath).toBe('/music/9.mp3');
  });

  it('walks through pause and resume in order', async () => {
    const queue = new QueueManager(downloads.capability, { concurrency: 1 });
    const statuses: QueueStatus[] = [];
    const events: QueueEvent[] = [];
    queue.subscribe((event, item) => {
      events.push(event);
      if (statuses[statuses.length - 1] !== item.status) {
        statuses.push(item.status);
      }
    });

    const [id] = await enqueueAll(queue, 1);
    queue.start();
    await tick();

    const call = downloads.call(0);
    call.onProgress({ bytesDone: 30, bytesTotal: 100, speed: 10, phase: 'downloading' });
    expect(queue.pause(id)).toBe(true);
    expect(call.control.paused).toBe(true);
    call.onProgress({ bytesDone: 35, bytesTotal: 100, speed: 10, phase: 'downloading' });
    expect(queue.status(id)?.status).toBe('paused');

    expect(queue.resume(id)).toBe(true);
    expect(call.control.paused).toBe(false);
    call.onProgress({ bytesDone: 100, bytesTotal: 100, speed: 10, phase: 'processing' });
    downloads.complete(0);
    await queue.onIdle();

    expect(statuses).toEqual(['queued', 'downloading', 'paused', 'downloading', 'processing', 'complete']);
    expect(events).toEqual([
      'queued',
      'started',
      'progress',
      'paused',
      'progress',
      'resumed',
      'progress',
      'completed',
    ]);
    expect(queue.status(id)).toMatchObject({ progress: 1, eta: 0 });
  });

  it('computes eta from the transfer speed', async () => {
    const queue = new QueueManager(downloads.capability);
    const [id] = await enqueueAll(queue, 1);
    queue.start();
    await tick();

    downloads.call(0).onProgress({ bytesDone: 40, bytesTotal: 100, speed: 20, phase: 'downloading' });
    expect(queue.status(id)).toMatchObject({ progress: 0.4, speed: 20, eta: 3 });

    downloads.complete(0);
    await queue.onIdle();
  });

  it('cancels a queued item before it reaches a worker', async () => {
    const queue = new QueueManager(downloads.capability, { concurrency: 1 });
    const seen: QueueStatus[] = [];
    const [first, second] = await enqueueAll(queue, 2);
    queue.subscribe((_event, item) => {
      if (item.id === second) {
        seen.push(item.status);
      }
    });
    queue.start();
    await tick();

    expect(queue.cancel(second)).toBe(true);
    expect(queue.status(second)?.status).toBe('cancelled');

    downloads.complete(0);
    await queue.onIdle();

    expect(downloads.calls).toHaveLength(1);
    expect(seen).toEqual(['cancelled']);
    expect(queue.status(first)?.status).toBe('complete');
    expect(queue.cancel(second)).toBe(false);
  });

  it('settles a running item as cancelled once the job stops', async () => {
    const queue = new QueueManager(downloads.capability);
    const [id] = await enqueueAll(queue, 1);
    queue.start();
    await tick();

    expect(queue.cancel(id)).toBe(true);
    expect(queue.status(id)?.status).toBe('downloading');
    const call = downloads.call(0);
    expect(call.control.cancelled).toBe(true);
    await expect(call.control.checkpoint()).rejects.toBeInstanceOf(DownloadCancelledError);

    call.reject(new DownloadCancelledError(id));
    await queue.onIdle();
    expect(queue.status(id)).toMatchObject({ status: 'cancelled', eta: null });
  });

  it('holds a paused queued item until it is resumed', async () => {
    const queue = new QueueManager(downloads.capability, { concurrency: 1 });
    const [, second] = await enqueueAll(queue, 2);
    queue.pause(second);
    queue.start();
    await tick();

    downloads.complete(0);
    await queue.onIdle();
    expect(downloads.calls).toHaveLength(1);
    expect(queue.status(second)?.status).toBe('paused');

    expect(queue.resume(second)).toBe(true);
    await tick();
    expect(downloads.calls).toHaveLength(2);
    expect(downloads.call(1).request.title).toBe('song-1');

    downloads.complete(1);
    await queue.onIdle();
    expect(queue.status(second)?.status).toBe('complete');
  });

  it('refuses to pause or resume settled and unknown items', async () => {
    const queue = new QueueManager(downloads.capability);
    const [id] = await enqueueAll(queue, 1);
    queue.start();
    await tick();
    downloads.complete(0);
    await queue.onIdle();

    expect(queue.pause(id)).toBe(false);
    expect(queue.resume(id)).toBe(false);
    expect(queue.pause('missing')).toBe(false);
    expect(queue.status('missing')).toBeUndefined();
  });

  it('retries a failed download before giving up', async () => {
    const queue = new QueueManager(downloads.capability, { retries: 1 });
    const events: QueueEvent[] = [];
    queue.subscribe((event) => events.push(event));
    const [id] = await enqueueAll(queue, 1);
    queue.start();
    await tick();

    downloads.call(0).reject(new Error('flaky'));
    await tick();
    expect(downloads.calls).toHaveLength(2);
    downloads.complete(1);
    await queue.onIdle();

    expect(queue.status(id)).toMatchObject({ status: 'complete', attempts: 2 });
    expect(events).toEqual(['queued', 'started', 'retrying', 'completed']);
  });

  it('rejects new work when full under the reject policy', async () => {
    const queue = new QueueManager(downloads.capability, { maxPending: 2, overflow: 'reject' });
    await enqueueAll(queue, 2);

    await expect(queue.enqueue(job('overflow'))).rejects.toBeInstanceOf(CapacityExceededError);
    await expect(queue.enqueue(job('overflow'))).rejects.toThrow('Queue is full (2 unfinished items)');
  });

  it('waits for room under the wait policy', async () => {
    const queue = new QueueManager(downloads.capability, { maxPending: 2, overflow: 'wait' });
    const [first] = await enqueueAll(queue, 2);

    let accepted = false;
    const pending = queue.enqueue(job('late')).then((id) => {
      accepted = true;
      return id;
    });
    await tick();
    expect(accepted).toBe(false);

    queue.cancel(first);
    const id = await pending;
    expect(queue.status(id)?.title).toBe('late');
    expect(queue.list()).toHaveLength(3);
  });

  it('clears settled items and keeps the rest', async () => {
    const queue = new QueueManager(downloads.capability, { concurrency: 1 });
    const removed: string[] = [];
    queue.subscribe((event, item) => {
      if (event === 'removed') {
        removed.push(item.id);
      }
    });
    const [first, second] = await enqueueAll(queue, 2);
    queue.cancel(first);

    expect(queue.clear()).toBe(1);
    expect(removed).toEqual([first]);
    expect(queue.list().map((item) => item.id)).toEqual([second]);
  });

  it('hands out frozen snapshots in enqueue order', async () => {
    const queue = new QueueManager(downloads.capability);
    const ids = await enqueueAll(queue, 3);
    const items = queue.list();

    expect(items.map((item) => item.id)).toEqual(ids);
    expect(Object.isFrozen(items[0])).toBe(true);
  });

  it('keeps working when a listener throws', async () => {
    const queue = new QueueManager(downloads.capability);
    queue.subscribe(() => {
      throw new Error('listener broke');
    });
    const [id] = await enqueueAll(queue, 1);
    queue.start();
    await tick();
    downloads.complete(0);
    await queue.onIdle();

    expect(queue.status(id)?.status).toBe('complete');
    expect(console.warn).toHaveBeenCalledWith('Queue listener failed on "queued": listener broke');
  });

  it('cancels everything unfinished on shutdown', async () => {
    const queue = new QueueManager(downloads.capability, { concurrency: 1 });
    const [first, second] = await enqueueAll(queue, 2);
    queue.start();
    await tick();

    const stopped = queue.shutdown();
    downloads.call(0).reject(new DownloadCancelledError(first));
    await stopped;

    expect(queue.status(first)?.status).toBe('cancelled');
    expect(queue.status(second)?.status).toBe('cancelled');
    expect(queue.isStarted).toBe(false);
  });
});
