#!/usr/bin/env node
import path from 'node:path';
import process from 'node:process';
import cliProgress from 'cli-progress';
import fs from 'fs-extra';
import { AppleMusicLibrary } from './apple-music.js';
import { loadConfig, printHelp } from './config.js';
import type { AppConfig } from './config.js';
import { createYoutubeDownloader } from './download.js';
import { describeError } from './errors.js';
import { JsonFileLedger } from './ledger.js';
import { JsonLibrary } from './library.js';
import type { LibraryService } from './library.js';
import { QueueManager } from './queue.js';
import { TrackResolver } from './resolver.js';
import { searchYoutube } from './search.js';
import { SpotifyLibrary } from './spotify.js';
import { SyncOrchestrator } from './sync.js';
import { FileTokenStore } from './tokens.js';
import type { QueueItem, ScoredCandidate, StreamingTrack, SyncJob } from './types.js';
import { cleanupPlayerScripts, formatEta, formatSpeed, logFailure, logSuccess, logSyncSummary, verifyInternet } from './utils.js';

interface AmbiguousMatch {
  readonly track: StreamingTrack;
  readonly candidates: readonly ScoredCandidate[];
}

type ProgressBar = ReturnType<cliProgress.MultiBar['create']>;

/**
 * Truncates long titles so progress bars remain readable in narrower terminals.
 */
const truncateTitle = (value: string, maxLength = 42): string =>
  value.length <= maxLength ? value : `${value.slice(0, maxLength - 3)}...`;

/**
 * Picks the library backend named on the command line.
 */
const createLibraryService = (config: AppConfig, service: string): LibraryService => {
  if (service === 'spotify') {
    if (!config.spotifyClientId) {
      throw new Error('SPOTIFY_CLIENT_ID must be set to sync a Spotify library');
    }
    return new SpotifyLibrary({
      clientId: config.spotifyClientId,
      clientSecret: config.spotifyClientSecret,
      tokenStore: new FileTokenStore(config.tokenPath),
    });
  }
  if (service === 'apple-music') {
    if (!config.appleDeveloperToken) {
      throw new Error('APPLE_MUSIC_DEVELOPER_TOKEN must be set to sync an Apple Music library');
    }
    return new AppleMusicLibrary({
      developerToken: config.appleDeveloperToken,
      musicUserToken: config.appleMusicUserToken,
      tokenStore: new FileTokenStore(config.tokenPath),
    });
  }
  if (service.toLowerCase().endsWith('.json')) {
    return new JsonLibrary(path.basename(service, path.extname(service)), path.resolve(service));
  }
  throw new Error(`Unsupported library: ${service} (use "spotify", "apple-music" or a .json export)`);
};

const describeItem = (item: QueueItem): string => `${item.artist} - ${item.title}`;

/**
 * Summarizes the sync run, the final queue state and any tracks awaiting a manual choice.
 */
const printSummary = (job: SyncJob, items: readonly QueueItem[], ambiguous: readonly AmbiguousMatch[]): void => {
  console.log('\nDownload summary');
  console.table(
    items.map((item) => ({
      Track: describeItem(item),
      Status: item.status,
      Attempts: item.attempts,
      Reason: item.error ?? '',
      File: item.filePath ?? '',
    })),
  );

  if (ambiguous.length > 0) {
    console.log('\nTracks needing a manual choice');
    console.table(
      ambiguous.flatMap(({ track, candidates }) =>
        candidates.map((entry) => ({
          Track: `${track.artist} - ${track.title}`,
          Candidate: entry.candidate.title,
          Channel: entry.candidate.channel,
          Confidence: entry.confidence.toFixed(2),
          URL: entry.candidate.url,
        })),
      ),
    );
  }

  const { counts } = job;
  console.log(
    `Totals => tracks: ${job.total}, queued: ${counts.queued}, skipped: ${counts.skipped}, ambiguous: ${counts.ambiguous}, ` +
      `unresolved: ${counts.unresolved}, failed: ${counts.failed}`,
  );
};

/**
 * Runs one sync session: fetch the library, resolve every track and wait for the downloads.
 */
const runSyncSession = async (config: AppConfig, serviceArg: string): Promise<void> => {
  try {
    await verifyInternet();
  } catch (error) {
    console.warn(`Connectivity check failed: ${describeError(error)}`);
  }

  await fs.ensureDir(config.outputDir);

  const service = createLibraryService(config, serviceArg);
  const queue = new QueueManager(
    createYoutubeDownloader({
      outputDir: config.outputDir,
      duplicates: config.duplicates,
      ffmpegPath: config.ffmpegPath,
    }),
    config.queue,
  );
  const ledger = await JsonFileLedger.open(config.ledgerPath);

  const multiBar = new cliProgress.MultiBar(
    {
      clearOnComplete: false,
      hideCursor: true,
      format: '{bar} {percentage}% | {speed} | ETA {eta_text} | {title}',
    },
    cliProgress.Presets.shades_grey,
  );

  const ambiguous: AmbiguousMatch[] = [];
  const logWrites: Array<Promise<void>> = [];
  const bars = new Map<string, ProgressBar>();

  const recordLog = (write: Promise<void>): void => {
    logWrites.push(
      write.catch((error: unknown) => {
        console.error(`Could not write log entry: ${describeError(error)}`);
      }),
    );
  };

  const releaseBar = (item: QueueItem): void => {
    const bar = bars.get(item.id);
    if (bar) {
      bar.stop();
      multiBar.remove(bar);
      bars.delete(item.id);
    }
  };

  const unsubscribe = queue.subscribe((event, item) => {
    const payload = {
      title: truncateTitle(describeItem(item)),
      speed: formatSpeed(item.speed),
      eta_text: formatEta(item.eta),
    };
    switch (event) {
      case 'started':
        bars.set(item.id, multiBar.create(100, 0, payload));
        return;
      case 'progress':
      case 'paused':
      case 'resumed':
      case 'retrying':
        bars.get(item.id)?.update(Math.floor(item.progress * 100), payload);
        return;
      case 'completed':
        releaseBar(item);
        if (item.filePath) {
          recordLog(logSuccess(item.filePath, service.name));
        }
        return;
      case 'error':
        releaseBar(item);
        recordLog(logFailure(`${describeItem(item)} (${item.source}) :: ${item.error ?? 'unknown error'}`));
        return;
      case 'cancelled':
        releaseBar(item);
        return;
      default:
        return;
    }
  });

  const orchestrator = new SyncOrchestrator({
    resolver: new TrackResolver(searchYoutube, config.resolver),
    queue,
    services: [service],
    ledger,
    resolveConcurrency: config.resolveConcurrency,
    events: {
      onSyncProgress: (job) => {
        if (job.state === 'resolving' && job.processed === 0) {
          multiBar.log(`Resolving ${job.total} tracks from ${job.service}\n`);
        }
      },
      onAmbiguousMatch: (track, candidates) => {
        ambiguous.push({ track, candidates });
        multiBar.log(`Needs a manual choice: ${track.artist} - ${track.title} (${candidates.length} candidates)\n`);
      },
    },
  });

  process.once('SIGINT', () => {
    multiBar.log('Cancelling downloads...\n');
    queue.shutdown().catch((error: unknown) => {
      console.error(`Shutdown failed: ${describeError(error)}`);
    });
  });

  queue.start();
  let job: SyncJob;
  try {
    job = await orchestrator.run(service.name, config.sync);
    await queue.onIdle();
  } catch (error) {
    await logFailure(`Sync of ${service.name} failed :: ${describeError(error)}`);
    await queue.shutdown();
    throw error;
  } finally {
    multiBar.stop();
    unsubscribe();
    orchestrator.dispose();
    await Promise.all(logWrites);
    await orchestrator.flush();
    await cleanupPlayerScripts();
  }

  process.stdout.write('\n');
  printSummary(job, queue.list(), ambiguous);
  await logSyncSummary(job);
};

/**
 * Entry point that resolves configuration and runs the requested command.
 */
const main = async (): Promise<void> => {
  const config = loadConfig();
  if (config.command === 'help') {
    printHelp();
    return;
  }
  if (!config.service) {
    printHelp();
    process.exitCode = 1;
    return;
  }
  await runSyncSession(config, config.service);
};

void main().catch((error: unknown) => {
  console.error(`Fatal error: ${describeError(error)}`);
  process.exit(1);
});
