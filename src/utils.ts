import path from 'node:path';
import { promises as dns } from 'node:dns';
import fs from 'fs-extra';
import type { DuplicateStrategy, SyncJob } from './types.js';

export const DEFAULT_CONCURRENCY = 3;
export const DOWNLOADS_DIR = path.resolve(process.cwd(), 'downloads');
export const ERRORS_LOG = path.resolve(process.cwd(), 'errors.log');
export const DOWNLOADED_LOG = path.resolve(process.cwd(), 'downloaded.log');

const MAX_RENAME_ATTEMPTS = 1000;

/**
 * Sanitizes possible file names so they are safe to write to the filesystem.
 */
export const sanitizeFileName = (value: string): string =>
  value.replace(/[\/\\:*?"<>|\x00-\x1f]/g, ' ').replace(/\s+/g, ' ').trim().replace(/[.\s]+$/u, '');

/**
 * Returns an absolute mp3 file path for a given base name.
 */
export const resolveOutputPath = (baseName: string, baseDir: string = DOWNLOADS_DIR): string =>
  path.resolve(baseDir, `${sanitizeFileName(baseName)}.mp3`);

/**
 * Builds `<baseDir>/<artist>/<album>/<title>.mp3`, leaving out the album folder when unknown.
 */
export const buildTrackPath = (baseDir: string, artist: string, title: string, album?: string): string => {
  const artistDir = sanitizeFileName(artist) || 'Unknown Artist';
  const albumDir = album ? sanitizeFileName(album) : '';
  const targetDir = albumDir ? path.join(baseDir, artistDir, albumDir) : path.join(baseDir, artistDir);
  return resolveOutputPath(sanitizeFileName(title) || 'untitled', targetDir);
};

/**
 * Checks whether the given mp3 file has already been downloaded.
 */
export const isAlreadyDownloaded = async (filePath: string): Promise<boolean> =>
  fs.pathExists(filePath);

/**
 * Picks the path a new download should be written to. `rename` appends " (n)" until the name is free;
 * `skip` and `overwrite` keep the original path and leave the decision to the caller.
 */
export const resolveDuplicatePath = async (filePath: string, strategy: DuplicateStrategy): Promise<string> => {
  if (strategy !== 'rename' || !(await isAlreadyDownloaded(filePath))) {
    return filePath;
  }

  const { dir, name, ext } = path.parse(filePath);
  for (let counter = 1; counter <= MAX_RENAME_ATTEMPTS; counter += 1) {
    const candidate = path.join(dir, `${name} (${counter})${ext}`);
    if (!(await isAlreadyDownloaded(candidate))) {
      return candidate;
    }
  }
  return filePath;
};

/**
 * Appends error information to a persistent log so the user can review failures.
 */
export const logFailure = async (message: string, logFile: string = ERRORS_LOG): Promise<void> => {
  const timestamp = new Date().toISOString();
  await fs.appendFile(logFile, `[${timestamp}] ${message}\n`);
};

/**
 * Appends successfully downloaded file names to a persistent log for tracking,
 * tagged with the service they were synced from when known.
 */
export const logSuccess = async (
  filePath: string,
  service?: string,
  logFile: string = DOWNLOADED_LOG,
): Promise<void> => {
  const timestamp = new Date().toISOString();
  const fileName = path.basename(filePath);

  if (service) {
    await fs.appendFile(logFile, `[${timestamp}] [SYNC: ${service}] ${fileName}\n`);
  } else {
    await fs.appendFile(logFile, `[${timestamp}] ${fileName}\n`);
  }
};

/**
 * Logs a sync run summary with its final counts.
 */
export const logSyncSummary = async (job: SyncJob, logFile: string = DOWNLOADED_LOG): Promise<void> => {
  const timestamp = new Date().toISOString();
  const { counts } = job;
  await fs.appendFile(
    logFile,
    `\n[${timestamp}] ========================================\n` +
    `[${timestamp}] SYNC SUMMARY: ${job.service} (${job.state})\n` +
    `[${timestamp}] TRACKS: ${job.processed}/${job.total}\n` +
    `[${timestamp}] QUEUED: ${counts.queued} | SKIPPED: ${counts.skipped} | AMBIGUOUS: ${counts.ambiguous} | ` +
    `UNRESOLVED: ${counts.unresolved} | FAILED: ${counts.failed}\n` +
    `[${timestamp}] ========================================\n\n`,
  );
};

export const formatBytes = (bytes: number): string => {
  const units = ['B', 'KB', 'MB', 'GB'];
  let value = bytes;
  for (const unit of units) {
    if (value < 1024) {
      return `${value.toFixed(1)} ${unit}`;
    }
    value /= 1024;
  }
  return `${value.toFixed(1)} TB`;
};

export const formatSpeed = (bytesPerSecond: number): string => `${formatBytes(Math.max(0, bytesPerSecond))}/s`;

/**
 * Formats remaining seconds as "42s", "3m" or "1h 5m".
 */
export const formatEta = (seconds: number | null): string => {
  if (seconds === null || !Number.isFinite(seconds)) {
    return '--';
  }
  const whole = Math.floor(seconds);
  if (whole < 60) {
    return `${whole}s`;
  }
  if (whole < 3600) {
    return `${Math.floor(whole / 60)}m`;
  }
  return `${Math.floor(whole / 3600)}h ${Math.floor((whole % 3600) / 60)}m`;
};

/**
 * Quickly probes DNS to help surface connectivity issues before downloads run.
 */
export const verifyInternet = async (): Promise<void> => {
  await dns.lookup('youtube.com');
};

/**
 * Removes temporary player script files that ytdl-core may leave behind.
 */
export const cleanupPlayerScripts = async (): Promise<void> => {
  try {
    const cwd = process.cwd();
    const entries = await fs.readdir(cwd);
    const targets = entries.filter((name) => /player-script\.js$/u.test(name));
    if (targets.length === 0) {
      return;
    }
    await Promise.all(
      targets.map(async (name) => {
        const filePath = path.resolve(cwd, name);
        try {
          await fs.remove(filePath);
        } catch (error) {
          await logFailure(`Cleanup failed for ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
        }
      }),
    );
  } catch (error) {
    await logFailure(`Cleanup scan failed: ${error instanceof Error ? error.message : String(error)}`);
  }
};
