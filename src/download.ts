import path from 'node:path';
import fs from 'fs-extra';
import ffmpeg from 'fluent-ffmpeg';
import ytdl from '@distube/ytdl-core';
import { DownloadCancelledError } from './errors.js';
import type {
  DownloadCapability,
  DownloadRequest,
  DuplicateStrategy,
  JobControl,
  ProgressCallback,
  Quality,
} from './types.js';
import { buildTrackPath, isAlreadyDownloaded, resolveDuplicatePath } from './utils.js';

export const QUALITY_BITRATES: Record<Quality, number> = {
  best: 320,
  high: 320,
  medium: 256,
  standard: 192,
  low: 128,
};

export interface DownloaderOptions {
  readonly outputDir: string;
  readonly duplicates: DuplicateStrategy;
  /** Explicit ffmpeg binary; otherwise fluent-ffmpeg looks at FFMPEG_PATH and the PATH. */
  readonly ffmpegPath?: string;
}

const REQUEST_HEADERS: Record<string, string> = {
  'User-Agent':
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/127.0.0.0 Safari/537.36',
  'Accept-Language': 'en-US,en;q=0.9',
  Referer: 'https://www.youtube.com/',
  Origin: 'https://www.youtube.com',
};

type TransferResult = 'done' | 'interrupted';

/**
 * ffmpeg `-metadata` arguments for the basic ID3 fields.
 */
export const metadataArgs = (request: DownloadRequest): string[] => {
  const fields: Array<[string, string | number | undefined]> = [
    ['title', request.title],
    ['artist', request.artist],
    ['album', request.album],
    ['track', request.trackNumber],
  ];
  return fields.flatMap(([key, value]) =>
    value === undefined || value === '' ? [] : ['-metadata', `${key}=${value}`],
  );
};

/**
 * Streams audio via ytdl-core into ffmpeg, writing `tempPath`. Settles as `interrupted`
 * as soon as the control is paused or cancelled.
 */
const transfer = (
  request: DownloadRequest,
  tempPath: string,
  onProgress: ProgressCallback,
  control: JobControl,
): Promise<TransferResult> =>
  new Promise((resolve, reject) => {
    // A pause or cancel may land while the previous `.part` is being removed.
    if (control.paused || control.cancelled) {
      resolve('interrupted');
      return;
    }

    const startedAt = Date.now();
    let settled = false;
    let downloadedBytes = 0;
    let totalBytes = 0;

    const stream = ytdl(request.source, {
      quality: 'highestaudio',
      highWaterMark: 1 << 25,
      dlChunkSize: 1 << 20,
      requestOptions: { headers: REQUEST_HEADERS },
    });

    const command = ffmpeg(stream)
      .audioBitrate(QUALITY_BITRATES[request.quality])
      .format('mp3')
      .outputOptions(...metadataArgs(request));

    const finish = (settle: () => void): void => {
      if (settled) {
        return;
      }
      settled = true;
      unsubscribe();
      settle();
    };

    const unsubscribe = control.onChange(() => {
      if (!control.paused && !control.cancelled) {
        return;
      }
      finish(() => {
        stream.destroy();
        command.kill('SIGKILL');
        resolve('interrupted');
      });
    });

    const speed = (): number => {
      const elapsed = (Date.now() - startedAt) / 1000;
      return elapsed > 0 ? downloadedBytes / elapsed : 0;
    };

    stream.on('progress', (_chunkLength: number, downloaded: number, total: number) => {
      downloadedBytes = downloaded;
      totalBytes = total;
      onProgress({ bytesDone: downloaded, bytesTotal: total, speed: speed(), phase: 'downloading' });
    });

    stream.on('end', () => {
      if (!settled) {
        onProgress({ bytesDone: downloadedBytes, bytesTotal: totalBytes, speed: speed(), phase: 'processing' });
      }
    });

    stream.on('error', (error: Error) => {
      finish(() => reject(error));
    });

    command
      .on('error', (error: Error) => {
        finish(() => reject(error));
      })
      .on('end', () => {
        finish(() => resolve('done'));
      })
      .save(tempPath);
  });

/**
 * Builds the YouTube-to-MP3 download capability used by the queue.
 *
 * Partial resume is not supported: pausing tears the transfer down and resuming restarts
 * it from zero. Cancelling removes the `.part` file.
 */
export const createYoutubeDownloader = (options: DownloaderOptions): DownloadCapability => {
  if (options.ffmpegPath) {
    ffmpeg.setFfmpegPath(options.ffmpegPath);
  }

  return async (request, onProgress, control) => {
    if (!ytdl.validateURL(request.source)) {
      throw new Error(`Invalid YouTube URL: ${request.source}`);
    }

    const basePath = buildTrackPath(options.outputDir, request.artist, request.title, request.album);
    if (options.duplicates === 'skip' && (await isAlreadyDownloaded(basePath))) {
      return { filePath: basePath, skipped: true };
    }

    const targetPath = await resolveDuplicatePath(basePath, options.duplicates);
    const tempPath = `${targetPath}.part`;
    await fs.ensureDir(path.dirname(targetPath));

    for (;;) {
      await control.checkpoint();
      await fs.remove(tempPath);

      let result: TransferResult;
      try {
        result = await transfer(request, tempPath, onProgress, control);
      } catch (error) {
        await fs.remove(tempPath);
        throw error instanceof Error ? error : new Error(String(error));
      }

      if (result === 'done' && control.cancelled) {
        await fs.remove(tempPath);
        throw new DownloadCancelledError(request.itemId);
      }
      if (result === 'done') {
        await fs.move(tempPath, targetPath, { overwrite: true });
        return { filePath: targetPath, skipped: false };
      }
      await fs.remove(tempPath);
    }
  };
};
