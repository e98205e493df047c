import path from 'node:path';
import { DEFAULT_QUEUE_OPTIONS } from './queue.js';
import type { QueueOptions } from './queue.js';
import { DEFAULT_RESOLVER_OPTIONS } from './resolver.js';
import type { ResolverOptions } from './resolver.js';
import { DEFAULT_SYNC_OPTIONS } from './sync.js';
import type { DuplicateStrategy, OverflowPolicy, Quality, SyncOptions } from './types.js';
import { DEFAULT_CONCURRENCY, DOWNLOADS_DIR } from './utils.js';

export interface AppConfig {
  readonly command: 'sync' | 'help';
  /** `spotify`, `apple-music`, or a path to an exported library JSON file. */
  readonly service?: string;
  readonly outputDir: string;
  readonly duplicates: DuplicateStrategy;
  readonly sync: SyncOptions;
  readonly queue: QueueOptions;
  readonly resolver: ResolverOptions;
  readonly resolveConcurrency: number;
  readonly ledgerPath: string;
  readonly tokenPath: string;
  readonly spotifyClientId?: string;
  readonly spotifyClientSecret?: string;
  readonly appleDeveloperToken?: string;
  readonly appleMusicUserToken?: string;
  readonly ffmpegPath?: string;
}

const QUALITIES: readonly Quality[] = ['best', 'high', 'medium', 'standard', 'low'];
const DUPLICATES: readonly DuplicateStrategy[] = ['skip', 'overwrite', 'rename'];
const OVERFLOWS: readonly OverflowPolicy[] = ['reject', 'wait'];

const VALUE_FLAGS = new Set([
  '--output',
  '--quality',
  '--concurrency',
  '--retries',
  '--max-pending',
  '--overflow',
  '--duplicates',
  '--accept-threshold',
  '--ambiguity-margin',
  '--duration-tolerance',
  '--search-limit',
  '--resolve-concurrency',
  '--ledger',
  '--tokens',
]);

const SWITCHES = new Set(['--no-auto-match', '--no-liked', '--no-playlists', '--help']);

interface ParsedArgs {
  readonly values: Map<string, string>;
  readonly switches: Set<string>;
  readonly positionals: string[];
}

const splitArgs = (argv: string[]): ParsedArgs => {
  const values = new Map<string, string>();
  const switches = new Set<string>();
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === '-h') {
      switches.add('--help');
      continue;
    }
    if (arg === '-c') {
      const next = argv[i + 1];
      if (next === undefined) {
        throw new Error('Missing value for -c');
      }
      values.set('--concurrency', next);
      i += 1;
      continue;
    }
    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const key = eq >= 0 ? arg.slice(0, eq) : arg;
    if (SWITCHES.has(key)) {
      switches.add(key);
      continue;
    }
    if (!VALUE_FLAGS.has(key)) {
      throw new Error(`Unknown option: ${key}`);
    }
    const value = eq >= 0 ? arg.slice(eq + 1) : argv[i + 1];
    if (value === undefined) {
      throw new Error(`Missing value for ${key}`);
    }
    values.set(key, value);
    if (eq < 0) {
      i += 1;
    }
  }

  return { values, switches, positionals };
};

export const parseInteger = (name: string, raw: string, min: number): number => {
  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`Invalid ${name} value: ${raw}`);
  }
  return value;
};

export const parseRatio = (name: string, raw: string): number => {
  const value = Number(raw.trim());
  if (raw.trim() === '' || !Number.isFinite(value) || value < 0 || value > 1) {
    throw new Error(`Invalid ${name} value: ${raw} (expected 0..1)`);
  }
  return value;
};

export const parseChoice = <T extends string>(name: string, raw: string, choices: readonly T[]): T => {
  const normalized = raw.trim().toLowerCase();
  const match = choices.find((choice) => choice === normalized);
  if (!match) {
    throw new Error(`Invalid ${name} value: ${raw} (expected ${choices.join(', ')})`);
  }
  return match;
};

/**
 * Resolves the effective configuration from environment defaults and CLI flags. Flags win.
 */
export const loadConfig = (argv: string[] = process.argv.slice(2), env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const { values, switches, positionals } = splitArgs(argv);
  const pick = (flag: string, envKey: string): string | undefined => values.get(flag) ?? env[envKey];

  const [commandArg, service] = positionals;
  const help = switches.has('--help') || commandArg === undefined || commandArg === 'help';
  if (!help && commandArg !== 'sync') {
    throw new Error(`Unknown command: ${commandArg}`);
  }

  const outputDir = path.resolve(pick('--output', 'TUNESYNC_OUTPUT') ?? DOWNLOADS_DIR);

  const concurrencyRaw = pick('--concurrency', 'DOWNLOAD_CONCURRENCY');
  const retriesRaw = pick('--retries', 'TUNESYNC_RETRIES');
  const maxPendingRaw = pick('--max-pending', 'TUNESYNC_MAX_PENDING');
  const overflowRaw = pick('--overflow', 'TUNESYNC_OVERFLOW');
  const qualityRaw = pick('--quality', 'TUNESYNC_QUALITY');
  const duplicatesRaw = pick('--duplicates', 'TUNESYNC_DUPLICATES');
  const acceptRaw = pick('--accept-threshold', 'TUNESYNC_ACCEPT_THRESHOLD');
  const marginRaw = pick('--ambiguity-margin', 'TUNESYNC_AMBIGUITY_MARGIN');
  const toleranceRaw = pick('--duration-tolerance', 'TUNESYNC_DURATION_TOLERANCE');
  const searchLimitRaw = pick('--search-limit', 'TUNESYNC_SEARCH_LIMIT');
  const resolveConcurrencyRaw = pick('--resolve-concurrency', 'TUNESYNC_RESOLVE_CONCURRENCY');

  const quality = qualityRaw ? parseChoice('--quality', qualityRaw, QUALITIES) : DEFAULT_SYNC_OPTIONS.quality;

  const resolver: ResolverOptions = {
    ...DEFAULT_RESOLVER_OPTIONS,
    acceptThreshold: acceptRaw ? parseRatio('--accept-threshold', acceptRaw) : DEFAULT_RESOLVER_OPTIONS.acceptThreshold,
    ambiguityMargin: marginRaw ? parseRatio('--ambiguity-margin', marginRaw) : DEFAULT_RESOLVER_OPTIONS.ambiguityMargin,
    durationTolerance: toleranceRaw
      ? parseInteger('--duration-tolerance', toleranceRaw, 1)
      : DEFAULT_RESOLVER_OPTIONS.durationTolerance,
    searchLimit: searchLimitRaw ? parseInteger('--search-limit', searchLimitRaw, 1) : DEFAULT_RESOLVER_OPTIONS.searchLimit,
  };
  if (resolver.durationCap >= resolver.acceptThreshold) {
    throw new Error(
      `--accept-threshold must be above the duration cap (${resolver.durationCap}), got ${resolver.acceptThreshold}`,
    );
  }

  const stateDir = path.join(outputDir, '.tunesync');

  return {
    command: help ? 'help' : 'sync',
    service,
    outputDir,
    duplicates: duplicatesRaw ? parseChoice('--duplicates', duplicatesRaw, DUPLICATES) : 'rename',
    sync: {
      autoMatch: !switches.has('--no-auto-match'),
      includeLiked: !switches.has('--no-liked'),
      includePlaylists: !switches.has('--no-playlists'),
      quality,
    },
    queue: {
      concurrency: concurrencyRaw ? parseInteger('--concurrency', concurrencyRaw, 1) : DEFAULT_CONCURRENCY,
      retries: retriesRaw ? parseInteger('--retries', retriesRaw, 0) : DEFAULT_QUEUE_OPTIONS.retries,
      maxPending: maxPendingRaw ? parseInteger('--max-pending', maxPendingRaw, 1) : DEFAULT_QUEUE_OPTIONS.maxPending,
      overflow: overflowRaw ? parseChoice('--overflow', overflowRaw, OVERFLOWS) : 'wait',
    },
    resolver,
    resolveConcurrency: resolveConcurrencyRaw ? parseInteger('--resolve-concurrency', resolveConcurrencyRaw, 1) : 1,
    ledgerPath: path.resolve(values.get('--ledger') ?? path.join(stateDir, 'ledger.json')),
    tokenPath: path.resolve(values.get('--tokens') ?? env.TUNESYNC_TOKENS ?? path.join(stateDir, 'tokens.json')),
    spotifyClientId: env.SPOTIFY_CLIENT_ID,
    spotifyClientSecret: env.SPOTIFY_CLIENT_SECRET,
    appleDeveloperToken: env.APPLE_MUSIC_DEVELOPER_TOKEN,
    appleMusicUserToken: env.APPLE_MUSIC_USER_TOKEN,
    ffmpegPath: env.FFMPEG_PATH,
  };
};

/**
 * Displays a concise help menu describing supported CLI options.
 */
export const printHelp = (): void => {
  const lines = [
    '',
    'tunesync - sync a streaming library to MP3 files',
    '',
    'Usage:',
    '  tunesync sync spotify             # Sync the Spotify library (SPOTIFY_CLIENT_ID + stored tokens)',
    '  tunesync sync apple-music         # Sync Apple Music (APPLE_MUSIC_DEVELOPER_TOKEN + APPLE_MUSIC_USER_TOKEN)',
    '  tunesync sync <library.json>      # Sync an exported library file',
    '',
    'Options:',
    '  -c, --concurrency <n>        Parallel downloads (default 3, env DOWNLOAD_CONCURRENCY)',
    '      --output <dir>           Music folder (default ./downloads)',
    '      --quality <q>            best | high | medium | standard | low',
    '      --duplicates <mode>      skip | overwrite | rename (default rename)',
    '      --retries <n>            Extra attempts for a failed download (default 0)',
    '      --max-pending <n>        Unfinished items the queue accepts (default 500)',
    '      --overflow <policy>      wait | reject when the queue is full (default wait)',
    '      --accept-threshold <x>   Minimum confidence for an automatic match (default 0.6)',
    '      --ambiguity-margin <x>   Score gap below which matches are ambiguous (default 0.05)',
    '      --duration-tolerance <s> Seconds of drift tolerated (default 10)',
    '      --search-limit <n>       Candidates requested per query (default 10)',
    '      --resolve-concurrency <n> Tracks resolved in parallel (default 1)',
    '      --no-auto-match          Report every match for manual confirmation',
    '      --no-liked               Skip liked songs',
    '      --no-playlists           Skip playlists',
    '      --ledger <file>          Sync ledger (default <output>/.tunesync/ledger.json)',
    '      --tokens <file>          Token store (default <output>/.tunesync/tokens.json)',
    '  -h, --help                   Show this help message',
  ];
  console.log(lines.join('\n'));
};
