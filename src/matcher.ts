import type { Candidate, MatchScore, StreamingTrack } from './types.js';

export interface MatcherOptions {
  /** Seconds of duration drift tolerated before the score is capped. */
  readonly durationTolerance: number;
  /** Ceiling applied to candidates outside the duration tolerance. */
  readonly durationCap: number;
}

export const DEFAULT_MATCHER_OPTIONS: MatcherOptions = {
  durationTolerance: 10,
  durationCap: 0.45,
};

const WEIGHTS = {
  title: 0.55,
  artist: 0.2,
  duration: 0.15,
  authenticity: 0.1,
} as const;

const VARIANT_PENALTY = 0.3;

const VARIANT_MARKERS = [
  'live',
  'cover',
  'remix',
  'karaoke',
  'instrumental',
  'acoustic',
  'sped up',
  'slowed',
  'nightcore',
  '8d',
] as const;

const SEGMENT_SEPARATOR = /\s+[-–—|]\s+/u;

const stripDiacritics = (value: string): string => value.normalize('NFKD').replace(/[\u0300-\u036f]/gu, '');

const collapse = (value: string): string => value.replace(/[^\p{L}\p{N}]+/gu, ' ').trim();

/**
 * Lower-cased, accent-free text with punctuation folded to single spaces. Brackets are kept.
 */
export const normalizeLoose = (value: string): string => collapse(stripDiacritics(value).toLowerCase());

/**
 * Like {@link normalizeLoose} but also drops bracketed annotations such as "(Official Video)"
 * and trailing featured-artist credits.
 */
export const normalizeTitle = (value: string): string =>
  normalizeLoose(
    value
      .replace(/\([^)]*\)|\[[^\]]*\]|\{[^}]*\}/gu, ' ')
      .replace(/\s(?:feat|ft|featuring)\.?\s.*$/iu, ' '),
  );

const compact = (value: string): string => value.replace(/\s+/gu, '');

/**
 * Sørensen-Dice coefficient over character bigrams, ignoring whitespace.
 */
export const diceSimilarity = (a: string, b: string): number => {
  const left = compact(a);
  const right = compact(b);
  if (left === right) {
    return left.length > 0 ? 1 : 0;
  }
  if (left.length < 2 || right.length < 2) {
    return 0;
  }

  const bigrams = new Map<string, number>();
  for (let i = 0; i < left.length - 1; i += 1) {
    const gram = left.slice(i, i + 2);
    bigrams.set(gram, (bigrams.get(gram) ?? 0) + 1);
  }

  let overlap = 0;
  for (let i = 0; i < right.length - 1; i += 1) {
    const gram = right.slice(i, i + 2);
    const count = bigrams.get(gram) ?? 0;
    if (count > 0) {
      bigrams.set(gram, count - 1);
      overlap += 1;
    }
  }

  return (2 * overlap) / (left.length - 1 + right.length - 1);
};

/**
 * Best similarity between the track title and the candidate title or any of its
 * "Artist - Title" style segments.
 */
export const titleSimilarity = (trackTitle: string, candidateTitle: string): number => {
  const target = normalizeTitle(trackTitle);
  const variants = [candidateTitle, ...candidateTitle.split(SEGMENT_SEPARATOR)].map(normalizeTitle);
  return variants.reduce((best, variant) => Math.max(best, diceSimilarity(target, variant)), 0);
};

/**
 * Share of the artist found in the candidate title or channel: 1 for a full match,
 * otherwise the fraction of artist tokens present.
 */
export const artistPresence = (artist: string, candidate: Candidate): number => {
  const name = normalizeLoose(artist);
  if (!name) {
    return 0;
  }
  const haystack = `${normalizeLoose(candidate.title)} ${normalizeLoose(candidate.channel)}`;
  if (haystack.includes(name) || compact(haystack).includes(compact(name))) {
    return 1;
  }
  const words = new Set(haystack.split(' '));
  const tokens = name.split(' ');
  return tokens.filter((token) => words.has(token)).length / tokens.length;
};

export const isOfficialChannel = (channel: string, artist: string): boolean => {
  const normalized = normalizeLoose(channel);
  if (normalized.endsWith(' topic')) {
    return true;
  }
  const artistKey = compact(normalizeLoose(artist));
  if (!artistKey || !compact(normalized).includes(artistKey)) {
    return false;
  }
  return normalized.includes('vevo') || normalized.includes('official');
};

const hasMarker = (text: string, marker: string): boolean => ` ${text} `.includes(` ${marker} `);

export const variantMarkers = (track: StreamingTrack, candidate: Candidate): string[] => {
  const source = normalizeLoose(`${track.title} ${track.album}`);
  const target = normalizeLoose(candidate.title);
  return VARIANT_MARKERS.filter((marker) => hasMarker(target, marker) && !hasMarker(source, marker));
};

const normalizeIsrc = (value: string | undefined): string => (value ?? '').toUpperCase().replace(/[^A-Z0-9]/gu, '');

export const isrcMatches = (track: StreamingTrack, candidate: Candidate): boolean => {
  const left = normalizeIsrc(track.isrc);
  return left.length > 0 && left === normalizeIsrc(candidate.isrc);
};

const round = (value: number): number => Math.round(value * 10000) / 10000;

/**
 * Scores how likely `candidate` is an upload of `track`. Pure and deterministic.
 */
export const scoreCandidate = (
  track: StreamingTrack,
  candidate: Candidate,
  options: MatcherOptions = DEFAULT_MATCHER_OPTIONS,
): MatchScore => {
  if (isrcMatches(track, candidate)) {
    return { confidence: 1, reason: 'isrc match' };
  }

  const reasons: string[] = [];

  const similarity = titleSimilarity(track.title, candidate.title);
  reasons.push(`title ${similarity.toFixed(2)}`);

  const presence = artistPresence(track.artist, candidate);
  reasons.push(presence === 1 ? 'artist found' : presence > 0 ? `artist partial ${presence.toFixed(2)}` : 'artist missing');

  let durationScore = 0.5;
  let capped = false;
  if (track.durationSeconds > 0 && candidate.durationSeconds > 0) {
    const diff = Math.abs(track.durationSeconds - candidate.durationSeconds);
    if (diff > options.durationTolerance) {
      capped = true;
      durationScore = 0;
      reasons.push(`duration off by ${diff}s`);
    } else {
      durationScore = 1 - diff / options.durationTolerance;
      reasons.push(`duration within ${diff}s`);
    }
  } else {
    reasons.push('duration unknown');
  }

  const official = candidate.official || isOfficialChannel(candidate.channel, track.artist);
  if (official) {
    reasons.push('official');
  }

  const markers = variantMarkers(track, candidate);
  if (markers.length > 0) {
    reasons.push(`variant ${markers.join('/')}`);
  }

  let confidence =
    WEIGHTS.title * similarity +
    WEIGHTS.artist * presence +
    WEIGHTS.duration * durationScore +
    (official ? WEIGHTS.authenticity : 0) -
    (markers.length > 0 ? VARIANT_PENALTY : 0);

  confidence = Math.min(1, Math.max(0, confidence));
  if (capped) {
    confidence = Math.min(confidence, options.durationCap);
  }

  return { confidence: round(confidence), reason: reasons.join(', ') };
};
