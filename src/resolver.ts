import { SearchFailure } from './errors.js';
import { DEFAULT_MATCHER_OPTIONS, isrcMatches, scoreCandidate } from './matcher.js';
import type { MatcherOptions } from './matcher.js';
import type {
  Candidate,
  QueryTier,
  ResolutionResult,
  ScoredCandidate,
  SearchCapability,
  StreamingTrack,
} from './types.js';

export interface ResolverOptions extends MatcherOptions {
  readonly acceptThreshold: number;
  /** Score delta below which two candidates are treated as indistinguishable. */
  readonly ambiguityMargin: number;
  readonly searchLimit: number;
}

export const DEFAULT_RESOLVER_OPTIONS: ResolverOptions = {
  ...DEFAULT_MATCHER_OPTIONS,
  acceptThreshold: 0.6,
  ambiguityMargin: 0.05,
  searchLimit: 10,
};

export const primaryQuery = (track: StreamingTrack): string => [track.artist, track.title].filter(Boolean).join(' ');

export const relaxedQuery = (track: StreamingTrack): string => track.title;

// Confidences carry two decimals; comparing whole basis points keeps float noise out of the margin test.
const toBasisPoints = (value: number): number => Math.round(value * 10_000);

const compareScored = (a: ScoredCandidate, b: ScoredCandidate): number =>
  b.confidence - a.confidence ||
  b.candidate.viewCount - a.candidate.viewCount ||
  Number(b.candidate.official) - Number(a.candidate.official) ||
  a.rank - b.rank;

/**
 * Maps streaming tracks to the best matching upload returned by a search capability.
 */
export class TrackResolver {
  private readonly options: ResolverOptions;

  constructor(
    private readonly search: SearchCapability,
    options: Partial<ResolverOptions> = {},
  ) {
    this.options = { ...DEFAULT_RESOLVER_OPTIONS, ...options };
    if (this.options.acceptThreshold <= this.options.durationCap) {
      throw new RangeError(
        `acceptThreshold must be above the duration cap (${this.options.durationCap}), got ${this.options.acceptThreshold}`,
      );
    }
  }

  /**
   * Scores candidates against the track and returns them best first. Duplicate sources are dropped.
   */
  rank(track: StreamingTrack, candidates: readonly Candidate[]): ScoredCandidate[] {
    const seen = new Set<string>();
    const scored: ScoredCandidate[] = [];
    candidates.forEach((candidate, rank) => {
      if (seen.has(candidate.sourceId)) {
        return;
      }
      seen.add(candidate.sourceId);
      scored.push({ candidate, rank, ...scoreCandidate(track, candidate, this.options) });
    });
    return scored.sort(compareScored);
  }

  classify(track: StreamingTrack, ranked: readonly ScoredCandidate[], query: QueryTier): ResolutionResult {
    const [winner] = ranked;
    if (!winner) {
      return { kind: 'not-found', reason: 'no-candidates' };
    }
    if (winner.confidence < this.options.acceptThreshold) {
      return { kind: 'not-found', reason: 'below-threshold', best: winner };
    }

    const margin = toBasisPoints(this.options.ambiguityMargin);
    const contenders = ranked.filter((entry) => toBasisPoints(winner.confidence - entry.confidence) < margin);
    if (contenders.length > 1) {
      return { kind: 'ambiguous', candidates: contenders, query };
    }

    return {
      kind: 'matched',
      candidate: winner.candidate,
      confidence: winner.confidence,
      matchedBy: isrcMatches(track, winner.candidate) ? 'isrc' : 'heuristic',
      query,
      reason: winner.reason,
    };
  }

  /**
   * Resolves a track with the artist + title query, falling back once to a title-only query.
   * Never rejects: search failures come back as `not-found` with the failure attached.
   */
  async resolve(track: StreamingTrack): Promise<ResolutionResult> {
    const primary = await this.attempt(track, primaryQuery(track), 'primary');
    if (primary.kind !== 'not-found') {
      return primary;
    }

    const fallback = relaxedQuery(track);
    if (!fallback || fallback === primaryQuery(track)) {
      return primary;
    }

    const relaxed = await this.attempt(track, fallback, 'relaxed');
    if (relaxed.kind !== 'not-found') {
      return relaxed;
    }

    const best = pickBest(primary.best, relaxed.best);
    const cause = relaxed.cause ?? primary.cause;
    const reason = best ? 'below-threshold' : cause ? 'search-failed' : 'no-candidates';
    return { kind: 'not-found', reason, best, cause };
  }

  private async attempt(track: StreamingTrack, query: string, tier: QueryTier): Promise<ResolutionResult> {
    let candidates: Candidate[];
    try {
      candidates = await this.search(query, this.options.searchLimit);
    } catch (error) {
      const cause = error instanceof SearchFailure ? error : new SearchFailure(query, error);
      return { kind: 'not-found', reason: 'search-failed', cause };
    }
    return this.classify(track, this.rank(track, candidates.slice(0, this.options.searchLimit)), tier);
  }
}

const pickBest = (a?: ScoredCandidate, b?: ScoredCandidate): ScoredCandidate | undefined => {
  if (!a || !b) {
    return a ?? b;
  }
  return compareScored(a, b) <= 0 ? a : b;
};
