import ytSearch from 'yt-search';
import { SearchFailure } from './errors.js';
import type { Candidate, SearchCapability } from './types.js';

const OFFICIAL_CHANNEL = /(vevo|official|\s-\s+topic)$/iu;

/**
 * Converts a yt-search video into a resolution candidate.
 */
export const toCandidate = (video: ytSearch.VideoSearchResult): Candidate => ({
  sourceId: video.videoId,
  url: video.url,
  title: video.title,
  channel: video.author.name,
  durationSeconds: video.seconds,
  viewCount: video.views,
  official: OFFICIAL_CHANNEL.test(video.author.name.trim()),
});

/**
 * Performs a keyword search on YouTube and returns up to `limit` video candidates.
 */
export const searchYoutube: SearchCapability = async (query, limit) => {
  try {
    const searchResult = await ytSearch(query);
    return (searchResult.videos ?? []).slice(0, limit).map(toCandidate);
  } catch (error) {
    throw new SearchFailure(query, error);
  }
};
