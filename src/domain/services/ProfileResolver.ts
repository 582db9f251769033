/**
 * Profile Resolver
 *
 * Matches a candidate name to one public profile search result and hands it
 * to the field extractor.
 *
 * Matching order:
 * 1. Exact-name query, first result whose title contains the name
 * 2. Name + job title query (only when a hint is given), same containment test
 * 3. First result of the exact-name query, then of the hinted query
 */

import type { CandidateProfile, SearchResultRecord } from '../entities/Candidate.js';
import type { SearchClient } from '../../integrations/search/index.js';
import { extractProfile } from './ProfileFieldExtractor.js';

// =============================================================================
// TYPES
// =============================================================================

export interface ProfileResolverConfig {
  /** Site filter appended to every query */
  profileSite: string;
  resultsPerQuery: number;
}

const DEFAULT_CONFIG: ProfileResolverConfig = {
  profileSite: 'linkedin.com/in',
  resultsPerQuery: 5,
};

export type MatchStrategy = 'exact_name' | 'name_and_title' | 'first_result';

// =============================================================================
// PROFILE RESOLVER
// =============================================================================

export class ProfileResolver {
  private config: ProfileResolverConfig;

  constructor(
    private searchClient: SearchClient,
    config: Partial<ProfileResolverConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  buildQuery(name: string, jobTitleHint?: string): string {
    const terms = jobTitleHint ? `"${name}" "${jobTitleHint}"` : `"${name}"`;
    return `${terms} site:${this.config.profileSite}`;
  }

  /**
   * Returns null when nothing was found or the search service failed.
   */
  async resolve(name: string, jobTitleHint = ''): Promise<CandidateProfile | null> {
    try {
      const selected = await this.selectRecord(name, jobTitleHint);
      if (!selected) {
        console.log(`[ProfileResolver] No profile found for "${name}"`);
        return null;
      }

      console.log(`[ProfileResolver] "${name}" resolved via ${selected.strategy}: ${selected.record.link}`);
      return extractProfile(selected.record);
    } catch (error) {
      console.error(`[ProfileResolver] Search failed for "${name}":`, error);
      return null;
    }
  }

  private async selectRecord(
    name: string,
    jobTitleHint: string
  ): Promise<{ record: SearchResultRecord; strategy: MatchStrategy } | null> {
    const exactResults = await this.searchClient.search(
      this.buildQuery(name),
      this.config.resultsPerQuery
    );

    const exactMatch = findNameMatch(exactResults, name);
    if (exactMatch) {
      return { record: exactMatch, strategy: 'exact_name' };
    }

    let hintedResults: SearchResultRecord[] = [];
    if (jobTitleHint) {
      hintedResults = await this.searchClient.search(
        this.buildQuery(name, jobTitleHint),
        this.config.resultsPerQuery
      );

      const hintedMatch = findNameMatch(hintedResults, name);
      if (hintedMatch) {
        return { record: hintedMatch, strategy: 'name_and_title' };
      }
    }

    const fallback = exactResults[0] ?? hintedResults[0];
    return fallback ? { record: fallback, strategy: 'first_result' } : null;
  }
}

export function findNameMatch(
  records: readonly SearchResultRecord[],
  name: string
): SearchResultRecord | undefined {
  const needle = name.toLowerCase();
  return records.find((record) => record.title.toLowerCase().includes(needle));
}
