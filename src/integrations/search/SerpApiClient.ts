/**
 * SerpAPI Client - Web search for public profile discovery
 *
 * Runs Google searches through SerpAPI and maps organic results to
 * SearchResultRecords. Rich snippet extensions ("San Francisco Bay Area",
 * "3 years experience", "OpenAI") are carried through for field extraction.
 *
 * API Docs: https://serpapi.com/search-api
 */

import { z } from 'zod';
import type { SearchResultRecord } from '../../domain/entities/Candidate.js';

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface SerpApiConfig {
  apiKey: string;
  engine?: string; // defaults to "google"
  baseUrl?: string;
  /** Swappable transport, mainly for tests */
  fetchImpl?: typeof fetch;
}

const DEFAULT_BASE_URL = 'https://serpapi.com/search.json';

/**
 * Anything that can answer a free-text query with organic result records.
 */
export interface SearchClient {
  search(query: string, num: number): Promise<SearchResultRecord[]>;
}

// =============================================================================
// ERRORS
// =============================================================================

export class SearchApiError extends Error {
  constructor(
    message: string,
    public status?: number
  ) {
    super(message);
    this.name = 'SearchApiError';
  }
}

// =============================================================================
// RESPONSE SCHEMA
// =============================================================================

// Only the fields we read; everything else in the payload is ignored.
const organicResultSchema = z
  .object({
    title: z.string().catch(''),
    link: z.string().catch(''),
    snippet: z.string().catch(''),
    rich_snippet: z
      .object({
        top: z
          .object({
            extensions: z.array(z.string()).catch([]),
          })
          .partial()
          .optional(),
      })
      .partial()
      .optional()
      .catch(undefined),
  })
  .partial();

const searchResponseSchema = z.object({
  organic_results: z.array(z.unknown()).optional(),
  error: z.string().optional(),
});

export function toSearchResultRecord(raw: unknown): SearchResultRecord | null {
  const parsed = organicResultSchema.safeParse(raw);
  if (!parsed.success) return null;

  const result = parsed.data;
  const extensions = result.rich_snippet?.top?.extensions;

  return {
    title: result.title ?? '',
    link: result.link ?? '',
    snippet: result.snippet ?? '',
    ...(extensions ? { richExtensions: extensions } : {}),
  };
}

// =============================================================================
// SERPAPI CLIENT
// =============================================================================

export class SerpApiClient implements SearchClient {
  private config: Required<Omit<SerpApiConfig, 'fetchImpl'>>;
  private fetchImpl: typeof fetch;

  constructor(config: SerpApiConfig) {
    if (!config.apiKey) {
      throw new Error('SERPAPI_API_KEY is required');
    }

    this.config = {
      apiKey: config.apiKey,
      engine: config.engine || 'google',
      baseUrl: config.baseUrl || DEFAULT_BASE_URL,
    };
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  async search(query: string, num: number): Promise<SearchResultRecord[]> {
    const params = new URLSearchParams({
      engine: this.config.engine,
      q: query,
      num: String(num),
      api_key: this.config.apiKey,
    });

    const response = await this.fetchImpl(`${this.config.baseUrl}?${params.toString()}`);

    if (!response.ok) {
      const errorBody = await response.text();
      console.error(`[SerpApiClient] API error: ${response.status}`, errorBody);
      throw new SearchApiError(`SerpAPI error: ${response.status} ${response.statusText}`, response.status);
    }

    const body: unknown = await response.json();
    const parsed = searchResponseSchema.safeParse(body);
    if (!parsed.success) {
      console.error('[SerpApiClient] Unexpected response shape');
      return [];
    }

    if (parsed.data.error) {
      // SerpAPI reports "no results" and quota problems in-band with a 200
      console.log(`[SerpApiClient] ${parsed.data.error}`);
    }

    return (parsed.data.organic_results ?? [])
      .map(toSearchResultRecord)
      .filter((record): record is SearchResultRecord => record !== null);
  }
}
