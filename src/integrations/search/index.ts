/**
 * Search Integration Module
 *
 * Public web search used to discover candidate profile pages.
 */

export {
  SerpApiClient,
  SearchApiError,
  toSearchResultRecord,
} from './SerpApiClient.js';

export type { SerpApiConfig, SearchClient } from './SerpApiClient.js';
