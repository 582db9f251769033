/**
 * Candidate - Core sourcing entities
 *
 * Each stage of the sourcing pipeline builds one of these and hands it on.
 * Later stages spread the previous entity and add fields; nothing is
 * rewritten after creation.
 */

// =============================================================================
// SEARCH INPUT
// =============================================================================

/**
 * One organic result returned by the web search collaborator.
 */
export interface SearchResultRecord {
  title: string;
  link: string;
  snippet: string;
  /** Short descriptors from the result's rich snippet (location, tenure, role...) */
  richExtensions?: string[];
}

// =============================================================================
// CANDIDATE PROFILE
// =============================================================================

export const UNKNOWN_COMPANY = 'N/A';

export type CandidateProfile = Readonly<{
  name: string;
  headline: string;
  company: string; // UNKNOWN_COMPANY when nothing usable was found
  location: string;
  linkedinUrl: string;
  snippet: string;
  education: string;
  currentRole: string;
}>;

// =============================================================================
// SCORING
// =============================================================================

export type FitLevel =
  | 'Excellent Fit'
  | 'Strong Fit'
  | 'Good Fit'
  | 'Moderate Fit'
  | 'Poor Fit'
  | 'Error';

export type ScoredProfile = CandidateProfile &
  Readonly<{
    score: number; // 0-100
    scoreBreakdown: Readonly<Record<string, string>>;
    fitLevel: FitLevel;
  }>;

// =============================================================================
// OUTREACH
// =============================================================================

/**
 * Outreach fields are only present for candidates a message was attempted for.
 */
export type OutreachResult = ScoredProfile &
  Readonly<{
    message?: string;
    messageGenerated?: boolean;
    highlights?: readonly string[];
  }>;

// =============================================================================
// PIPELINE RESULT
// =============================================================================

export type PipelineStatus = 'success' | 'failed';

export interface PipelineSummary {
  total: number;
  byFitLevel: Record<FitLevel, number>;
  topCandidate: { name: string; score: number } | null;
}

export interface PipelineResult {
  status: PipelineStatus;
  jobId: string;
  runId: string;
  candidatesFound: number;
  candidatesScored: number;
  executionTimeSeconds: number;
  rankedCandidates: OutreachResult[];
  summary: PipelineSummary | null;
  summaryText: string;
  message?: string;
}
