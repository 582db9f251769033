/**
 * Sourcing Pipeline - Search → Score → Outreach
 *
 * Runs the full sourcing flow for one job description and a list of names:
 * 1. Resolve each name to a public profile (serially, throttled)
 * 2. Score every resolved profile against the job
 * 3. Draft outreach for the top N of the ranking
 *
 * Per-candidate failures never stop the batch. Only a run where no
 * candidate resolves at all is reported as failed.
 */

import { v4 as uuid } from 'uuid';
import type {
  CandidateProfile,
  FitLevel,
  OutreachResult,
  PipelineResult,
  PipelineSummary,
  ScoredProfile,
} from '../entities/Candidate.js';
import type { AppConfig } from '../../config/index.js';
import { ClaudeClient } from '../../integrations/llm/ClaudeClient.js';
import { SerpApiClient } from '../../integrations/search/index.js';
import { AIFitScorer, categorizeFit, type FitScore } from './AIFitScorer.js';
import { AIOutreachComposer, extractHighlights, type ComposedMessage } from './AIOutreachComposer.js';
import { extractJobTitle, generateJobId } from './JobIdentity.js';
import { ProfileResolver } from './ProfileResolver.js';

// =============================================================================
// COLLABORATORS
// =============================================================================

export interface CandidateResolver {
  resolve(name: string, jobTitleHint?: string): Promise<CandidateProfile | null>;
}

export interface CandidateScorer {
  scoreCandidate(profile: CandidateProfile, jobDescription: string): Promise<FitScore>;
}

export interface OutreachComposer {
  composeMessage(candidate: ScoredProfile, jobDescription: string): Promise<ComposedMessage>;
}

export interface SourcingPipelineDeps {
  resolver: CandidateResolver;
  scorer: CandidateScorer;
  composer: OutreachComposer;
}

export interface SourcingPipelineConfig {
  topN: number;
  /** Pause between profile searches, as a courtesy to the search provider */
  resolveDelayMs: number;
  sleep: (ms: number) => Promise<void>;
  now: () => number;
}

export interface RunOptions {
  topN?: number;
}

const DEFAULT_CONFIG: SourcingPipelineConfig = {
  topN: 5,
  resolveDelayMs: 1000,
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
  now: () => Date.now(),
};

// =============================================================================
// SOURCING PIPELINE
// =============================================================================

export class SourcingPipeline {
  private config: SourcingPipelineConfig;

  constructor(
    private deps: SourcingPipelineDeps,
    config: Partial<SourcingPipelineConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  async run(
    jobDescription: string,
    candidateNames: string[],
    options: RunOptions = {}
  ): Promise<PipelineResult> {
    const runId = uuid();
    const jobId = generateJobId(jobDescription);
    const topN = options.topN ?? this.config.topN;
    const startTime = this.config.now();

    console.log(`[SourcingPipeline] Run ${runId} started for job ${jobId} (${candidateNames.length} names)`);

    // Step 1: profile discovery
    const profiles = await this.resolveCandidates(jobDescription, candidateNames);

    if (profiles.length === 0) {
      console.log(`[SourcingPipeline] Run ${runId}: no candidates found`);
      return {
        status: 'failed',
        jobId,
        runId,
        candidatesFound: 0,
        candidatesScored: 0,
        executionTimeSeconds: this.elapsedSeconds(startTime),
        rankedCandidates: [],
        summary: null,
        summaryText: 'No candidates processed.',
        message: 'No candidates found on LinkedIn',
      };
    }

    // Step 2: scoring
    const ranked = await this.scoreCandidates(profiles, jobDescription);

    // Step 3: outreach for the top of the ranking
    const results = await this.generateOutreach(ranked, jobDescription, topN);

    const executionTimeSeconds = this.elapsedSeconds(startTime);
    const summary = buildSummary(results);
    const summaryText = formatSummary(summary, executionTimeSeconds);

    console.log(`[SourcingPipeline] Run ${runId} completed\n${summaryText}`);

    return {
      status: 'success',
      jobId,
      runId,
      candidatesFound: profiles.length,
      candidatesScored: ranked.length,
      executionTimeSeconds,
      rankedCandidates: results,
      summary,
      summaryText,
    };
  }

  async resolveCandidates(jobDescription: string, candidateNames: string[]): Promise<CandidateProfile[]> {
    const jobTitle = extractJobTitle(jobDescription);
    const names = candidateNames.map((n) => n.trim()).filter(Boolean);
    const profiles: CandidateProfile[] = [];

    for (const [i, name] of names.entries()) {
      console.log(`[SourcingPipeline] [${i + 1}/${names.length}] Searching: ${name}`);

      try {
        const profile = await this.deps.resolver.resolve(name, jobTitle);
        if (profile && profile.name) {
          profiles.push(profile);
          console.log(`[SourcingPipeline] Found: ${profile.name} at ${profile.company}`);
        } else {
          console.log(`[SourcingPipeline] Not found: ${name}`);
        }
      } catch (error) {
        console.error(`[SourcingPipeline] Error searching ${name}:`, error);
      }

      if (i < names.length - 1 && this.config.resolveDelayMs > 0) {
        await this.config.sleep(this.config.resolveDelayMs);
      }
    }

    return profiles;
  }

  /**
   * Sorted by score descending; equal scores keep resolution order.
   */
  async scoreCandidates(profiles: CandidateProfile[], jobDescription: string): Promise<ScoredProfile[]> {
    const scored: ScoredProfile[] = [];

    for (const profile of profiles) {
      try {
        const fit = await this.deps.scorer.scoreCandidate(profile, jobDescription);
        scored.push({
          ...profile,
          score: fit.score,
          scoreBreakdown: fit.breakdown,
          fitLevel: categorizeFit(fit.score),
        });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[SourcingPipeline] Error scoring ${profile.name}: ${message}`);
        scored.push({
          ...profile,
          score: 0,
          scoreBreakdown: { error: message },
          fitLevel: 'Error',
        });
      }
    }

    return scored.sort((a, b) => b.score - a.score);
  }

  async generateOutreach(
    ranked: ScoredProfile[],
    jobDescription: string,
    topN: number
  ): Promise<OutreachResult[]> {
    const results: OutreachResult[] = [];

    for (const [i, candidate] of ranked.entries()) {
      if (i >= topN) {
        results.push(candidate);
        continue;
      }

      const composed = await this.deps.composer.composeMessage(candidate, jobDescription);
      results.push({
        ...candidate,
        message: composed.message,
        messageGenerated: composed.messageGenerated,
        highlights: composed.messageGenerated ? extractHighlights(candidate) : [],
      });
    }

    return results;
  }

  private elapsedSeconds(startTime: number): number {
    return Math.round((this.config.now() - startTime) / 10) / 100;
  }
}

// =============================================================================
// SUMMARY
// =============================================================================

export function buildSummary(results: readonly ScoredProfile[]): PipelineSummary {
  const byFitLevel: Record<FitLevel, number> = {
    'Excellent Fit': 0,
    'Strong Fit': 0,
    'Good Fit': 0,
    'Moderate Fit': 0,
    'Poor Fit': 0,
    Error: 0,
  };
  for (const candidate of results) {
    byFitLevel[candidate.fitLevel] += 1;
  }

  const top = results[0];
  return {
    total: results.length,
    byFitLevel,
    topCandidate: top ? { name: top.name, score: top.score } : null,
  };
}

export function formatSummary(summary: PipelineSummary, executionTimeSeconds: number): string {
  if (summary.total === 0) {
    return 'No candidates processed.';
  }

  const { byFitLevel, topCandidate } = summary;
  const lines = [
    'EXECUTION SUMMARY:',
    `• Total Candidates: ${summary.total}`,
    `• Excellent Fits (80+): ${byFitLevel['Excellent Fit']}`,
    `• Strong Fits (70-79): ${byFitLevel['Strong Fit']}`,
    `• Good Fits (60-69): ${byFitLevel['Good Fit']}`,
    `• Moderate Fits (50-59): ${byFitLevel['Moderate Fit']}`,
    `• Poor Fits (<50): ${byFitLevel['Poor Fit']}`,
  ];
  if (byFitLevel.Error > 0) {
    lines.push(`• Scoring Errors: ${byFitLevel.Error}`);
  }
  lines.push(
    `• Top Candidate: ${topCandidate ? `${topCandidate.name} (${topCandidate.score.toFixed(1)}/100)` : 'None'}`,
    `• Execution Time: ${executionTimeSeconds.toFixed(1)}s`
  );

  return lines.join('\n');
}

// =============================================================================
// FACTORY
// =============================================================================

/**
 * Wires the pipeline to SerpAPI and Claude. Throws when either API key is missing.
 */
export function createSourcingPipeline(config: AppConfig): SourcingPipeline {
  const searchClient = new SerpApiClient({ apiKey: config.search.apiKey ?? '' });
  const llm = new ClaudeClient({
    apiKey: config.llm.apiKey,
    defaultModel: config.llm.model,
    maxRetries: 0,
  });

  return new SourcingPipeline(
    {
      resolver: new ProfileResolver(searchClient, { resultsPerQuery: config.search.resultsPerQuery }),
      scorer: new AIFitScorer(llm),
      composer: new AIOutreachComposer(llm),
    },
    {
      topN: config.sourcing.topN,
      resolveDelayMs: config.sourcing.resolveDelayMs,
    }
  );
}

let pipelineInstance: SourcingPipeline | null = null;

export function getSourcingPipeline(config: AppConfig): SourcingPipeline {
  if (!pipelineInstance) {
    pipelineInstance = createSourcingPipeline(config);
  }
  return pipelineInstance;
}

export function resetSourcingPipeline(): void {
  pipelineInstance = null;
}
