/**
 * AI Fit Scorer
 *
 * Scores a sourced profile against a job description with Claude, using a
 * fixed six-criterion rubric:
 * - Education (20%)
 * - Experience Match (25%)
 * - Company Relevance (15%)
 * - Career Trajectory (20%)
 * - Location Match (10%)
 * - Tenure (10%)
 *
 * Each criterion is rated 1-10 and the weighted sum is multiplied by 10.
 * Scoring never throws: any failure degrades to a zero score with an
 * `error` entry in the breakdown so the candidate still shows up, ranked last.
 */

import { z } from 'zod';
import { LlmServiceError, type LlmClient } from '../../integrations/llm/ClaudeClient.js';
import type { CandidateProfile, FitLevel } from '../entities/Candidate.js';

// =============================================================================
// TYPES
// =============================================================================

export interface FitScore {
  score: number;
  breakdown: Record<string, string>;
}

export interface RubricCriterion {
  key: 'education' | 'experience' | 'company' | 'trajectory' | 'location' | 'tenure';
  label: string;
  weight: number;
  guide: string[];
}

export const FIT_RUBRIC: readonly RubricCriterion[] = [
  {
    key: 'education',
    label: 'Education',
    weight: 0.2,
    guide: [
      'Elite schools (IIT/MIT/Stanford/NIT/IIIT): 9-10',
      'Good universities: 7-8',
      'Standard colleges: 5-6',
      'Not specified: 3-4',
    ],
  },
  {
    key: 'experience',
    label: 'Experience Match',
    weight: 0.25,
    guide: [
      'Perfect skill match: 9-10',
      'Strong overlap (70%+): 7-8',
      'Some relevant skills (40-60%): 5-6',
      'Basic relevant skills: 3-4',
    ],
  },
  {
    key: 'company',
    label: 'Company Relevance',
    weight: 0.15,
    guide: [
      'FAANG/Top tech: 9-10',
      'Relevant industry: 7-8',
      'Any tech company: 5-6',
      'Non-tech/intern: 3-4',
    ],
  },
  {
    key: 'trajectory',
    label: 'Career Trajectory',
    weight: 0.2,
    guide: ['Senior level: 8-10', 'Mid-level: 6-8', 'Junior/intern: 4-6', 'Student only: 3-4'],
  },
  {
    key: 'location',
    label: 'Location Match',
    weight: 0.1,
    guide: ['Same city: 10', 'Same country: 6', 'Different country: 3'],
  },
  {
    key: 'tenure',
    label: 'Tenure',
    weight: 0.1,
    guide: ['2+ years per role: 8-10', '1-2 years: 6-8', 'Internship level: 4-6', 'No experience: 3'],
  },
];

// =============================================================================
// PROMPTS
// =============================================================================

export const FIT_SCORING_SYSTEM_PROMPT =
  'You are a technical recruiter expert at scoring candidates objectively.';

export function buildFitScoringPrompt(profile: CandidateProfile, jobDescription: string): string {
  const rubric = FIT_RUBRIC.map(
    (c) => `${c.label} (${Math.round(c.weight * 100)}%): 1-10 points\n${c.guide.map((g) => `- ${g}`).join('\n')}`
  ).join('\n\n');

  const formula = FIT_RUBRIC.map((c) => `(${c.label}×${c.weight})`).join(' + ');
  const explanationKeys = FIT_RUBRIC.map((c) => `"${c.key}": "<${c.label.toLowerCase()} analysis with exact points>"`).join(', ');

  return `You are a technical recruiter expert at scoring candidates objectively. Analyze THIS SPECIFIC candidate against the job requirements.

=== JOB REQUIREMENTS ===
${jobDescription}

=== CANDIDATE DATA TO ANALYZE ===
Name: ${profile.name || 'N/A'}
Headline: ${profile.headline || 'N/A'}
Current Role: ${profile.currentRole || 'N/A'}
Company: ${profile.company || 'N/A'}
Location: ${profile.location || 'N/A'}
Education: ${profile.education || 'N/A'}
Profile Snippet: ${profile.snippet || 'N/A'}

=== ANALYSIS INSTRUCTIONS ===
1. Extract education from snippet if not in education field
2. Determine actual experience level from headline/snippet
3. Compare candidate's location with job location from description
4. Assess company relevance to job requirements
5. Calculate weighted score based on actual data

=== SCORING WEIGHTS ===
${rubric}

=== CALCULATION ===
Final = (${formula}) × 10

=== OUTPUT FORMAT ===
Return ONLY this JSON structure with CONSISTENT explanations:

{"final_score": <calculated_score>, "explanation": {${explanationKeys}}}

IMPORTANT: Make explanations match the points given. If you score company as 3 points, explanation must reflect that (e.g., "Startup/intern level - 3 points").`;
}

// =============================================================================
// RESPONSE PARSING
// =============================================================================

const numericScore = z.union([
  z.number(),
  z
    .string()
    .regex(/^\s*-?\d+(\.\d+)?\s*$/)
    .transform(Number),
]);

const fitScoreResponseSchema = z.object({
  final_score: numericScore,
  explanation: z
    .record(z.unknown())
    .default({})
    .transform((explanation) =>
      Object.fromEntries(
        Object.entries(explanation).map(([key, value]) => [
          key,
          typeof value === 'string' ? value : JSON.stringify(value),
        ])
      )
    ),
});

export type FitScoreResponse = z.infer<typeof fitScoreResponseSchema>;

export class FitScoreParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FitScoreParseError';
  }
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Pulls the JSON object out of model output. Tried in order:
 * 1. ```json fenced block
 * 2. First {...} substring, widened to the last closing brace if needed
 * Output is never evaluated as code.
 */
export function extractJsonObject(output: string): unknown {
  const fenced = /```json\s*(\{.*?\})\s*```/s.exec(output);
  if (fenced) {
    const parsed = tryParseJson(fenced[1]);
    if (parsed !== undefined) return parsed;
  }

  const shortest = /(\{.*?\})/s.exec(output);
  if (shortest) {
    const parsed = tryParseJson(shortest[1]);
    if (parsed !== undefined) return parsed;

    const start = output.indexOf('{');
    const end = output.lastIndexOf('}');
    if (end > start) {
      const widened = tryParseJson(output.slice(start, end + 1));
      if (widened !== undefined) return widened;
    }
  }

  throw new FitScoreParseError('No JSON object found in model output');
}

export function parseFitScoreResponse(output: string): FitScore {
  const result = fitScoreResponseSchema.safeParse(extractJsonObject(output));
  if (!result.success) {
    throw new FitScoreParseError(
      `Unexpected score format: ${result.error.issues.map((i) => `${i.path.join('.')} ${i.message}`).join(', ')}`
    );
  }

  return {
    score: clampScore(result.data.final_score),
    breakdown: result.data.explanation,
  };
}

// The rubric's arithmetic can land above 100
export function clampScore(score: number): number {
  if (!Number.isFinite(score)) return 0;
  return Math.max(0, Math.min(100, score));
}

// =============================================================================
// FIT LEVELS
// =============================================================================

export function categorizeFit(score: number): Exclude<FitLevel, 'Error'> {
  if (score >= 80) return 'Excellent Fit';
  if (score >= 70) return 'Strong Fit';
  if (score >= 60) return 'Good Fit';
  if (score >= 50) return 'Moderate Fit';
  return 'Poor Fit';
}

// =============================================================================
// AI FIT SCORER CLASS
// =============================================================================

export interface AIFitScorerConfig {
  model?: string;
  temperature: number;
  maxTokens: number;
}

const DEFAULT_SCORER_CONFIG: AIFitScorerConfig = {
  temperature: 0.2, // Low for consistency
  maxTokens: 800,
};

export class AIFitScorer {
  private config: AIFitScorerConfig;

  constructor(
    private llm: LlmClient,
    config: Partial<AIFitScorerConfig> = {}
  ) {
    this.config = { ...DEFAULT_SCORER_CONFIG, ...config };
  }

  async scoreCandidate(profile: CandidateProfile, jobDescription: string): Promise<FitScore> {
    try {
      const response = await this.llm.chat({
        systemPrompt: FIT_SCORING_SYSTEM_PROMPT,
        prompt: buildFitScoringPrompt(profile, jobDescription),
        model: this.config.model,
        temperature: this.config.temperature,
        maxTokens: this.config.maxTokens,
      });

      return parseFitScoreResponse(response.content);
    } catch (error) {
      if (error instanceof LlmServiceError && error.status !== undefined) {
        console.error(`[AIFitScorer] API error scoring ${profile.name}: ${error.status}`);
        return { score: 0, breakdown: { error: `API Error: ${error.status}` } };
      }

      const message = error instanceof Error ? error.message : String(error);
      console.error(`[AIFitScorer] Scoring failed for ${profile.name}: ${message}`);
      return { score: 0, breakdown: { error: `Scoring failed: ${message}` } };
    }
  }
}
