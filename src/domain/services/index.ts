/**
 * Domain Services Module
 *
 * The sourcing capabilities, leaf-first:
 * - Field extraction: search result → structured profile
 * - Profile resolution: candidate name → best matching search result
 * - Fit scoring: rubric-constrained LLM score
 * - Outreach: personalized first message
 * - Pipeline: search → score → outreach over a batch of names
 */

export {
  extractProfile,
  extractCompany,
  extractName,
  extractEducation,
  extractLocationAndRole,
  cleanCompanyName,
  COMPANY_EXTRACTORS,
  EDUCATION_RULES,
  type CompanyExtractor,
  type EducationRule,
} from './ProfileFieldExtractor.js';

export { ProfileResolver, findNameMatch, type ProfileResolverConfig, type MatchStrategy } from './ProfileResolver.js';

export {
  AIFitScorer,
  categorizeFit,
  parseFitScoreResponse,
  FIT_RUBRIC,
  type FitScore,
  type AIFitScorerConfig,
} from './AIFitScorer.js';

export {
  AIOutreachComposer,
  extractHighlights,
  type ComposedMessage,
  type AIOutreachComposerConfig,
} from './AIOutreachComposer.js';

export { extractJobTitle, generateJobId } from './JobIdentity.js';

export {
  SourcingPipeline,
  createSourcingPipeline,
  getSourcingPipeline,
  resetSourcingPipeline,
  buildSummary,
  formatSummary,
  type SourcingPipelineDeps,
  type SourcingPipelineConfig,
  type CandidateResolver,
  type CandidateScorer,
  type OutreachComposer,
  type RunOptions,
} from './SourcingPipeline.js';
