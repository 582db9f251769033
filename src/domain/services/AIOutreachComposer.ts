/**
 * AI Outreach Composer
 *
 * Drafts a short personalized LinkedIn message for a scored candidate.
 * Failures come back as an error string with messageGenerated=false.
 */

import type { LlmClient } from '../../integrations/llm/ClaudeClient.js';
import { UNKNOWN_COMPANY, type ScoredProfile } from '../entities/Candidate.js';

// =============================================================================
// TYPES
// =============================================================================

export interface ComposedMessage {
  message: string;
  messageGenerated: boolean;
}

export interface AIOutreachComposerConfig {
  model?: string;
  maxTokens: number;
}

// =============================================================================
// PROMPTS
// =============================================================================

export const OUTREACH_SYSTEM_PROMPT = 'You are a helpful and professional recruiter.';

export function buildOutreachPrompt(candidate: ScoredProfile, jobDescription: string): string {
  return `You are a professional technical recruiter.

Write a personalized LinkedIn message to ${candidate.name}, who is a ${candidate.headline}, and these are its snippets: ${candidate.snippet} based on this job:

${jobDescription}

Make the message reference their background. Keep it short, friendly, and professional. Do not exaggerate or use emojis.`;
}

// =============================================================================
// HIGHLIGHTS
// =============================================================================

export function extractHighlights(candidate: ScoredProfile): string[] {
  const highlights: string[] = [];

  if (candidate.company && candidate.company !== UNKNOWN_COMPANY) {
    highlights.push(`Experience at ${candidate.company}`);
  }
  if (candidate.score >= 70) {
    highlights.push('Strong technical fit');
  }
  if (candidate.location) {
    highlights.push(`Located in ${candidate.location}`);
  }

  return highlights;
}

// =============================================================================
// AI OUTREACH COMPOSER CLASS
// =============================================================================

export class AIOutreachComposer {
  private config: AIOutreachComposerConfig;

  constructor(
    private llm: LlmClient,
    config: Partial<AIOutreachComposerConfig> = {}
  ) {
    this.config = { maxTokens: 600, ...config };
  }

  async composeMessage(candidate: ScoredProfile, jobDescription: string): Promise<ComposedMessage> {
    try {
      const response = await this.llm.chat({
        systemPrompt: OUTREACH_SYSTEM_PROMPT,
        prompt: buildOutreachPrompt(candidate, jobDescription),
        model: this.config.model,
        maxTokens: this.config.maxTokens,
      });

      const message = response.content.trim();
      if (!message) {
        throw new Error('Empty response from model');
      }

      return { message, messageGenerated: true };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.error(`[AIOutreachComposer] Error generating message for ${candidate.name}: ${reason}`);
      return { message: `Error generating message: ${reason}`, messageGenerated: false };
    }
  }
}
