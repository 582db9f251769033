/**
 * AI Outreach Composer Tests
 */

import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import {
  AIOutreachComposer,
  OUTREACH_SYSTEM_PROMPT,
  buildOutreachPrompt,
  extractHighlights,
} from '../../domain/services/AIOutreachComposer.js';
import { LlmServiceError, type LlmClient } from '../../integrations/llm/ClaudeClient.js';
import type { ScoredProfile } from '../../domain/entities/Candidate.js';

const candidate: ScoredProfile = {
  name: 'Jane Doe',
  headline: 'Jane Doe - Data Scientist - Acme Inc',
  company: 'Acme Inc',
  location: 'Pune, Maharashtra, India',
  linkedinUrl: 'https://linkedin.com/in/jane',
  snippet: 'Data Scientist at Acme Inc.',
  education: '',
  currentRole: 'Data Scientist',
  score: 74,
  scoreBreakdown: {},
  fitLevel: 'Strong Fit',
};

const JOB = 'Data Scientist - Acme\nPune, full time';

function composerReturning(content: string) {
  const chat = jest.fn<LlmClient['chat']>(async () => ({
    content,
    model: 'claude-3-5-haiku-20241022',
    usage: { inputTokens: 1, outputTokens: 1, totalTokens: 2 },
    stopReason: 'end_turn',
    latencyMs: 1,
  }));
  return { chat, composer: new AIOutreachComposer({ chat }) };
}

describe('AIOutreachComposer', () => {
  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  describe('composeMessage', () => {
    it('should return the trimmed draft', async () => {
      const { composer } = composerReturning('\n  Hi Jane, your work at Acme caught my eye.  \n');

      await expect(composer.composeMessage(candidate, JOB)).resolves.toEqual({
        message: 'Hi Jane, your work at Acme caught my eye.',
        messageGenerated: true,
      });
    });

    it('should send the recruiter system prompt without a temperature', async () => {
      const { chat, composer } = composerReturning('Hello');

      await composer.composeMessage(candidate, JOB);

      const request = chat.mock.calls[0][0];
      expect(request.systemPrompt).toBe(OUTREACH_SYSTEM_PROMPT);
      expect(request.maxTokens).toBe(600);
      expect(request.temperature).toBeUndefined();
    });

    it('should return an error string when the call fails', async () => {
      const chat = jest.fn<LlmClient['chat']>(async () => {
        throw new LlmServiceError('Claude API error: 529', 529);
      });
      const composer = new AIOutreachComposer({ chat });

      await expect(composer.composeMessage(candidate, JOB)).resolves.toEqual({
        message: 'Error generating message: Claude API error: 529',
        messageGenerated: false,
      });
    });

    it('should treat an empty completion as a failure', async () => {
      const { composer } = composerReturning('   ');

      await expect(composer.composeMessage(candidate, JOB)).resolves.toEqual({
        message: 'Error generating message: Empty response from model',
        messageGenerated: false,
      });
    });
  });

  describe('buildOutreachPrompt', () => {
    it('should reference the candidate and the job', () => {
      const prompt = buildOutreachPrompt(candidate, JOB);

      expect(prompt).toContain('Write a personalized LinkedIn message to Jane Doe, who is a Jane Doe - Data Scientist - Acme Inc');
      expect(prompt).toContain(JOB);
    });
  });

  describe('extractHighlights', () => {
    it('should list company, fit and location in order', () => {
      expect(extractHighlights(candidate)).toEqual([
        'Experience at Acme Inc',
        'Strong technical fit',
        'Located in Pune, Maharashtra, India',
      ]);
    });

    it('should skip unknown companies, low scores and empty locations', () => {
      expect(extractHighlights({ ...candidate, company: 'N/A', score: 69.9, location: '' })).toEqual([]);
    });
  });
});
