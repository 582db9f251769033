/**
 * AI Fit Scorer Tests
 *
 * The LLM is replaced by a jest.fn returning canned completions.
 */

import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import {
  AIFitScorer,
  FIT_SCORING_SYSTEM_PROMPT,
  buildFitScoringPrompt,
  categorizeFit,
  clampScore,
  extractJsonObject,
} from '../../domain/services/AIFitScorer.js';
import { LlmServiceError, type ClaudeResponse, type LlmClient } from '../../integrations/llm/ClaudeClient.js';
import type { CandidateProfile } from '../../domain/entities/Candidate.js';

const profile: CandidateProfile = {
  name: 'Jane Doe',
  headline: 'Jane Doe - Data Scientist - Acme Inc',
  company: 'Acme Inc',
  location: 'Pune, Maharashtra, India',
  linkedinUrl: 'https://linkedin.com/in/jane',
  snippet: 'Data Scientist at Acme Inc. M.Tech from IIT.',
  education: "Master's degree",
  currentRole: 'Data Scientist',
};

const JOB = 'Data Scientist - Acme\nPune, full time';

function completion(content: string): ClaudeResponse {
  return {
    content,
    model: 'claude-3-5-haiku-20241022',
    usage: { inputTokens: 10, outputTokens: 10, totalTokens: 20 },
    stopReason: 'end_turn',
    latencyMs: 5,
  };
}

function scorerReturning(content: string) {
  const chat = jest.fn<LlmClient['chat']>(async () => completion(content));
  return { chat, scorer: new AIFitScorer({ chat }) };
}

describe('AIFitScorer', () => {
  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  describe('scoreCandidate', () => {
    it('should parse a fenced JSON block', async () => {
      const { scorer } = scorerReturning(
        '```json\n{"final_score": 72.5, "explanation": {"education": "Good - 7 points"}}\n```'
      );

      const result = await scorer.scoreCandidate(profile, JOB);

      expect(result).toEqual({ score: 72.5, breakdown: { education: 'Good - 7 points' } });
    });

    it('should parse a bare nested object surrounded by prose', async () => {
      const { scorer } = scorerReturning(
        'Here is the score: {"final_score": 64, "explanation": {"experience": "Some overlap"}} Thanks'
      );

      const result = await scorer.scoreCandidate(profile, JOB);

      expect(result).toEqual({ score: 64, breakdown: { experience: 'Some overlap' } });
    });

    it('should accept a numeric string score', async () => {
      const { scorer } = scorerReturning('{"final_score": "81"}');

      await expect(scorer.scoreCandidate(profile, JOB)).resolves.toEqual({ score: 81, breakdown: {} });
    });

    it('should stringify non-string explanation values', async () => {
      const { scorer } = scorerReturning('{"final_score": 50, "explanation": {"education": 7}}');

      const result = await scorer.scoreCandidate(profile, JOB);

      expect(result.breakdown).toEqual({ education: '7' });
    });

    it('should clamp scores into 0-100', async () => {
      await expect(scorerReturning('{"final_score": 135}').scorer.scoreCandidate(profile, JOB)).resolves.toEqual({
        score: 100,
        breakdown: {},
      });
      await expect(scorerReturning('{"final_score": -5}').scorer.scoreCandidate(profile, JOB)).resolves.toEqual({
        score: 0,
        breakdown: {},
      });
    });

    it('should degrade to zero when no JSON is present', async () => {
      const { scorer } = scorerReturning('I cannot score this candidate.');

      await expect(scorer.scoreCandidate(profile, JOB)).resolves.toEqual({
        score: 0,
        breakdown: { error: 'Scoring failed: No JSON object found in model output' },
      });
    });

    it('should not evaluate non-JSON object literals', async () => {
      const { scorer } = scorerReturning("{'final_score': 70, 'explanation': {}}");

      const result = await scorer.scoreCandidate(profile, JOB);

      expect(result).toEqual({
        score: 0,
        breakdown: { error: 'Scoring failed: No JSON object found in model output' },
      });
    });

    it('should report a missing final_score', async () => {
      const { scorer } = scorerReturning('{"explanation": {}}');

      const result = await scorer.scoreCandidate(profile, JOB);

      expect(result.score).toBe(0);
      expect(result.breakdown.error).toMatch(/^Scoring failed: Unexpected score format/);
    });

    it('should report the status of a failed API call', async () => {
      const chat = jest.fn<LlmClient['chat']>(async () => {
        throw new LlmServiceError('Claude API error: 500', 500);
      });
      const scorer = new AIFitScorer({ chat });

      await expect(scorer.scoreCandidate(profile, JOB)).resolves.toEqual({
        score: 0,
        breakdown: { error: 'API Error: 500' },
      });
    });

    it('should report other failures by message', async () => {
      const chat = jest.fn<LlmClient['chat']>(async () => {
        throw new Error('socket hang up');
      });
      const scorer = new AIFitScorer({ chat });

      await expect(scorer.scoreCandidate(profile, JOB)).resolves.toEqual({
        score: 0,
        breakdown: { error: 'Scoring failed: socket hang up' },
      });
    });

    it('should request a low temperature with the scoring system prompt', async () => {
      const { chat, scorer } = scorerReturning('{"final_score": 60}');

      await scorer.scoreCandidate(profile, JOB);

      expect(chat).toHaveBeenCalledWith(
        expect.objectContaining({
          systemPrompt: FIT_SCORING_SYSTEM_PROMPT,
          temperature: 0.2,
          maxTokens: 800,
        })
      );
    });
  });

  describe('buildFitScoringPrompt', () => {
    it('should include the job and candidate fields', () => {
      const prompt = buildFitScoringPrompt(profile, JOB);

      expect(prompt).toContain(JOB);
      expect(prompt).toContain('Name: Jane Doe');
      expect(prompt).toContain('Location: Pune, Maharashtra, India');
      expect(prompt).toContain('Experience Match (25%): 1-10 points');
    });

    it('should print N/A for empty fields', () => {
      const prompt = buildFitScoringPrompt({ ...profile, location: '' }, JOB);

      expect(prompt).toContain('Location: N/A');
    });
  });

  describe('extractJsonObject', () => {
    it('should throw when braces never form valid JSON', () => {
      expect(() => extractJsonObject('{not json}')).toThrow('No JSON object found in model output');
    });
  });

  describe('clampScore', () => {
    it('should map non-finite values to zero', () => {
      expect(clampScore(Number.NaN)).toBe(0);
    });
  });

  describe('categorizeFit', () => {
    it.each([
      [80, 'Excellent Fit'],
      [79.9, 'Strong Fit'],
      [70, 'Strong Fit'],
      [60, 'Good Fit'],
      [50, 'Moderate Fit'],
      [49, 'Poor Fit'],
      [0, 'Poor Fit'],
    ])('should map %p to %p', (score, level) => {
      expect(categorizeFit(score)).toBe(level);
    });
  });
});
