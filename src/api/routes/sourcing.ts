/**
 * Sourcing API Routes
 *
 * Endpoints that run the sourcing pipeline:
 * - Source, score and draft outreach for a list of names
 * - Sample request body for manual testing
 */

import { Router } from 'express';
import { z } from 'zod';
import type { PipelineResult } from '../../domain/entities/Candidate.js';
import type { SourcingPipeline } from '../../domain/services/SourcingPipeline.js';
import { ApiError, ServiceUnavailableError } from '../middleware/errorHandler.js';

// =============================================================================
// SCHEMAS
// =============================================================================

export const sourceCandidatesSchema = z.object({
  jobDescription: z
    .string()
    .refine((value) => value.trim().length > 0, 'Job description cannot be empty'),
  candidateNames: z
    .array(z.string().trim().min(1, 'Candidate names cannot be blank'))
    .min(1, 'At least one candidate name is required')
    .max(100),
  topN: z.number().int().min(1).max(50).optional(),
});

export type SourceCandidatesRequest = z.infer<typeof sourceCandidatesSchema>;

export const SAMPLE_REQUEST: SourceCandidatesRequest = {
  jobDescription:
    'Software Engineer, ML Research - Example Labs\nLooking for candidates with experience in LLMs, Python, and production ML systems.',
  candidateNames: ['Jane Doe', 'John Smith', 'Alex Example'],
};

// =============================================================================
// ROUTES
// =============================================================================

/**
 * `getPipeline` throws when the search or LLM credentials are missing.
 */
export function createSourcingRoutes(getPipeline: () => SourcingPipeline): Router {
  const router = Router();

  /**
   * POST /sourcing/source-candidates - Run the full pipeline
   */
  router.post('/source-candidates', async (req, res, next) => {
    try {
      const { jobDescription, candidateNames, topN } = sourceCandidatesSchema.parse(req.body);

      let pipeline: SourcingPipeline;
      try {
        pipeline = getPipeline();
      } catch (error) {
        throw new ServiceUnavailableError('Sourcing pipeline is not configured', {
          reason: error instanceof Error ? error.message : String(error),
        });
      }

      let result: PipelineResult;
      try {
        result = await pipeline.run(jobDescription, candidateNames, { topN });
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ApiError(`Pipeline execution failed: ${reason}`, 500, 'PIPELINE_FAILED');
      }

      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /sourcing/sample-request - Example body for source-candidates
   */
  router.get('/sample-request', (_req, res) => {
    res.json({
      sampleRequest: SAMPLE_REQUEST,
      usage: 'POST this JSON to /api/sourcing/source-candidates',
    });
  });

  return router;
}
