/**
 * Batch runner export tests
 */

import { describe, it, expect } from '@jest/globals';
import { mkdtemp, readFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { defaultOutputPath, exportResultsJson } from '../../scripts/runSourcing.js';
import type { PipelineResult } from '../../domain/entities/index.js';

const result: PipelineResult = {
  status: 'failed',
  jobId: 'data-scientist-c9b14a',
  runId: 'run-1',
  candidatesFound: 0,
  candidatesScored: 0,
  executionTimeSeconds: 0.5,
  rankedCandidates: [],
  summary: null,
  summaryText: 'No candidates processed.',
  message: 'No candidates found on LinkedIn',
};

describe('runSourcing', () => {
  it('should name the output after the job id', () => {
    expect(defaultOutputPath(result)).toBe('sourcing_results_data-scientist-c9b14a.json');
  });

  it('should write the result as pretty JSON', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'sourcing-'));
    const target = join(dir, 'out.json');

    const written = await exportResultsJson(result, target);

    expect(written).toBe(target);
    expect(JSON.parse(await readFile(target, 'utf-8'))).toEqual(result);
  });
});
