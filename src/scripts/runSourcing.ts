/**
 * Batch sourcing runner
 *
 * Usage: npm run source -- <input.json> [output.json]
 *
 * The input file holds { jobDescription, candidateNames, topN? }. The full
 * pipeline result is written as JSON and the summary is printed.
 */

import 'dotenv/config';
import { readFile, writeFile } from 'fs/promises';
import { sourceCandidatesSchema } from '../api/routes/sourcing.js';
import { loadConfig } from '../config/index.js';
import type { PipelineResult } from '../domain/entities/index.js';
import { createSourcingPipeline } from '../domain/services/index.js';

export function defaultOutputPath(result: PipelineResult): string {
  return `sourcing_results_${result.jobId || 'job'}.json`;
}

export async function exportResultsJson(result: PipelineResult, filename?: string): Promise<string> {
  const target = filename || defaultOutputPath(result);
  await writeFile(target, `${JSON.stringify(result, null, 2)}\n`, 'utf-8');
  return target;
}

async function main(argv: string[]) {
  const [inputPath, outputPath] = argv;
  if (!inputPath) {
    console.error('Usage: npm run source -- <input.json> [output.json]');
    process.exitCode = 1;
    return;
  }

  const raw: unknown = JSON.parse(await readFile(inputPath, 'utf-8'));
  const input = sourceCandidatesSchema.parse(raw);

  const pipeline = createSourcingPipeline(loadConfig());
  const result = await pipeline.run(input.jobDescription, input.candidateNames, { topN: input.topN });

  const written = await exportResultsJson(result, outputPath);
  console.log(`\nResults exported to: ${written}`);

  if (result.status === 'failed') {
    console.error(`Pipeline failed: ${result.message ?? 'unknown error'}`);
    process.exitCode = 1;
    return;
  }

  console.log(`Job ID: ${result.jobId}`);
  console.log(`Candidates Found: ${result.candidatesFound}`);
  console.log(`Execution Time: ${result.executionTimeSeconds}s\n`);

  for (const [i, candidate] of result.rankedCandidates.slice(0, 3).entries()) {
    console.log(`${i + 1}. ${candidate.name}`);
    console.log(`   Score: ${candidate.score.toFixed(1)}/100 (${candidate.fitLevel})`);
    console.log(`   Company: ${candidate.company}`);
    console.log(`   Location: ${candidate.location || 'Unknown'}`);
    console.log(`   LinkedIn: ${candidate.linkedinUrl}`);
    if (candidate.message) {
      console.log(`   Message Preview: ${candidate.message.slice(0, 100)}...`);
    }
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).catch((error) => {
    console.error('Sourcing run failed:', error);
    process.exit(1);
  });
}
