/**
 * Job identity helpers
 *
 * The job title hint narrows profile searches; the job id lets callers
 * recognise repeated submissions of the same job text.
 */

import { createHash } from 'crypto';

export const DEFAULT_JOB_TITLE = 'Software Engineer';

/**
 * "Software Engineer, ML Research - Windsurf\n..." -> "Software Engineer, ML Research"
 */
export function extractJobTitle(jobDescription: string): string {
  const [firstLine = ''] = jobDescription.trim().split('\n');
  const title = firstLine.split(' - ')[0].trim();
  return title || DEFAULT_JOB_TITLE;
}

/**
 * Title slug plus the first 6 hex chars of the description's md5.
 */
export function generateJobId(jobDescription: string): string {
  const slug = extractJobTitle(jobDescription).toLowerCase().replace(/ /g, '-');
  const hashSuffix = createHash('md5').update(jobDescription).digest('hex').slice(0, 6);
  return `${slug}-${hashSuffix}`;
}
