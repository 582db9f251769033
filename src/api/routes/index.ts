export { createHealthRoutes } from './health.js';
export { createSourcingRoutes, sourceCandidatesSchema, SAMPLE_REQUEST } from './sourcing.js';
export type { SourceCandidatesRequest } from './sourcing.js';
