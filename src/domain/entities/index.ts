/**
 * Domain Entities - Candidate Sourcing
 */

export * from './Candidate.js';
