/**
 * Lead Scorer Agent
 *
 * Ranks leads by urgency from deterministic rules plus a model-read
 * notes signal with keyword fallback.
 *
 * @module lead-scorer
 */

// === Contracts (API boundaries) ===
export * from './contracts';

// === Types (internal) ===
export * from './types';

// === Core Modules ===
export * from './rules';
export * from './notes-heuristics';
export * from './notes-scorer';
export * from './scoring';
export * from './logger';

// === Agent ===
export { LeadScorerAgent, createLeadScorerAgent } from './agent';
