/**
 * Lead Scorer Contracts
 *
 * Re-exports all contract types and schemas.
 *
 * @module contracts
 */

export * from './lead-input';
export * from './scoring-result';
