/**
 * Call Evaluator Contracts
 *
 * Re-exports all contract types and schemas.
 *
 * @module contracts
 */

export * from './call-input';
export * from './verdict';
