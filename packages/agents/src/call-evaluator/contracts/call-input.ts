/**
 * Call Input Contract
 *
 * Defines the input schema for call evaluation.
 *
 * @module contracts/call-input
 */

import { z } from 'zod';

/** Minimum transcript length after trimming */
export const MIN_TRANSCRIPT_LENGTH = 20;

export const CallTranscriptSchema = z.object({
  call_id: z
    .string()
    .min(1, 'call_id is required')
    .describe('Unique identifier for the call'),

  lead_id: z
    .string()
    .min(1)
    .optional()
    .describe('Associated lead, if known'),

  transcript: z
    .string()
    .transform((text) => text.trim())
    .refine((text) => text.length >= MIN_TRANSCRIPT_LENGTH, {
      message: `transcript must be at least ${MIN_TRANSCRIPT_LENGTH} characters`,
    })
    .describe('Speaker-tagged transcript ("Agent: ...", "Customer: ...")'),

  duration_seconds: z
    .number()
    .int()
    .nonnegative('duration_seconds must be non-negative')
    .optional()
    .describe('Call duration'),
});

export type CallTranscript = z.infer<typeof CallTranscriptSchema>;

// ===========================================
// Validation Helpers
// ===========================================

const SPEAKER_TAG = /^\s*[A-Za-z][\w .'-]{0,30}:/m;

/**
 * Whether the transcript carries at least one speaker tag
 */
export function hasSpeakerTags(transcript: string): boolean {
  return SPEAKER_TAG.test(transcript);
}
