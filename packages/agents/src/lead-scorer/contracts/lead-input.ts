/**
 * Lead Input Contract
 *
 * Defines the input schema for lead prioritization.
 * This contract is used by:
 * - CRM exports and intake forms (sender)
 * - Lead Scorer Agent (receiver)
 *
 * @module contracts/lead-input
 */

import { z } from 'zod';

// ===========================================
// Enums
// ===========================================

export const LeadStatusSchema = z.enum([
  'new',
  'contacted',
  'follow_up',
  'qualified',
]);

export type LeadStatus = z.infer<typeof LeadStatusSchema>;

/**
 * Source values with a known quality score. Any other string is accepted
 * and scored with the default.
 */
export const KNOWN_LEAD_SOURCES = [
  'referral',
  'walk-in',
  'portal',
  'magicbricks',
  '99acres',
  'housing.com',
  'website',
  'social',
  'social_media',
  'other',
] as const;

// ===========================================
// Lead Input Schema
// ===========================================

export const LeadInputSchema = z.object({
  lead_id: z
    .string()
    .min(1, 'lead_id is required')
    .describe('Unique identifier for the lead'),

  source: z
    .string()
    .min(1, 'source is required')
    .describe('How the lead was acquired (referral, walk-in, portal, ...)'),

  budget: z
    .number()
    .nonnegative('budget must be non-negative')
    .describe('Stated budget in INR'),

  city: z
    .string()
    .describe('City of interest'),

  property_type: z
    .string()
    .describe('Property type of interest (e.g. 2BHK, villa)'),

  last_activity_minutes_ago: z
    .number()
    .int()
    .nonnegative('last_activity_minutes_ago must be non-negative')
    .describe('Minutes since the lead last engaged'),

  past_interactions: z
    .number()
    .int()
    .nonnegative('past_interactions must be non-negative')
    .describe('Count of prior touches'),

  notes: z
    .string()
    .default('')
    .describe('Free-text agent notes'),

  status: LeadStatusSchema
    .describe('Pipeline status'),
});

export type LeadInput = z.infer<typeof LeadInputSchema>;

// ===========================================
// Batch Schema
// ===========================================

export const LeadBatchSchema = z.object({
  leads: z
    .array(LeadInputSchema)
    .superRefine((leads, ctx) => {
      const seen = new Set<string>();
      leads.forEach((lead, index) => {
        if (seen.has(lead.lead_id)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [index, 'lead_id'],
            message: `duplicate lead_id ${lead.lead_id}`,
          });
        }
        seen.add(lead.lead_id);
      });
    })
    .describe('Leads to prioritize (may be empty, lead_id unique)'),

  max_results: z
    .number()
    .int()
    .min(1, 'max_results must be at least 1')
    .default(10)
    .describe('Maximum number of ranked leads to return'),

  use_llm: z
    .boolean()
    .default(true)
    .describe('Attempt model analysis of notes when a model is configured'),
});

export type LeadBatch = z.infer<typeof LeadBatchSchema>;

// ===========================================
// Validation Helpers
// ===========================================

/**
 * Validate a lead input object
 * @throws ZodError if validation fails
 */
export function validateLeadInput(input: unknown): LeadInput {
  return LeadInputSchema.parse(input);
}

/**
 * Safely validate a lead input, returning null on failure
 */
export function safeValidateLeadInput(input: unknown): LeadInput | null {
  const result = LeadInputSchema.safeParse(input);
  return result.success ? result.data : null;
}
