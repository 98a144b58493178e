/**
 * Guide Request Validation
 * zod schemas for params and bodies of the guide endpoints
 */

import { z } from 'zod';
import { SUPPORTED_LANGS } from '../../services/i18n/index.js';

export const userParamsSchema = z.object({
  userId: z.string().trim().min(1).max(128),
});

export const placeParamsSchema = userParamsSchema.extend({
  index: z.coerce.number().int().min(0),
});

export const locationBodySchema = z.object({
  lat: z.number().min(-90).max(90),
  lng: z.number().min(-180).max(180),
});

export const preferencesBodySchema = z.object({
  categories: z.object({
    nature: z.boolean().optional(),
    religion: z.boolean().optional(),
    culture: z.boolean().optional(),
    history: z.boolean().optional(),
    must_visit: z.boolean().optional(),
  }).strict().optional(),
  language: z.enum(SUPPORTED_LANGS).optional(),
}).strict();

export type PreferencesBody = z.infer<typeof preferencesBodySchema>;

export interface ValidationFailure {
  error: 'VALIDATION_ERROR';
  issues: string[];
}

export function toValidationFailure(error: z.ZodError): ValidationFailure {
  return {
    error: 'VALIDATION_ERROR',
    issues: error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
  };
}
