/**
 * Zod schemas for the resume extraction agent.
 */

import { resumeRecordSchema } from '@resumekit/schemas';
import { z } from 'zod';
import { deepFreeze } from './normalize.js';

export const NormalizationWarningSchema = z.object({
  /** Dotted path into the record, e.g. `academic_education.0.levels`. */
  path: z.string(),
  code: z.enum(['unknown_enum', 'type_coerced', 'invariant_fixed', 'item_dropped']),
  message: z.string(),
  value: z.unknown().optional(),
});

export type NormalizationWarning = z.infer<typeof NormalizationWarningSchema>;

export const ResumeExtractionInputSchema = z.object({
  filePath: z.string().min(1),
});

export type ResumeExtractionInput = z.infer<typeof ResumeExtractionInputSchema>;

export const ResumeExtractionOutputSchema = z.object({
  sourceFile: z.string(),
  model: z.string(),
  attempts: z.number().int().positive(),
  /** Parsing copies the record; the copy is frozen again. */
  record: resumeRecordSchema.transform((record) => deepFreeze(record)),
  warnings: z.array(NormalizationWarningSchema),
});

export type ResumeExtractionOutput = z.infer<typeof ResumeExtractionOutputSchema>;
