import { z } from 'zod';

export const genderEnum = z.enum(['male', 'female', 'other']);
export type Gender = z.infer<typeof genderEnum>;

export const addressTypeEnum = z.enum(['present', 'permanent']);
export type AddressType = z.infer<typeof addressTypeEnum>;

/**
 * Academic levels. The school-system levels come first; the professional
 * qualifications after `other` are accepted as first-class levels too.
 */
export const educationLevelEnum = z.enum([
  'jsc',
  'ssc',
  'hsc',
  'olevel',
  'alevel',
  'diploma',
  'bachelors',
  'masters',
  'phd',
  'other',
  'ca_qualified',
  'ca_cc',
  'cma_qualified',
  'cma_student',
  'acca',
  'cs',
  'mbbs',
  'bds',
  'llb',
  'llm',
]);
export type EducationLevel = z.infer<typeof educationLevelEnum>;

/** Spellings models commonly emit for a level, mapped to the canonical member. */
export const educationLevelAliases: Readonly<Record<string, EducationLevel>> = {
  o_level: 'olevel',
  'o-level': 'olevel',
  'o level': 'olevel',
  a_level: 'alevel',
  'a-level': 'alevel',
  'a level': 'alevel',
};
