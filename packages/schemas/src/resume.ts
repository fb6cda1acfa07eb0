import { z } from 'zod';
import { addressTypeEnum, educationLevelEnum, genderEnum } from './enums.js';

// Enum-backed fields are plain strings here: values outside the vocabulary are
// kept verbatim and reported as warnings by the normalizer.

export const personalInfoSchema = z.object({
  name: z.string(),
  date_of_birth: z.string(),
  gender: z.string(),
  email: z.string(),
  phone: z.string(),
});

export const addressSchema = z.object({
  type: z.string(),
  address: z.string(),
  post_name: z.string(),
  post_code: z.string(),
});

export const academicEducationSchema = z.object({
  levels: z.string(),
  subject: z.string(),
  board: z.string(),
  institute: z.string(),
  passing_year: z.string(),
  result: z.string(),
});

export const employmentSchema = z
  .object({
    company_name: z.string(),
    company_type: z.string(),
    position: z.string(),
    joining_date: z.string(),
    leaving_date: z.string(),
    currently_working: z.boolean(),
    responsibility: z.string(),
  })
  .refine((e) => !e.currently_working || e.leaving_date === '', {
    message: 'leaving_date must be empty while currently_working is true',
    path: ['leaving_date'],
  });

export const resumeRecordSchema = z.object({
  personal_info: personalInfoSchema,
  addresses: z.array(addressSchema),
  academic_education: z.array(academicEducationSchema),
  employment: z.array(employmentSchema),
  skills: z.array(z.string()),
});

export type PersonalInfo = z.infer<typeof personalInfoSchema>;
export type Address = z.infer<typeof addressSchema>;
export type AcademicEducation = z.infer<typeof academicEducationSchema>;
export type Employment = z.infer<typeof employmentSchema>;
export type ResumeRecord = z.infer<typeof resumeRecordSchema>;

export function createEmptyPersonalInfo(): PersonalInfo {
  return { name: '', date_of_birth: '', gender: '', email: '', phone: '' };
}

export function createEmptyAddress(): Address {
  return { type: '', address: '', post_name: '', post_code: '' };
}

export function createEmptyEducation(): AcademicEducation {
  return { levels: '', subject: '', board: '', institute: '', passing_year: '', result: '' };
}

export function createEmptyEmployment(): Employment {
  return {
    company_name: '',
    company_type: '',
    position: '',
    joining_date: '',
    leaving_date: '',
    currently_working: false,
    responsibility: '',
  };
}

export function createEmptyResumeRecord(): ResumeRecord {
  return {
    personal_info: createEmptyPersonalInfo(),
    addresses: [],
    academic_education: [],
    employment: [],
    skills: [],
  };
}

// ============== SCHEMA DESCRIPTOR ==============

export type FieldSpec =
  | { name: string; type: 'string'; hint?: string }
  | { name: string; type: 'boolean'; hint?: string }
  | { name: string; type: 'enum'; values: readonly string[]; hint?: string };

export interface SectionSpec {
  key: string;
  /** `object` is a single object, `list` an array of objects, `string-list` an array of strings. */
  kind: 'object' | 'list' | 'string-list';
  description: string;
  fields: readonly FieldSpec[];
}

export interface SchemaDescriptor {
  name: string;
  sections: readonly SectionSpec[];
}

/**
 * Field-by-field description of {@link ResumeRecord}, rendered into the
 * extraction prompt. Order here is the order the model sees.
 */
export const RESUME_SCHEMA_DESCRIPTOR: SchemaDescriptor = {
  name: 'ResumeRecord',
  sections: [
    {
      key: 'personal_info',
      kind: 'object',
      description: 'The candidate',
      fields: [
        { name: 'name', type: 'string', hint: 'full name' },
        { name: 'date_of_birth', type: 'string', hint: 'as written in the resume' },
        { name: 'gender', type: 'enum', values: genderEnum.options },
        { name: 'email', type: 'string' },
        { name: 'phone', type: 'string' },
      ],
    },
    {
      key: 'addresses',
      kind: 'list',
      description: 'Postal addresses, only those present in the resume',
      fields: [
        { name: 'type', type: 'enum', values: addressTypeEnum.options },
        { name: 'address', type: 'string', hint: 'full address line' },
        { name: 'post_name', type: 'string', hint: 'post office name' },
        { name: 'post_code', type: 'string' },
      ],
    },
    {
      key: 'academic_education',
      kind: 'list',
      description: 'Academic qualifications in the order they appear',
      fields: [
        { name: 'levels', type: 'enum', values: educationLevelEnum.options },
        { name: 'subject', type: 'string', hint: 'major, group or field of study' },
        { name: 'board', type: 'string', hint: 'examination board or university' },
        { name: 'institute', type: 'string' },
        { name: 'passing_year', type: 'string', hint: 'four-digit year' },
        { name: 'result', type: 'string', hint: 'GPA, CGPA, class or division' },
      ],
    },
    {
      key: 'employment',
      kind: 'list',
      description: 'Jobs in the order they appear',
      fields: [
        { name: 'company_name', type: 'string' },
        { name: 'company_type', type: 'string', hint: 'industry or kind of organisation' },
        { name: 'position', type: 'string' },
        { name: 'joining_date', type: 'string', hint: 'as written in the resume' },
        {
          name: 'leaving_date',
          type: 'string',
          hint: 'as written in the resume; empty when currently working',
        },
        { name: 'currently_working', type: 'boolean' },
        { name: 'responsibility', type: 'string', hint: 'duties and achievements' },
      ],
    },
    {
      key: 'skills',
      kind: 'string-list',
      description: 'Skills, each listed once',
      fields: [],
    },
  ],
};
