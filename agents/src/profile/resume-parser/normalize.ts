/**
 * Resume response normalizer.
 *
 * Turns a raw model reply into a ResumeRecord. Strictness is tiered:
 * - missing or null fields take their empty default
 * - enum values outside the vocabulary are kept and reported as warnings
 * - only a non-object reply, or a scalar where a list of objects belongs, fails
 */

import { SchemaValidationError, isPlainObject, parseJsonObject } from '@resumekit/llm';
import {
  addressTypeEnum,
  educationLevelAliases,
  educationLevelEnum,
  genderEnum,
  resumeRecordSchema,
  type AcademicEducation,
  type Address,
  type Employment,
  type PersonalInfo,
  type ResumeRecord,
} from '@resumekit/schemas';
import type { NormalizationWarning } from './schema.js';

export interface NormalizedResume {
  /** Deep-frozen. */
  record: ResumeRecord;
  warnings: NormalizationWarning[];
}

const PLACEHOLDERS = new Set([
  'n/a',
  'n.a.',
  'none',
  'null',
  'nil',
  'undefined',
  '-',
  '--',
  'unknown',
  'not specified',
  'not available',
  'not mentioned',
]);

/** leaving_date values that mean the job has not ended. */
const PRESENT_WORDS = new Set([
  'present',
  'current',
  'currently',
  'now',
  'till date',
  'till now',
  'to date',
  'ongoing',
  'continuing',
]);

const TRUE_WORDS = new Set(['true', 'yes', 'y', '1', 'current', 'present']);

class Normalizer {
  readonly warnings: NormalizationWarning[] = [];

  constructor(private readonly raw: string) {}

  warn(path: string, code: NormalizationWarning['code'], message: string, value?: unknown): void {
    this.warnings.push({ path, code, message, value });
  }

  text(value: unknown, path: string): string {
    if (value === undefined || value === null) return '';
    if (typeof value === 'string') {
      const trimmed = value.trim();
      return PLACEHOLDERS.has(trimmed.toLowerCase()) ? '' : trimmed;
    }
    if (typeof value === 'number' || typeof value === 'boolean') {
      return Number.isNaN(value) ? '' : String(value);
    }
    this.warn(path, 'type_coerced', 'Expected a string; value discarded', value);
    return '';
  }

  bool(value: unknown, path: string): boolean {
    if (value === undefined || value === null) return false;
    if (typeof value === 'boolean') return value;
    if (typeof value === 'number') return value !== 0;
    if (typeof value === 'string') return TRUE_WORDS.has(value.trim().toLowerCase());
    this.warn(path, 'type_coerced', 'Expected a boolean; treated as false', value);
    return false;
  }

  /**
   * Case- and separator-insensitive match against the vocabulary. Unknown
   * values pass through with exactly one warning.
   */
  enumValue(
    value: unknown,
    vocabulary: readonly string[],
    path: string,
    aliases: Readonly<Record<string, string>> = {},
  ): string {
    const text = this.text(value, path);
    if (!text) return '';

    const key = text.toLowerCase().replace(/\s+/g, ' ');
    if (vocabulary.includes(key)) return key;
    const alias = Object.hasOwn(aliases, key) ? aliases[key] : undefined;
    if (alias) return alias;
    const underscored = key.replace(/[\s-]+/g, '_');
    if (vocabulary.includes(underscored)) return underscored;

    this.warn(path, 'unknown_enum', `"${text}" is not one of: ${vocabulary.join(', ')}`, text);
    return text;
  }

  /**
   * A list of objects. A lone object is wrapped; a scalar means the model
   * abandoned the schema.
   */
  objectList(value: unknown, path: string): Record<string, unknown>[] {
    if (value === undefined || value === null) return [];

    let items: unknown[];
    if (Array.isArray(value)) {
      items = value;
    } else if (isPlainObject(value)) {
      this.warn(path, 'type_coerced', 'Expected a list; wrapped single object');
      items = [value];
    } else {
      throw new SchemaValidationError(`${path} must be a list, got ${typeof value}`, this.raw);
    }

    const objects: Record<string, unknown>[] = [];
    items.forEach((item, index) => {
      if (isPlainObject(item)) {
        objects.push(item);
      } else {
        this.warn(`${path}.${index}`, 'item_dropped', 'List item is not an object', item);
      }
    });
    return objects;
  }

  personalInfo(source: Record<string, unknown>): PersonalInfo {
    const key = source.personal_info !== undefined ? 'personal_info' : 'user_info';
    let info: Record<string, unknown> = {};
    const value = source[key];
    if (isPlainObject(value)) {
      info = value;
    } else if (value !== undefined && value !== null) {
      this.warn('personal_info', 'type_coerced', 'Expected an object; defaults used', value);
    }

    return {
      name: this.text(info.name, 'personal_info.name'),
      date_of_birth: this.text(info.date_of_birth, 'personal_info.date_of_birth'),
      gender: this.enumValue(info.gender, genderEnum.options, 'personal_info.gender'),
      email: this.text(info.email, 'personal_info.email'),
      phone: this.text(info.phone ?? info.phone_number, 'personal_info.phone'),
    };
  }

  addresses(value: unknown): Address[] {
    return this.objectList(value, 'addresses').map((a, i) => {
      const path = `addresses.${i}`;
      return {
        type: this.enumValue(a.type, addressTypeEnum.options, `${path}.type`),
        address: this.text(a.address, `${path}.address`),
        post_name: this.text(a.post_name, `${path}.post_name`),
        post_code: this.text(a.post_code, `${path}.post_code`),
      };
    });
  }

  education(value: unknown): AcademicEducation[] {
    return this.objectList(value, 'academic_education').map((e, i) => {
      const path = `academic_education.${i}`;
      return {
        levels: this.enumValue(
          e.levels,
          educationLevelEnum.options,
          `${path}.levels`,
          educationLevelAliases,
        ),
        subject: this.text(e.subject, `${path}.subject`),
        board: this.text(e.board, `${path}.board`),
        institute: this.text(e.institute, `${path}.institute`),
        passing_year: this.text(e.passing_year, `${path}.passing_year`),
        result: this.text(e.result, `${path}.result`),
      };
    });
  }

  employment(value: unknown): Employment[] {
    return this.objectList(value, 'employment').map((job, i) => {
      const path = `employment.${i}`;
      let currentlyWorking = this.bool(job.currently_working, `${path}.currently_working`);
      let leavingDate = this.text(job.leaving_date, `${path}.leaving_date`);

      if (!currentlyWorking && PRESENT_WORDS.has(leavingDate.toLowerCase())) {
        this.warn(
          `${path}.leaving_date`,
          'invariant_fixed',
          `leaving_date "${leavingDate}" marks a current job; set currently_working`,
          leavingDate,
        );
        currentlyWorking = true;
        leavingDate = '';
      } else if (currentlyWorking && leavingDate) {
        this.warn(
          `${path}.leaving_date`,
          'invariant_fixed',
          `Cleared leaving_date "${leavingDate}" because currently_working is true`,
          leavingDate,
        );
        leavingDate = '';
      }

      return {
        company_name: this.text(job.company_name, `${path}.company_name`),
        company_type: this.text(job.company_type, `${path}.company_type`),
        position: this.text(job.position, `${path}.position`),
        joining_date: this.text(job.joining_date, `${path}.joining_date`),
        leaving_date: leavingDate,
        currently_working: currentlyWorking,
        responsibility: this.text(job.responsibility, `${path}.responsibility`),
      };
    });
  }

  /**
   * Skills as an ordered set: trimmed, placeholders dropped, duplicates
   * removed case-insensitively with the first spelling kept.
   */
  skills(value: unknown): string[] {
    let items: unknown[];
    if (value === undefined || value === null) {
      items = [];
    } else if (Array.isArray(value)) {
      items = value;
    } else if (typeof value === 'string') {
      this.warn('skills', 'type_coerced', 'Expected a list; split string on separators', value);
      items = value.split(/[,;\n]/);
    } else if (isPlainObject(value)) {
      // e.g. { technical: [...], soft: [...] }
      this.warn('skills', 'type_coerced', 'Expected a list; flattened grouped skills');
      items = Object.values(value).flatMap((group) => (Array.isArray(group) ? group : [group]));
    } else {
      throw new SchemaValidationError(`skills must be a list, got ${typeof value}`, this.raw);
    }

    const seen = new Set<string>();
    const skills: string[] = [];
    items.forEach((item, index) => {
      const path = `skills.${index}`;
      const candidate = isPlainObject(item) && typeof item.name === 'string' ? item.name : item;
      if (isPlainObject(candidate) || Array.isArray(candidate)) {
        this.warn(path, 'item_dropped', 'Skill is not a string', item);
        return;
      }
      const skill = this.text(candidate, path);
      const key = skill.toLowerCase();
      if (!skill || seen.has(key)) return;
      seen.add(key);
      skills.push(skill);
    });
    return skills;
  }
}

/**
 * Parse, coerce and validate a raw model reply.
 *
 * Throws SchemaValidationError (or its MalformedJSONError subtype) when no
 * record can be salvaged.
 */
export function normalizeResumeResponse(rawText: string): NormalizedResume {
  const source = parseJsonObject(rawText);
  const n = new Normalizer(rawText);

  const record: ResumeRecord = {
    personal_info: n.personalInfo(source),
    addresses: n.addresses(source.addresses),
    academic_education: n.education(source.academic_education),
    employment: n.employment(source.employment),
    skills: n.skills(source.skills),
  };

  const validated = resumeRecordSchema.safeParse(record);
  if (!validated.success) {
    const issues = validated.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new SchemaValidationError(issues.join('; '), rawText, { cause: validated.error });
  }

  return { record: deepFreeze(validated.data), warnings: n.warnings };
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
