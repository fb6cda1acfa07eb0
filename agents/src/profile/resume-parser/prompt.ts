/**
 * Extraction prompt for resume text.
 * Pure and deterministic: the same text and descriptor always give the same prompt.
 */

import {
  EmptyDocumentError,
  jsonExtractionPrompt,
  strictJsonReminder,
  structuredExtractionSystem,
} from '@resumekit/llm';
import {
  RESUME_SCHEMA_DESCRIPTOR,
  type FieldSpec,
  type SchemaDescriptor,
  type SectionSpec,
} from '@resumekit/schemas';

export const EXTRACTION_SYSTEM_PROMPT = structuredExtractionSystem(
  'parse resumes into a fixed JSON schema and return valid JSON only',
);

const EXTRACTION_RULES = `Rules:
- Output exactly one JSON object containing every key shown in the skeleton, even when empty.
- Use "" for unknown text, [] for empty lists and false for unknown booleans.
- Never write placeholder text such as "N/A", "null", "none" or "unknown".
- Enum fields must use one of the listed values exactly; use "other" for an education level that fits none.
- Keep list entries in the order they appear in the resume.
- Copy dates as written; do not reformat or guess them.
- When currently_working is true, leaving_date must be "".
- List each skill once.`;

function describeField(field: FieldSpec): string {
  const type =
    field.type === 'enum'
      ? `one of ${field.values.map((v) => `"${v}"`).join(' | ')}`
      : field.type;
  return `  - ${field.name}: ${type}${field.hint ? ` (${field.hint})` : ''}`;
}

function describeSection(section: SectionSpec): string {
  const kind =
    section.kind === 'object'
      ? 'object'
      : section.kind === 'list'
        ? 'list of objects'
        : 'list of strings';
  return [`${section.key} (${kind}): ${section.description}`, ...section.fields.map(describeField)].join(
    '\n',
  );
}

function emptyValue(field: FieldSpec): string | boolean {
  return field.type === 'boolean' ? false : '';
}

/**
 * JSON skeleton of the target object with every key at its empty value.
 */
export function buildSkeleton(descriptor: SchemaDescriptor): string {
  const skeleton: Record<string, unknown> = {};
  for (const section of descriptor.sections) {
    const item = Object.fromEntries(section.fields.map((f) => [f.name, emptyValue(f)]));
    skeleton[section.key] =
      section.kind === 'object' ? item : section.kind === 'list' ? [item] : [];
  }
  return JSON.stringify(skeleton, null, 2);
}

export function describeSchema(descriptor: SchemaDescriptor): string {
  return [
    ...descriptor.sections.map(describeSection),
    '',
    'JSON skeleton:',
    buildSkeleton(descriptor),
  ].join('\n');
}

/**
 * Build the extraction prompt. Throws EmptyDocumentError when the text is
 * blank, before anything is sent anywhere.
 */
export function buildExtractionPrompt(
  documentText: string,
  descriptor: SchemaDescriptor = RESUME_SCHEMA_DESCRIPTOR,
): string {
  const text = documentText.trim();
  if (!text) throw new EmptyDocumentError();

  return jsonExtractionPrompt(
    text,
    describeSchema(descriptor),
    `Extract structured information from the resume below into a ${descriptor.name} JSON object.\n\n${EXTRACTION_RULES}`,
  );
}

/**
 * Follow-up prompt after a reply that was not valid JSON.
 */
export function buildRepairPrompt(
  documentText: string,
  descriptor: SchemaDescriptor = RESUME_SCHEMA_DESCRIPTOR,
  reason?: string,
): string {
  return `${buildExtractionPrompt(documentText, descriptor)}\n\n${strictJsonReminder(reason)}`;
}
