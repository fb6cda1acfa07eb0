/**
 * Prompt helpers for consistent JSON-extraction calls.
 */

/**
 * Wrap content in JSON extraction instructions.
 * The content goes between fixed delimiters so the model can tell it apart
 * from the instructions.
 */
export function jsonExtractionPrompt(
  content: string,
  schema: string,
  instructions?: string,
): string {
  return `${instructions ? instructions + '\n\n' : ''}Extract the following information from the content below and return it as valid JSON matching this schema:

Schema:
${schema}

Content:
-----
${content}
-----

Return ONLY valid JSON. Do not include any explanation or markdown formatting.`;
}

/**
 * Create a structured extraction system prompt.
 */
export function structuredExtractionSystem(taskDescription: string): string {
  return `You are a precise data extraction assistant. Your task is to ${taskDescription}.

Rules:
1. Extract information exactly as it appears in the source
2. Return valid JSON matching the requested schema
3. Use an empty string, empty list or false for missing fields; never omit a key
4. Do not make up or infer information that isn't present
5. Preserve original formatting for text content`;
}

/**
 * Appended to a prompt when the previous reply could not be parsed.
 */
export function strictJsonReminder(reason?: string): string {
  return [
    `IMPORTANT: Your last output was not valid JSON${reason ? ` (${reason})` : ''}.`,
    'Return ONLY one valid JSON object matching the schema: no markdown fences, no comments, no trailing commas, no text before or after it.',
  ].join('\n');
}
