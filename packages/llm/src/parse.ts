/**
 * JSON extraction from free-form model replies.
 *
 * Replies often wrap the object in prose or a markdown fence, and long replies
 * get cut off. The span is located by string-aware bracket counting, and a
 * truncated span is closed before parsing.
 */

import { MalformedJSONError, SchemaValidationError } from './errors.js';

export interface JsonSpan {
  text: string;
  /** Offset of the opening brace in the searched text. */
  start: number;
  /** True when the span never closed and was completed by `closeTruncated`. */
  repaired: boolean;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const CODE_FENCE = /```[\w-]*[ \t]*\r?\n?([\s\S]*?)(?:```|$)/g;

/**
 * Bodies of every markdown code fence that holds a `{`, in order.
 * An unterminated fence runs to the end of the text.
 */
export function codeFenceBodies(response: string): string[] {
  const bodies: string[] = [];
  for (const fence of response.matchAll(CODE_FENCE)) {
    if (fence[1].includes('{')) bodies.push(fence[1]);
  }
  return bodies;
}

/**
 * Return the body of the first markdown code fence that holds a `{`,
 * or the input unchanged.
 */
export function stripCodeFence(response: string): string {
  return codeFenceBodies(response)[0] ?? response;
}

/**
 * Find every top-level `{...}` span in order. The last one may be a repaired
 * truncation.
 */
export function findJsonObjectSpans(text: string): JsonSpan[] {
  const spans: JsonSpan[] = [];
  let from = text.indexOf('{');

  while (from !== -1) {
    const closers: string[] = [];
    let inString = false;
    let escaped = false;
    let end = -1;

    for (let i = from; i < text.length; i++) {
      const ch = text[i];
      if (inString) {
        if (escaped) escaped = false;
        else if (ch === '\\') escaped = true;
        else if (ch === '"') inString = false;
        continue;
      }
      if (ch === '"') {
        inString = true;
      } else if (ch === '{') {
        closers.push('}');
      } else if (ch === '[') {
        closers.push(']');
      } else if (ch === '}' || ch === ']') {
        closers.pop();
        if (closers.length === 0) {
          end = i;
          break;
        }
      }
    }

    if (end === -1) {
      spans.push({
        text: closeTruncated(text.slice(from), inString, closers),
        start: from,
        repaired: true,
      });
      break;
    }

    spans.push({ text: text.slice(from, end + 1), start: from, repaired: false });
    from = text.indexOf('{', end + 1);
  }

  return spans;
}

/**
 * Complete a JSON fragment cut off mid-way: close an open string, drop a
 * dangling key or separator, then append the missing closers.
 */
export function closeTruncated(fragment: string, inString: boolean, closers: string[]): string {
  let out = inString ? `${fragment}"` : fragment;
  const insideObject = closers[closers.length - 1] === '}';

  out = out.trimEnd();
  // "key": with no value
  out = out.replace(/"(?:[^"\\]|\\.)*"\s*:\s*$/, '');
  // a bare key right after { or ,
  if (insideObject) {
    out = out.replace(/([{,])\s*"(?:[^"\\]|\\.)*"\s*$/, '$1');
  }
  out = out.trimEnd().replace(/,$/, '');

  return out + [...closers].reverse().join('');
}

/**
 * Common JSON fixers for LLM output issues.
 */
export const jsonFixers = {
  /** Raw newlines inside string values are invalid JSON; outside them they are whitespace. */
  fixNewlines: (input: string): string => {
    return input.replace(/[\r\n]+/g, ' ');
  },

  /** Remove trailing commas in arrays/objects */
  removeTrailingCommas: (input: string): string => {
    return input.replace(/,\s*([}\]])/g, '$1');
  },

  /** Fix unquoted keys */
  quoteKeys: (input: string): string => {
    return input.replace(/([{,])\s*([a-zA-Z_][a-zA-Z0-9_]*)\s*:/g, '$1"$2":');
  },
};

/**
 * Fixers applied cumulatively, in order, after a plain parse fails.
 */
export const defaultFixers = [
  jsonFixers.fixNewlines,
  jsonFixers.removeTrailingCommas,
  jsonFixers.quoteKeys,
];

/**
 * Locate and parse the JSON object in a model reply.
 *
 * Throws a structural SchemaValidationError when the reply holds no object
 * (or is a top-level array), and MalformedJSONError when an object-like span
 * is found but cannot be parsed even after the fixers.
 */
export function parseJsonObject(
  response: string,
  fixers: Array<(input: string) => string> = defaultFixers,
): Record<string, unknown> {
  // Fence bodies first, in order; the whole reply last.
  const sources = [...codeFenceBodies(response), response].map((text) => text.trim());
  const body = sources[0];

  if (body.startsWith('[')) {
    const top = tryParse(body);
    if (top.ok && Array.isArray(top.value)) {
      throw new SchemaValidationError('top-level JSON value is an array, expected an object', response);
    }
  }

  let found = false;
  let firstError: { message: string; position?: number; cause: unknown } | undefined;

  for (const source of new Set(sources)) {
    for (const span of findJsonObjectSpans(source)) {
      found = true;
      let candidate = span.text;
      let result = tryParse(candidate);

      for (const fixer of fixers) {
        if (result.ok) break;
        candidate = fixer(candidate);
        result = tryParse(candidate);
      }

      if (result.ok && isPlainObject(result.value)) {
        return result.value;
      }
      if (!result.ok && !firstError) {
        const position = errorPosition(result.error, span.text);
        firstError = {
          message: result.error.message,
          position: position === undefined ? undefined : span.start + position,
          cause: result.error,
        };
      }
    }
  }

  if (!found) {
    throw new SchemaValidationError('no JSON object found in response', response);
  }

  throw new MalformedJSONError(
    `Invalid JSON: ${firstError?.message ?? 'no parsable object'}`,
    response,
    firstError?.position,
    { cause: firstError?.cause },
  );
}

type ParseAttempt = { ok: true; value: unknown } | { ok: false; error: SyntaxError };

function tryParse(text: string): ParseAttempt {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    if (error instanceof SyntaxError) return { ok: false, error };
    throw error;
  }
}

/**
 * Offset of a JSON.parse failure, when the runtime's message reports one.
 */
export function errorPosition(error: SyntaxError, text: string): number | undefined {
  const position = error.message.match(/at position (\d+)/);
  if (position) return Number(position[1]);

  const lineColumn = error.message.match(/line (\d+) column (\d+)/);
  if (lineColumn) {
    const line = Number(lineColumn[1]);
    const column = Number(lineColumn[2]);
    const lines = text.split('\n').slice(0, line - 1);
    return lines.reduce((sum, l) => sum + l.length + 1, 0) + column - 1;
  }

  if (/Unexpected end of JSON input/.test(error.message)) return text.length;
  return undefined;
}
