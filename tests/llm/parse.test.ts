import { describe, it, expect } from 'vitest';
import {
  MalformedJSONError,
  SchemaValidationError,
  closeTruncated,
  codeFenceBodies,
  errorPosition,
  findJsonObjectSpans,
  parseJsonObject,
  stripCodeFence,
} from '@resumekit/llm';

describe('stripCodeFence', () => {
  it('returns the body of a json fence', () => {
    expect(stripCodeFence('Here:\n```json\n{"a": 1}\n```\nDone')).toBe('{"a": 1}\n');
  });

  it('reads an unterminated fence to the end', () => {
    expect(stripCodeFence('```\n{"a": 1}')).toBe('{"a": 1}');
  });

  it('leaves text without an object-bearing fence alone', () => {
    const text = 'Run ```npm test``` then {"a": 1}';
    expect(stripCodeFence(text)).toBe(text);
  });
});

describe('codeFenceBodies', () => {
  it('lists every object-bearing fence in order', () => {
    const reply = '```\n{ a }\n```\nthen ```sh\nls\n``` and ```json\n{"b": 1}\n```';
    expect(codeFenceBodies(reply)).toEqual(['{ a }\n', '{"b": 1}\n']);
  });
});

describe('findJsonObjectSpans', () => {
  it('ignores braces inside strings', () => {
    const spans = findJsonObjectSpans('{"a": "}"} tail {"b": 1}');
    expect(spans).toEqual([
      { text: '{"a": "}"}', start: 0, repaired: false },
      { text: '{"b": 1}', start: 16, repaired: false },
    ]);
  });

  it('repairs a truncated trailing span', () => {
    const spans = findJsonObjectSpans('{"skills": ["Go", "Rust"], "employment": ');
    expect(spans).toEqual([{ text: '{"skills": ["Go", "Rust"]}', start: 0, repaired: true }]);
  });

  it('finds nothing in plain prose', () => {
    expect(findJsonObjectSpans('I cannot help with that.')).toEqual([]);
  });
});

describe('closeTruncated', () => {
  it('drops a trailing comma and closes open containers', () => {
    expect(closeTruncated('{"a": [1, 2,', false, ['}', ']'])).toBe('{"a": [1, 2]}');
  });

  it('drops a bare key cut off inside an object', () => {
    expect(closeTruncated('{"a": 1, "b', true, ['}'])).toBe('{"a": 1}');
  });

  it('closes an open string value', () => {
    expect(closeTruncated('{"email": "ada@', true, ['}'])).toBe('{"email": "ada@"}');
  });
});

describe('parseJsonObject', () => {
  it('parses bare JSON', () => {
    expect(parseJsonObject('{"skills": ["Go"]}')).toEqual({ skills: ['Go'] });
  });

  it('parses JSON wrapped in prose', () => {
    expect(parseJsonObject('Sure! {"skills": ["Go"]} Hope this helps.')).toEqual({
      skills: ['Go'],
    });
  });

  it('parses JSON inside a markdown fence', () => {
    const reply = 'Here is the JSON:\n```json\n{"skills": ["Go","Go"]}\n```';
    expect(parseJsonObject(reply)).toEqual({ skills: ['Go', 'Go'] });
  });

  it('completes a reply cut off mid-string', () => {
    const reply = '{"personal_info": {"name": "Ada Lovelace", "email": "ada@';
    expect(parseJsonObject(reply)).toEqual({
      personal_info: { name: 'Ada Lovelace', email: 'ada@' },
    });
  });

  it('removes trailing commas', () => {
    expect(parseJsonObject('{"skills": ["Go",],}')).toEqual({ skills: ['Go'] });
  });

  it('quotes bare keys', () => {
    expect(parseJsonObject('{skills: ["Go"]}')).toEqual({ skills: ['Go'] });
  });

  it('treats raw newlines inside strings as spaces', () => {
    expect(parseJsonObject('{"responsibility": "Led the team\nShipped v2"}')).toEqual({
      responsibility: 'Led the team Shipped v2',
    });
  });

  it('skips an unparsable example span for a later valid one', () => {
    expect(parseJsonObject('Example: {bad} Actual: {"skills": ["Go"]}')).toEqual({
      skills: ['Go'],
    });
  });

  it('reads the fenced result after a fenced schema example', () => {
    const reply =
      'The schema is:\n```\n{ skills: string[] }\n```\nResult:\n```json\n{"skills":["Go"]}\n```';
    expect(parseJsonObject(reply)).toEqual({ skills: ['Go'] });
  });

  it('falls back to an object outside the fence', () => {
    const reply = '```\n{ not json }\n```\nActual: {"skills": ["Go"]}';
    expect(parseJsonObject(reply)).toEqual({ skills: ['Go'] });
  });

  it('rejects a reply without any object as a structural error', () => {
    let caught: unknown;
    try {
      parseJsonObject('I cannot help with that.');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SchemaValidationError);
    expect(caught).not.toBeInstanceOf(MalformedJSONError);
    expect(caught).toMatchObject({
      code: 'SCHEMA_VALIDATION',
      reason: 'no JSON object found in response',
      rawTextExcerpt: 'I cannot help with that.',
    });
  });

  it('rejects a top-level array', () => {
    expect(() => parseJsonObject('[{"skills": []}]')).toThrow(
      'Response does not match the resume schema: top-level JSON value is an array, expected an object',
    );
  });

  it('reports an object that cannot be repaired as malformed JSON', () => {
    let caught: unknown;
    try {
      parseJsonObject('{"skills": ["Go" "Rust"]}');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(MalformedJSONError);
    expect(caught).toBeInstanceOf(SchemaValidationError);
    expect(caught).toMatchObject({ code: 'MALFORMED_JSON' });
  });
});

describe('errorPosition', () => {
  it('reads "at position N"', () => {
    expect(errorPosition(new SyntaxError('Unexpected token } in JSON at position 12'), '')).toBe(12);
  });

  it('converts line and column to an offset', () => {
    expect(errorPosition(new SyntaxError('Bad character at line 2 column 3'), 'ab\ncdef')).toBe(5);
  });

  it('puts an early end of input at the end of the text', () => {
    expect(errorPosition(new SyntaxError('Unexpected end of JSON input'), 'abc')).toBe(3);
  });

  it('returns undefined when the message has no position', () => {
    expect(errorPosition(new SyntaxError('Unexpected token'), 'abc')).toBeUndefined();
  });
});
