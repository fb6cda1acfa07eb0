/**
 * PDF text extraction using pdf-parse.
 * Code-only step - no LLM involvement.
 */

import * as fs from 'fs/promises';
import { createRequire } from 'module';
import * as path from 'path';
import { UnreadableDocumentError } from '@resumekit/llm';

type PdfParseResult = {
  text: string;
  numpages: number;
  info?: { Title?: string; Author?: string; Creator?: string };
};
type PdfParseFn = (buffer: Buffer) => Promise<PdfParseResult>;

let pdfParse: PdfParseFn | null = null;

// pdf-parse runs a self-test when loaded without a parent module, which an
// ESM import is; loading it through require gives it one.
function getPdfParser(): PdfParseFn {
  if (!pdfParse) {
    const require = createRequire(import.meta.url);
    const loaded: PdfParseFn = require('pdf-parse');
    pdfParse = loaded;
    return loaded;
  }
  return pdfParse;
}

export interface ExtractedText {
  text: string;
  numPages: number;
  info?: {
    title?: string;
    author?: string;
    creator?: string;
  };
}

/**
 * Collapse runs of spaces and tabs, trim every line, and keep at most one
 * blank line between paragraphs.
 */
export function cleanExtractedText(text: string): string {
  const lines = text
    .replace(/\r\n?/g, '\n')
    .replace(/[ \t\f\v]+/g, ' ')
    .split('\n')
    .map((line) => line.trim());

  const cleaned: string[] = [];
  let previousBlank = false;
  for (const line of lines) {
    if (line) {
      cleaned.push(line);
      previousBlank = false;
    } else if (!previousBlank) {
      cleaned.push('');
      previousBlank = true;
    }
  }
  return cleaned.join('\n').trim();
}

async function readDocument(absolutePath: string): Promise<Buffer> {
  try {
    return await fs.readFile(absolutePath);
  } catch (error) {
    throw new UnreadableDocumentError(
      absolutePath,
      'not_found',
      `Resume file not found: ${absolutePath}`,
      { cause: error },
    );
  }
}

/**
 * Extract text content from a PDF file. Image-only PDFs yield an empty string.
 */
export async function extractTextFromPdf(filePath: string): Promise<ExtractedText> {
  const absolutePath = path.resolve(filePath);
  const buffer = await readDocument(absolutePath);

  let data: PdfParseResult;
  try {
    data = await getPdfParser()(buffer);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    const encrypted = /password|encrypt/i.test(message);
    throw new UnreadableDocumentError(
      absolutePath,
      encrypted ? 'encrypted' : 'corrupt',
      encrypted
        ? `PDF is password-protected: ${absolutePath}`
        : `Error reading PDF file ${absolutePath}: ${message}`,
      { cause: error },
    );
  }

  return {
    text: cleanExtractedText(data.text),
    numPages: data.numpages,
    info: data.info
      ? {
          title: data.info.Title,
          author: data.info.Author,
          creator: data.info.Creator,
        }
      : undefined,
  };
}

/**
 * Extract text from a resume file based on extension.
 */
export async function extractText(filePath: string): Promise<ExtractedText> {
  const ext = path.extname(filePath).toLowerCase();

  switch (ext) {
    case '.pdf':
      return extractTextFromPdf(filePath);
    case '.txt': {
      const absolutePath = path.resolve(filePath);
      const buffer = await readDocument(absolutePath);
      return { text: cleanExtractedText(buffer.toString('utf-8')), numPages: 1 };
    }
    default:
      throw new UnreadableDocumentError(
        path.resolve(filePath),
        'unsupported_format',
        `Unsupported file format: ${ext || '(none)'}`,
      );
  }
}
