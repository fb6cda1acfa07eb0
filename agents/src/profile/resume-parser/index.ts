/**
 * Resume Extraction Agent
 *
 * Turns a resume file into a validated ResumeRecord:
 * - text extraction from PDF or plain text (code-only)
 * - one LLM call for the whole record, retried and repaired by the orchestrator
 * - normalization into the fixed schema
 */

import type { LLMProvider } from '@resumekit/llm';
import { BaseAgent } from '../../shared/base-agent.js';
import type { AgentConfig, AgentContext } from '../../shared/types.js';
import {
  ResumeExtractionInputSchema,
  ResumeExtractionOutputSchema,
  type ResumeExtractionInput,
  type ResumeExtractionOutput,
} from './schema.js';
import { extractText, type ExtractedText } from './extract-text.js';
import { extractResume, type BackoffOptions } from './extract.js';

export interface ResumeExtractionAgentOptions {
  model?: string;
  maxAttempts?: number;
  timeoutMs?: number;
  backoff?: BackoffOptions;
  /** Replaces file reading; tests feed text directly. */
  readText?: (filePath: string) => Promise<ExtractedText>;
}

export class ResumeExtractionAgent extends BaseAgent<
  ResumeExtractionInput,
  ResumeExtractionOutput
> {
  config: AgentConfig = {
    name: 'ResumeExtractionAgent',
    description: 'Extracts a structured resume record from a PDF or text file via an LLM',
    version: '1.0.0',
  };

  inputSchema = ResumeExtractionInputSchema;
  outputSchema = ResumeExtractionOutputSchema;

  constructor(
    private readonly provider: LLMProvider,
    private readonly options: ResumeExtractionAgentOptions = {},
  ) {
    super();
  }

  protected async run(
    input: ResumeExtractionInput,
    context: AgentContext,
  ): Promise<ResumeExtractionOutput> {
    const { filePath } = input;
    const { readText = extractText, ...extractOptions } = this.options;

    context.logger.info('Extracting text from resume file', { filePath });
    const extracted = await readText(filePath);
    context.logger.debug(
      `Extracted ${extracted.numPages} page(s), ${extracted.text.length} chars`,
    );

    const result = await extractResume(extracted.text, this.provider, {
      ...extractOptions,
      signal: context.signal,
      logger: context.logger,
    });

    return {
      sourceFile: filePath,
      model: result.model,
      attempts: result.attempts,
      record: result.record,
      warnings: result.warnings,
    };
  }
}

export * from './schema.js';
export * from './prompt.js';
export * from './normalize.js';
export * from './extract.js';
export * from './extract-text.js';
export * from './output.js';
export * from './batch.js';
