/**
 * Batch extraction over many documents with a bounded worker pool.
 * Every document gets its own outcome; a failure never stops its siblings.
 */

import { CancelledError } from '@resumekit/llm';
import { runPool } from '../../shared/pool.js';
import type { Agent, AgentResult } from '../../shared/types.js';
import { deriveOutputPath, writeRecord } from './output.js';
import type { ResumeExtractionInput, ResumeExtractionOutput } from './schema.js';

export type DocumentOutcome =
  | { status: 'ok'; filePath: string; outputPath?: string; result: ResumeExtractionOutput }
  | { status: 'failed'; filePath: string; errorName: string; message: string; error: unknown }
  | { status: 'cancelled'; filePath: string };

export interface BatchOptions {
  concurrency: number;
  signal?: AbortSignal;
  /** Write `<stem>.json` per success; `undefined` writes beside each input. */
  outputDir?: string;
  /** Skip writing artifacts. */
  dryRun?: boolean;
  onOutcome?: (outcome: DocumentOutcome, index: number) => void;
}

export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
  cancelled: number;
}

function failure(filePath: string, error: unknown): DocumentOutcome {
  if (error instanceof CancelledError) return { status: 'cancelled', filePath };
  return {
    status: 'failed',
    filePath,
    errorName: error instanceof Error ? error.name : 'Error',
    message: error instanceof Error ? error.message : String(error),
    error,
  };
}

function fromAgentResult(
  filePath: string,
  result: AgentResult<ResumeExtractionOutput>,
): DocumentOutcome {
  if (result.success && result.data) {
    return { status: 'ok', filePath, result: result.data };
  }
  return failure(filePath, result.cause ?? new Error(result.error ?? 'Extraction failed'));
}

export async function runBatch(
  filePaths: readonly string[],
  agent: Agent<ResumeExtractionInput, ResumeExtractionOutput>,
  options: BatchOptions,
): Promise<DocumentOutcome[]> {
  const settlements = await runPool(
    filePaths,
    async (filePath, index) => {
      let outcome = fromAgentResult(
        filePath,
        await agent.execute({ filePath }, { signal: options.signal, runId: `batch-${index + 1}` }),
      );

      if (outcome.status === 'ok' && !options.dryRun) {
        try {
          const outputPath = await writeRecord(
            outcome.result.record,
            deriveOutputPath(filePath, options.outputDir),
          );
          outcome = { ...outcome, outputPath };
        } catch (error) {
          outcome = failure(filePath, error);
        }
      }

      options.onOutcome?.(outcome, index);
      return outcome;
    },
    { concurrency: options.concurrency, signal: options.signal },
  );

  return settlements.map((settlement, i): DocumentOutcome => {
    switch (settlement.status) {
      case 'fulfilled':
        return settlement.value;
      case 'rejected':
        return failure(filePaths[i], settlement.reason);
      case 'skipped':
        return { status: 'cancelled', filePath: filePaths[i] };
    }
  });
}

export function summarizeBatch(outcomes: readonly DocumentOutcome[]): BatchSummary {
  return {
    total: outcomes.length,
    succeeded: outcomes.filter((o) => o.status === 'ok').length,
    failed: outcomes.filter((o) => o.status === 'failed').length,
    cancelled: outcomes.filter((o) => o.status === 'cancelled').length,
  };
}
