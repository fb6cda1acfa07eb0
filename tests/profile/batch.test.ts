import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ProviderUnavailableError, UnreadableDocumentError } from '@resumekit/llm';
import {
  ResumeExtractionAgent,
  runBatch,
  serializeRecord,
  summarizeBatch,
  type DocumentOutcome,
} from '@resumekit/agents';
import { FixedProvider } from './stub-provider.js';

const REPLY = '{"personal_info": {"name": "Jane Doe"}, "skills": ["Go"]}';

async function readFake(filePath: string) {
  if (filePath.includes('missing')) {
    throw new UnreadableDocumentError(filePath, 'not_found', `Resume file not found: ${filePath}`);
  }
  return { text: `Resume from ${path.basename(filePath)}`, numPages: 1 };
}

describe('runBatch', () => {
  let outDir: string;

  beforeEach(async () => {
    outDir = await fs.mkdtemp(path.join(os.tmpdir(), 'resumekit-batch-'));
  });

  afterEach(async () => {
    await fs.rm(outDir, { recursive: true, force: true });
  });

  it('keeps going past a failed document and reports outcomes in input order', async () => {
    const agent = new ResumeExtractionAgent(new FixedProvider(async () => REPLY), {
      readText: readFake,
    });
    const seen: string[] = [];

    const outcomes = await runBatch(['in/a.pdf', 'in/missing.pdf', 'in/c.pdf'], agent, {
      concurrency: 2,
      outputDir: outDir,
      onOutcome: (outcome) => seen.push(outcome.filePath),
    });

    expect(outcomes.map((o) => [o.filePath, o.status])).toEqual([
      ['in/a.pdf', 'ok'],
      ['in/missing.pdf', 'failed'],
      ['in/c.pdf', 'ok'],
    ]);
    expect(outcomes[1]).toMatchObject({
      errorName: 'UnreadableDocumentError',
      message: 'Resume file not found: in/missing.pdf',
    });
    expect([...seen].sort()).toEqual(['in/a.pdf', 'in/c.pdf', 'in/missing.pdf']);
    expect(summarizeBatch(outcomes)).toEqual({ total: 3, succeeded: 2, failed: 1, cancelled: 0 });
  });

  it('writes one JSON file per successful document', async () => {
    const agent = new ResumeExtractionAgent(new FixedProvider(async () => REPLY), {
      readText: readFake,
    });

    const [outcome] = await runBatch(['in/jane.pdf'], agent, { concurrency: 1, outputDir: outDir });

    const expectedPath = path.join(outDir, 'jane.json');
    expect(outcome).toMatchObject({ status: 'ok', outputPath: expectedPath });
    if (outcome.status === 'ok') {
      expect(await fs.readFile(expectedPath, 'utf-8')).toBe(serializeRecord(outcome.result.record));
    }
  });

  it('writes nothing on a dry run', async () => {
    const agent = new ResumeExtractionAgent(new FixedProvider(async () => REPLY), {
      readText: readFake,
    });

    const [outcome] = await runBatch(['in/jane.pdf'], agent, {
      concurrency: 1,
      outputDir: outDir,
      dryRun: true,
    });

    expect(outcome.status).toBe('ok');
    expect(await fs.readdir(outDir)).toEqual([]);
  });

  it('never runs more documents at once than the concurrency', async () => {
    let active = 0;
    let peak = 0;
    const provider = new FixedProvider(async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active--;
      return REPLY;
    });
    const agent = new ResumeExtractionAgent(provider, { readText: readFake });
    const files = ['1', '2', '3', '4', '5', '6'].map((n) => `in/${n}.pdf`);

    const outcomes = await runBatch(files, agent, { concurrency: 2, dryRun: true });

    expect(outcomes.every((o) => o.status === 'ok')).toBe(true);
    expect(peak).toBe(2);
    expect(provider.calls).toBe(6);
  });

  it('marks remaining documents cancelled once the signal aborts', async () => {
    const controller = new AbortController();
    const agent = new ResumeExtractionAgent(new FixedProvider(async () => REPLY), {
      readText: readFake,
    });

    const outcomes = await runBatch(['in/a.pdf', 'in/b.pdf', 'in/c.pdf'], agent, {
      concurrency: 1,
      signal: controller.signal,
      dryRun: true,
      onOutcome: () => controller.abort(),
    });

    expect(outcomes.map((o) => o.status)).toEqual(['ok', 'cancelled', 'cancelled']);
    expect(summarizeBatch(outcomes)).toEqual({ total: 3, succeeded: 1, failed: 0, cancelled: 2 });
  });

  it('reports an in-flight call interrupted by cancellation as cancelled, not failed', async () => {
    const controller = new AbortController();
    const provider = new FixedProvider(async () => {
      controller.abort();
      throw new ProviderUnavailableError('ollama', 'socket closed');
    });
    const agent = new ResumeExtractionAgent(provider, { readText: readFake });

    const outcomes: DocumentOutcome[] = await runBatch(['in/a.pdf', 'in/b.pdf'], agent, {
      concurrency: 1,
      signal: controller.signal,
      dryRun: true,
    });

    expect(outcomes).toEqual([
      { status: 'cancelled', filePath: 'in/a.pdf' },
      { status: 'cancelled', filePath: 'in/b.pdf' },
    ]);
  });
});
