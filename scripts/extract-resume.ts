/**
 * Extract structured resume records from PDFs.
 *
 * Run: npm run extract -- parse resume.pdf -o resume.json
 *      npm run extract -- parse-batch ./resumes -o ./out --concurrency 4
 *      npm run extract -- check --provider openai
 */
import './load-env.js';

import * as fs from 'fs/promises';
import * as path from 'path';
import {
  ResumeExtractionAgent,
  deriveOutputPath,
  runBatch,
  serializeRecord,
  summarizeBatch,
  writeRecord,
  type DocumentOutcome,
} from '@resumekit/agents';
import {
  ConfigError,
  OllamaClient,
  ResumeKitError,
  createProvider,
  loadConfig,
  resolveApiKey,
  type ExtractionConfig,
} from '@resumekit/llm';
import { CliUsageError, USAGE, parseCliArgs } from './cli-args.js';

const VERSION = '0.1.0';
const EXIT_FAILURE = 1;
const EXIT_USAGE = 2;
const EXIT_INTERRUPTED = 130;

function agentFor(config: ExtractionConfig): ResumeExtractionAgent {
  return new ResumeExtractionAgent(createProvider(config), {
    model: config.model,
    maxAttempts: config.maxAttempts,
    timeoutMs: config.timeoutMs,
  });
}

async function parseOne(
  config: ExtractionConfig,
  input: string,
  output: string | undefined,
  dryRun: boolean,
): Promise<number> {
  const result = await agentFor(config).execute({ filePath: input });
  if (!result.success || !result.data) {
    console.error(`[extract] ${result.errorName ?? 'Error'}: ${result.error}`);
    return EXIT_FAILURE;
  }

  const { record, warnings, attempts } = result.data;
  for (const warning of warnings) {
    console.error(`[extract] warning ${warning.path}: ${warning.message}`);
  }
  if (dryRun) {
    process.stdout.write(serializeRecord(record));
    return 0;
  }
  const written = await writeRecord(record, output ?? deriveOutputPath(input));
  console.error(`[extract] ${input} -> ${written} (${attempts} call(s))`);
  return 0;
}

async function listPdfs(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith('.pdf'))
    .map((entry) => path.join(dir, entry.name))
    .sort();
}

function describeOutcome(outcome: DocumentOutcome): string {
  switch (outcome.status) {
    case 'ok':
      return `ok        ${outcome.filePath}${outcome.outputPath ? ` -> ${outcome.outputPath}` : ''}`;
    case 'failed':
      return `failed    ${outcome.filePath}: ${outcome.errorName}: ${outcome.message}`;
    case 'cancelled':
      return `cancelled ${outcome.filePath}`;
  }
}

async function parseBatch(
  config: ExtractionConfig,
  dir: string,
  outputDir: string | undefined,
  dryRun: boolean,
): Promise<number> {
  const files = await listPdfs(dir);
  if (files.length === 0) {
    console.error(`[extract] No PDF files found in ${dir}`);
    return EXIT_FAILURE;
  }

  const controller = new AbortController();
  const onSigint = () => {
    console.error('\n[extract] Interrupted; cancelling remaining documents...');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  console.error(`[extract] ${files.length} PDF(s), concurrency ${config.concurrency}`);
  let done = 0;
  try {
    const outcomes = await runBatch(files, agentFor(config), {
      concurrency: config.concurrency,
      signal: controller.signal,
      outputDir,
      dryRun,
      onOutcome: (outcome) => {
        done++;
        console.error(`[extract] [${done}/${files.length}] ${describeOutcome(outcome)}`);
      },
    });

    const summary = summarizeBatch(outcomes);
    console.error(
      `[extract] Done: ${summary.succeeded} succeeded, ${summary.failed} failed, ${summary.cancelled} cancelled`,
    );
    if (controller.signal.aborted) return EXIT_INTERRUPTED;
    return summary.failed > 0 ? EXIT_FAILURE : 0;
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}

async function check(config: ExtractionConfig): Promise<number> {
  if (config.provider === 'ollama') {
    const client = new OllamaClient({ baseUrl: config.ollamaBaseUrl, defaultModel: config.model });
    const model = client.defaultModel;
    if (!(await client.isAvailable(model))) {
      console.error(
        `[check] Ollama at ${config.ollamaBaseUrl} is not reachable or model "${model}" is not pulled`,
      );
      return EXIT_FAILURE;
    }
    console.error(`[check] Ollama at ${config.ollamaBaseUrl} serves "${model}"`);
    return 0;
  }

  resolveApiKey(config.apiKey, process.env);
  console.error('[check] OpenAI credentials found');
  return 0;
}

async function main(argv: readonly string[]): Promise<number> {
  const args = parseCliArgs(argv);
  switch (args.command) {
    case 'help':
      console.log(USAGE);
      return 0;
    case 'version':
      console.log(VERSION);
      return 0;
  }

  const config = loadConfig(args.config);
  switch (args.command) {
    case 'parse':
      return parseOne(config, args.input ?? '', args.output, args.dryRun);
    case 'parse-batch':
      return parseBatch(config, args.input ?? '', args.output, args.dryRun);
    case 'check':
      return check(config);
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof CliUsageError) {
      console.error(`${error.message}\n\n${USAGE}`);
      process.exitCode = EXIT_USAGE;
    } else if (error instanceof ConfigError) {
      console.error(`[extract] Invalid configuration:\n  ${error.issues.join('\n  ')}`);
      process.exitCode = EXIT_USAGE;
    } else if (error instanceof ResumeKitError) {
      console.error(`[extract] ${error.name}: ${error.message}`);
      process.exitCode = EXIT_FAILURE;
    } else {
      console.error('[extract] Unexpected error:', error);
      process.exitCode = EXIT_FAILURE;
    }
  });
