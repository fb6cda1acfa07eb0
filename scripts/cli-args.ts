/**
 * Argument parsing for the extract-resume CLI. Pure: no I/O, no process exit.
 */
import { parseArgs } from 'node:util';
import type { ExtractionConfigInput, ProviderName } from '@resumekit/llm';

export type CliCommand = 'parse' | 'parse-batch' | 'check';

export type CliArgs =
  | { command: 'help' }
  | { command: 'version' }
  | {
      command: CliCommand;
      /** File for `parse`, directory for `parse-batch`, absent for `check`. */
      input?: string;
      output?: string;
      dryRun: boolean;
      config: Partial<ExtractionConfigInput>;
    };

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export const USAGE = `Usage: npm run extract -- <command> [options]

Commands:
  parse <file>          Extract one resume (PDF or .txt) to JSON
  parse-batch <dir>     Extract every PDF in a directory
  check                 Verify the provider is reachable and configured

Options:
  -o, --output <path>        Output file (parse) or directory (parse-batch)
      --provider <name>      ollama | openai (env RESUME_PROVIDER)
      --model <name>         Model name (env RESUME_MODEL)
      --api-key <key>        OpenAI API key (env OPENAI_API_KEY)
      --ollama-base-url <u>  Ollama server URL (env OLLAMA_BASE_URL)
      --timeout <ms>         Per-call timeout (env LLM_TIMEOUT_MS)
      --max-attempts <n>     Provider calls per prompt (env LLM_MAX_ATTEMPTS)
      --concurrency <n>      Parallel documents (env BATCH_CONCURRENCY)
      --dry-run              Extract without writing JSON files
  -h, --help                 Show this help
  -v, --version              Show the version`;

const COMMANDS: readonly CliCommand[] = ['parse', 'parse-batch', 'check'];

function isCommand(value: string): value is CliCommand {
  return COMMANDS.some((command) => command === value);
}

function isProviderName(value: string): value is ProviderName {
  return value === 'ollama' || value === 'openai';
}

function toNumber(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new CliUsageError(`--${flag} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        output: { type: 'string', short: 'o' },
        provider: { type: 'string' },
        model: { type: 'string' },
        'api-key': { type: 'string' },
        'ollama-base-url': { type: 'string' },
        timeout: { type: 'string' },
        'max-attempts': { type: 'string' },
        concurrency: { type: 'string' },
        'dry-run': { type: 'boolean', default: false },
        help: { type: 'boolean', short: 'h', default: false },
        version: { type: 'boolean', short: 'v', default: false },
      },
    });
  } catch (error) {
    throw new CliUsageError(error instanceof Error ? error.message : String(error));
  }
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const { values, positionals } = readArgs(argv);
  if (values.help) return { command: 'help' };
  if (values.version) return { command: 'version' };

  const [command, input, ...extra] = positionals;
  if (command === undefined) throw new CliUsageError('Missing command');
  if (!isCommand(command)) throw new CliUsageError(`Unknown command: ${command}`);

  if (command === 'check') {
    if (input !== undefined) throw new CliUsageError('check takes no arguments');
  } else if (input === undefined) {
    throw new CliUsageError(`${command} needs ${command === 'parse' ? 'a file' : 'a directory'}`);
  }
  if (extra.length > 0) throw new CliUsageError(`Unexpected argument: ${extra[0]}`);

  const provider = values.provider?.toLowerCase();
  if (provider !== undefined && !isProviderName(provider)) {
    throw new CliUsageError(`--provider must be ollama or openai, got "${values.provider}"`);
  }

  return {
    command,
    input,
    output: values.output,
    dryRun: values['dry-run'],
    config: {
      provider,
      model: values.model,
      apiKey: values['api-key'],
      ollamaBaseUrl: values['ollama-base-url'],
      timeoutMs: toNumber('timeout', values.timeout),
      maxAttempts: toNumber('max-attempts', values['max-attempts']),
      concurrency: toNumber('concurrency', values.concurrency),
    },
  };
}
