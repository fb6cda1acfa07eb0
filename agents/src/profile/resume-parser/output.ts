import * as fs from 'fs/promises';
import * as path from 'path';
import type { ResumeRecord } from '@resumekit/schemas';

/**
 * `<dir>/<input-stem>.json`, beside the input unless a directory is given.
 */
export function deriveOutputPath(inputPath: string, outputDir?: string): string {
  const parsed = path.parse(inputPath);
  return path.join(outputDir ?? parsed.dir, `${parsed.name}.json`);
}

export function serializeRecord(record: ResumeRecord): string {
  return `${JSON.stringify(record, null, 2)}\n`;
}

export async function writeRecord(record: ResumeRecord, outputPath: string): Promise<string> {
  await fs.mkdir(path.dirname(outputPath), { recursive: true });
  await fs.writeFile(outputPath, serializeRecord(record), 'utf-8');
  return outputPath;
}
