import fs from 'fs';
import { ValidationError } from '../models/errors';

/**
 * Parse JSONL text into one value per non-blank line
 */
export function parseJsonl(content: string, source: string = 'input'): unknown[] {
  const records: unknown[] = [];
  const lines = content.split(/\r?\n/);

  lines.forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (!line) return;

    try {
      const record: unknown = JSON.parse(line);
      records.push(record);
    } catch (error) {
      throw new ValidationError(
        `Invalid JSON on line ${index + 1} of ${source}: ${error instanceof Error ? error.message : 'parse error'}`
      );
    }
  });

  return records;
}

export async function readJsonlFile(filePath: string): Promise<unknown[]> {
  const content = await fs.promises.readFile(filePath, 'utf-8');
  return parseJsonl(content, filePath);
}
