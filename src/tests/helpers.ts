import { Database } from 'sqlite';
import { openDatabase } from '../config/database';
import { runMigrations } from '../database/migrations';
import { AppConfig, loadConfig } from '../config/appConfig';
import { EmbeddingProvider } from '../services/embedding/EmbeddingProvider';
import { GenerationProvider, GenerationRequest } from '../services/generation/GenerationProvider';
import { Message } from '../types/models';

/**
 * Fresh in-memory database with the full schema
 */
export async function createTestDatabase(): Promise<Database> {
  const db = await openDatabase(':memory:');
  await runMigrations(db);
  return db;
}

export function createTestConfig(env: Record<string, string> = {}): AppConfig {
  return loadConfig({ OPENAI_API_KEY: 'test-secret', DATABASE_PATH: ':memory:', ...env });
}

/**
 * Embedding provider that maps text to vectors by keyword; the first matching keyword wins
 */
export class StubEmbeddingProvider implements EmbeddingProvider {
  readonly dimensions = 3;
  readonly embed = jest.fn(async (text: string): Promise<number[]> => this.vectorFor(text));

  constructor(
    private rules: Array<[string, number[]]> = [],
    private fallback: number[] = [0, 0, 1]
  ) {}

  private vectorFor(text: string): number[] {
    const rule = this.rules.find(([keyword]) => text.includes(keyword));
    return rule ? rule[1] : this.fallback;
  }
}

/**
 * Generation provider that replays queued outputs in order
 */
export class StubGenerationProvider implements GenerationProvider {
  readonly generate = jest.fn(async (request: GenerationRequest): Promise<unknown> => {
    this.requests.push(request);
    const next = this.outputs.shift();
    if (next instanceof Error) {
      throw next;
    }
    return next;
  });

  readonly requests: GenerationRequest[] = [];

  constructor(private outputs: unknown[] = []) {}

  enqueue(...outputs: unknown[]): void {
    this.outputs.push(...outputs);
  }
}

export function buildMessage(overrides: Partial<Message> = {}): Message {
  return {
    id: 'msg-1',
    subject: 'Your Delta eTicket',
    sender: 'delta@example.com',
    recipients: ['me@example.com'],
    snippet: 'Flight DL123 confirmed',
    body: 'Your flight from ATL to SFO is confirmed.',
    date: new Date('2025-01-15T10:00:00.000Z'),
    ...overrides
  };
}

export function toBase64(text: string): string {
  return Buffer.from(text, 'utf-8').toString('base64');
}
