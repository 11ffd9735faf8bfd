import path from 'path';
import { StaleRecordPolicy, StrategyName } from '../types/models';

export interface OpenAIConfig {
  apiKey?: string;
  embeddingModel: string;
  embeddingDimensions: number;
  generationModel: string;
  maxRetries: number;
  timeoutMs: number;
}

export interface ClassificationDefaults {
  strategy: StrategyName;
  topN?: number;
  threshold: number;
  staleRecordPolicy: StaleRecordPolicy;
  debug: boolean;
}

/**
 * Application configuration, built once at startup and passed to services
 */
export interface AppConfig {
  port: number;
  databasePath: string;
  openai: OpenAIConfig;
  classification: ClassificationDefaults;
}

type Env = Record<string, string | undefined>;

function parseStrategy(value: string | undefined): StrategyName {
  if (value === undefined || value === '') return 'embedding';
  if (value === 'embedding' || value === 'llm') return value;
  throw new Error(`CLASSIFICATION_STRATEGY must be "embedding" or "llm", got "${value}"`);
}

function parseStalePolicy(value: string | undefined): StaleRecordPolicy {
  if (value === undefined || value === '') return 'retain';
  if (value === 'retain' || value === 'prune') return value;
  throw new Error(`CLASSIFICATION_STALE_POLICY must be "retain" or "prune", got "${value}"`);
}

function parseOptionalInt(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) {
    throw new Error(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function parseUnitInterval(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value === '') return fallback;
  const parsed = parseFloat(value);
  if (isNaN(parsed) || parsed < 0 || parsed > 1) {
    throw new Error(`${name} must be a number between 0 and 1, got "${value}"`);
  }
  return parsed;
}

/**
 * Build the application configuration from environment variables.
 * Callers load `.env` (dotenv) before calling this.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: parseInt(env.PORT || '3000', 10),
    databasePath: env.DATABASE_PATH || path.join(process.cwd(), 'data', 'messages.db'),
    openai: {
      apiKey: env.OPENAI_API_KEY || undefined,
      embeddingModel: env.EMBEDDING_MODEL || 'text-embedding-3-small',
      embeddingDimensions: parseOptionalInt('EMBEDDING_DIMENSIONS', env.EMBEDDING_DIMENSIONS) ?? 1536,
      generationModel: env.GENERATION_MODEL || 'gpt-4o-mini',
      maxRetries: parseInt(env.OPENAI_MAX_RETRIES || '1', 10),
      timeoutMs: parseInt(env.OPENAI_TIMEOUT_MS || '60000', 10)
    },
    classification: {
      strategy: parseStrategy(env.CLASSIFICATION_STRATEGY),
      topN: parseOptionalInt('CLASSIFICATION_TOP_N', env.CLASSIFICATION_TOP_N),
      threshold: parseUnitInterval('CLASSIFICATION_THRESHOLD', env.CLASSIFICATION_THRESHOLD, 0.5),
      staleRecordPolicy: parseStalePolicy(env.CLASSIFICATION_STALE_POLICY),
      debug: env.CLASSIFICATION_DEBUG === 'true'
    }
  };
}
