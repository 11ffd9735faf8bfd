import Joi from 'joi';
import { StrategyConfig } from '../types/models';
import { ValidationError } from './errors';

/**
 * Validation schemas and functions for API input, JSONL lines and model output
 */

export interface MessageCreateInput {
  id?: string;
  subject: string;
  sender: string;
  recipients: string[];
  snippet?: string;
  body?: string;
  bodyIsBase64: boolean;
  date?: Date;
}

export type MessageUpdateInput = Partial<Omit<MessageCreateInput, 'id' | 'bodyIsBase64'>>;

export interface CategoryCreateInput {
  name: string;
  description: string;
}

export type CategoryUpdateInput = Partial<CategoryCreateInput>;

export interface MessageJsonlLine {
  id: string;
  subject: string;
  from: string;
  to: string[];
  snippet?: string;
  body: string; // base64
  date: string; // ISO-8601
}

export interface ListQuery {
  limit?: number;
  offset?: number;
}

export interface BootstrapRequest extends Partial<StrategyConfig> {
  messages?: object[];
  categories?: object[];
  dropExisting: boolean;
  autoClassify: boolean;
}

export interface LlmClassificationItem {
  category_index: number;
  is_in_category: boolean;
  confidence: number;
  explanation: string;
}

export interface LlmClassificationPayload {
  classifications: LlmClassificationItem[];
}

// Validation schemas
export const messageCreateSchema = Joi.object<MessageCreateInput>({
  id: Joi.string().trim().min(1).optional(),
  subject: Joi.string().allow('').required(),
  sender: Joi.string().min(1).required(),
  recipients: Joi.array().items(Joi.string()).default([]),
  snippet: Joi.string().allow('').optional(),
  body: Joi.string().allow('').optional(),
  bodyIsBase64: Joi.boolean().default(false),
  date: Joi.date().iso().optional()
});

export const messageUpdateSchema = Joi.object<MessageUpdateInput>({
  subject: Joi.string().allow('').optional(),
  sender: Joi.string().min(1).optional(),
  recipients: Joi.array().items(Joi.string()).optional(),
  snippet: Joi.string().allow('').optional(),
  body: Joi.string().allow('').optional(),
  date: Joi.date().iso().optional()
}).min(1);

export const categoryCreateSchema = Joi.object<CategoryCreateInput>({
  name: Joi.string().trim().min(1).max(200).required(),
  description: Joi.string().trim().min(1).max(2000).required()
});

export const categoryUpdateSchema = Joi.object<CategoryUpdateInput>({
  name: Joi.string().trim().min(1).max(200).optional(),
  description: Joi.string().trim().min(1).max(2000).optional()
}).min(1);

export const strategyConfigSchema = Joi.object<StrategyConfig>({
  strategy: Joi.string().valid('embedding', 'llm').required(),
  topN: Joi.number().integer().min(1).optional(),
  threshold: Joi.number().min(0).max(1).optional()
});

export const classifyQuerySchema = Joi.object<Partial<StrategyConfig>>({
  strategy: Joi.string().valid('embedding', 'llm').optional(),
  topN: Joi.number().integer().min(1).optional(),
  threshold: Joi.number().min(0).max(1).optional()
});

export const listQuerySchema = Joi.object<ListQuery>({
  limit: Joi.number().integer().min(1).max(1000).optional(),
  offset: Joi.number().integer().min(0).optional()
});

export const categoryIdSchema = Joi.object<{ id: number }>({
  id: Joi.number().integer().min(1).required()
});

export const bootstrapRequestSchema = Joi.object<BootstrapRequest>({
  messages: Joi.array().items(Joi.object().unknown(true)).optional(),
  categories: Joi.array().items(Joi.object().unknown(true)).optional(),
  dropExisting: Joi.boolean().default(false),
  autoClassify: Joi.boolean().default(false),
  strategy: Joi.string().valid('embedding', 'llm').optional(),
  topN: Joi.number().integer().min(1).optional(),
  threshold: Joi.number().min(0).max(1).optional()
});

export const messageJsonlSchema = Joi.object<MessageJsonlLine>({
  id: Joi.string().min(1).required(),
  subject: Joi.string().allow('').required(),
  from: Joi.string().min(1).required(),
  to: Joi.array().items(Joi.string()).required(),
  snippet: Joi.string().allow('', null).optional(),
  body: Joi.string().allow('').required(),
  date: Joi.string().isoDate().required()
}).unknown(true);

export const categoryJsonlSchema = categoryCreateSchema.unknown(true);

export const llmClassificationSchema = Joi.object<LlmClassificationPayload>({
  classifications: Joi.array().items(
    Joi.object<LlmClassificationItem>({
      category_index: Joi.number().integer().required(),
      is_in_category: Joi.boolean().required(),
      confidence: Joi.number().required(),
      explanation: Joi.string().allow('').required()
    }).unknown(true)
  ).required()
}).unknown(true);

/**
 * Validate `input` against `schema`, returning the converted value or throwing ValidationError
 */
export function validateOrThrow<T>(schema: Joi.ObjectSchema<T>, input: unknown, label: string): T {
  const { error, value } = schema.validate(input, { abortEarly: false });
  if (error) {
    throw new ValidationError(`Invalid ${label}: ${error.message}`, error.details);
  }
  return value;
}

export function validateConfidenceScore(score: number): boolean {
  return score >= 0 && score <= 1;
}
