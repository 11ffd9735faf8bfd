import { Category, Judgment, Message } from '../../../types/models';
import { GenerationError, ValidationError } from '../../../models/errors';
import {
  LlmClassificationItem, llmClassificationSchema, validateConfidenceScore, validateOrThrow
} from '../../../models/validation';
import { GenerationProvider, GenerationRequest } from '../../generation/GenerationProvider';
import { buildIndexedCategoryBlock, buildMessageText } from '../TextRepresentation';
import { ClassificationStrategy } from './ClassificationStrategy';

const MAX_ATTEMPTS = 2;

const SYSTEM_PROMPT = 'You are an expert message classifier. For every numbered category, ' +
  'decide independently whether the message belongs to it. Always respond with valid JSON.';

export const CLASSIFICATION_JSON_SCHEMA: Record<string, unknown> = {
  type: 'object',
  properties: {
    classifications: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          category_index: { type: 'integer' },
          is_in_category: { type: 'boolean' },
          confidence: { type: 'number' },
          explanation: { type: 'string' }
        },
        required: ['category_index', 'is_in_category', 'confidence', 'explanation'],
        additionalProperties: false
      }
    }
  },
  required: ['classifications'],
  additionalProperties: false
};

/**
 * Asks a generative model to judge the message against all categories in one request
 */
export class LLMClassificationStrategy implements ClassificationStrategy {
  readonly name = 'llm' as const;

  constructor(
    private provider: GenerationProvider,
    private debug: boolean = false
  ) {}

  async classify(message: Message, categories: Category[]): Promise<Judgment[]> {
    if (categories.length === 0) {
      return [];
    }

    const request = this.buildRequest(message, categories);
    let lastError: ValidationError | undefined;

    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      const output = await this.provider.generate(request);
      if (this.debug) {
        console.log(`🔄 LLM output for message ${message.id} (attempt ${attempt}):`, JSON.stringify(output));
      }

      try {
        return this.toJudgments(output, categories);
      } catch (error) {
        if (!(error instanceof ValidationError)) {
          throw error;
        }
        lastError = error;
        console.warn(`⚠️ Invalid classification output for message ${message.id} (attempt ${attempt}): ${error.message}`);
      }
    }

    throw new GenerationError(
      `Model output for message ${message.id} failed validation after ${MAX_ATTEMPTS} attempts: ${lastError?.message ?? 'unknown error'}`,
      lastError?.details
    );
  }

  buildPrompt(message: Message, categories: Category[]): string {
    const blocks = categories.map((category, index) => buildIndexedCategoryBlock(index, category));

    return `Classify the following message against each category below.

MESSAGE:
${buildMessageText(message)}

CATEGORIES:
${blocks.join('\n\n')}

Return one entry per category index from 0 to ${categories.length - 1} with:
- category_index: the number in brackets
- is_in_category: true if the message belongs to the category
- confidence: a number between 0 and 1
- explanation: one or two sentences explaining the decision`;
  }

  private buildRequest(message: Message, categories: Category[]): GenerationRequest {
    return {
      system: SYSTEM_PROMPT,
      prompt: this.buildPrompt(message, categories),
      schemaName: 'message_classification',
      jsonSchema: CLASSIFICATION_JSON_SCHEMA
    };
  }

  /**
   * Validate model output and map indices back to categories.
   * Indices outside the category list are dropped before any range check.
   */
  private toJudgments(output: unknown, categories: Category[]): Judgment[] {
    const payload = validateOrThrow(llmClassificationSchema, output, 'classification output');
    const byIndex = new Map<number, LlmClassificationItem>();

    for (const item of payload.classifications) {
      if (item.category_index < 0 || item.category_index >= categories.length) {
        console.warn(`⚠️ Dropping classification for unknown category index ${item.category_index}`);
        continue;
      }
      if (byIndex.has(item.category_index)) {
        throw new ValidationError(`Duplicate classification for category index ${item.category_index}`);
      }
      byIndex.set(item.category_index, item);
    }

    return categories.map((category, index) => {
      const item = byIndex.get(index);
      if (!item) {
        throw new ValidationError(`Missing classification for category index ${index}`);
      }
      if (!validateConfidenceScore(item.confidence)) {
        throw new ValidationError(`Confidence ${item.confidence} for category index ${index} is outside [0, 1]`);
      }
      return {
        category,
        isInCategory: item.is_in_category,
        score: item.confidence,
        explanation: item.explanation
      };
    });
  }
}
