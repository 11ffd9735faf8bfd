import { OpenAI } from 'openai';
import { OpenAIConfig } from '../../config/appConfig';
import { ProviderError, errorMessage } from '../../models/errors';
import { EmbeddingProvider } from './EmbeddingProvider';

const MAX_INPUT_CHARS = 8000;

/**
 * EmbeddingProvider backed by OpenAI's embedding models
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  private openai: OpenAI;
  private embeddingModel: string;
  readonly dimensions: number;

  constructor(config: OpenAIConfig) {
    if (!config.apiKey) {
      throw new ProviderError('OPENAI_API_KEY is required for embeddings');
    }
    this.openai = new OpenAI({
      apiKey: config.apiKey,
      maxRetries: config.maxRetries,
      timeout: config.timeoutMs
    });
    this.embeddingModel = config.embeddingModel;
    this.dimensions = config.embeddingDimensions;
  }

  /**
   * Generate embedding for text content
   */
  async embed(text: string): Promise<number[]> {
    let embedding: number[] | undefined;
    try {
      const response = await this.openai.embeddings.create({
        model: this.embeddingModel,
        input: this.truncateContent(text, MAX_INPUT_CHARS),
        encoding_format: 'float'
      });
      embedding = response.data[0]?.embedding;
    } catch (error) {
      console.error('❌ Failed to generate embedding:', error);
      throw new ProviderError(`Embedding request failed: ${errorMessage(error)}`, error);
    }

    if (!embedding || embedding.length === 0) {
      throw new ProviderError('No embedding data received from OpenAI');
    }
    if (embedding.length !== this.dimensions) {
      throw new ProviderError(
        `Embedding model returned ${embedding.length} dimensions, expected ${this.dimensions}`
      );
    }
    return embedding;
  }

  private truncateContent(content: string, maxChars: number): string {
    if (content.length <= maxChars) {
      return content;
    }
    return content.substring(0, maxChars - 3) + '...';
  }
}
