import { OpenAI } from 'openai';
import { OpenAIConfig } from '../../config/appConfig';
import { ProviderError, errorMessage } from '../../models/errors';
import { GenerationProvider, GenerationRequest } from './GenerationProvider';

/**
 * GenerationProvider backed by OpenAI chat completions with a JSON schema response format
 */
export class OpenAIGenerationProvider implements GenerationProvider {
  private openai: OpenAI;
  private model: string;

  constructor(config: OpenAIConfig) {
    if (!config.apiKey) {
      throw new ProviderError('OPENAI_API_KEY is required for generation');
    }
    this.openai = new OpenAI({
      apiKey: config.apiKey,
      maxRetries: config.maxRetries,
      timeout: config.timeoutMs
    });
    this.model = config.generationModel;
  }

  async generate(request: GenerationRequest): Promise<unknown> {
    let content: string | null | undefined;
    try {
      const response = await this.openai.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.prompt }
        ],
        temperature: 0.1,
        response_format: {
          type: 'json_schema',
          json_schema: {
            name: request.schemaName,
            schema: request.jsonSchema,
            strict: true
          }
        }
      });
      content = response.choices[0]?.message.content;
    } catch (error) {
      console.error('❌ OpenAI generation error:', error);
      throw new ProviderError(`Generation request failed: ${errorMessage(error)}`, error);
    }

    if (!content) {
      return null;
    }

    // Malformed JSON is handed back as-is; the caller's validation rejects it
    try {
      const parsed: unknown = JSON.parse(content);
      return parsed;
    } catch {
      return content;
    }
  }
}
