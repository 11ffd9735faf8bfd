import { Category, Message } from '../../types/models';
import { MessageRepository } from '../../repositories/MessageRepository';
import { CategoryRepository } from '../../repositories/CategoryRepository';
import { buildCategoryText, buildMessageText } from '../classification/TextRepresentation';
import { EmbeddingProvider } from './EmbeddingProvider';

/**
 * Compute-if-absent embeddings for messages and categories.
 * A computed vector is stored on the entity and the database row; a present one is returned as is.
 */
export class EmbeddingService {
  constructor(
    private provider: EmbeddingProvider,
    private messageRepository: MessageRepository,
    private categoryRepository: CategoryRepository
  ) {}

  embedMessageText(message: Message): Promise<number[]> {
    return this.provider.embed(buildMessageText(message));
  }

  embedCategoryText(category: Pick<Category, 'name' | 'description'>): Promise<number[]> {
    return this.provider.embed(buildCategoryText(category));
  }

  async ensureMessageEmbedding(message: Message): Promise<number[]> {
    if (message.embedding) {
      return message.embedding;
    }

    const embedding = await this.embedMessageText(message);
    await this.messageRepository.updateEmbedding(message.id, embedding);
    message.embedding = embedding;
    console.log(`✅ Embedded message ${message.id}`);
    return embedding;
  }

  async ensureCategoryEmbedding(category: Category): Promise<number[]> {
    if (category.embedding) {
      return category.embedding;
    }

    const embedding = await this.embedCategoryText(category);
    await this.categoryRepository.updateEmbedding(category.id, embedding);
    category.embedding = embedding;
    console.log(`✅ Embedded category '${category.name}'`);
    return embedding;
  }
}
