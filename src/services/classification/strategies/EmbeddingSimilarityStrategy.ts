import { Category, Judgment, Message } from '../../../types/models';
import { EmbeddingService } from '../../embedding/EmbeddingService';
import { cosineSimilarity } from '../similarity';
import { ClassificationStrategy, StrategyOptions, compareJudgments } from './ClassificationStrategy';

/**
 * Matches a message to every category whose embedding is close enough to its own
 */
export class EmbeddingSimilarityStrategy implements ClassificationStrategy {
  readonly name = 'embedding' as const;

  constructor(private embeddingService: EmbeddingService) {}

  async classify(message: Message, categories: Category[], options: StrategyOptions): Promise<Judgment[]> {
    if (categories.length === 0) {
      return [];
    }

    const messageVector = await this.embeddingService.ensureMessageEmbedding(message);
    const scored: Judgment[] = [];

    for (const category of categories) {
      const categoryVector = await this.embeddingService.ensureCategoryEmbedding(category);
      const similarity = Math.min(cosineSimilarity(messageVector, categoryVector), 1);

      if (similarity < options.threshold) {
        continue;
      }

      scored.push({
        category,
        isInCategory: true,
        score: similarity,
        explanation: this.explain(message, category, options.threshold, similarity)
      });
    }

    scored.sort(compareJudgments);
    return options.topN === undefined ? scored : scored.slice(0, options.topN);
  }

  private explain(message: Message, category: Category, threshold: number, score: number): string {
    return `Message ${message.id} embeddings exceed ${threshold.toFixed(2)} similarity threshold ` +
      `for category '${category.name}' with score ${score.toFixed(4)}`;
  }
}
