import {
  Category, ClassifyResponse, Judgment, StrategyConfig
} from '../../types/models';
import { NotFoundError } from '../../models/errors';
import { strategyConfigSchema, validateOrThrow } from '../../models/validation';
import { ClassificationDefaults } from '../../config/appConfig';
import { MessageRepository } from '../../repositories/MessageRepository';
import { CategoryRepository } from '../../repositories/CategoryRepository';
import { ClassificationRepository } from '../../repositories/ClassificationRepository';
import { compareJudgments } from './strategies/ClassificationStrategy';
import { StrategyFactory } from './strategyFactory';

export interface ClassifyAllResult {
  processed: number;
  matched: number;
}

/**
 * Classifies a stored message against every stored category and records the matches.
 *
 * The strategy runs (and calls its provider) before any write; the resulting
 * records land in a single transaction.
 */
export class ClassificationService {
  constructor(
    private messageRepository: MessageRepository,
    private categoryRepository: CategoryRepository,
    private classificationRepository: ClassificationRepository,
    private strategies: StrategyFactory,
    private defaults: ClassificationDefaults,
    private now: () => Date = () => new Date()
  ) {}

  /**
   * Classify one message and upsert its matching categories
   */
  async classifyMessage(messageId: string, strategyConfig?: Partial<StrategyConfig>): Promise<ClassifyResponse> {
    const config = this.resolveConfig(strategyConfig);

    const message = await this.messageRepository.getById(messageId);
    if (!message) {
      throw new NotFoundError('message', messageId);
    }

    const categories = await this.categoryRepository.getAll();
    if (categories.length === 0) {
      return { messageId, classifications: [] };
    }

    const strategy = this.strategies(config.strategy);
    const judgments = await strategy.classify(message, categories, {
      topN: config.topN,
      threshold: config.threshold ?? this.defaults.threshold
    });

    const matches = judgments
      .filter(judgment => judgment.isInCategory)
      .sort(compareJudgments);

    await this.persist(messageId, matches, categories);

    if (this.defaults.debug) {
      console.log(`🔄 Message ${messageId}: ${matches.length}/${categories.length} categories matched via ${config.strategy}`);
    }

    return {
      messageId,
      classifications: matches.map(judgment => ({
        categoryId: judgment.category.id,
        categoryName: judgment.category.name,
        score: judgment.score,
        isInCategory: judgment.isInCategory,
        explanation: judgment.explanation
      }))
    };
  }

  /**
   * Classify every stored message sequentially
   */
  async classifyAll(strategyConfig?: Partial<StrategyConfig>): Promise<ClassifyAllResult> {
    const messageIds = await this.messageRepository.getAllIds();
    return this.classifyMessages(messageIds, strategyConfig);
  }

  /**
   * Classify the given messages sequentially; `matched` counts those with at least one category
   */
  async classifyMessages(messageIds: string[], strategyConfig?: Partial<StrategyConfig>): Promise<ClassifyAllResult> {
    let matched = 0;

    console.log(`🔄 Classifying ${messageIds.length} messages...`);
    for (const messageId of messageIds) {
      const response = await this.classifyMessage(messageId, strategyConfig);
      if (response.classifications.length > 0) {
        matched++;
      }
    }
    console.log(`✅ Classified ${messageIds.length} messages, ${matched} with at least one category`);

    return { processed: messageIds.length, matched };
  }

  private async persist(messageId: string, matches: Judgment[], categories: Category[]): Promise<void> {
    const classifiedAt = this.now();

    if (this.defaults.staleRecordPolicy === 'prune') {
      const removed = await this.classificationRepository.replaceForMessage(
        messageId,
        matches,
        categories.map(category => category.id),
        classifiedAt
      );
      if (removed > 0) {
        console.log(`🔄 Pruned ${removed} stale classification records for message ${messageId}`);
      }
      return;
    }

    await this.classificationRepository.upsertMany(messageId, matches, classifiedAt);
  }

  private resolveConfig(strategyConfig: Partial<StrategyConfig> = {}): StrategyConfig {
    return validateOrThrow(strategyConfigSchema, {
      strategy: strategyConfig.strategy ?? this.defaults.strategy,
      topN: strategyConfig.topN ?? this.defaults.topN,
      threshold: strategyConfig.threshold ?? this.defaults.threshold
    }, 'strategy configuration');
  }
}
