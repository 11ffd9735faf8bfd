import { Category, Judgment, Message, StrategyName } from '../../../types/models';

export interface StrategyOptions {
  topN?: number;
  threshold: number;
}

/**
 * Decides, per category, whether a message belongs to it.
 * Strategies never write classification records.
 */
export interface ClassificationStrategy {
  readonly name: StrategyName;
  classify(message: Message, categories: Category[], options: StrategyOptions): Promise<Judgment[]>;
}

/**
 * Sort by score descending, ties by category id ascending
 */
export function compareJudgments(a: Judgment, b: Judgment): number {
  return b.score - a.score || a.category.id - b.category.id;
}
