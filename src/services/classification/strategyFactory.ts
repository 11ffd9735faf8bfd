import { StrategyName } from '../../types/models';
import { ProviderError } from '../../models/errors';
import { EmbeddingService } from '../embedding/EmbeddingService';
import { GenerationProvider } from '../generation/GenerationProvider';
import { ClassificationStrategy } from './strategies/ClassificationStrategy';
import { EmbeddingSimilarityStrategy } from './strategies/EmbeddingSimilarityStrategy';
import { LLMClassificationStrategy } from './strategies/LLMClassificationStrategy';

export interface StrategyDependencies {
  embeddingService: EmbeddingService;
  /** Only needed for the llm strategy */
  generationProvider?: GenerationProvider;
  debug?: boolean;
}

export type StrategyFactory = (name: StrategyName) => ClassificationStrategy;

/**
 * Resolve strategies by tag. Instances are built lazily and reused.
 */
export function createStrategyFactory(deps: StrategyDependencies): StrategyFactory {
  const cache = new Map<StrategyName, ClassificationStrategy>();

  const build = (name: StrategyName): ClassificationStrategy => {
    switch (name) {
      case 'embedding':
        return new EmbeddingSimilarityStrategy(deps.embeddingService);
      case 'llm':
        if (!deps.generationProvider) {
          throw new ProviderError('The llm strategy needs a generation provider; set OPENAI_API_KEY');
        }
        return new LLMClassificationStrategy(deps.generationProvider, deps.debug);
    }
  };

  return (name: StrategyName) => {
    let strategy = cache.get(name);
    if (!strategy) {
      strategy = build(name);
      cache.set(name, strategy);
    }
    return strategy;
  };
}
