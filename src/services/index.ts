import { Database } from 'sqlite';
import { AppConfig } from '../config/appConfig';
import { MessageRepository } from '../repositories/MessageRepository';
import { CategoryRepository } from '../repositories/CategoryRepository';
import { ClassificationRepository } from '../repositories/ClassificationRepository';
import { EmbeddingProvider } from './embedding/EmbeddingProvider';
import { OpenAIEmbeddingProvider } from './embedding/OpenAIEmbeddingProvider';
import { EmbeddingService } from './embedding/EmbeddingService';
import { GenerationProvider } from './generation/GenerationProvider';
import { OpenAIGenerationProvider } from './generation/OpenAIGenerationProvider';
import { createStrategyFactory } from './classification/strategyFactory';
import { ClassificationService } from './classification/ClassificationService';
import { MessagesService } from './messages/MessagesService';
import { MessageParser } from './messages/MessageParser';
import { CategoriesService } from './categories/CategoriesService';
import { BootstrapService } from './bootstrap/BootstrapService';

export interface ProviderOverrides {
  embeddingProvider?: EmbeddingProvider;
  generationProvider?: GenerationProvider;
}

export interface AppServices {
  messagesService: MessagesService;
  categoriesService: CategoriesService;
  classificationService: ClassificationService;
  bootstrapService: BootstrapService;
}

/**
 * Wire repositories and services on one database connection.
 * Providers default to OpenAI; the generation provider is only built when an API key is set.
 */
export function buildServices(db: Database, config: AppConfig, overrides: ProviderOverrides = {}): AppServices {
  const messageRepository = new MessageRepository(db);
  const categoryRepository = new CategoryRepository(db);
  const classificationRepository = new ClassificationRepository(db);

  const embeddingProvider = overrides.embeddingProvider ?? new OpenAIEmbeddingProvider(config.openai);
  const generationProvider = overrides.generationProvider ??
    (config.openai.apiKey ? new OpenAIGenerationProvider(config.openai) : undefined);

  const embeddingService = new EmbeddingService(embeddingProvider, messageRepository, categoryRepository);
  const strategies = createStrategyFactory({
    embeddingService,
    generationProvider,
    debug: config.classification.debug
  });

  const classificationService = new ClassificationService(
    messageRepository,
    categoryRepository,
    classificationRepository,
    strategies,
    config.classification
  );
  const messagesService = new MessagesService(
    messageRepository,
    classificationRepository,
    embeddingService,
    new MessageParser(),
    classificationService
  );
  const categoriesService = new CategoriesService(categoryRepository, classificationRepository, embeddingService);
  const bootstrapService = new BootstrapService(db, categoriesService, messagesService, classificationService);

  return { messagesService, categoriesService, classificationService, bootstrapService };
}
