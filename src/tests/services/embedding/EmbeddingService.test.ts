import { Database } from 'sqlite';
import { EmbeddingService } from '../../../services/embedding/EmbeddingService';
import { MessageRepository } from '../../../repositories/MessageRepository';
import { CategoryRepository } from '../../../repositories/CategoryRepository';
import { StubEmbeddingProvider, buildMessage, createTestDatabase } from '../../helpers';

describe('EmbeddingService', () => {
  let db: Database;
  let provider: StubEmbeddingProvider;
  let messageRepository: MessageRepository;
  let categoryRepository: CategoryRepository;
  let service: EmbeddingService;

  beforeEach(async () => {
    db = await createTestDatabase();
    provider = new StubEmbeddingProvider([['Travel', [0, 1, 0]]], [1, 0, 0]);
    messageRepository = new MessageRepository(db);
    categoryRepository = new CategoryRepository(db);
    service = new EmbeddingService(provider, messageRepository, categoryRepository);
  });

  afterEach(async () => {
    await db.close();
  });

  it('should embed the canonical message text', async () => {
    const message = buildMessage({ recipients: [], snippet: undefined, body: undefined, date: undefined });

    await service.embedMessageText(message);

    expect(provider.embed).toHaveBeenCalledWith('Subject: Your Delta eTicket\nFrom: delta@example.com');
  });

  it('should embed the canonical category text', async () => {
    const vector = await service.embedCategoryText({ name: 'Travel', description: 'Trips' });

    expect(vector).toEqual([0, 1, 0]);
    expect(provider.embed).toHaveBeenCalledWith('Category: Travel\nDescription: Trips');
  });

  it('should compute, store and attach a missing message embedding', async () => {
    const message = buildMessage();
    await messageRepository.create(message);

    const vector = await service.ensureMessageEmbedding(message);

    expect(vector).toEqual([1, 0, 0]);
    expect(message.embedding).toEqual([1, 0, 0]);
    expect((await messageRepository.getById(message.id))?.embedding).toEqual([1, 0, 0]);
  });

  it('should return an existing embedding without calling the provider', async () => {
    const vector = await service.ensureMessageEmbedding(buildMessage({ embedding: [0.5, 0.5, 0] }));

    expect(vector).toEqual([0.5, 0.5, 0]);
    expect(provider.embed).not.toHaveBeenCalled();
  });

  it('should compute and store a missing category embedding once', async () => {
    const category = await categoryRepository.create('Travel', 'Trips');

    await service.ensureCategoryEmbedding(category);
    await service.ensureCategoryEmbedding(category);

    expect(provider.embed).toHaveBeenCalledTimes(1);
    expect((await categoryRepository.getById(category.id))?.embedding).toEqual([0, 1, 0]);
  });
});
