import fs from 'fs';
import os from 'os';
import path from 'path';
import { Database } from 'sqlite';
import { CategoriesService } from '../../../services/categories/CategoriesService';
import { EmbeddingService } from '../../../services/embedding/EmbeddingService';
import { MessageRepository } from '../../../repositories/MessageRepository';
import { CategoryRepository } from '../../../repositories/CategoryRepository';
import { ClassificationRepository } from '../../../repositories/ClassificationRepository';
import { ConflictError, NotFoundError, ValidationError } from '../../../models/errors';
import { StubEmbeddingProvider, buildMessage, createTestDatabase } from '../../helpers';

describe('CategoriesService', () => {
  let db: Database;
  let provider: StubEmbeddingProvider;
  let categoryRepository: CategoryRepository;
  let classificationRepository: ClassificationRepository;
  let service: CategoriesService;

  beforeEach(async () => {
    db = await createTestDatabase();
    provider = new StubEmbeddingProvider([['Travel', [1, 0, 0]], ['Finance', [0, 1, 0]]]);
    categoryRepository = new CategoryRepository(db);
    classificationRepository = new ClassificationRepository(db);
    service = new CategoriesService(
      categoryRepository,
      classificationRepository,
      new EmbeddingService(provider, new MessageRepository(db), categoryRepository)
    );
  });

  afterEach(async () => {
    await db.close();
  });

  describe('createCategory', () => {
    it('should embed and store the category', async () => {
      const category = await service.createCategory(' Travel ', 'Trips and bookings');

      expect(category).toEqual({ id: 1, name: 'Travel', description: 'Trips and bookings', embedding: [1, 0, 0] });
      expect(provider.embed).toHaveBeenCalledWith('Category: Travel\nDescription: Trips and bookings');
    });

    it('should reject a duplicate name before embedding and keep the original', async () => {
      await service.createCategory('Travel', 'Trips and bookings');
      provider.embed.mockClear();

      await expect(service.createCategory('Travel', 'Other'))
        .rejects.toThrow(new ConflictError("Category with name 'Travel' already exists"));

      expect(provider.embed).not.toHaveBeenCalled();
      expect(await service.listCategories()).toEqual([
        { id: 1, name: 'Travel', description: 'Trips and bookings', embedding: [1, 0, 0] }
      ]);
    });

    it('should reject a missing description', async () => {
      await expect(service.createCategory('Travel', '')).rejects.toThrow(ValidationError);
    });
  });

  describe('updateCategory', () => {
    it('should rename, re-describe and re-embed', async () => {
      await service.createCategory('Travel', 'Trips');

      const updated = await service.updateCategory(1, { name: 'Finance' });

      expect(updated).toEqual({ id: 1, name: 'Finance', description: 'Trips', embedding: [0, 1, 0] });
      expect(await categoryRepository.getById(1)).toEqual(updated);
    });

    it('should reject a rename onto another category', async () => {
      await service.createCategory('Travel', 'Trips');
      await service.createCategory('Finance', 'Money');

      await expect(service.updateCategory(2, { name: 'Travel' })).rejects.toThrow(ConflictError);
    });

    it('should allow keeping the same name', async () => {
      await service.createCategory('Travel', 'Trips');

      const updated = await service.updateCategory(1, { name: 'Travel', description: 'All trips' });

      expect(updated.description).toBe('All trips');
    });

    it('should fail for an unknown category', async () => {
      await expect(service.updateCategory(42, { description: 'x' }))
        .rejects.toThrow(new NotFoundError('category', 42));
    });
  });

  describe('deleteCategory', () => {
    it('should remove the category and its classification records', async () => {
      const travel = await service.createCategory('Travel', 'Trips');
      await new MessageRepository(db).create(buildMessage({ id: 'm1' }));
      await classificationRepository.upsertMany('m1', [
        { category: travel, isInCategory: true, score: 0.7, explanation: 'trip' }
      ], new Date());

      await service.deleteCategory(travel.id);

      expect(await classificationRepository.count()).toBe(0);
      await expect(service.getCategory(travel.id)).rejects.toThrow(NotFoundError);
      await expect(service.deleteCategory(travel.id)).rejects.toThrow(NotFoundError);
    });
  });

  describe('listCategoryMessages', () => {
    it('should list assigned messages', async () => {
      const travel = await service.createCategory('Travel', 'Trips');
      await new MessageRepository(db).create(buildMessage({ id: 'm1' }));
      const classifiedAt = new Date('2025-03-01T00:00:00.000Z');
      await classificationRepository.upsertMany('m1', [
        { category: travel, isInCategory: true, score: 0.7, explanation: 'trip' }
      ], classifiedAt);

      expect(await service.listCategoryMessages(travel.id)).toEqual([{
        messageId: 'm1',
        subject: 'Your Delta eTicket',
        sender: 'delta@example.com',
        score: 0.7,
        explanation: 'trip',
        classifiedAt
      }]);
    });

    it('should fail for an unknown category', async () => {
      await expect(service.listCategoryMessages(9)).rejects.toThrow(NotFoundError);
    });
  });

  describe('import', () => {
    it('should create one category per JSONL line', async () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'categories-'));
      const file = path.join(dir, 'categories.jsonl');
      fs.writeFileSync(file, [
        JSON.stringify({ name: 'Travel', description: 'Trips' }),
        JSON.stringify({ name: 'Finance', description: 'Money', color: 'green' })
      ].join('\n'));

      try {
        const created = await service.importFromJsonl(file);
        expect(created.map(c => [c.id, c.name])).toEqual([[1, 'Travel'], [2, 'Finance']]);
      } finally {
        fs.rmSync(dir, { recursive: true, force: true });
      }
    });

    it('should validate every line before creating any category', async () => {
      await expect(service.importCategories([{ name: 'Travel', description: 'Trips' }, { name: 'Broken' }]))
        .rejects.toThrow('Invalid category on line 2: "description" is required');
      expect(await categoryRepository.count()).toBe(0);
    });
  });
});
