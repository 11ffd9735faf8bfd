import { Database } from 'sqlite';
import { ClassificationRepository } from '../../repositories/ClassificationRepository';
import { MessageRepository } from '../../repositories/MessageRepository';
import { CategoryRepository } from '../../repositories/CategoryRepository';
import { DataIntegrityError } from '../../models/errors';
import { Category, Judgment } from '../../types/models';
import { buildMessage, createTestDatabase } from '../helpers';

describe('ClassificationRepository', () => {
  let db: Database;
  let repository: ClassificationRepository;
  let travel: Category;
  let work: Category;
  let finance: Category;

  const firstRun = new Date('2025-01-01T00:00:00.000Z');
  const secondRun = new Date('2025-01-02T00:00:00.000Z');

  const judgment = (category: Category, score: number, explanation = `match ${category.name}`): Judgment => ({
    category,
    isInCategory: true,
    score,
    explanation
  });

  beforeEach(async () => {
    db = await createTestDatabase();
    repository = new ClassificationRepository(db);

    const messages = new MessageRepository(db);
    await messages.create(buildMessage({ id: 'm1', subject: 'Flight booked', sender: 'airline@example.com' }));
    await messages.create(buildMessage({ id: 'm2', subject: 'Invoice', sender: 'billing@example.com' }));

    const categories = new CategoryRepository(db);
    travel = await categories.create('Travel', 'Trips');
    work = await categories.create('Work', 'Jobs');
    finance = await categories.create('Finance', 'Money');
  });

  afterEach(async () => {
    await db.close();
  });

  describe('upsertMany', () => {
    it('should store one record per judgment', async () => {
      await repository.upsertMany('m1', [judgment(travel, 0.82), judgment(work, 0.6)], firstRun);

      expect(await repository.getRecordsForMessage('m1')).toEqual([
        { messageId: 'm1', categoryId: 1, score: 0.82, explanation: 'match Travel', classifiedAt: firstRun },
        { messageId: 'm1', categoryId: 2, score: 0.6, explanation: 'match Work', classifiedAt: firstRun }
      ]);
    });

    it('should overwrite the existing record for a pair', async () => {
      await repository.upsertMany('m1', [judgment(travel, 0.82, 'first')], firstRun);
      await repository.upsertMany('m1', [judgment(travel, 0.7, 'second')], secondRun);

      expect(await repository.countForMessage('m1')).toBe(1);
      expect(await repository.getRecordsForMessage('m1')).toEqual([{
        messageId: 'm1', categoryId: 1, score: 0.7, explanation: 'second', classifiedAt: secondRun
      }]);
    });

    it('should keep records of pairs absent from a later run', async () => {
      await repository.upsertMany('m1', [judgment(travel, 0.82), judgment(work, 0.6)], firstRun);
      await repository.upsertMany('m1', [judgment(travel, 0.9)], secondRun);

      expect((await repository.getRecordsForMessage('m1')).map(r => r.categoryId)).toEqual([1, 2]);
    });

    it('should reject out-of-range scores before writing anything', async () => {
      await expect(repository.upsertMany('m1', [judgment(travel, 0.5), judgment(work, 1.2)], firstRun))
        .rejects.toThrow(new DataIntegrityError('Score 1.2 for category 2 is outside [0, 1]'));

      expect(await repository.count()).toBe(0);
    });

    it('should leave no partial records when a write fails', async () => {
      const ghost: Category = { id: 99, name: 'Ghost', description: 'Not stored' };

      await expect(repository.upsertMany('m1', [judgment(travel, 0.5), judgment(ghost, 0.6)], firstRun))
        .rejects.toThrow(/FOREIGN KEY constraint failed/);

      expect(await repository.count()).toBe(0);
    });

    it('should do nothing for an empty judgment list', async () => {
      await repository.upsertMany('m1', [], firstRun);

      expect(await repository.count()).toBe(0);
    });
  });

  describe('replaceForMessage', () => {
    it('should delete records for evaluated categories that no longer match', async () => {
      await repository.upsertMany('m1', [judgment(travel, 0.8), judgment(work, 0.6)], firstRun);
      await repository.upsertMany('m2', [judgment(work, 0.7)], firstRun);

      const removed = await repository.replaceForMessage('m1', [judgment(travel, 0.9)], [1, 2, 3], secondRun);

      expect(removed).toBe(1);
      expect(await repository.getRecordsForMessage('m1')).toEqual([
        { messageId: 'm1', categoryId: 1, score: 0.9, explanation: 'match Travel', classifiedAt: secondRun }
      ]);
      expect(await repository.countForMessage('m2')).toBe(1);
    });

    it('should leave records for categories that were not evaluated', async () => {
      await repository.upsertMany('m1', [judgment(finance, 0.6)], firstRun);

      const removed = await repository.replaceForMessage('m1', [], [1, 2], secondRun);

      expect(removed).toBe(0);
      expect(await repository.countForMessage('m1')).toBe(1);
    });
  });

  describe('listings', () => {
    beforeEach(async () => {
      await repository.upsertMany('m1', [judgment(travel, 0.6), judgment(work, 0.9)], firstRun);
      await repository.upsertMany('m2', [judgment(work, 0.7)], firstRun);
    });

    it('should list categories for a message, highest score first', async () => {
      expect(await repository.getForMessage('m1')).toEqual([
        { categoryId: 2, name: 'Work', description: 'Jobs', score: 0.9, explanation: 'match Work', classifiedAt: firstRun },
        { categoryId: 1, name: 'Travel', description: 'Trips', score: 0.6, explanation: 'match Travel', classifiedAt: firstRun }
      ]);
    });

    it('should list messages for a category, highest score first', async () => {
      expect(await repository.getForCategory(2)).toEqual([
        { messageId: 'm1', subject: 'Flight booked', sender: 'airline@example.com', score: 0.9, explanation: 'match Work', classifiedAt: firstRun },
        { messageId: 'm2', subject: 'Invoice', sender: 'billing@example.com', score: 0.7, explanation: 'match Work', classifiedAt: firstRun }
      ]);
    });

    it('should drop records when their message is deleted', async () => {
      await new MessageRepository(db).delete('m1');

      expect(await repository.countForMessage('m1')).toBe(0);
      expect(await repository.count()).toBe(1);
    });
  });
});
