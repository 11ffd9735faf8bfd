import fs from 'fs';
import os from 'os';
import path from 'path';
import { Database } from 'sqlite';
import { MessagesService, deriveMessageId } from '../../../services/messages/MessagesService';
import { MessageParser } from '../../../services/messages/MessageParser';
import { EmbeddingService } from '../../../services/embedding/EmbeddingService';
import { ClassificationService } from '../../../services/classification/ClassificationService';
import { createStrategyFactory } from '../../../services/classification/strategyFactory';
import { MessageRepository } from '../../../repositories/MessageRepository';
import { CategoryRepository } from '../../../repositories/CategoryRepository';
import { ClassificationRepository } from '../../../repositories/ClassificationRepository';
import { ConflictError, NotFoundError, ProviderError, ValidationError } from '../../../models/errors';
import { StubEmbeddingProvider, buildMessage, createTestDatabase, toBase64 } from '../../helpers';

describe('MessagesService', () => {
  let db: Database;
  let provider: StubEmbeddingProvider;
  let messageRepository: MessageRepository;
  let categoryRepository: CategoryRepository;
  let classificationRepository: ClassificationRepository;
  let service: MessagesService;
  let tempDir: string;

  const jsonlLine = (id: string, subject: string, body: string, date = '2025-01-15T10:00:00Z') => JSON.stringify({
    id,
    subject,
    from: 'sender@example.com',
    to: ['me@example.com'],
    snippet: `${subject} preview`,
    body: toBase64(body),
    date
  });

  beforeEach(async () => {
    db = await createTestDatabase();
    provider = new StubEmbeddingProvider([['Flight', [1, 0, 0]], ['Category: Travel', [1, 0, 0]]], [0, 1, 0]);
    messageRepository = new MessageRepository(db);
    categoryRepository = new CategoryRepository(db);
    classificationRepository = new ClassificationRepository(db);

    const embeddingService = new EmbeddingService(provider, messageRepository, categoryRepository);
    const classificationService = new ClassificationService(
      messageRepository,
      categoryRepository,
      classificationRepository,
      createStrategyFactory({ embeddingService }),
      { strategy: 'embedding', threshold: 0.5, staleRecordPolicy: 'retain', debug: false }
    );
    service = new MessagesService(
      messageRepository,
      classificationRepository,
      embeddingService,
      new MessageParser(),
      classificationService
    );
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'messages-'));
  });

  afterEach(async () => {
    await db.close();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('createMessage', () => {
    it('should normalize the body, embed and store the message', async () => {
      const message = await service.createMessage({
        id: 'm1',
        subject: 'Flight confirmed',
        sender: 'airline@example.com',
        recipients: ['me@example.com'],
        body: toBase64('<p>Seat <b>12A</b></p>'),
        bodyIsBase64: true,
        date: new Date('2025-01-15T10:00:00.000Z')
      });

      expect(message.body).toBe('Seat 12A');
      expect(message.embedding).toEqual([1, 0, 0]);
      expect(await messageRepository.getById('m1')).toEqual(message);
    });

    it('should derive a stable id from the content when none is given', async () => {
      const input = { subject: 'Hello', sender: 'a@example.com', recipients: [], bodyIsBase64: false };

      const message = await service.createMessage(input);

      expect(message.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-5[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
      expect(message.id).toBe(deriveMessageId({ id: '', subject: 'Hello', sender: 'a@example.com', recipients: [] }));
      await expect(service.createMessage(input)).rejects.toThrow(ConflictError);
    });

    it('should store nothing when embedding fails', async () => {
      provider.embed.mockRejectedValueOnce(new ProviderError('Embedding request failed: timeout'));

      await expect(service.createMessage({
        id: 'm1', subject: 'Hi', sender: 'a@example.com', recipients: [], bodyIsBase64: false
      })).rejects.toThrow(ProviderError);
      expect(await messageRepository.count()).toBe(0);
    });

    it('should reject invalid input', async () => {
      await expect(service.createMessage({
        subject: 'Hi', sender: '', recipients: [], bodyIsBase64: false
      })).rejects.toThrow(ValidationError);
    });
  });

  describe('getMessage', () => {
    it('should include assigned categories', async () => {
      await messageRepository.create(buildMessage({ id: 'm1' }));
      const travel = await categoryRepository.create('Travel', 'Trips');
      await classificationRepository.upsertMany('m1', [
        { category: travel, isInCategory: true, score: 0.9, explanation: 'trip' }
      ], new Date('2025-02-01T00:00:00.000Z'));

      const message = await service.getMessage('m1');

      expect(message.categories).toEqual([{
        categoryId: travel.id,
        name: 'Travel',
        description: 'Trips',
        score: 0.9,
        explanation: 'trip',
        classifiedAt: new Date('2025-02-01T00:00:00.000Z')
      }]);
    });

    it('should fail for an unknown id', async () => {
      await expect(service.getMessage('nope')).rejects.toThrow(new NotFoundError('message', 'nope'));
    });
  });

  describe('updateMessage', () => {
    it('should apply the patch and re-embed', async () => {
      await messageRepository.create(buildMessage({ id: 'm1', subject: 'Lunch', embedding: [0, 0, 1] }));

      const updated = await service.updateMessage('m1', { subject: 'Flight moved' });

      expect(updated.subject).toBe('Flight moved');
      expect(updated.embedding).toEqual([1, 0, 0]);
      expect((await messageRepository.getById('m1'))?.embedding).toEqual([1, 0, 0]);
    });

    it('should fail for an unknown id', async () => {
      await expect(service.updateMessage('nope', { subject: 'x' })).rejects.toThrow(NotFoundError);
    });
  });

  describe('deleteMessage', () => {
    it('should delete an existing message and fail for a missing one', async () => {
      await messageRepository.create(buildMessage({ id: 'm1' }));

      await service.deleteMessage('m1');

      await expect(service.deleteMessage('m1')).rejects.toThrow(NotFoundError);
    });
  });

  describe('listMessages', () => {
    it('should list newest first with pagination', async () => {
      await messageRepository.create(buildMessage({ id: 'old', date: new Date('2025-01-01T00:00:00.000Z') }));
      await messageRepository.create(buildMessage({ id: 'new', date: new Date('2025-02-01T00:00:00.000Z') }));

      expect((await service.listMessages({ limit: 1 })).map(m => m.id)).toEqual(['new']);
    });

    it('should attach the categories of each message', async () => {
      await messageRepository.create(buildMessage({ id: 'm1' }));
      await messageRepository.create(buildMessage({ id: 'm2' }));
      const travel = await categoryRepository.create('Travel', 'Trips');
      await classificationRepository.upsertMany('m1', [
        { category: travel, isInCategory: true, score: 0.9, explanation: 'trip' }
      ], new Date('2025-02-01T00:00:00.000Z'));

      const listed = await service.listMessages();

      expect(listed.map(m => [m.id, m.categories.map(c => c.name)])).toEqual([['m1', ['Travel']], ['m2', []]]);
    });
  });

  describe('importFromJsonl', () => {
    it('should import every line with decoded bodies and return a preview', async () => {
      const file = path.join(tempDir, 'messages.jsonl');
      fs.writeFileSync(file, [
        jsonlLine('a', 'Flight to Paris', '<div>Gate 4</div>'),
        '',
        jsonlLine('b', 'Lunch?', 'Noon works')
      ].join('\n'));

      const result = await service.importFromJsonl(file);

      expect(result.totalImported).toBe(2);
      expect(result.preview.map(m => m.id)).toEqual(['a', 'b']);
      expect(result.classification).toBeUndefined();

      const stored = await messageRepository.getById('a');
      expect(stored?.body).toBe('Gate 4');
      expect(stored?.sender).toBe('sender@example.com');
      expect(stored?.snippet).toBe('Flight to Paris preview');
      expect(stored?.embedding).toEqual([1, 0, 0]);
    });

    it('should limit the preview to five messages', async () => {
      const lines = Array.from({ length: 7 }, (_, i) => jsonlLine(`m${i}`, `Subject ${i}`, 'Body'));

      const result = await service.importMessages(lines.map(line => JSON.parse(line)));

      expect(result.totalImported).toBe(7);
      expect(result.preview.map(m => m.id)).toEqual(['m0', 'm1', 'm2', 'm3', 'm4']);
    });

    it('should replace existing messages when asked', async () => {
      await messageRepository.create(buildMessage({ id: 'existing' }));

      await service.importMessages([JSON.parse(jsonlLine('a', 'Hi', 'Body'))], { dropExisting: true });

      expect(await messageRepository.getAllIds()).toEqual(['a']);
    });

    it('should classify after importing when asked', async () => {
      await categoryRepository.create('Travel', 'Trips', [1, 0, 0]);

      await messageRepository.create(buildMessage({ id: 'earlier', embedding: [1, 0, 0] }));

      const result = await service.importMessages([
        JSON.parse(jsonlLine('a', 'Flight to Paris', 'Gate 4')),
        JSON.parse(jsonlLine('b', 'Lunch?', 'Noon works'))
      ], { autoClassify: true });

      expect(result.messageIds).toEqual(['a', 'b']);
      expect(result.classification).toEqual({ processed: 2, matched: 1 });
      expect(await classificationRepository.countForMessage('a')).toBe(1);
      expect(await classificationRepository.countForMessage('earlier')).toBe(0);
    });

    it('should store nothing when a line is invalid', async () => {
      const invalid = { id: 'b', subject: 'No sender', to: [], body: '', date: '2025-01-01T00:00:00Z' };

      await expect(service.importMessages([JSON.parse(jsonlLine('a', 'Hi', 'Body')), invalid]))
        .rejects.toThrow('Invalid message on line 2: "from" is required');
      expect(await messageRepository.count()).toBe(0);
    });
  });
});
