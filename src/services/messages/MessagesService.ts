import { v5 as uuidv5 } from 'uuid';
import { Message, MessageWithCategories, StrategyConfig } from '../../types/models';
import { NotFoundError } from '../../models/errors';
import {
  MessageCreateInput, MessageUpdateInput, MessageJsonlLine,
  messageCreateSchema, messageUpdateSchema, messageJsonlSchema, validateOrThrow
} from '../../models/validation';
import { MessageRepository } from '../../repositories/MessageRepository';
import { ClassificationRepository } from '../../repositories/ClassificationRepository';
import { EmbeddingService } from '../embedding/EmbeddingService';
import { ClassificationService, ClassifyAllResult } from '../classification/ClassificationService';
import { buildMessageText } from '../classification/TextRepresentation';
import { readJsonlFile } from '../../utils/jsonl';
import { MessageParser } from './MessageParser';

export const PREVIEW_SIZE = 5;

export interface ImportOptions {
  dropExisting?: boolean;
  autoClassify?: boolean;
  strategy?: Partial<StrategyConfig>;
}

export interface ImportResult {
  totalImported: number;
  messageIds: string[];
  preview: Message[];
  classification?: ClassifyAllResult;
}

/**
 * MessagesService manages message records and keeps their embeddings current
 */
export class MessagesService {
  constructor(
    private messageRepository: MessageRepository,
    private classificationRepository: ClassificationRepository,
    private embeddingService: EmbeddingService,
    private parser: MessageParser = new MessageParser(),
    private classificationService?: ClassificationService
  ) {}

  /**
   * Normalize, embed and store a new message. Without an id, one is derived from its content.
   */
  async createMessage(input: MessageCreateInput): Promise<Message> {
    const validated = validateOrThrow(messageCreateSchema, input, 'message');

    const message: Message = {
      id: '',
      subject: validated.subject,
      sender: validated.sender,
      recipients: validated.recipients,
      snippet: validated.snippet,
      body: validated.body === undefined
        ? undefined
        : this.parser.parseContent(validated.body, validated.bodyIsBase64),
      date: validated.date
    };
    message.id = validated.id ?? deriveMessageId(message);
    message.embedding = await this.embeddingService.embedMessageText(message);

    await this.messageRepository.create(message);
    console.log(`✅ Created message ${message.id}`);
    return message;
  }

  /**
   * Get a message with its assigned categories
   */
  async getMessage(messageId: string): Promise<MessageWithCategories> {
    const message = await this.messageRepository.getById(messageId);
    if (!message) {
      throw new NotFoundError('message', messageId);
    }

    const categories = await this.classificationRepository.getForMessage(messageId);
    return { ...message, categories };
  }

  /**
   * List messages, newest first, each with its assigned categories
   */
  async listMessages(options: { limit?: number; offset?: number } = {}): Promise<MessageWithCategories[]> {
    const messages = await this.messageRepository.getAll(options);

    const listed: MessageWithCategories[] = [];
    for (const message of messages) {
      const categories = await this.classificationRepository.getForMessage(message.id);
      listed.push({ ...message, categories });
    }
    return listed;
  }

  /**
   * Apply a partial update and re-embed the message
   */
  async updateMessage(messageId: string, patch: MessageUpdateInput): Promise<Message> {
    const validated = validateOrThrow(messageUpdateSchema, patch, 'message update');

    const existing = await this.messageRepository.getById(messageId);
    if (!existing) {
      throw new NotFoundError('message', messageId);
    }

    const updated: Message = {
      ...existing,
      ...validated,
      body: validated.body === undefined ? existing.body : this.parser.parseContent(validated.body, false)
    };
    updated.embedding = await this.embeddingService.embedMessageText(updated);

    await this.messageRepository.update(updated);
    return updated;
  }

  async deleteMessage(messageId: string): Promise<void> {
    const deleted = await this.messageRepository.delete(messageId);
    if (!deleted) {
      throw new NotFoundError('message', messageId);
    }
  }

  /**
   * Import messages from a JSONL file, one message object per line
   */
  async importFromJsonl(filePath: string, options: ImportOptions = {}): Promise<ImportResult> {
    const records = await readJsonlFile(filePath);
    return this.importMessages(records, options);
  }

  /**
   * Validate, normalize and embed every record, then store them in one transaction.
   * Nothing is written if any record is invalid or an embedding call fails.
   */
  async importMessages(records: unknown[], options: ImportOptions = {}): Promise<ImportResult> {
    const messages: Message[] = [];
    for (const [index, record] of records.entries()) {
      const line = validateOrThrow(messageJsonlSchema, record, `message on line ${index + 1}`);
      const message = this.fromJsonlLine(line);
      message.embedding = await this.embeddingService.embedMessageText(message);
      messages.push(message);
    }

    if (options.dropExisting) {
      const removed = await this.messageRepository.deleteAll();
      console.log(`🔄 Dropped ${removed} existing messages`);
    }

    await this.messageRepository.batchCreate(messages);
    console.log(`✅ Imported ${messages.length} messages`);

    const result: ImportResult = {
      totalImported: messages.length,
      messageIds: messages.map(message => message.id),
      preview: messages.slice(0, PREVIEW_SIZE)
    };

    if (options.autoClassify) {
      if (!this.classificationService) {
        throw new Error('Auto-classification requires a classification service');
      }
      result.classification = await this.classificationService.classifyMessages(result.messageIds, options.strategy);
    }

    return result;
  }

  private fromJsonlLine(line: MessageJsonlLine): Message {
    return {
      id: line.id,
      subject: line.subject,
      sender: line.from,
      recipients: line.to,
      snippet: line.snippet || undefined,
      body: this.parser.parseContent(line.body, true),
      date: this.parser.parseDate(line.date)
    };
  }
}

/**
 * Stable id for a message that arrived without one: UUIDv5 of its canonical text
 */
export function deriveMessageId(message: Message): string {
  return uuidv5(buildMessageText(message), uuidv5.URL);
}
