import { Request, Response } from 'express';
import { Message } from '../types/models';
import { classifyQuerySchema, listQuerySchema, validateOrThrow } from '../models/validation';
import { MessagesService } from '../services/messages/MessagesService';
import { ClassificationService } from '../services/classification/ClassificationService';
import { sendError } from '../middleware/errorHandler';

/**
 * Message as returned by the API; embeddings stay server-side
 */
export type MessageView<T extends Message = Message> = Omit<T, 'embedding'>;

export function toMessageView<T extends Message>(message: T): MessageView<T> {
  const { embedding: _embedding, ...view } = message;
  return view;
}

/**
 * MessagesController handles HTTP requests for messages and their classification
 */
export class MessagesController {
  constructor(
    private messagesService: MessagesService,
    private classificationService: ClassificationService
  ) {}

  /**
   * POST /api/messages - Create a message
   */
  async createMessage(req: Request, res: Response): Promise<void> {
    try {
      const message = await this.messagesService.createMessage(req.body);
      res.status(201).json({ message: toMessageView(message) });
    } catch (error) {
      sendError(res, error, 'Failed to create message');
    }
  }

  /**
   * GET /api/messages - List messages with their categories, newest first
   */
  async listMessages(req: Request, res: Response): Promise<void> {
    try {
      const query = validateOrThrow(listQuerySchema, req.query, 'query');
      const messages = await this.messagesService.listMessages(query);

      res.json({
        messages: messages.map(message => toMessageView(message)),
        pagination: {
          limit: query.limit ?? null,
          offset: query.offset ?? 0,
          count: messages.length
        }
      });
    } catch (error) {
      sendError(res, error, 'Failed to retrieve messages');
    }
  }

  /**
   * GET /api/messages/:id - Message with its assigned categories
   */
  async getMessage(req: Request, res: Response): Promise<void> {
    try {
      const message = await this.messagesService.getMessage(req.params.id);
      res.json({ message: toMessageView(message) });
    } catch (error) {
      sendError(res, error, 'Failed to retrieve message');
    }
  }

  /**
   * PUT /api/messages/:id - Update a message
   */
  async updateMessage(req: Request, res: Response): Promise<void> {
    try {
      const message = await this.messagesService.updateMessage(req.params.id, req.body);
      res.json({ message: toMessageView(message) });
    } catch (error) {
      sendError(res, error, 'Failed to update message');
    }
  }

  /**
   * DELETE /api/messages/:id - Delete a message and its classification records
   */
  async deleteMessage(req: Request, res: Response): Promise<void> {
    try {
      await this.messagesService.deleteMessage(req.params.id);
      res.status(204).send();
    } catch (error) {
      sendError(res, error, 'Failed to delete message');
    }
  }

  /**
   * POST /api/messages/:id/classify - Classify against all categories
   */
  async classifyMessage(req: Request, res: Response): Promise<void> {
    try {
      const config = validateOrThrow(classifyQuerySchema, req.query, 'classification options');
      const result = await this.classificationService.classifyMessage(req.params.id, config);
      res.json(result);
    } catch (error) {
      sendError(res, error, 'Failed to classify message');
    }
  }
}
