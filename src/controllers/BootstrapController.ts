import { Request, Response } from 'express';
import { bootstrapRequestSchema, validateOrThrow } from '../models/validation';
import { BootstrapService } from '../services/bootstrap/BootstrapService';
import { sendError } from '../middleware/errorHandler';
import { toCategoryView } from './CategoriesController';
import { toMessageView } from './MessagesController';

/**
 * BootstrapController seeds the store from JSONL records sent as JSON arrays
 */
export class BootstrapController {
  constructor(private bootstrapService: BootstrapService) {}

  /**
   * POST /api/bootstrap
   */
  async bootstrap(req: Request, res: Response): Promise<void> {
    try {
      const request = validateOrThrow(bootstrapRequestSchema, req.body ?? {}, 'bootstrap request');

      const result = await this.bootstrapService.bootstrap({
        messages: request.messages ?? [],
        categories: request.categories ?? [],
        dropExisting: request.dropExisting,
        autoClassify: request.autoClassify,
        strategy: {
          strategy: request.strategy,
          topN: request.topN,
          threshold: request.threshold
        }
      });

      res.status(201).json({
        ...result,
        categoriesPreview: result.categoriesPreview.map(toCategoryView),
        messagesPreview: result.messagesPreview.map(message => toMessageView(message))
      });
    } catch (error) {
      sendError(res, error, 'Bootstrap failed');
    }
  }
}
