import { Request, Response } from 'express';
import { Category } from '../types/models';
import { categoryIdSchema, validateOrThrow } from '../models/validation';
import { CategoriesService } from '../services/categories/CategoriesService';
import { sendError } from '../middleware/errorHandler';

export type CategoryView = Omit<Category, 'embedding'>;

export function toCategoryView(category: Category): CategoryView {
  return { id: category.id, name: category.name, description: category.description };
}

/**
 * CategoriesController handles HTTP requests for category management
 */
export class CategoriesController {
  constructor(private categoriesService: CategoriesService) {}

  /**
   * POST /api/categories - Create a category
   */
  async createCategory(req: Request, res: Response): Promise<void> {
    try {
      const { name, description } = req.body ?? {};
      const category = await this.categoriesService.createCategory(name, description);
      res.status(201).json({ category: toCategoryView(category) });
    } catch (error) {
      sendError(res, error, 'Failed to create category');
    }
  }

  /**
   * GET /api/categories - List all categories
   */
  async listCategories(req: Request, res: Response): Promise<void> {
    try {
      const categories = await this.categoriesService.listCategories();
      res.json({ categories: categories.map(toCategoryView) });
    } catch (error) {
      sendError(res, error, 'Failed to retrieve categories');
    }
  }

  /**
   * GET /api/categories/:id
   */
  async getCategory(req: Request, res: Response): Promise<void> {
    try {
      const { id } = validateOrThrow(categoryIdSchema, req.params, 'category id');
      const category = await this.categoriesService.getCategory(id);
      res.json({ category: toCategoryView(category) });
    } catch (error) {
      sendError(res, error, 'Failed to retrieve category');
    }
  }

  /**
   * PUT /api/categories/:id - Rename or re-describe a category
   */
  async updateCategory(req: Request, res: Response): Promise<void> {
    try {
      const { id } = validateOrThrow(categoryIdSchema, req.params, 'category id');
      const category = await this.categoriesService.updateCategory(id, req.body ?? {});
      res.json({ category: toCategoryView(category) });
    } catch (error) {
      sendError(res, error, 'Failed to update category');
    }
  }

  /**
   * DELETE /api/categories/:id - Delete a category and its classification records
   */
  async deleteCategory(req: Request, res: Response): Promise<void> {
    try {
      const { id } = validateOrThrow(categoryIdSchema, req.params, 'category id');
      await this.categoriesService.deleteCategory(id);
      res.status(204).send();
    } catch (error) {
      sendError(res, error, 'Failed to delete category');
    }
  }

  /**
   * GET /api/categories/:id/messages - Messages assigned to a category
   */
  async listCategoryMessages(req: Request, res: Response): Promise<void> {
    try {
      const { id } = validateOrThrow(categoryIdSchema, req.params, 'category id');
      const messages = await this.categoriesService.listCategoryMessages(id);
      res.json({ categoryId: id, messages });
    } catch (error) {
      sendError(res, error, 'Failed to retrieve category messages');
    }
  }
}
