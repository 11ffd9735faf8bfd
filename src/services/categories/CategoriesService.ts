import { Category, CategoryMessageAssignment } from '../../types/models';
import { ConflictError, NotFoundError } from '../../models/errors';
import {
  CategoryUpdateInput, categoryCreateSchema, categoryUpdateSchema, categoryJsonlSchema, validateOrThrow
} from '../../models/validation';
import { CategoryRepository } from '../../repositories/CategoryRepository';
import { ClassificationRepository } from '../../repositories/ClassificationRepository';
import { EmbeddingService } from '../embedding/EmbeddingService';
import { readJsonlFile } from '../../utils/jsonl';

/**
 * CategoriesService manages user-defined categories and their embeddings
 */
export class CategoriesService {
  constructor(
    private categoryRepository: CategoryRepository,
    private classificationRepository: ClassificationRepository,
    private embeddingService: EmbeddingService
  ) {}

  /**
   * Embed and store a new category. Names are unique.
   */
  async createCategory(name: string, description: string): Promise<Category> {
    const input = validateOrThrow(categoryCreateSchema, { name, description }, 'category');

    if (await this.categoryRepository.getByName(input.name)) {
      throw new ConflictError(`Category with name '${input.name}' already exists`);
    }

    const embedding = await this.embeddingService.embedCategoryText(input);
    const category = await this.categoryRepository.create(input.name, input.description, embedding);
    console.log(`✅ Created category '${category.name}' (${category.id})`);
    return category;
  }

  async getCategory(categoryId: number): Promise<Category> {
    const category = await this.categoryRepository.getById(categoryId);
    if (!category) {
      throw new NotFoundError('category', categoryId);
    }
    return category;
  }

  listCategories(): Promise<Category[]> {
    return this.categoryRepository.getAll();
  }

  /**
   * Rename or re-describe a category and re-embed it
   */
  async updateCategory(categoryId: number, patch: CategoryUpdateInput): Promise<Category> {
    const input = validateOrThrow(categoryUpdateSchema, patch, 'category update');
    const existing = await this.getCategory(categoryId);

    if (input.name !== undefined && input.name !== existing.name) {
      const clash = await this.categoryRepository.getByName(input.name);
      if (clash) {
        throw new ConflictError(`Category with name '${input.name}' already exists`);
      }
    }

    const updated: Category = {
      id: existing.id,
      name: input.name ?? existing.name,
      description: input.description ?? existing.description
    };
    updated.embedding = await this.embeddingService.embedCategoryText(updated);

    await this.categoryRepository.update(updated);
    return updated;
  }

  /**
   * Delete a category; its classification records go with it
   */
  async deleteCategory(categoryId: number): Promise<void> {
    const deleted = await this.categoryRepository.delete(categoryId);
    if (!deleted) {
      throw new NotFoundError('category', categoryId);
    }
  }

  async listCategoryMessages(categoryId: number): Promise<CategoryMessageAssignment[]> {
    await this.getCategory(categoryId);
    return this.classificationRepository.getForCategory(categoryId);
  }

  async importFromJsonl(filePath: string): Promise<Category[]> {
    const records = await readJsonlFile(filePath);
    return this.importCategories(records);
  }

  /**
   * Create one category per `{ name, description }` record, in order
   */
  async importCategories(records: unknown[]): Promise<Category[]> {
    const inputs = records.map((record, index) =>
      validateOrThrow(categoryJsonlSchema, record, `category on line ${index + 1}`)
    );

    const created: Category[] = [];
    for (const input of inputs) {
      created.push(await this.createCategory(input.name, input.description));
    }
    console.log(`✅ Imported ${created.length} categories`);
    return created;
  }
}
