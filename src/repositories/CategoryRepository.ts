import { Database } from 'sqlite';
import { Category, CategoryRow } from '../types/models';
import { categoryRowToModel, encodeEmbedding } from '../models/transformers';
import { ConflictError } from '../models/errors';
import { runExclusive } from '../config/database';
import { isUniqueViolation } from './sqliteErrors';

/**
 * CategoryRepository handles CRUD operations for categories in SQLite.
 * Names are unique; a duplicate insert or rename raises ConflictError and changes nothing.
 */
export class CategoryRepository {
  constructor(private db: Database) {}

  async create(name: string, description: string, embedding?: number[]): Promise<Category> {
    try {
      const result = await runExclusive(this.db, db => db.run(
        'INSERT INTO categories (name, description, embedding) VALUES (?, ?, ?)',
        [name, description, encodeEmbedding(embedding)]
      ));
      if (result.lastID === undefined) {
        throw new Error('SQLite did not report an id for the new category');
      }
      return { id: result.lastID, name, description, embedding };
    } catch (error) {
      if (isUniqueViolation(error, 'categories.name')) {
        throw new ConflictError(`Category with name '${name}' already exists`);
      }
      console.error('❌ Failed to create category:', error);
      throw error;
    }
  }

  async getById(categoryId: number): Promise<Category | null> {
    try {
      const row = await this.db.get<CategoryRow>('SELECT * FROM categories WHERE id = ?', [categoryId]);
      return row ? categoryRowToModel(row) : null;
    } catch (error) {
      console.error('❌ Failed to get category by ID:', error);
      throw error;
    }
  }

  async getByName(name: string): Promise<Category | null> {
    const row = await this.db.get<CategoryRow>('SELECT * FROM categories WHERE name = ?', [name]);
    return row ? categoryRowToModel(row) : null;
  }

  /**
   * All categories ordered by id, the order strategies receive them in
   */
  async getAll(): Promise<Category[]> {
    try {
      const rows = await this.db.all<CategoryRow[]>('SELECT * FROM categories ORDER BY id ASC');
      return rows.map(row => categoryRowToModel(row));
    } catch (error) {
      console.error('❌ Failed to list categories:', error);
      throw error;
    }
  }

  async update(category: Category): Promise<void> {
    try {
      await runExclusive(this.db, db => db.run(
        'UPDATE categories SET name = ?, description = ?, embedding = ? WHERE id = ?',
        [category.name, category.description, encodeEmbedding(category.embedding), category.id]
      ));
    } catch (error) {
      if (isUniqueViolation(error, 'categories.name')) {
        throw new ConflictError(`Category with name '${category.name}' already exists`);
      }
      console.error('❌ Failed to update category:', error);
      throw error;
    }
  }

  async updateEmbedding(categoryId: number, embedding: number[]): Promise<void> {
    try {
      await runExclusive(this.db, db =>
        db.run('UPDATE categories SET embedding = ? WHERE id = ?', [encodeEmbedding(embedding), categoryId])
      );
    } catch (error) {
      console.error('❌ Failed to update category embedding:', error);
      throw error;
    }
  }

  /**
   * Delete category by ID; classification records cascade
   */
  async delete(categoryId: number): Promise<boolean> {
    try {
      const result = await runExclusive(this.db, db => db.run('DELETE FROM categories WHERE id = ?', [categoryId]));
      return (result.changes ?? 0) > 0;
    } catch (error) {
      console.error('❌ Failed to delete category:', error);
      throw error;
    }
  }

  async count(): Promise<number> {
    const row = await this.db.get<{ count: number }>('SELECT COUNT(*) as count FROM categories');
    return row?.count || 0;
  }
}
