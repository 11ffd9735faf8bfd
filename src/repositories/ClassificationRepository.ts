import { Database } from 'sqlite';
import {
  ClassificationRecord, ClassificationRecordRow, Judgment,
  MessageCategoryAssignment, CategoryMessageAssignment
} from '../types/models';
import { classificationRecordRowToModel } from '../models/transformers';
import { DataIntegrityError } from '../models/errors';
import { validateConfidenceScore } from '../models/validation';
import { withTransaction } from '../config/database';

const UPSERT_RECORD_SQL = `
  INSERT INTO message_categories (message_id, category_id, score, explanation, classified_at)
  VALUES (?, ?, ?, ?, ?)
  ON CONFLICT (message_id, category_id) DO UPDATE SET
    score = excluded.score,
    explanation = excluded.explanation,
    classified_at = excluded.classified_at
`;

interface MessageAssignmentRow extends ClassificationRecordRow {
  name: string;
  description: string;
}

interface CategoryAssignmentRow extends ClassificationRecordRow {
  subject: string;
  sender: string;
}

/**
 * Classification result store.
 *
 * One record per (message, category) pair. Every write for a classification
 * run happens inside a single transaction, so a run either lands completely
 * or not at all.
 */
export class ClassificationRepository {
  constructor(private db: Database) {}

  /**
   * Insert or overwrite a record for every judgment
   */
  async upsertMany(messageId: string, judgments: Judgment[], classifiedAt: Date): Promise<void> {
    if (judgments.length === 0) return;
    this.assertScores(judgments);

    try {
      await withTransaction(this.db, async (db) => {
        await this.writeRecords(db, messageId, judgments, classifiedAt);
      });
    } catch (error) {
      console.error(`❌ Failed to store classification records for message ${messageId}:`, error);
      throw error;
    }
  }

  /**
   * Upsert matching judgments and delete records for evaluated categories
   * that no longer match, in one transaction
   */
  async replaceForMessage(
    messageId: string,
    judgments: Judgment[],
    evaluatedCategoryIds: number[],
    classifiedAt: Date
  ): Promise<number> {
    this.assertScores(judgments);
    const matched = new Set(judgments.map(j => j.category.id));
    const stale = evaluatedCategoryIds.filter(id => !matched.has(id));

    try {
      return await withTransaction(this.db, async (db) => {
        await this.writeRecords(db, messageId, judgments, classifiedAt);

        if (stale.length === 0) return 0;
        const placeholders = stale.map(() => '?').join(',');
        const result = await db.run(
          `DELETE FROM message_categories WHERE message_id = ? AND category_id IN (${placeholders})`,
          [messageId, ...stale]
        );
        return result.changes ?? 0;
      });
    } catch (error) {
      console.error(`❌ Failed to replace classification records for message ${messageId}:`, error);
      throw error;
    }
  }

  async getRecordsForMessage(messageId: string): Promise<ClassificationRecord[]> {
    const rows = await this.db.all<ClassificationRecordRow[]>(
      'SELECT * FROM message_categories WHERE message_id = ? ORDER BY score DESC, category_id ASC',
      [messageId]
    );
    return rows.map(row => classificationRecordRowToModel(row));
  }

  /**
   * Categories assigned to a message, highest score first
   */
  async getForMessage(messageId: string): Promise<MessageCategoryAssignment[]> {
    try {
      const rows = await this.db.all<MessageAssignmentRow[]>(`
        SELECT mc.*, c.name, c.description
        FROM message_categories mc
        JOIN categories c ON c.id = mc.category_id
        WHERE mc.message_id = ?
        ORDER BY mc.score DESC, mc.category_id ASC
      `, [messageId]);

      return rows.map(row => ({
        categoryId: row.category_id,
        name: row.name,
        description: row.description,
        score: row.score,
        explanation: row.explanation,
        classifiedAt: new Date(row.classified_at)
      }));
    } catch (error) {
      console.error('❌ Failed to get categories for message:', error);
      throw error;
    }
  }

  /**
   * Messages assigned to a category, highest score first
   */
  async getForCategory(categoryId: number): Promise<CategoryMessageAssignment[]> {
    try {
      const rows = await this.db.all<CategoryAssignmentRow[]>(`
        SELECT mc.*, m.subject, m.sender
        FROM message_categories mc
        JOIN messages m ON m.id = mc.message_id
        WHERE mc.category_id = ?
        ORDER BY mc.score DESC, mc.message_id ASC
      `, [categoryId]);

      return rows.map(row => ({
        messageId: row.message_id,
        subject: row.subject,
        sender: row.sender,
        score: row.score,
        explanation: row.explanation,
        classifiedAt: new Date(row.classified_at)
      }));
    } catch (error) {
      console.error('❌ Failed to get messages for category:', error);
      throw error;
    }
  }

  async countForMessage(messageId: string): Promise<number> {
    const row = await this.db.get<{ count: number }>(
      'SELECT COUNT(*) as count FROM message_categories WHERE message_id = ?',
      [messageId]
    );
    return row?.count || 0;
  }

  async count(): Promise<number> {
    const row = await this.db.get<{ count: number }>('SELECT COUNT(*) as count FROM message_categories');
    return row?.count || 0;
  }

  private async writeRecords(db: Database, messageId: string, judgments: Judgment[], classifiedAt: Date): Promise<void> {
    const timestamp = classifiedAt.toISOString();
    for (const judgment of judgments) {
      await db.run(UPSERT_RECORD_SQL, [
        messageId,
        judgment.category.id,
        judgment.score,
        judgment.explanation,
        timestamp
      ]);
    }
  }

  private assertScores(judgments: Judgment[]): void {
    const invalid = judgments.find(j => !validateConfidenceScore(j.score));
    if (invalid) {
      throw new DataIntegrityError(
        `Score ${invalid.score} for category ${invalid.category.id} is outside [0, 1]`
      );
    }
  }
}
