import { Database } from 'sqlite';
import { Message, MessageRow } from '../types/models';
import { messageModelToRow, messageRowToModel, encodeEmbedding } from '../models/transformers';
import { ConflictError } from '../models/errors';
import { runExclusive, withTransaction } from '../config/database';
import { isUniqueViolation } from './sqliteErrors';

const INSERT_MESSAGE_SQL = `
  INSERT INTO messages (
    id, subject, sender, recipients, snippet, body, date, embedding
  ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
`;

/**
 * MessageRepository handles CRUD operations for messages in SQLite
 */
export class MessageRepository {
  constructor(private db: Database) {}

  private rowParams(row: MessageRow): Array<string | null> {
    return [row.id, row.subject, row.sender, row.recipients, row.snippet, row.body, row.date, row.embedding];
  }

  /**
   * Create a new message record
   */
  async create(message: Message): Promise<void> {
    try {
      const params = this.rowParams(messageModelToRow(message));
      await runExclusive(this.db, db => db.run(INSERT_MESSAGE_SQL, params));
    } catch (error) {
      if (isUniqueViolation(error, 'messages.id')) {
        throw new ConflictError(`Message with id '${message.id}' already exists`);
      }
      console.error('❌ Failed to create message:', error);
      throw error;
    }
  }

  /**
   * Batch create messages in one transaction
   */
  async batchCreate(messages: Message[]): Promise<void> {
    if (messages.length === 0) return;

    try {
      await withTransaction(this.db, async (db) => {
        const stmt = await db.prepare(INSERT_MESSAGE_SQL);
        try {
          for (const message of messages) {
            await stmt.run(this.rowParams(messageModelToRow(message)));
          }
        } finally {
          await stmt.finalize();
        }
      });
    } catch (error) {
      if (isUniqueViolation(error, 'messages.id')) {
        throw new ConflictError('Batch contains a message id that already exists');
      }
      console.error('❌ Failed to batch create messages:', error);
      throw error;
    }
  }

  /**
   * Get message by ID
   */
  async getById(messageId: string): Promise<Message | null> {
    try {
      const row = await this.db.get<MessageRow>('SELECT * FROM messages WHERE id = ?', [messageId]);
      return row ? messageRowToModel(row) : null;
    } catch (error) {
      console.error('❌ Failed to get message by ID:', error);
      throw error;
    }
  }

  /**
   * List messages, newest first, with optional pagination
   */
  async getAll(options: { limit?: number; offset?: number } = {}): Promise<Message[]> {
    let query = 'SELECT * FROM messages ORDER BY date DESC, id ASC';
    const params: number[] = [];

    if (options.limit !== undefined) {
      query += ' LIMIT ?';
      params.push(options.limit);
      if (options.offset !== undefined) {
        query += ' OFFSET ?';
        params.push(options.offset);
      }
    } else if (options.offset !== undefined) {
      query += ' LIMIT -1 OFFSET ?';
      params.push(options.offset);
    }

    try {
      const rows = await this.db.all<MessageRow[]>(query, params);
      return rows.map(row => messageRowToModel(row));
    } catch (error) {
      console.error('❌ Failed to list messages:', error);
      throw error;
    }
  }

  /**
   * Get all message IDs in insertion order
   */
  async getAllIds(): Promise<string[]> {
    const rows = await this.db.all<Array<{ id: string }>>('SELECT id FROM messages ORDER BY rowid ASC');
    return rows.map(row => row.id);
  }

  /**
   * Update message record
   */
  async update(message: Message): Promise<void> {
    const row = messageModelToRow(message);

    try {
      await runExclusive(this.db, db => db.run(`
        UPDATE messages SET
          subject = ?, sender = ?, recipients = ?, snippet = ?, body = ?, date = ?, embedding = ?
        WHERE id = ?
      `, [row.subject, row.sender, row.recipients, row.snippet, row.body, row.date, row.embedding, row.id]));
    } catch (error) {
      console.error('❌ Failed to update message:', error);
      throw error;
    }
  }

  /**
   * Store a computed embedding on the message
   */
  async updateEmbedding(messageId: string, embedding: number[]): Promise<void> {
    try {
      await runExclusive(this.db, db =>
        db.run('UPDATE messages SET embedding = ? WHERE id = ?', [encodeEmbedding(embedding), messageId])
      );
    } catch (error) {
      console.error('❌ Failed to update message embedding:', error);
      throw error;
    }
  }

  /**
   * Delete message by ID; classification records cascade
   */
  async delete(messageId: string): Promise<boolean> {
    try {
      const result = await runExclusive(this.db, db => db.run('DELETE FROM messages WHERE id = ?', [messageId]));
      return (result.changes ?? 0) > 0;
    } catch (error) {
      console.error('❌ Failed to delete message:', error);
      throw error;
    }
  }

  /**
   * Delete every message; classification records cascade
   */
  async deleteAll(): Promise<number> {
    try {
      const result = await runExclusive(this.db, db => db.run('DELETE FROM messages'));
      return result.changes ?? 0;
    } catch (error) {
      console.error('❌ Failed to delete messages:', error);
      throw error;
    }
  }

  async count(): Promise<number> {
    const row = await this.db.get<{ count: number }>('SELECT COUNT(*) as count FROM messages');
    return row?.count || 0;
  }
}
