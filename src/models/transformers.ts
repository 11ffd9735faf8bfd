import {
  Message, Category, ClassificationRecord,
  MessageRow, CategoryRow, ClassificationRecordRow
} from '../types/models';
import { DataIntegrityError } from './errors';

/**
 * Transformation functions between database rows and model objects
 */

// Embedding transformations
export function encodeEmbedding(embedding: number[] | undefined): string | null {
  return embedding ? JSON.stringify(embedding) : null;
}

export function decodeEmbedding(raw: string | null, owner: string): number[] | undefined {
  if (raw === null || raw === '') {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new DataIntegrityError(`Stored embedding for ${owner} is not valid JSON`);
  }

  if (!Array.isArray(parsed) || parsed.length === 0) {
    throw new DataIntegrityError(`Stored embedding for ${owner} is not a non-empty array`);
  }

  const vector: number[] = [];
  for (const value of parsed) {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new DataIntegrityError(`Stored embedding for ${owner} contains a non-numeric value`);
    }
    vector.push(value);
  }
  return vector;
}

function decodeRecipients(raw: string, messageId: string): string[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new DataIntegrityError(`Stored recipients for message ${messageId} are not valid JSON`);
  }
  if (!Array.isArray(parsed)) {
    throw new DataIntegrityError(`Stored recipients for message ${messageId} are not an array`);
  }
  return parsed.map(String);
}

// Message transformations
export function messageRowToModel(row: MessageRow): Message {
  return {
    id: row.id,
    subject: row.subject,
    sender: row.sender,
    recipients: decodeRecipients(row.recipients, row.id),
    snippet: row.snippet ?? undefined,
    body: row.body ?? undefined,
    date: row.date ? new Date(row.date) : undefined,
    embedding: decodeEmbedding(row.embedding, `message ${row.id}`)
  };
}

export function messageModelToRow(message: Message): MessageRow {
  return {
    id: message.id,
    subject: message.subject,
    sender: message.sender,
    recipients: JSON.stringify(message.recipients),
    snippet: message.snippet ?? null,
    body: message.body ?? null,
    date: message.date ? message.date.toISOString() : null,
    embedding: encodeEmbedding(message.embedding)
  };
}

// Category transformations
export function categoryRowToModel(row: CategoryRow): Category {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    embedding: decodeEmbedding(row.embedding, `category ${row.id}`)
  };
}

// Classification record transformations
export function classificationRecordRowToModel(row: ClassificationRecordRow): ClassificationRecord {
  return {
    messageId: row.message_id,
    categoryId: row.category_id,
    score: row.score,
    explanation: row.explanation,
    classifiedAt: new Date(row.classified_at)
  };
}
