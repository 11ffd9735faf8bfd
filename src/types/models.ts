/**
 * Core data models for the message categorization system
 */

export interface Message {
  id: string;
  subject: string;
  sender: string;
  recipients: string[];
  snippet?: string; // Short preview text
  body?: string; // Plain text, already normalized
  date?: Date;
  embedding?: number[];
}

export interface Category {
  id: number;
  name: string; // Unique
  description: string;
  embedding?: number[];
}

/**
 * In-memory per-category decision produced by a strategy
 */
export interface Judgment {
  category: Category;
  isInCategory: boolean;
  score: number; // 0..1
  explanation: string;
}

/**
 * Persisted outcome of a matching judgment, unique on (messageId, categoryId)
 */
export interface ClassificationRecord {
  messageId: string;
  categoryId: number;
  score: number;
  explanation: string;
  classifiedAt: Date;
}

export type StrategyName = 'embedding' | 'llm';

export interface StrategyConfig {
  strategy: StrategyName;
  topN?: number; // Similarity only; unrestricted when absent
  threshold?: number; // Similarity only
}

export type StaleRecordPolicy = 'retain' | 'prune';

export interface CategoryClassification {
  categoryId: number;
  categoryName: string;
  score: number;
  isInCategory: boolean;
  explanation: string;
}

export interface ClassifyResponse {
  messageId: string;
  classifications: CategoryClassification[];
}

/**
 * A category assigned to a message, as shown in message listings
 */
export interface MessageCategoryAssignment {
  categoryId: number;
  name: string;
  description: string;
  score: number;
  explanation: string;
  classifiedAt: Date;
}

export interface MessageWithCategories extends Message {
  categories: MessageCategoryAssignment[];
}

/**
 * A message assigned to a category, as shown in category listings
 */
export interface CategoryMessageAssignment {
  messageId: string;
  subject: string;
  sender: string;
  score: number;
  explanation: string;
  classifiedAt: Date;
}

// Database row interfaces (for SQLite storage)
export interface MessageRow {
  id: string;
  subject: string;
  sender: string;
  recipients: string; // JSON string array
  snippet: string | null;
  body: string | null;
  date: string | null;
  embedding: string | null; // JSON number array
}

export interface CategoryRow {
  id: number;
  name: string;
  description: string;
  embedding: string | null; // JSON number array
}

export interface ClassificationRecordRow {
  message_id: string;
  category_id: number;
  score: number;
  explanation: string;
  classified_at: string;
}
