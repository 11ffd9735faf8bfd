import { Category, Message } from '../../types/models';

export const MAX_BODY_CHARS = 4000;
const TRUNCATION_MARKER = ' ...(truncated)';

/**
 * Canonical text for a message. Labeled lines in a fixed order; absent
 * optional fields are left out.
 */
export function buildMessageText(message: Message): string {
  const lines = [
    `Subject: ${message.subject}`,
    `From: ${message.sender}`
  ];

  if (message.recipients.length > 0) {
    lines.push(`To: ${message.recipients.join(', ')}`);
  }
  if (message.date) {
    lines.push(`Date: ${message.date.toISOString()}`);
  }
  if (message.snippet) {
    lines.push(`Preview: ${message.snippet}`);
  }
  if (message.body) {
    const body = message.body.length > MAX_BODY_CHARS
      ? message.body.substring(0, MAX_BODY_CHARS) + TRUNCATION_MARKER
      : message.body;
    lines.push(`Body: ${body}`);
  }

  return lines.join('\n');
}

export function buildCategoryText(category: Pick<Category, 'name' | 'description'>): string {
  return `Category: ${category.name}\nDescription: ${category.description}`;
}

/**
 * Category text prefixed with its prompt index, e.g. `[0] Category: ...`
 */
export function buildIndexedCategoryBlock(index: number, category: Pick<Category, 'name' | 'description'>): string {
  return `[${index}] ${buildCategoryText(category)}`;
}
