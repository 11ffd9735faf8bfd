import { ValidationError } from '../../models/errors';

const HTML_TAG_PATTERN = /<\/?(html|head|body|div|p|br|span|table|tr|td|a|img|h[1-6]|ul|ol|li|strong|em|b|i)\b[^>]*>/i;
const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * MessageParser normalizes message bodies to plain text
 */
export class MessageParser {
  /**
   * Decode (when base64) and strip HTML so the stored body is plain text
   */
  parseContent(content: string, isBase64: boolean): string {
    const decoded = isBase64 ? this.decodeBase64(content) : content;
    return decoded && this.isHtml(decoded) ? this.stripHtml(decoded) : decoded;
  }

  isHtml(content: string): boolean {
    return HTML_TAG_PATTERN.test(content);
  }

  /**
   * Strips HTML tags from content to get plain text
   */
  stripHtml(html: string): string {
    return html
      .replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, '') // Drop script and style bodies
      .replace(/<\/?(h[1-6]|p|div|br|li|tr)[^>]*>/gi, ' ') // Add space for block elements
      .replace(/<[^>]*>/g, '') // Remove HTML tags
      .replace(/&nbsp;/g, ' ')
      .replace(/&lt;/g, '<')
      .replace(/&gt;/g, '>')
      .replace(/&quot;/g, '"')
      .replace(/&#39;/g, "'")
      .replace(/&amp;/g, '&')
      .replace(/\s+/g, ' ') // Normalize whitespace
      .trim();
  }

  /**
   * Decode standard or url-safe base64 into UTF-8 text
   */
  decodeBase64(data: string): string {
    const base64 = data.replace(/\s+/g, '').replace(/-/g, '+').replace(/_/g, '/');
    const padded = base64 + '='.repeat((4 - base64.length % 4) % 4);

    if (base64.length % 4 === 1 || !BASE64_PATTERN.test(padded)) {
      throw new ValidationError('Message body is not valid base64');
    }

    return Buffer.from(padded, 'base64').toString('utf-8');
  }

  /**
   * Parse an ISO-8601 timestamp
   */
  parseDate(value: string): Date {
    const date = new Date(value);
    if (isNaN(date.getTime())) {
      throw new ValidationError(`Invalid date: ${value}`);
    }
    return date;
  }
}
