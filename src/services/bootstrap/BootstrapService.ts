import fs from 'fs';
import { Database } from 'sqlite';
import { Category, Message, StrategyConfig } from '../../types/models';
import { clearData } from '../../database/migrations';
import { readJsonlFile } from '../../utils/jsonl';
import { CategoriesService } from '../categories/CategoriesService';
import { MessagesService, PREVIEW_SIZE } from '../messages/MessagesService';
import { ClassificationService, ClassifyAllResult } from '../classification/ClassificationService';

export interface BootstrapOptions {
  /** Message records, as parsed JSONL lines */
  messages?: unknown[];
  categories?: unknown[];
  messagesFile?: string;
  categoriesFile?: string;
  dropExisting?: boolean;
  autoClassify?: boolean;
  strategy?: Partial<StrategyConfig>;
}

export interface BootstrapResult {
  totalCategories: number;
  totalMessages: number;
  /** Imported messages that went through classification */
  totalClassified: number;
  /** Classified messages that matched at least one category */
  totalMatched: number;
  categoriesPreview: Category[];
  messagesPreview: Message[];
}

/**
 * Seeds the store with categories and messages, then optionally classifies the imported messages
 */
export class BootstrapService {
  constructor(
    private db: Database,
    private categoriesService: CategoriesService,
    private messagesService: MessagesService,
    private classificationService: ClassificationService
  ) {}

  async bootstrap(options: BootstrapOptions): Promise<BootstrapResult> {
    const categoryRecords = await this.collect(options.categories, options.categoriesFile);
    const messageRecords = await this.collect(options.messages, options.messagesFile);

    if (options.dropExisting) {
      await clearData(this.db);
      console.log('🔄 Cleared existing messages, categories and classifications');
    }

    const categories = await this.categoriesService.importCategories(categoryRecords);
    const imported = await this.messagesService.importMessages(messageRecords);

    // Without any stored category there is nothing to classify against
    let classification: ClassifyAllResult | undefined;
    if (options.autoClassify && imported.totalImported > 0 && (await this.categoriesService.listCategories()).length > 0) {
      classification = await this.classificationService.classifyMessages(imported.messageIds, options.strategy);
    }

    console.log(`✅ Bootstrap complete: ${categories.length} categories, ${imported.totalImported} messages`);

    return {
      totalCategories: categories.length,
      totalMessages: imported.totalImported,
      totalClassified: classification?.processed ?? 0,
      totalMatched: classification?.matched ?? 0,
      categoriesPreview: categories.slice(0, PREVIEW_SIZE),
      messagesPreview: imported.preview
    };
  }

  /**
   * Inline records win over a file; a missing file contributes nothing
   */
  private async collect(records: unknown[] | undefined, filePath: string | undefined): Promise<unknown[]> {
    if (records) {
      return records;
    }
    if (!filePath) {
      return [];
    }
    if (!fs.existsSync(filePath)) {
      console.warn(`⚠️ Bootstrap file not found, skipping: ${filePath}`);
      return [];
    }
    return readJsonlFile(filePath);
  }
}
