import { Command } from 'commander';
import { StrategyConfig } from '../types/models';
import {
  CategoryUpdateInput, categoryIdSchema, classifyQuerySchema, listQuerySchema, validateOrThrow
} from '../models/validation';
import { errorMessage } from '../models/errors';
import { AppServices } from '../services';

export interface CliContext {
  services: AppServices;
  close(): Promise<void>;
}

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

interface StrategyFlags {
  strategy?: string;
  topN?: string;
  threshold?: string;
}

const consoleIO: CliIO = {
  out: line => console.log(line),
  err: line => console.error(line)
};

function addStrategyOptions(cmd: Command): Command {
  return cmd
    .option('--strategy <name>', 'Classification strategy: embedding or llm')
    .option('--top-n <n>', 'Maximum categories per message (embedding strategy)')
    .option('--threshold <score>', 'Minimum similarity between 0 and 1 (embedding strategy)');
}

function strategyFrom(flags: StrategyFlags): Partial<StrategyConfig> {
  return validateOrThrow(classifyQuerySchema, {
    strategy: flags.strategy,
    topN: flags.topN,
    threshold: flags.threshold
  }, 'classification options');
}

/**
 * Build the `message-categorizer` command tree.
 * Every action opens a context, runs, and closes it; failures print and set exit code 1.
 */
export function createProgram(openContext: () => Promise<CliContext>, io: CliIO = consoleIO): Command {
  const run = <A extends unknown[]>(action: (services: AppServices, ...args: A) => Promise<void>) =>
    async (...args: A): Promise<void> => {
      let context: CliContext | undefined;
      try {
        context = await openContext();
        await action(context.services, ...args);
      } catch (error) {
        io.err(`❌ ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        await context?.close();
      }
    };

  const print = (value: unknown) => io.out(JSON.stringify(value, null, 2));

  const program = new Command()
    .name('message-categorizer')
    .description('Assign user-defined categories to messages with scores and explanations')
    .version('1.0.0');

  addStrategyOptions(
    program
      .command('bootstrap')
      .description('Load categories and messages from JSONL files')
      .option('--messages <file>', 'Messages JSONL file')
      .option('--categories <file>', 'Categories JSONL file')
      .option('--keep-existing', 'Keep existing data instead of clearing it')
      .option('--classify', 'Classify every message after loading')
  ).action(run(async (services, opts: StrategyFlags & {
    messages?: string;
    categories?: string;
    keepExisting?: boolean;
    classify?: boolean;
  }) => {
    const result = await services.bootstrapService.bootstrap({
      messagesFile: opts.messages,
      categoriesFile: opts.categories,
      dropExisting: !opts.keepExisting,
      autoClassify: Boolean(opts.classify),
      strategy: strategyFrom(opts)
    });
    io.out(`✅ Loaded ${result.totalCategories} categories and ${result.totalMessages} messages`);
    if (opts.classify) {
      io.out(`✅ Classified ${result.totalClassified} messages, ${result.totalMatched} matched at least one category`);
    }
  }));

  const messages = program.command('messages').description('Manage messages');

  addStrategyOptions(
    messages
      .command('import <file>')
      .description('Import messages from a JSONL file')
      .option('--drop', 'Delete existing messages first')
      .option('--classify', 'Classify every message after importing')
  ).action(run(async (services, file: string, opts: StrategyFlags & { drop?: boolean; classify?: boolean }) => {
    const result = await services.messagesService.importFromJsonl(file, {
      dropExisting: Boolean(opts.drop),
      autoClassify: Boolean(opts.classify),
      strategy: strategyFrom(opts)
    });
    io.out(`✅ Imported ${result.totalImported} messages`);
    for (const message of result.preview) {
      io.out(`  ${message.id}  ${message.subject}`);
    }
  }));

  messages
    .command('list')
    .description('List messages, newest first')
    .option('--limit <n>', 'Maximum number of messages')
    .option('--offset <n>', 'Number of messages to skip')
    .action(run(async (services, opts: { limit?: string; offset?: string }) => {
      const query = validateOrThrow(listQuerySchema, opts, 'list options');
      const list = await services.messagesService.listMessages(query);
      for (const message of list) {
        const names = message.categories.map(category => category.name).join(', ');
        io.out(`${message.id}  ${message.date ? message.date.toISOString() : '-'}  ${message.subject}` +
          (names ? `  [${names}]` : ''));
      }
    }));

  messages
    .command('show <id>')
    .description('Show a message and its categories')
    .action(run(async (services, id: string) => {
      const { embedding: _embedding, ...message } = await services.messagesService.getMessage(id);
      print(message);
    }));

  addStrategyOptions(
    messages
      .command('classify <id>')
      .description('Classify a message against every category')
  ).action(run(async (services, id: string, opts: StrategyFlags) => {
    const result = await services.classificationService.classifyMessage(id, strategyFrom(opts));
    if (result.classifications.length === 0) {
      io.out(`No categories matched message ${id}`);
      return;
    }
    for (const entry of result.classifications) {
      io.out(`${entry.categoryName}  ${entry.score.toFixed(4)}  ${entry.explanation}`);
    }
  }));

  addStrategyOptions(
    messages
      .command('classify-all')
      .description('Classify every stored message')
  ).action(run(async (services, opts: StrategyFlags) => {
    const result = await services.classificationService.classifyAll(strategyFrom(opts));
    io.out(`✅ Classified ${result.processed} messages, ${result.matched} matched at least one category`);
  }));

  messages
    .command('delete <id>')
    .description('Delete a message')
    .action(run(async (services, id: string) => {
      await services.messagesService.deleteMessage(id);
      io.out(`✅ Deleted message ${id}`);
    }));

  const categories = program.command('categories').description('Manage categories');

  categories
    .command('add <name> <description>')
    .description('Create a category')
    .action(run(async (services, name: string, description: string) => {
      const category = await services.categoriesService.createCategory(name, description);
      io.out(`✅ Created category ${category.id}: ${category.name}`);
    }));

  categories
    .command('list')
    .description('List categories')
    .action(run(async (services) => {
      const list = await services.categoriesService.listCategories();
      for (const category of list) {
        io.out(`${category.id}  ${category.name}  ${category.description}`);
      }
    }));

  categories
    .command('get <id>')
    .description('Show a category')
    .action(run(async (services, id: string) => {
      const { id: categoryId } = validateOrThrow(categoryIdSchema, { id }, 'category id');
      const category = await services.categoriesService.getCategory(categoryId);
      io.out(`${category.id}  ${category.name}  ${category.description}`);
    }));

  categories
    .command('update <id>')
    .description('Rename or re-describe a category')
    .option('--name <name>', 'New name')
    .option('--description <text>', 'New description')
    .action(run(async (services, id: string, opts: { name?: string; description?: string }) => {
      const { id: categoryId } = validateOrThrow(categoryIdSchema, { id }, 'category id');
      const patch: CategoryUpdateInput = {};
      if (opts.name !== undefined) patch.name = opts.name;
      if (opts.description !== undefined) patch.description = opts.description;

      const category = await services.categoriesService.updateCategory(categoryId, patch);
      io.out(`✅ Updated category ${category.id}: ${category.name}  ${category.description}`);
    }));

  categories
    .command('delete <id>')
    .description('Delete a category')
    .action(run(async (services, id: string) => {
      const { id: categoryId } = validateOrThrow(categoryIdSchema, { id }, 'category id');
      await services.categoriesService.deleteCategory(categoryId);
      io.out(`✅ Deleted category ${categoryId}`);
    }));

  return program;
}
