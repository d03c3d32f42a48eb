import { Command } from 'commander';
import { loadConfig } from '../../config/loader';
import { createOllamaClient, createRetrievalIndex } from '../../orchestrator/runtime';
import type { RetrievalIndex } from '../../retrieval/retrieval-index';
import { RETRIEVAL_CATEGORIES } from '../../retrieval/types';
import { CLIWorkflowLogger } from '../cli-logger';
import { formatHits, formatInfo, formatSuccess } from '../formatters';
import type { AddCommandOptions, SearchCommandOptions } from '../types';
import { ValidationError, parseCategory, parsePositiveInt, parseTags } from '../validators/options';
import { isVerbose, reportFailure } from './shared';

function openIndex(program: Command): { index: RetrievalIndex; knowledgeDir: string } {
  const config = loadConfig();
  const logger = new CLIWorkflowLogger(isVerbose(program));
  const client = createOllamaClient(config, logger);
  return { index: createRetrievalIndex(config, client, logger), knowledgeDir: config.retrieval.knowledge_dir };
}

export function registerRetrievalCommand(program: Command): void {
  const retrieval = program.command('retrieval').description('Inspect and extend the example index');

  retrieval
    .command('search <query...>')
    .description('Find the examples most similar to a query')
    .option('--category <name>', `One of ${RETRIEVAL_CATEGORIES.join(', ')}`)
    .option('--top-k <n>', 'Number of results')
    .option('--json', 'Output as JSON', false)
    .action(async (words: string[], options: SearchCommandOptions) => {
      try {
        const { index } = openIndex(program);
        const hits = await index.search(words.join(' '), parseCategory(options.category), parsePositiveInt(options.topK, '--top-k'));
        console.log(options.json ? JSON.stringify(hits, null, 2) : formatHits(hits));
      } catch (err) {
        reportFailure(err);
      }
    });

  retrieval
    .command('add <text...>')
    .description('Add one example to the index')
    .requiredOption('--category <name>', `One of ${RETRIEVAL_CATEGORIES.join(', ')}`)
    .option('--id <id>', 'Example id (defaults to user_<timestamp>)')
    .option('--type <type>', 'Example type', 'user')
    .option('--tags <list>', 'Comma-separated tags')
    .action(async (words: string[], options: AddCommandOptions) => {
      try {
        const category = parseCategory(options.category);
        if (!category) throw new ValidationError('--category is required');
        const { index } = openIndex(program);
        const id = options.id ?? `user_${Date.now()}`;
        await index.add(words.join(' '), { id, category, type: options.type ?? 'user', tags: parseTags(options.tags) });
        console.log(formatSuccess(`Added ${category}/${id}`));
      } catch (err) {
        reportFailure(err);
      }
    });

  retrieval
    .command('seed')
    .description('Load the bundled examples into the index')
    .option('--force', 'Re-embed even when the index already has records', false)
    .action(async (options: { force?: boolean }) => {
      try {
        const { index, knowledgeDir } = openIndex(program);
        const added = await index.seed(knowledgeDir, { force: options.force === true });
        console.log(added ? formatSuccess(`Seeded ${added} examples from ${knowledgeDir}`) : formatInfo('Index already populated; use --force to re-seed.'));
      } catch (err) {
        reportFailure(err);
      }
    });

  retrieval
    .command('info')
    .description('Show index statistics')
    .option('--json', 'Output as JSON', false)
    .action(async (options: { json?: boolean }) => {
      try {
        const { index } = openIndex(program);
        const info = await index.info();
        if (options.json) {
          console.log(JSON.stringify(info, null, 2));
          return;
        }
        console.log(formatSuccess('Retrieval index'));
        console.log(formatInfo(`documents: ${info.totalDocuments}`));
        for (const category of RETRIEVAL_CATEGORIES) {
          console.log(formatInfo(`  ${category}: ${info.categories[category]}`));
        }
      } catch (err) {
        reportFailure(err);
      }
    });
}
