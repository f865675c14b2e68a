#!/usr/bin/env npx tsx

import { Command, InvalidArgumentError } from 'commander';
import ora from 'ora';
import type { SupportAgentSettings } from '../src/config';
import {
  ConfigManager,
  DEFAULT_CONFIG_PATH,
  isSettingKey,
} from '../src/ConfigManager';
import { Crawler } from '../src/crawler/Crawler';
import { createFetcher } from '../src/crawler/fetchers';
import { errorMessage } from '../src/errors';
import { FeedbackCollector } from '../src/FeedbackCollector';
import { openKnowledgeBase } from '../src/KnowledgeBase';
import { OllamaChatClient } from '../src/OllamaChatClient';
import { loadPdfDocument, processPdfDirectory } from '../src/pdfExtractor';
import { SupportAgent } from '../src/SupportAgent';
import { formatDuration } from '../src/utils';
import { createComponentLogger } from '../src/WithLogging';

interface GlobalOptions {
  config: string;
}

interface CrawlCommandOptions {
  maxPages?: number;
  domain: string[];
  strategy?: SupportAgentSettings['fetchStrategy'];
  delay?: number;
  dryRun?: boolean;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function parseStrategy(value: string): SupportAgentSettings['fetchStrategy'] {
  if (value === 'static' || value === 'rendering' || value === 'auto') {
    return value;
  }
  throw new InvalidArgumentError('Expected static, rendering or auto.');
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function preview(text: string, length = 150): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > length ? `${flat.substring(0, length)}...` : flat;
}

async function loadConfig(): Promise<ConfigManager> {
  const { config } = program.opts<GlobalOptions>();
  return ConfigManager.load({ configPath: config });
}

function fail(message: string): never {
  console.error(`❌ ${message}`);
  process.exit(1);
}

async function ingestPdfCommand(file: string) {
  const configManager = await loadConfig();
  const kb = await openKnowledgeBase(configManager);
  const spinner = ora({ text: `Reading ${file}...`, spinner: 'dots' }).start();
  const startTime = Date.now();

  const loaded = await loadPdfDocument(file, {
    logger: createComponentLogger(configManager, 'PDF'),
  });
  if (!loaded.ok) {
    spinner.fail(`Cannot read ${file}`);
    fail(loaded.error.message);
  }

  spinner.text = 'Embedding chunks...';
  const { text, metadata } = loaded.value;
  const result = await kb.pipeline.addDocument(text, {
    source: file,
    title: metadata.title,
  });
  if (!result.ok) {
    spinner.fail('Ingestion failed');
    fail(result.error.message);
  }

  if (result.value.status === 'skipped') {
    spinner.warn(`No text found in ${file}`);
    return;
  }
  spinner.succeed(
    `Indexed ${result.value.chunkCount} chunks from ${metadata.pages} pages in ${formatDuration(Date.now() - startTime)}`
  );
  console.log(`💾 Index: ${configManager.get('vectorDbPath')} (${kb.index.size()} vectors)`);
}

async function ingestDirCommand(dir: string) {
  const configManager = await loadConfig();
  const kb = await openKnowledgeBase(configManager);
  const spinner = ora({ text: `Scanning ${dir}...`, spinner: 'dots' }).start();
  const startTime = Date.now();

  const { documents, failures } = await processPdfDirectory(dir, {
    logger: createComponentLogger(configManager, 'PDF'),
  });
  spinner.text = `Embedding ${documents.length} documents...`;

  const result = await kb.pipeline.addDocuments(
    documents.map(doc => doc.text),
    documents.map(doc => ({ source: doc.filePath, title: doc.metadata.title }))
  );
  if (result.error) {
    spinner.fail('Ingestion failed');
    fail(result.error.message);
  }

  spinner.succeed(
    `Indexed ${result.chunks} chunks from ${result.documents} PDFs in ${formatDuration(Date.now() - startTime)}`
  );
  if (result.skipped > 0) {
    console.log(`⚠️  ${result.skipped} PDFs had no text`);
  }
  for (const failure of failures) {
    console.log(`⚠️  Skipped ${failure.filePath}: ${failure.error.message}`);
  }
}

async function crawlCommand(url: string, options: CrawlCommandOptions) {
  const loaded = await loadConfig();
  // Command-line overrides apply to this run only
  const configManager = ConfigManager.fromSettings({
    ...loaded.getAll(),
    ...(options.strategy ? { fetchStrategy: options.strategy } : {}),
  });

  const crawler = new Crawler({
    fetcher: createFetcher(configManager),
    configManager,
  });
  const spinner = ora({ text: `Crawling ${url}...`, spinner: 'dots' }).start();

  const { pages, failures } = await crawler.crawl(url, {
    maxPages: options.maxPages,
    allowedDomains: options.domain.length > 0 ? options.domain : undefined,
    delayMs: options.delay,
  });
  spinner.succeed(`Crawled ${pages.length} pages`);

  for (const page of pages) {
    console.log(`📄 ${page.metadata.url}`);
    if (page.metadata.title) {
      console.log(`   ${page.metadata.title}`);
    }
  }
  for (const failure of failures) {
    console.log(`⚠️  ${failure.error.message}`);
  }

  if (options.dryRun || pages.length === 0) {
    return;
  }

  const kb = await openKnowledgeBase(configManager);
  const ingestSpinner = ora({ text: 'Embedding pages...', spinner: 'dots' }).start();
  const result = await kb.pipeline.ingestPages(pages);
  if (result.error) {
    ingestSpinner.fail('Ingestion failed');
    fail(result.error.message);
  }
  ingestSpinner.succeed(
    `Indexed ${result.chunks} chunks from ${result.documents} pages (${result.skipped} without content)`
  );
}

async function searchCommand(query: string, options: { top?: number }) {
  const configManager = await loadConfig();
  const kb = await openKnowledgeBase(configManager);

  if (kb.index.size() === 0) {
    fail('The index is empty. Ingest some documents first.');
  }

  console.log('🔎 Search\n');
  console.log(`📝 Query: "${query}"`);
  console.log(`📚 Searching in ${kb.index.size()} chunks...\n`);

  const results = await kb.search.searchChunks(query, options.top);
  results.forEach((result, idx) => {
    console.log(`${idx + 1}. ${result.label}`);
    if (result.sourceId) {
      console.log(`   📁 Source: ${result.sourceId}`);
    }
    if (result.text) {
      console.log(`   📝 "${preview(result.text)}"`);
    }
  });
}

async function askCommand(query: string, options: { top?: number; rate?: number }) {
  const configManager = await loadConfig();
  const kb = await openKnowledgeBase(configManager);
  const agent = new SupportAgent({
    search: kb.search,
    llm: new OllamaChatClient(configManager),
    configManager,
  });

  const spinner = ora({ text: 'Thinking...', spinner: 'dots' }).start();
  const { answer, sources } = await agent.handleQuery(query, options.top);
  spinner.stop();

  console.log(answer.trim());
  if (sources.length > 0) {
    console.log('\n📚 Sources');
    for (const source of sources) {
      console.log(`   ${source.sourceId || source.label}`);
    }
  }

  await new FeedbackCollector({ configManager }).logFeedback({
    query,
    response: answer,
    rating: options.rate ?? null,
    metadata: { sources: sources.map(s => s.id) },
  });
}

async function statsCommand() {
  const configManager = await loadConfig();
  const kb = await openKnowledgeBase(configManager);
  const feedback = await new FeedbackCollector({ configManager }).getStats();

  console.log('📊 Knowledge Base Statistics\n');
  console.log(`💾 Index: ${kb.index.path}`);
  console.log(`📐 Dimension: ${kb.index.dimension}`);
  console.log(`📝 Vectors: ${kb.index.size()}`);
  console.log(`📄 Chunks with text: ${kb.chunkStore.size()}`);
  console.log(`🤖 Embedder: ${configManager.get('embedderType')}`);
  console.log(
    `⭐ Feedback: ${feedback.totalQueries} queries, ${feedback.ratedQueries} rated` +
      (feedback.averageRating === null
        ? ''
        : `, average ${feedback.averageRating.toFixed(2)}`)
  );
}

async function configCommand(options: { list?: boolean; set?: string }) {
  const configManager = await loadConfig();

  if (options.set) {
    const separator = options.set.indexOf('=');
    if (separator < 1) {
      fail('Expected --set key=value');
    }
    const key = options.set.slice(0, separator);
    if (!isSettingKey(key)) {
      fail(`Unknown setting: ${key}`);
    }
    await configManager.set(key, options.set.slice(separator + 1));
    console.log(`✅ Updated ${key} = ${JSON.stringify(configManager.get(key))}`);
    return;
  }

  if (options.list) {
    console.log('📋 Current Configuration:\n');
    console.log(JSON.stringify(configManager.getAll(), null, 2));
    return;
  }

  console.log('Use --list to view current config, or --set key=value to update.');
}

const program = new Command();

program
  .name('support-agent')
  .description('Knowledge base ingestion and retrieval for support answers')
  .version('0.1.0')
  .option('-c, --config <path>', 'Configuration file', DEFAULT_CONFIG_PATH);

program
  .command('ingest-pdf <file>')
  .description('Add one PDF to the index')
  .action(ingestPdfCommand);

program
  .command('ingest-dir <dir>')
  .description('Add every PDF under a directory to the index')
  .action(ingestDirCommand);

program
  .command('crawl <url>')
  .description('Crawl a site breadth-first and add its pages to the index')
  .option('-m, --max-pages <n>', 'Page budget', parseInteger)
  .option('-d, --domain <host>', 'Allowed host (repeatable)', collect, [])
  .option('-s, --strategy <strategy>', 'static, rendering or auto', parseStrategy)
  .option('--delay <ms>', 'Delay between fetches', parseInteger)
  .option('--dry-run', 'Crawl without adding pages to the index')
  .action(crawlCommand);

program
  .command('search <query>')
  .description('Show the nearest chunks for a query')
  .option('-t, --top <n>', 'Number of results to return', parseInteger)
  .action(searchCommand);

program
  .command('ask <query>')
  .description('Answer a question from the knowledge base')
  .option('-t, --top <n>', 'Number of chunks to use as context', parseInteger)
  .option('-r, --rate <rating>', 'Rate the answer from 1 to 5', parseInteger)
  .action(askCommand);

program
  .command('stats')
  .description('Show index and feedback statistics')
  .action(statsCommand);

program
  .command('config')
  .description('Manage configuration')
  .option('-l, --list', 'List current configuration')
  .option('-s, --set <key=value>', 'Set a config value')
  .action(configCommand);

program.parseAsync().catch((error: unknown) => {
  fail(errorMessage(error));
});
