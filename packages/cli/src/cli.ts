#!/usr/bin/env node

import { Command } from 'commander';
import yaml from 'js-yaml';
import readline from 'readline';

import {
  DEFAULT_TOP_K,
  Ingester,
  QueryService,
  consoleLogger,
  errorMessage,
  loadConfig,
  readSourceRecords,
  silentLogger,
} from '@qsearch/core';
import type { QsearchConfig } from '@qsearch/core';
import { formatProgress, formatReport, formatResults } from './format';
import { applyOverrides, parseOutputFormat, parsePositiveInt, redactConfig } from './options';
import type { ConfigOverrides, OutputFormat } from './options';
import { openRuntime } from './runtime';
import type { Runtime } from './runtime';

interface CommonOptions {
  config?: string;
  index?: string;
}

interface IngestOptions extends CommonOptions {
  batchSize?: number;
  strict?: boolean;
}

interface QueryOptions extends CommonOptions {
  top: number;
  output: OutputFormat;
}

const program = new Command();

program
  .name('qsearch')
  .description('Semantic search over question titles')
  .version('0.1.0');

program
  .command('ingest')
  .description('Rebuild the index from a JSON Lines file of posts')
  .argument('<file>', 'JSON Lines file, one post per line')
  .option('--batch-size <n>', 'Questions embedded per request', parsePositiveInt)
  .option('--index <name>', 'Index to (re)create')
  .option('--strict', 'Abort on the first failed batch')
  .option('--config <path>', 'Path to config file')
  .action(async (file: string, options: IngestOptions) => {
    const config = resolveConfig(options);
    await withRuntime(config, async runtime => {
      const ingester = new Ingester(runtime.provider, runtime.store, consoleLogger('Ingester'));
      console.log(`\n📥 Ingesting ${file} (${config.embedding.provider}, dim ${runtime.provider.dim})\n`);

      const report = await ingester.ingest(readSourceRecords(file), {
        indexName: config.indexName,
        batchSize: config.batchSize,
        strict: config.strict,
        onProgress: progress => {
          const line = formatProgress(progress);
          if (line) console.log(line);
        },
      });

      console.log('');
      console.log(formatReport(report));
      const total = await runtime.store.count(config.indexName);
      console.log(`   ${total} record(s) now searchable in "${config.indexName}"`);
    });
  });

program
  .command('query')
  .description('Find the questions closest to a piece of text')
  .argument('<text>', 'Query text')
  .option('-k, --top <n>', 'Number of results', parsePositiveInt, DEFAULT_TOP_K)
  .option('--output <format>', 'Output format: text | json', parseOutputFormat, 'text')
  .option('--index <name>', 'Index to query')
  .option('--config <path>', 'Path to config file')
  .action(async (text: string, options: QueryOptions) => {
    const config = resolveConfig(options);
    await withRuntime(config, async runtime => {
      const service = new QueryService(runtime.provider, runtime.store, { indexName: config.indexName }, silentLogger);
      const response = await service.search(text, options.top);
      if (options.output === 'json') {
        console.log(JSON.stringify(response, null, 2));
      } else {
        console.log(formatResults(text, response));
      }
    });
  });

program
  .command('repl')
  .description('Interactive search: one query per line, :q to quit')
  .option('-k, --top <n>', 'Number of results', parsePositiveInt, DEFAULT_TOP_K)
  .option('--index <name>', 'Index to query')
  .option('--config <path>', 'Path to config file')
  .action(async (options: Omit<QueryOptions, 'output'>) => {
    const config = resolveConfig(options);
    await withRuntime(config, async runtime => {
      const service = new QueryService(runtime.provider, runtime.store, { indexName: config.indexName }, silentLogger);
      await repl(service, options.top);
    });
  });

program
  .command('config')
  .description('Show the effective configuration')
  .option('--config <path>', 'Path to config file')
  .action((options: CommonOptions) => {
    const config = resolveConfig(options);
    console.log('\n⚙️  Current Configuration:\n');
    console.log(yaml.dump(redactConfig(config), { indent: 2, skipInvalid: true }));
  });

function resolveConfig(options: CommonOptions & ConfigOverrides): QsearchConfig {
  try {
    return applyOverrides(loadConfig({ path: options.config }), options);
  } catch (error) {
    return fail(error);
  }
}

async function withRuntime(config: QsearchConfig, run: (runtime: Runtime) => Promise<void>): Promise<void> {
  let runtime: Runtime;
  try {
    runtime = await openRuntime(config);
  } catch (error) {
    return fail(error);
  }

  try {
    await run(runtime);
  } catch (error) {
    await runtime.close();
    return fail(error);
  }
  await runtime.close();
}

/**
 * Reads queries until EOF, `:q` or Ctrl-C at the prompt. Ctrl-C while a query
 * is running cancels that query only.
 */
async function repl(service: QueryService, k: number): Promise<void> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: 'qsearch> ' });
  let inFlight: AbortController | null = null;

  rl.on('SIGINT', () => {
    if (inFlight) inFlight.abort();
    else rl.close();
  });

  console.log(`🔎 Searching "${service.indexName}" (top ${k}). Type :q to quit.\n`);
  rl.prompt();
  for await (const line of rl) {
    const text = line.trim();
    if (text === ':q') break;
    if (text) {
      const controller = new AbortController();
      inFlight = controller;
      try {
        console.log(formatResults(text, await service.search(text, k, { signal: controller.signal })));
      } catch (error) {
        if (controller.signal.aborted) console.log('Cancelled.');
        else console.error('Error:', errorMessage(error));
      } finally {
        inFlight = null;
      }
      console.log('');
    }
    rl.prompt();
  }
  rl.close();
}

function fail(error: unknown): never {
  console.error('Error:', errorMessage(error));
  process.exit(1);
}

program.parseAsync().catch(fail);
