#!/usr/bin/env node

import 'dotenv/config';
import { Command, Option } from 'commander';
import glob from 'fast-glob';
import fs from 'fs-extra';
import {
  ARTICLE_STATES,
  CONTENT_FORMATS,
  PLATFORMS,
  PLATFORM_LABELS,
  type ArticleState,
  type ContentFormat,
  type CrossPosterError,
  type Platform,
} from '@cross-poster/shared';
import {
  EXIT_INPUT_ERROR,
  EXIT_REMOTE_ERROR,
  clientProvider,
  exitCodeFor,
  parsePerPage,
  parsePlatform,
  parsePlatforms,
  parsePositiveInt,
  parseTagList,
  renderArticle,
  serializeError,
  serializeOutcome,
  serializePreviewEntry,
} from './cli-helpers.js';
import { CrossPoster, formatSummary } from './cross-poster.js';
import { describeConfig, getConfigPath, initConfig, loadConfig } from './config.js';
import { MARKDOWN_EXTENSIONS } from './file-loader.js';
import { Logger } from './utils/logger.js';

async function createCrossPoster(logger: Logger): Promise<CrossPoster> {
  return new CrossPoster({ logger, clients: clientProvider(await loadConfig()) });
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

function reportError(logger: Logger, error: CrossPosterError): void {
  if (logger.json) {
    printJson({ success: false, error: serializeError(error) });
  } else {
    logger.error(error.message, { code: error.code });
  }
  process.exitCode = exitCodeFor(error);
}

const formatOption = () =>
  new Option('--format <format>', 'Content format to send')
    .choices([...CONTENT_FORMATS])
    .default('markdown');

interface PostCommandOptions {
  to: Platform[];
  cleanAi?: boolean;
  tags?: string[];
  canonical?: string;
  format: ContentFormat;
  dryRun?: boolean;
  json?: boolean;
}

interface PreviewCommandOptions {
  to: Platform[];
  cleanAi?: boolean;
  format: ContentFormat;
  json?: boolean;
}

interface ListCommandOptions {
  from: Platform;
  page: number;
  perPage: number;
  state: ArticleState;
  json?: boolean;
}

interface FetchCommandOptions {
  from: Platform;
  output?: string;
  json?: boolean;
}

interface ValidateCommandOptions {
  to: Platform[];
  cleanAi?: boolean;
  format: ContentFormat;
  json?: boolean;
}

interface JsonOption {
  json?: boolean;
}

const program = new Command();

program
  .name('crosspost')
  .description('Cross-post markdown articles to dev.to and Medium')
  .version('0.1.0');

/**
 * Post command
 */
program
  .command('post')
  .description('Publish an article to one or more platforms')
  .argument('<input>', 'Markdown file or dev.to article URL')
  .requiredOption('--to <platforms>', 'Comma-separated targets (devto,medium)', parsePlatforms)
  .option('--clean-ai', 'Remove AI-generated typographic artifacts')
  .option('--tags <tags>', 'Comma-separated tags replacing the front-matter tags', parseTagList)
  .option('--canonical <url>', 'Canonical URL replacing the front-matter value')
  .addOption(formatOption())
  .option('-d, --dry-run', 'Prepare the requests without sending them')
  .option('--json', 'Output in JSON format')
  .action(async (input: string, options: PostCommandOptions) => {
    const logger = new Logger(options.json);
    const poster = await createCrossPoster(logger);

    const article = await poster.loadArticle(input, {
      tags: options.tags,
      canonicalUrl: options.canonical,
    });
    if (!article.success) return reportError(logger, article.error);

    const report = await poster.post(article.data, options.to, {
      contentFormat: options.format,
      cleanAi: options.cleanAi ?? false,
      dryRun: options.dryRun,
    });

    if (options.json) {
      printJson({
        success: report.failed === 0,
        title: report.title,
        outcomes: report.outcomes.map(serializeOutcome),
      });
    } else {
      for (const outcome of report.outcomes) {
        if (outcome.status !== 'prepared') continue;
        const { formatted } = outcome.prepared;
        console.log(`\n--- ${PLATFORM_LABELS[outcome.platform]} (${formatted.contentFormat}, ${formatted.byteLength} bytes) ---`);
        console.log(JSON.stringify(outcome.prepared.payload, null, 2));
      }
      console.log(`\n📊 ${report.succeeded} succeeded, ${report.failed} failed`);
    }

    const failures = report.outcomes.flatMap(outcome => (outcome.status === 'failed' ? [outcome.error] : []));
    if (failures.length > 0) {
      process.exitCode = failures.some(error => error.category === 'remote')
        ? EXIT_REMOTE_ERROR
        : EXIT_INPUT_ERROR;
    }
  });

/**
 * Preview command
 */
program
  .command('preview')
  .description('Show the content each platform would receive')
  .argument('<input>', 'Markdown file or dev.to article URL')
  .option('--to <platforms>', 'Comma-separated targets', parsePlatforms, [...PLATFORMS])
  .option('--clean-ai', 'Remove AI-generated typographic artifacts')
  .addOption(formatOption())
  .option('--json', 'Output in JSON format')
  .action(async (input: string, options: PreviewCommandOptions) => {
    const logger = new Logger(options.json);
    const poster = await createCrossPoster(logger);

    const article = await poster.loadArticle(input);
    if (!article.success) return reportError(logger, article.error);

    const entries = poster.preview(article.data, options.to, {
      contentFormat: options.format,
      cleanAi: options.cleanAi ?? false,
    });

    if (options.json) {
      printJson(
        entries.map(serializePreviewEntry)
      );
    } else {
      for (const { platform, result } of entries) {
        const label = PLATFORM_LABELS[platform];
        if (!result.success) {
          logger.error(`${label}: ${result.error.message}`);
          continue;
        }
        const { content, contentFormat, byteLength, tags, warnings } = result.data;
        console.log(`\n=== ${label} (${contentFormat}, ${byteLength} bytes) ===`);
        console.log(`Title: ${result.data.title}`);
        console.log(`Tags: ${tags.join(', ') || '(none)'}`);
        warnings.forEach(warning => logger.warn(warning));
        console.log(`\n${content}`);
      }
    }

    const failed = entries.find(entry => !entry.result.success);
    if (failed && !failed.result.success) process.exitCode = exitCodeFor(failed.result.error);
  });

/**
 * List command
 */
program
  .command('list')
  .description('List your articles on a platform')
  .requiredOption('--from <platform>', 'Platform to list (devto or medium)', parsePlatform)
  .option('--page <n>', 'Page number', parsePositiveInt, 1)
  .option('--per-page <n>', 'Articles per page (1-1000)', parsePerPage, 30)
  .addOption(
    new Option('--state <state>', 'Which articles to list').choices([...ARTICLE_STATES]).default('published')
  )
  .option('--json', 'Output in JSON format')
  .action(async (options: ListCommandOptions) => {
    const logger = new Logger(options.json);
    const poster = await createCrossPoster(logger);
    const result = await poster.list(options.from, {
      page: options.page,
      perPage: options.perPage,
      state: options.state,
    });
    if (!result.success) return reportError(logger, result.error);

    const { articles, notices } = result.data;
    if (options.json) {
      printJson({ success: true, platform: options.from, articles, notices });
      return;
    }

    console.log(`📚 ${PLATFORM_LABELS[options.from]} articles (${articles.length})\n`);
    articles.forEach(summary => console.log(`  • ${formatSummary(summary)}`));
  });

/**
 * Fetch command
 */
program
  .command('fetch')
  .description('Fetch an article as markdown with front-matter')
  .argument('<id>', 'Article ID or user/slug path')
  .option('--from <platform>', 'Platform to fetch from', parsePlatform, 'devto')
  .option('-o, --output <file>', 'Write the article to a file instead of stdout')
  .option('--json', 'Output in JSON format')
  .action(async (id: string, options: FetchCommandOptions) => {
    const logger = new Logger(options.json);
    const poster = await createCrossPoster(logger);

    const result = await poster.fetch(options.from, id);
    if (!result.success) return reportError(logger, result.error);

    if (options.json) {
      printJson({ success: true, article: result.data });
      return;
    }

    const document = renderArticle(result.data);
    if (options.output) {
      await fs.outputFile(options.output, document);
      logger.success(`Saved "${result.data.title}" to ${options.output}`);
    } else {
      process.stdout.write(document);
    }
  });

/**
 * Validate command
 */
program
  .command('validate')
  .description('Check that articles parse and fit every target, without publishing')
  .argument('<patterns...>', 'Markdown files or glob patterns')
  .option('--to <platforms>', 'Comma-separated targets', parsePlatforms, [...PLATFORMS])
  .option('--clean-ai', 'Remove AI-generated typographic artifacts')
  .addOption(formatOption())
  .option('--json', 'Output in JSON format')
  .action(async (patterns: string[], options: ValidateCommandOptions) => {
    const logger = new Logger(options.json);

    const expandedFiles: string[] = [];
    for (const pattern of patterns) {
      if (glob.isDynamicPattern(pattern)) {
        expandedFiles.push(...(await glob(pattern, { onlyFiles: true })));
      } else {
        expandedFiles.push(pattern);
      }
    }
    const markdownFiles = [...new Set(expandedFiles)].filter(file =>
      MARKDOWN_EXTENSIONS.some(extension => file.toLowerCase().endsWith(extension))
    );

    if (markdownFiles.length === 0) {
      logger.error('No markdown files found matching the pattern');
      process.exitCode = EXIT_INPUT_ERROR;
      return;
    }

    const poster = await createCrossPoster(logger);
    const report = await poster.validate(markdownFiles, options.to, {
      contentFormat: options.format,
      cleanAi: options.cleanAi ?? false,
    });

    if (options.json) {
      printJson({
        success: report.invalid === 0,
        valid: report.valid,
        invalid: report.invalid,
        entries: report.entries.map(entry => ({ ...entry, errors: entry.errors.map(serializeError) })),
      });
    } else {
      for (const entry of report.entries) {
        console.log(`${entry.valid ? '✅' : '❌'} ${entry.path}${entry.title ? ` ("${entry.title}")` : ''}`);
        entry.errors.forEach(error => console.log(`    error: ${error.message}`));
        entry.warnings.forEach(warning => console.log(`    warning: ${warning}`));
      }
      console.log(`\n📊 ${report.valid} valid, ${report.invalid} invalid`);
    }

    if (report.invalid > 0) process.exitCode = EXIT_INPUT_ERROR;
  });

/**
 * Config commands
 */
const config = program.command('config').description('Manage the credentials file');

config
  .command('init')
  .description('Create the config file with placeholder values')
  .action(async () => {
    const logger = new Logger();
    const result = await initConfig(getConfigPath());
    if (!result.success) return reportError(logger, result.error);

    if (result.data.created) {
      logger.success(`Created ${result.data.path}`);
      logger.info('Replace the placeholder values with your dev.to API key and Medium integration token');
    } else {
      logger.warn(`Config file already exists at ${result.data.path}; leaving it unchanged`);
    }
  });

config
  .command('show')
  .description('Show configured credentials (masked)')
  .option('--json', 'Output in JSON format')
  .action(async (options: JsonOption) => {
    const logger = new Logger(options.json);
    const result = await loadConfig();
    if (!result.success) return reportError(logger, result.error);

    const entries = describeConfig(result.data);
    if (options.json) {
      printJson({ path: result.data.path, exists: result.data.exists, credentials: entries });
      return;
    }

    console.log(`Config file: ${result.data.path}${result.data.exists ? '' : ' (not found)'}\n`);
    for (const entry of entries) {
      const notes = [entry.source === 'none' ? '' : `from ${entry.source}`, entry.placeholder ? 'placeholder' : '']
        .filter(Boolean)
        .join(', ');
      console.log(`  ${entry.platform}.${entry.field}: ${entry.value}${notes ? ` (${notes})` : ''}`);
    }
  });

config
  .command('path')
  .description('Print the config file location')
  .action(() => {
    console.log(getConfigPath());
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`💥 Fatal error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(EXIT_INPUT_ERROR);
});
