#!/usr/bin/env node

import { config as loadDotEnv } from 'dotenv';
import { basename, extname, join } from 'node:path';
import { CLI_USAGE, CliUsageError, parseCliArgs, type CliArgs } from './cli/args.js';
import { parseConfig, type AppConfig } from './config.js';
import { Logger } from './core/logger.js';
import { startStdioServer } from './mcp/start-stdio-server.js';
import { ReferenceService } from './references/reference-service.js';
import { getPackageVersion } from './version.js';

loadDotEnv({ quiet: true });

const printStdout = (message: string): void => {
  process.stdout.write(`${message}\n`);
};

const printStderr = (message: string): void => {
  process.stderr.write(`${message}\n`);
};

const runExtract = async (cli: CliArgs, config: AppConfig, service: ReferenceService): Promise<void> => {
  const [file] = cli.files;
  if (!file) {
    throw new CliUsageError('The extract command takes exactly one file.');
  }

  const outputPath = cli.output ?? join(config.outputDir, `references_${basename(file, extname(file))}`);
  const outcome = await service.extractFromDocument(file, {
    minConfidence: cli.minConfidence,
    outputPath,
    formats: cli.formats
  });

  printStdout(
    JSON.stringify(
      {
        document: outcome.documentPath,
        backend: outcome.backend,
        text_quality: Number(outcome.textQuality.toFixed(3)),
        total_found: outcome.totalFound,
        kept: outcome.references.length,
        discarded: outcome.discarded,
        output_files: outcome.outputFiles,
        processing_time_ms: outcome.processingTimeMs
      },
      null,
      2
    )
  );
};

const runBatch = async (cli: CliArgs, service: ReferenceService): Promise<void> => {
  const outcome = await service.extractBatch(cli.files, {
    outputDir: cli.outputDir,
    formats: cli.formats,
    minConfidence: cli.minConfidence,
    concurrency: cli.concurrency
  });

  printStdout(
    JSON.stringify(
      {
        output_dir: outcome.outputDir,
        summary: outcome.summaryPath,
        total_documents: outcome.totalDocuments,
        successful: outcome.succeeded,
        failed: outcome.failed,
        total_references: outcome.totalReferences
      },
      null,
      2
    )
  );

  if (outcome.succeeded === 0) {
    process.exitCode = 1;
  }
};

const run = async (): Promise<void> => {
  const cli = parseCliArgs(process.argv.slice(2));

  if (cli.showHelp) {
    printStdout(CLI_USAGE);
    return;
  }

  if (cli.showVersion) {
    printStdout(getPackageVersion());
    return;
  }

  const config = parseConfig();
  const logger = new Logger(config.logLevel);
  const service = ReferenceService.fromConfig(config, logger);

  switch (cli.command) {
    case 'serve': {
      await startStdioServer(config, service, logger);
      return;
    }
    case 'extract': {
      await runExtract(cli, config, service);
      return;
    }
    case 'batch': {
      await runBatch(cli, service);
      return;
    }
    default: {
      throw new CliUsageError(`Unsupported command: ${String(cli.command)}`);
    }
  }
};

run().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  printStderr(`bibsift failed: ${message}`);
  if (error instanceof CliUsageError) {
    printStderr('');
    printStderr(CLI_USAGE);
  } else if (error instanceof Error && error.stack) {
    printStderr(error.stack);
  }
  process.exitCode = 1;
});
