#!/usr/bin/env node
import process from 'node:process';
import cliProgress from 'cli-progress';
import { ArgumentError, parseArgs, prepareDefaultFolder, printHelp, type CliConfig } from './args.js';
import { CancellationFlag } from './cancellation.js';
import { getConfig } from './config.js';
import { errorMessage } from './errors.js';
import { logger } from './logger.js';
import { PipelineRun, type PipelineOutcome } from './pipeline.js';
import { checkUrlList, runPreflightChecks } from './preflight.js';
import { createServices, type Services } from './services.js';
import type { DownloadResult, UploadResult } from './types.js';
import { BACKEND_LABELS } from './uploaders/index.js';
import { readUrlList, truncateLabel } from './utils.js';

const EXIT_FAILURE = 1;
const EXIT_CANCELLED = 130;

const describePayload = (result: UploadResult): string => {
  if (result.status === 'error') return result.error;
  switch (result.payload.backend) {
    case 'google-drive':
      return result.payload.url ?? result.payload.id;
    case 'yandex-disk':
      return result.payload.url;
    case 'local':
      return result.payload.path;
  }
};

/**
 * Summarizes overall processing results at the end of the execution.
 */
const printSummary = (downloads: DownloadResult[], uploads: UploadResult[]): void => {
  console.log('\nDownloads');
  console.table(
    downloads.map((result) => ({
      URL: result.url,
      Status: result.status,
      Detail: result.status === 'success' ? result.path : result.error,
    })),
  );

  if (uploads.length > 0) {
    console.log('Uploads');
    console.table(
      uploads.map((result) => ({
        File: result.filename,
        Status: result.status,
        Detail: describePayload(result),
      })),
    );
  }

  const downloaded = downloads.filter((result) => result.status === 'success').length;
  const uploaded = uploads.filter((result) => result.status === 'success').length;
  console.log(
    `Totals => urls: ${downloads.length}, downloaded: ${downloaded}, uploaded: ${uploaded}/${uploads.length}`,
  );
};

const collectUrls = async (cli: CliConfig): Promise<string[]> => {
  const fromFile = cli.urlsFile ? await readUrlList(cli.urlsFile) : [];
  return [...cli.urls, ...fromFile];
};

/**
 * Runs the pipeline with a progress bar and Ctrl+C cancellation.
 */
const runSession = async (cli: CliConfig, services: Services, urls: string[]): Promise<PipelineOutcome> => {
  const cancellation = new CancellationFlag();

  const multiBar = new cliProgress.MultiBar(
    {
      clearOnComplete: false,
      hideCursor: true,
      format: '{bar} {percentage}% | {message}',
    },
    cliProgress.Presets.shades_grey,
  );
  const bar = multiBar.create(100, 0, { message: 'Starting' });
  let shown = 0;

  const run = new PipelineRun(
    {
      urls,
      backend: cli.backend,
      destinationFolder: cli.folder,
      quality: cli.quality,
      filenameTemplate: cli.template,
      proxy: cli.proxy,
    },
    services.pipeline,
    {
      progress: (percent, message) => {
        // Download and upload progress interleave; the bar only moves forward.
        shown = Math.max(shown, percent);
        bar.update(shown, { message: truncateLabel(message, 60) });
      },
      error: (message) => {
        multiBar.log(`! ${message}\n`);
      },
    },
    cancellation,
  );

  let interrupts = 0;
  const onSigint = (): void => {
    interrupts += 1;
    if (interrupts > 1) {
      multiBar.stop();
      process.exit(EXIT_CANCELLED);
    }
    multiBar.log('Cancelling after the current step... (Ctrl+C again to quit)\n');
    run.requestCancel();
  };
  process.on('SIGINT', onSigint);

  try {
    return await run.start();
  } finally {
    process.off('SIGINT', onSigint);
    multiBar.stop();
  }
};

/**
 * Entry point that orchestrates CLI argument parsing, pre-flight and the run.
 */
const main = async (): Promise<number> => {
  const config = getConfig();
  logger.setLevel(config.logLevel);
  logger.setFile(config.logToFile ? config.logFilePath : null);

  let cli: CliConfig;
  try {
    cli = parseArgs(process.argv.slice(2), { proxy: config.proxyUrl });
  } catch (error) {
    if (error instanceof ArgumentError) {
      console.error(error.message);
      printHelp();
      return EXIT_FAILURE;
    }
    throw error;
  }

  if (cli.help) {
    printHelp();
    return 0;
  }

  const urls = await collectUrls(cli);
  const services = createServices(config);
  await prepareDefaultFolder(cli);
  console.log(`Checking ${BACKEND_LABELS[cli.backend]} and local tools...`);
  const check = await runPreflightChecks(
    { backend: cli.backend, destinationFolder: cli.folder },
    services.probes,
    services.registry,
    services.strategyDeps,
  );
  if (!check.ok) {
    console.error(check.message);
    return EXIT_FAILURE;
  }
  if (cli.checkOnly) {
    console.log('All checks passed.');
    return 0;
  }

  const urlCheck = checkUrlList(urls);
  if (!urlCheck.ok) {
    console.error(urlCheck.message);
    return EXIT_FAILURE;
  }

  const outcome = await runSession(cli, services, urls);
  process.stdout.write('\n');

  switch (outcome.state) {
    case 'cancelled':
      console.log('Run cancelled. Partial results were discarded.');
      return EXIT_CANCELLED;
    case 'failed':
      console.error(outcome.error ?? 'Run failed.');
      return EXIT_FAILURE;
    case 'completed':
      printSummary(outcome.downloads, outcome.uploads);
      return 0;
  }
};

void main()
  .then(async (code) => {
    await logger.flush();
    process.exit(code);
  })
  .catch((error: unknown) => {
    console.error(`Fatal error: ${errorMessage(error)}`);
    process.exit(EXIT_FAILURE);
  });
