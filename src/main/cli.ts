/**
 * tubetagger - Command Line Interface
 *
 * Loads settings and the batch, wires the services together, runs the
 * batch, writes the failure report and prints a summary.
 *
 * Exit status: 0 once a batch has run (even with failed items), 1 when the
 * batch could not start.
 */

import { parseArgs } from 'util';
import type { AppSettings, BatchResult, WorkItem } from '../shared/types';
import { BatchProcessor } from './services/batchProcessor';
import { CoverArtResolver } from './services/coverArtResolver';
import { type DestinationWriter, LocalFolderWriter, ScpWriter } from './services/destinationWriter';
import { YtDlpDownloader, verifyToolchain } from './services/downloader';
import { ConfigurationError, errorMessage, isPipelineError } from './services/errors';
import { writeFailureReport } from './services/failureReporter';
import { type LogEntry, Logger } from './services/logger';
import {
  DEFAULT_BATCH_FILE,
  DEFAULT_DESTINATION,
  loadBatchConfig,
  loadSettings,
  resolveWorkItems,
} from './services/settingsManager';

// ─── Argument Parsing ──────────────────────────────────────────────────────

/** Parsed command line */
export interface CliOptions {
  /** Single URL to download instead of the batch file */
  url: string | null;
  configPath: string;
  local: boolean;
  processMetadata: boolean;
  discardUntagged: boolean;
  verbose: boolean;
  help: boolean;
}

export const USAGE = `Usage: tubetagger [url] [options]

Downloads audio as MP3, tags it and places it in your music library.
Without a URL, every track in the batch file is processed.

Options:
  -c, --config <file>    Batch file (default: ${DEFAULT_BATCH_FILE})
      --local            Copy into MUSIC_FOLDER instead of the remote host
      --no-metadata      Skip tagging and cover art
      --discard-untagged Delete files whose tags could not be written
  -v, --verbose          Log debug output
  -h, --help             Show this help`;

function parseRawArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      options: {
        config: { type: 'string', short: 'c' },
        local: { type: 'boolean', default: false },
        'no-metadata': { type: 'boolean', default: false },
        'discard-untagged': { type: 'boolean', default: false },
        verbose: { type: 'boolean', short: 'v', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
    });
  } catch (error: unknown) {
    throw new ConfigurationError(errorMessage(error));
  }
}

/**
 * Parses command line arguments.
 * @throws ConfigurationError on unknown options or extra arguments
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const { values, positionals } = parseRawArgs(argv);
  if (positionals.length > 1) {
    throw new ConfigurationError(`Expected at most one URL, got ${positionals.length}`);
  }

  return {
    url: positionals[0] ?? null,
    configPath: values.config ?? DEFAULT_BATCH_FILE,
    local: values.local === true,
    processMetadata: values['no-metadata'] !== true,
    discardUntagged: values['discard-untagged'] === true,
    verbose: values.verbose === true,
    help: values.help === true,
  };
}

// ─── Output ────────────────────────────────────────────────────────────────

/**
 * Formats the end-of-run summary printed to the terminal.
 */
export function formatSummary(result: BatchResult, reportPath: string | null): string {
  const lines = [
    `Done: ${result.succeeded} succeeded, ${result.failed} failed, ${result.skipped} skipped`,
  ];
  if (reportPath !== null) {
    lines.push(`Failure report written to ${reportPath}`);
  }
  return lines.join('\n');
}

function echoToConsole(line: string, entry: LogEntry): void {
  if (entry.level === 'ERROR' || entry.level === 'WARN') {
    console.error(line);
  } else {
    console.log(line);
  }
}

// ─── Wiring ────────────────────────────────────────────────────────────────

async function loadWorkItems(options: CliOptions): Promise<WorkItem[]> {
  if (options.url !== null) {
    return [{ url: options.url, destination: DEFAULT_DESTINATION }];
  }
  return resolveWorkItems(await loadBatchConfig(options.configPath));
}

function createDestination(settings: AppSettings, logger: Logger): DestinationWriter {
  return settings.localPlacement
    ? new LocalFolderWriter(settings.musicFolder, logger)
    : new ScpWriter(settings.ssh, { logger });
}

/**
 * Runs the CLI.
 * @returns The process exit status
 */
export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error: unknown) {
    console.error(errorMessage(error));
    console.error(USAGE);
    return 1;
  }

  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  let settings: AppSettings;
  try {
    settings = {
      ...loadSettings(),
      processMetadata: options.processMetadata,
      untaggedPolicy: options.discardUntagged ? 'discard' : 'keep',
      localPlacement: options.local,
    };
  } catch (error: unknown) {
    console.error(isPipelineError(error) ? error.toUserMessage() : errorMessage(error));
    return 1;
  }

  const logger = new Logger({
    logDir: settings.logDir,
    minLevel: options.verbose ? 'DEBUG' : 'INFO',
    echo: echoToConsole,
  });
  await logger.initialize();

  let processor: BatchProcessor;
  let items: WorkItem[];
  try {
    items = await loadWorkItems(options);
    const destination = createDestination(settings, logger);
    const versions = await verifyToolchain(settings.ytDlpPath, settings.ffmpegPath);
    logger.debug(`yt-dlp ${versions.ytDlpVersion}; ${versions.ffmpegVersion}`);

    processor = new BatchProcessor({
      downloader: new YtDlpDownloader({
        ytDlpPath: settings.ytDlpPath,
        ffmpegPath: settings.ffmpegPath,
        logger,
      }),
      destination,
      coverResolver: new CoverArtResolver({ timeoutMs: settings.coverTimeoutMs, logger }),
      settings,
      logger,
    });
  } catch (error: unknown) {
    console.error(isPipelineError(error) ? error.toUserMessage() : errorMessage(error));
    return 1;
  }

  const onInterrupt = (): void => processor.cancel();
  process.once('SIGINT', onInterrupt);

  let result: BatchResult;
  try {
    result = await processor.run(items);
  } catch (error: unknown) {
    console.error(isPipelineError(error) ? error.toUserMessage() : errorMessage(error));
    return 1;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }

  let reportPath: string | null = null;
  try {
    reportPath = await writeFailureReport(result, settings.failureReportPath);
  } catch (error: unknown) {
    logger.error(`Failed to write failure report: ${errorMessage(error)}`);
  }

  console.log(formatSummary(result, reportPath));
  const logFilePath = logger.getSummary().logFilePath;
  if (logFilePath !== null) {
    console.log(`Log written to ${logFilePath}`);
  }
  return 0;
}
