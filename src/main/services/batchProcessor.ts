/**
 * Batch Processing Service
 *
 * Runs the per-item pipeline over a list of work items:
 * download -> normalize metadata -> resolve cover -> embed tags -> place.
 *
 * Key design decisions:
 * - Strictly sequential, in input order
 * - Per-item error isolation: each item resolves to an ItemOutcome value and
 *   failures become FailureRecords; nothing thrown by an item ends the batch
 * - Graceful cancellation (finishes the current item, then stops)
 * - Collaborators (downloader, cover resolver, destination) are injected
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type {
  AppSettings,
  BatchResult,
  CoverImage,
  FailureRecord,
  NormalizedTags,
  WorkItem,
} from '../../shared/types';
import { DEFAULT_SETTINGS } from '../../shared/types';
import { CoverArtResolver, extractCoverCandidates } from './coverArtResolver';
import type { DestinationWriter } from './destinationWriter';
import type { Downloader } from './downloader';
import { ConfigurationError, PipelineError, errorMessage, wrapError } from './errors';
import type { Logger } from './logger';
import { normalizeMetadata } from './metadataNormalizer';
import { embedTags } from './tagWriter';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** Result of processing a single work item */
export type ItemOutcome =
  | {
      status: 'succeeded';
      item: WorkItem;
      /** Where the file was placed */
      placedPath: string;
      /** Whether tags were embedded (false when metadata processing is off) */
      tagged: boolean;
    }
  | {
      status: 'failed';
      item: WorkItem;
      error: PipelineError;
      /** Set when an untagged file was still placed */
      placedPath: string | null;
    }
  | {
      status: 'skipped';
      item: WorkItem;
      reason: string;
    };

/** Tag embedding function (embedTags by default) */
export type EmbedFunction = (
  filePath: string,
  tags: NormalizedTags,
  cover: CoverImage | null,
) => void;

/** Options for the batch processor */
export interface BatchProcessorOptions {
  downloader: Downloader;
  destination: DestinationWriter;
  /** Cover resolver (defaults to one using the axios fetcher) */
  coverResolver?: CoverArtResolver;
  /** Tag embedder (for testing) */
  embed?: EmbedFunction;
  /** Application settings; only processMetadata and untaggedPolicy are read */
  settings?: Pick<AppSettings, 'processMetadata' | 'untaggedPolicy'>;
  /** Logger instance for structured logging */
  logger?: Logger;
  /** Parent directory for per-item work directories (default: OS temp dir) */
  workRoot?: string;
  /** Clock used for failure timestamps (for testing) */
  now?: () => Date;
  /** Callback for individual item completion */
  onItemComplete?: (outcome: ItemOutcome, index: number, total: number) => void;
}

/** Internal state of the running batch */
interface BatchState {
  cancelled: boolean;
}

// ─── Batch Processor ─────────────────────────────────────────────────────────

/**
 * Processes work items one at a time, collecting a BatchResult.
 *
 * Usage:
 * ```typescript
 * const processor = new BatchProcessor({
 *   downloader: new YtDlpDownloader({ logger }),
 *   destination: new LocalFolderWriter('./music'),
 *   logger,
 * });
 * const result = await processor.run(items);
 * ```
 */
export class BatchProcessor {
  private readonly downloader: Downloader;
  private readonly destination: DestinationWriter;
  private readonly coverResolver: CoverArtResolver;
  private readonly embed: EmbedFunction;
  private readonly settings: Pick<AppSettings, 'processMetadata' | 'untaggedPolicy'>;
  private readonly logger: Logger | null;
  private readonly workRoot: string;
  private readonly now: () => Date;
  private readonly onItemComplete:
    | ((outcome: ItemOutcome, index: number, total: number) => void)
    | null;

  // Batch state
  private state: BatchState | null = null;

  constructor(options: BatchProcessorOptions) {
    this.downloader = options.downloader;
    this.destination = options.destination;
    this.logger = options.logger ?? null;
    this.coverResolver =
      options.coverResolver ?? new CoverArtResolver({ logger: options.logger });
    this.embed = options.embed ?? embedTags;
    this.settings = options.settings ?? {
      processMetadata: DEFAULT_SETTINGS.processMetadata,
      untaggedPolicy: DEFAULT_SETTINGS.untaggedPolicy,
    };
    this.workRoot = options.workRoot ?? os.tmpdir();
    this.now = options.now ?? ((): Date => new Date());
    this.onItemComplete = options.onItemComplete ?? null;
  }

  /**
   * Returns whether the processor is currently running.
   */
  isRunning(): boolean {
    return this.state !== null && !this.state.cancelled;
  }

  /**
   * Cancels the current batch.
   * The item in progress finishes; items not yet started count as skipped.
   */
  cancel(): void {
    if (this.state && !this.state.cancelled) {
      this.state.cancelled = true;
      this.logger?.info('Batch cancelled; finishing the current item');
    }
  }

  /**
   * Processes every work item in order.
   *
   * @param items - Work items, processed in the given order
   * @returns Counts and the ordered failure records
   * @throws ConfigurationError when there are no items or a batch is already running
   */
  async run(items: readonly WorkItem[]): Promise<BatchResult> {
    if (items.length === 0) {
      throw new ConfigurationError('No work items to process');
    }
    if (this.state !== null) {
      throw new ConfigurationError('A batch is already running');
    }

    const state: BatchState = { cancelled: false };
    this.state = state;
    const failures: FailureRecord[] = [];
    let succeeded = 0;
    let skipped = 0;

    this.logger?.info(`Starting batch of ${items.length} item(s)`);

    try {
      for (const [index, item] of items.entries()) {
        if (state.cancelled) {
          skipped += items.length - index;
          this.logger?.warn(`${items.length - index} item(s) skipped after cancellation`);
          break;
        }

        this.logger?.info(`[${index + 1}/${items.length}] Processing`, { url: item.url });
        const outcome = await this.processItem(item);

        switch (outcome.status) {
          case 'succeeded':
            succeeded++;
            this.logger?.info(`Placed at ${outcome.placedPath}`, { url: item.url });
            break;
          case 'failed':
            failures.push(this.recordFailure(item, outcome.error));
            break;
          case 'skipped':
            skipped++;
            this.logger?.logSkippedItem(item.url, outcome.reason);
            break;
        }

        this.onItemComplete?.(outcome, index, items.length);
      }
    } finally {
      this.state = null;
    }

    return { succeeded, failed: failures.length, skipped, failures };
  }

  // ─── Per-item Pipeline ─────────────────────────────────────────────

  /**
   * Runs the pipeline for one item. Never throws.
   */
  private async processItem(item: WorkItem): Promise<ItemOutcome> {
    if (item.url.trim() === '') {
      return { status: 'skipped', item, reason: 'empty URL' };
    }

    let workDir: string;
    try {
      workDir = await fs.promises.mkdtemp(path.join(this.workRoot, 'tubetagger-'));
    } catch (error: unknown) {
      return {
        status: 'failed',
        item,
        error: wrapError(error, 'DownloadError', { url: item.url, step: 'downloading' }),
        placedPath: null,
      };
    }

    try {
      return await this.processInWorkDir(item, workDir);
    } finally {
      await this.removeWorkDir(workDir);
    }
  }

  private async processInWorkDir(item: WorkItem, workDir: string): Promise<ItemOutcome> {
    let audioPath: string;
    let metadata: Readonly<Record<string, unknown>>;
    try {
      ({ audioPath, metadata } = await this.downloader.fetch(item.url, workDir));
    } catch (error: unknown) {
      return {
        status: 'failed',
        item,
        error: wrapError(error, 'DownloadError', { url: item.url, step: 'downloading' }),
        placedPath: null,
      };
    }

    let tagError: PipelineError | null = null;
    if (this.settings.processMetadata) {
      const fallbackTitle = path.basename(audioPath, path.extname(audioPath));
      const tags = normalizeMetadata(metadata, fallbackTitle);
      const cover = await this.coverResolver.resolve(extractCoverCandidates(metadata), item.url);
      this.logger?.debug(
        `Tags: "${tags.artist} - ${tags.title}" (${tags.album})${cover ? ', with cover' : ''}`,
        { url: item.url, step: 'tagging' },
      );

      try {
        this.embed(audioPath, tags, cover);
      } catch (error: unknown) {
        tagError = wrapError(error, 'TagWriteError', { url: item.url, step: 'tagging' });
      }
    }

    if (tagError !== null && this.settings.untaggedPolicy === 'discard') {
      try {
        await fs.promises.rm(audioPath, { force: true });
        this.logger?.warn('Discarded untagged file', { url: item.url, step: 'tagging' });
      } catch (error: unknown) {
        this.logger?.warn(`Failed to discard untagged file: ${errorMessage(error)}`, {
          url: item.url,
          step: 'tagging',
        });
      }
      return { status: 'failed', item, error: tagError, placedPath: null };
    }

    let placedPath: string;
    try {
      placedPath = await this.destination.place(audioPath, item.destination);
    } catch (error: unknown) {
      return {
        status: 'failed',
        item,
        error: wrapError(error, 'PlacementError', { url: item.url, step: 'placing' }),
        placedPath: null,
      };
    }

    if (tagError !== null) {
      this.logger?.warn(`Placed untagged file at ${placedPath}`, { url: item.url, step: 'placing' });
      return { status: 'failed', item, error: tagError, placedPath };
    }

    return { status: 'succeeded', item, placedPath, tagged: this.settings.processMetadata };
  }

  private async removeWorkDir(workDir: string): Promise<void> {
    try {
      await fs.promises.rm(workDir, { recursive: true, force: true });
    } catch (error: unknown) {
      this.logger?.warn(`Failed to remove work directory ${workDir}: ${errorMessage(error)}`);
    }
  }

  private recordFailure(item: WorkItem, error: PipelineError): FailureRecord {
    this.logger?.logPipelineError(error, item.url);

    return Object.freeze({
      url: item.url,
      destination: item.destination,
      error: error.message,
      step: error.step,
      timestamp: this.now(),
    });
  }
}
