/**
 * Downloader Service
 *
 * Turns a source URL into a local MP3 file plus the source's raw metadata
 * record by driving the yt-dlp binary (audio extraction through ffmpeg).
 *
 * yt-dlp is asked to print the final info dictionary as JSON after the file
 * has been moved into place, so the record describes the converted file.
 */

import * as fs from 'fs';
import type { DownloadedAudio, RawMetadata } from '../../shared/types';
import { findAudioFiles } from '../utils/fileScanner';
import { ProcessFailure, runProcess } from '../utils/process';
import { probeAudioFile, type AudioProbe } from './audioReader';
import {
  ConfigurationError,
  DownloadError,
  type DownloadFailureReason,
  errorMessage,
} from './errors';
import type { Logger } from './logger';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** External download/convert collaborator */
export interface Downloader {
  /**
   * Downloads and converts one source into `workDir`.
   * @throws DownloadError when no playable audio file could be produced
   */
  fetch(url: string, workDir: string): Promise<DownloadedAudio>;
}

/** Options for the yt-dlp downloader */
export interface YtDlpDownloaderOptions {
  /** yt-dlp executable (default: "yt-dlp" on PATH) */
  ytDlpPath?: string;
  /** ffmpeg executable; passed to yt-dlp when not the PATH default */
  ffmpegPath?: string;
  /** Target MP3 bitrate (default: "192K") */
  audioQuality?: string;
  /** Kill a single download after this many milliseconds (default: 10 minutes) */
  timeoutMs?: number;
  logger?: Logger;
  /** Container check run on the converted file (for testing) */
  probe?: (filePath: string) => Promise<AudioProbe>;
}

// ─── Constants ───────────────────────────────────────────────────────────────

const DEFAULT_YT_DLP = 'yt-dlp';
const DEFAULT_FFMPEG = 'ffmpeg';
const DEFAULT_AUDIO_QUALITY = '192K';
const DEFAULT_TIMEOUT_MS = 10 * 60 * 1000;

/** stderr patterns mapped to failure reasons, checked in order */
const FAILURE_PATTERNS: ReadonlyArray<[RegExp, DownloadFailureReason]> = [
  [/Private video/i, 'PRIVATE'],
  [/Sign in to confirm your age|age[- ]restricted/i, 'AGE_RESTRICTED'],
  [/Video unavailable|This video is not available|has been removed/i, 'UNAVAILABLE'],
  [/Unsupported URL|is not a valid URL/i, 'UNSUPPORTED_URL'],
];

// ─── Helpers ─────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Builds the yt-dlp argument list for one download.
 */
export function buildYtDlpArgs(
  url: string,
  workDir: string,
  options: { ffmpegPath?: string; audioQuality?: string } = {},
): string[] {
  const args = [
    '--no-playlist',
    '--format',
    'bestaudio/best',
    '--extract-audio',
    '--audio-format',
    'mp3',
    '--audio-quality',
    options.audioQuality ?? DEFAULT_AUDIO_QUALITY,
  ];

  if (options.ffmpegPath && options.ffmpegPath !== DEFAULT_FFMPEG) {
    args.push('--ffmpeg-location', options.ffmpegPath);
  }

  args.push(
    '--paths',
    workDir,
    '--output',
    '%(title)s.%(ext)s',
    '--no-simulate',
    '--no-progress',
    '--print',
    'after_move:%()j',
    url,
  );

  return args;
}

/**
 * Classifies yt-dlp diagnostics into a failure reason.
 */
export function classifyDownloadFailure(stderr: string): DownloadFailureReason {
  for (const [pattern, reason] of FAILURE_PATTERNS) {
    if (pattern.test(stderr)) return reason;
  }
  return 'DOWNLOAD_FAILED';
}

/**
 * Returns the last "ERROR:" line of yt-dlp's stderr without its prefix.
 */
export function extractErrorLine(stderr: string): string | null {
  const lines = stderr
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.startsWith('ERROR:'));
  const last = lines[lines.length - 1];
  return last === undefined ? null : last.slice('ERROR:'.length).trim();
}

/**
 * Parses the info dictionary printed by yt-dlp (last JSON object line).
 * @returns The metadata record, or null when stdout holds none
 */
export function parseInfoJson(stdout: string): RawMetadata | null {
  const lines = stdout.split('\n').map((line) => line.trim());
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i];
    if (!line.startsWith('{')) continue;
    try {
      const parsed: unknown = JSON.parse(line);
      if (isRecord(parsed)) return parsed;
    } catch {
      // Not the info line; keep looking upwards.
    }
  }
  return null;
}

// ─── yt-dlp Downloader ───────────────────────────────────────────────────────

/**
 * Downloader backed by the yt-dlp binary.
 *
 * Usage:
 * ```typescript
 * const downloader = new YtDlpDownloader({ logger });
 * const { audioPath, metadata } = await downloader.fetch(url, workDir);
 * ```
 */
export class YtDlpDownloader implements Downloader {
  private readonly ytDlpPath: string;
  private readonly ffmpegPath: string;
  private readonly audioQuality: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger | null;
  private readonly probe: (filePath: string) => Promise<AudioProbe>;

  constructor(options: YtDlpDownloaderOptions = {}) {
    this.ytDlpPath = options.ytDlpPath ?? DEFAULT_YT_DLP;
    this.ffmpegPath = options.ffmpegPath ?? DEFAULT_FFMPEG;
    this.audioQuality = options.audioQuality ?? DEFAULT_AUDIO_QUALITY;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger ?? null;
    this.probe = options.probe ?? probeAudioFile;
  }

  async fetch(url: string, workDir: string): Promise<DownloadedAudio> {
    const args = buildYtDlpArgs(url, workDir, {
      ffmpegPath: this.ffmpegPath,
      audioQuality: this.audioQuality,
    });
    this.logger?.debug(`Running ${this.ytDlpPath} ${args.join(' ')}`, { url, step: 'downloading' });

    let stdout: string;
    try {
      ({ stdout } = await runProcess(this.ytDlpPath, args, { timeoutMs: this.timeoutMs }));
    } catch (error: unknown) {
      if (error instanceof ProcessFailure) {
        throw new DownloadError(extractErrorLine(error.stderr) ?? error.message, {
          url,
          reason: classifyDownloadFailure(error.stderr),
          cause: error,
        });
      }
      throw new DownloadError(errorMessage(error), { url });
    }

    const metadata = parseInfoJson(stdout) ?? {};
    const reported = metadata['filepath'];
    const audioPath =
      typeof reported === 'string' && fs.existsSync(reported)
        ? reported
        : findAudioFiles(workDir)[0];

    if (audioPath === undefined) {
      throw new DownloadError(`No MP3 file found in ${workDir}`, {
        url,
        reason: 'NO_AUDIO_OUTPUT',
      });
    }

    try {
      const probe = await this.probe(audioPath);
      this.logger?.debug(
        `Probed ${probe.container ?? 'unknown'} container, ${probe.duration.toFixed(1)}s`,
        { url, step: 'probing' },
      );
    } catch (error: unknown) {
      throw new DownloadError(errorMessage(error), {
        url,
        step: 'probing',
        reason: 'INVALID_CONTAINER',
        cause: error instanceof Error ? error : undefined,
      });
    }

    return { audioPath, metadata };
  }
}

// ─── Startup Checks ──────────────────────────────────────────────────────────

/**
 * Confirms the downloader and encoder binaries can be run.
 *
 * @throws ConfigurationError naming the first binary that is missing
 */
export async function verifyToolchain(
  ytDlpPath: string = DEFAULT_YT_DLP,
  ffmpegPath: string = DEFAULT_FFMPEG,
): Promise<{ ytDlpVersion: string; ffmpegVersion: string }> {
  const checks: Array<[string, string[]]> = [
    [ytDlpPath, ['--version']],
    [ffmpegPath, ['-version']],
  ];
  const versions: string[] = [];

  for (const [command, args] of checks) {
    try {
      const { stdout } = await runProcess(command, args, { timeoutMs: 30_000 });
      versions.push(stdout.split('\n')[0].trim());
    } catch (error: unknown) {
      const hint =
        error instanceof ProcessFailure && error.notFound
          ? `"${command}" was not found. Install it or set its path in the environment.`
          : `"${command}" could not be run: ${errorMessage(error)}`;
      throw new ConfigurationError(hint, { cause: error instanceof Error ? error : undefined });
    }
  }

  return { ytDlpVersion: versions[0], ffmpegVersion: versions[1] };
}
