/**
 * Settings Manager Service for tubetagger
 *
 * Builds runtime settings from the environment (a `.env` file is loaded with
 * dotenv) and loads the JSON batch file that lists the tracks to download.
 *
 * Batch file shape:
 * ```json
 * {
 *   "default_destination": "Music",
 *   "tracks": [{ "url": "https://...", "destination": "Rock" }]
 * }
 * ```
 */

import * as fs from 'fs';
import * as dotenv from 'dotenv';
import { type AppSettings, DEFAULT_SETTINGS, type WorkItem } from '../../shared/types';
import { ConfigurationError, errorMessage } from './errors';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** One validated entry of the batch file */
export interface TrackEntry {
  url: string;
  /** null when the track uses the default destination */
  destination: string | null;
}

/** Validated batch file */
export interface BatchConfig {
  defaultDestination: string;
  tracks: TrackEntry[];
}

/** Environment variables read by loadEnvironmentSettings */
export type SettingsEnvironment = Readonly<Record<string, string | undefined>>;

// ─── Constants ───────────────────────────────────────────────────────────────

/** Destination used when neither the track nor the batch file names one */
export const DEFAULT_DESTINATION = 'Music';

/** Default batch file name */
export const DEFAULT_BATCH_FILE = 'tracks_config.json';

// ─── Helper Functions ────────────────────────────────────────────────────────

function readTrimmed(value: unknown): string | null {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : null;
}

/**
 * Validates a TCP port value.
 *
 * @param value - The value to validate
 * @returns The port, or the default (22) when absent or invalid
 */
export function validatePort(value: unknown): number {
  const port = typeof value === 'string' ? Number(value.trim()) : value;
  if (typeof port !== 'number' || !Number.isInteger(port) || port < 1 || port > 65535) {
    return DEFAULT_SETTINGS.ssh.port;
  }
  return port;
}

/**
 * Validates a parsed batch file.
 *
 * Tracks without a usable URL are dropped; a track's destination falls back
 * to `default_destination`, then to "Music".
 *
 * @param parsed - The parsed JSON document
 * @returns The validated batch configuration
 * @throws ConfigurationError when there is no `tracks` list or no usable track
 */
export function validateBatchConfig(parsed: unknown): BatchConfig {
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigurationError('Batch file must contain a JSON object');
  }

  const tracks: unknown = Reflect.get(parsed, 'tracks');
  if (!Array.isArray(tracks)) {
    throw new ConfigurationError('Batch file has no "tracks" list');
  }

  const defaultDestination =
    readTrimmed(Reflect.get(parsed, 'default_destination')) ?? DEFAULT_DESTINATION;

  const entries: TrackEntry[] = [];
  for (const track of tracks) {
    if (track === null || typeof track !== 'object') continue;
    const url = readTrimmed(Reflect.get(track, 'url'));
    if (url === null) continue;
    entries.push({ url, destination: readTrimmed(Reflect.get(track, 'destination')) });
  }

  if (entries.length === 0) {
    throw new ConfigurationError('Batch file lists no track with a URL');
  }

  return { defaultDestination, tracks: entries };
}

/**
 * Reads and validates a batch file.
 *
 * @throws ConfigurationError when the file is missing, unreadable or invalid
 */
export async function loadBatchConfig(filePath: string): Promise<BatchConfig> {
  let content: string;
  try {
    content = await fs.promises.readFile(filePath, 'utf-8');
  } catch (error: unknown) {
    throw new ConfigurationError(`Cannot read batch file "${filePath}": ${errorMessage(error)}`, {
      cause: error instanceof Error ? error : undefined,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error: unknown) {
    throw new ConfigurationError(`Batch file "${filePath}" is not valid JSON: ${errorMessage(error)}`, {
      cause: error instanceof Error ? error : undefined,
    });
  }

  return validateBatchConfig(parsed);
}

/**
 * Expands a batch configuration into work items, in file order.
 */
export function resolveWorkItems(config: BatchConfig): WorkItem[] {
  return config.tracks.map((track) => ({
    url: track.url,
    destination: track.destination ?? config.defaultDestination,
  }));
}

/**
 * Builds settings from environment variables, falling back to defaults.
 *
 * Variables: SSH_HOST, SSH_USER, SSH_PORT, SSH_KEY_PATH, REMOTE_BASE_PATH,
 * MUSIC_FOLDER, FAILURE_REPORT_PATH, YT_DLP_PATH, FFMPEG_PATH, LOG_DIR
 */
export function loadEnvironmentSettings(env: SettingsEnvironment): AppSettings {
  return {
    ...DEFAULT_SETTINGS,
    musicFolder: readTrimmed(env.MUSIC_FOLDER) ?? DEFAULT_SETTINGS.musicFolder,
    failureReportPath: readTrimmed(env.FAILURE_REPORT_PATH) ?? DEFAULT_SETTINGS.failureReportPath,
    logDir: readTrimmed(env.LOG_DIR),
    ytDlpPath: readTrimmed(env.YT_DLP_PATH) ?? DEFAULT_SETTINGS.ytDlpPath,
    ffmpegPath: readTrimmed(env.FFMPEG_PATH) ?? DEFAULT_SETTINGS.ffmpegPath,
    ssh: {
      host: readTrimmed(env.SSH_HOST) ?? '',
      user: readTrimmed(env.SSH_USER) ?? '',
      port: validatePort(env.SSH_PORT),
      keyPath: readTrimmed(env.SSH_KEY_PATH) ?? '',
      remoteBasePath: readTrimmed(env.REMOTE_BASE_PATH) ?? '',
    },
  };
}

/**
 * Loads a `.env` file (when present) into process.env and returns the
 * resulting settings. Variables already set in the environment win.
 *
 * @param envFile - Path of the dotenv file (default: ".env" in the working directory)
 */
export function loadSettings(envFile?: string): AppSettings {
  const loaded = dotenv.config(envFile ? { path: envFile } : undefined);
  if (loaded.error && envFile) {
    throw new ConfigurationError(`Cannot load env file "${envFile}": ${loaded.error.message}`, {
      cause: loaded.error,
    });
  }
  return loadEnvironmentSettings(process.env);
}
