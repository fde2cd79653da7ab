/**
 * Shared type definitions for tubetagger.
 * These interfaces are used across the services and the CLI entry point.
 */

/** Image formats that may be embedded as cover art */
export type CoverFormat = 'jpeg' | 'png' | 'webp';

/** MIME types written into the embedded-picture frame */
export type CoverMimeType = 'image/jpeg' | 'image/png' | 'image/webp';

/** Maps an embeddable image format to its MIME type */
export const COVER_MIME_TYPES: Readonly<Record<CoverFormat, CoverMimeType>> = {
  jpeg: 'image/jpeg',
  png: 'image/png',
  webp: 'image/webp',
};

/** One unit of batch work: a source URL paired with a destination label */
export interface WorkItem {
  readonly url: string;
  readonly destination: string;
}

/**
 * Raw metadata record produced by the downloader.
 * Nothing about its shape is guaranteed; it is read once by the normalizer.
 */
export type RawMetadata = Readonly<Record<string, unknown>>;

/** Fixed tag schema written into every processed file */
export interface NormalizedTags {
  title: string;
  artist: string;
  album: string;
  albumArtist: string;
  /** ISO-8601 date (YYYY-MM-DD) or empty string */
  releaseDate: string;
  /** Comma-joined genre list */
  genre: string;
  /** Playlist position, or null outside a playlist context */
  trackNumber: number | null;
  comment: string;
}

/** A described image offered by the source as a potential cover */
export interface CoverCandidate {
  url: string;
  width: number;
  height: number;
  /** null when the URL does not name an embeddable image format */
  format: CoverFormat | null;
}

/** Resolved cover image bytes */
export interface CoverImage {
  data: Buffer;
  mimeType: CoverMimeType;
}

/** Result of a successful download */
export interface DownloadedAudio {
  /** Local path of the converted audio file */
  audioPath: string;
  /** Raw metadata record from the source */
  metadata: RawMetadata;
}

/** Pipeline step names used in failure records and logs */
export type PipelineStep =
  | 'configuration'
  | 'downloading'
  | 'probing'
  | 'normalizing'
  | 'fetching_cover'
  | 'tagging'
  | 'placing'
  | 'unknown';

/** A single failed work item */
export interface FailureRecord {
  readonly url: string;
  readonly destination: string;
  /** Error message raised while processing the item */
  readonly error: string;
  /** Step where the item failed */
  readonly step: PipelineStep;
  readonly timestamp: Date;
}

/** Aggregate outcome of a batch run */
export interface BatchResult {
  succeeded: number;
  failed: number;
  /** Items not processed (empty URL, or batch cancelled before they started) */
  skipped: number;
  /** Failures in processing order */
  failures: readonly FailureRecord[];
}

/** What happens to a downloaded file whose tags could not be written */
export type UntaggedFilePolicy = 'keep' | 'discard';

/** Runtime settings assembled from the environment and CLI flags */
export interface AppSettings {
  /** Whether to normalize metadata and embed tags/cover art */
  processMetadata: boolean;
  /** Disposition of files whose tag write failed */
  untaggedPolicy: UntaggedFilePolicy;
  /** Place files in the local music folder instead of the remote host */
  localPlacement: boolean;
  /** Root of the local music library */
  musicFolder: string;
  /** Where the failure report is written */
  failureReportPath: string;
  /** Directory for daily log files (null disables file logging) */
  logDir: string | null;
  /** yt-dlp executable */
  ytDlpPath: string;
  /** ffmpeg executable */
  ffmpegPath: string;
  /** Cover download timeout in milliseconds */
  coverTimeoutMs: number;
  /** Remote host settings (only required for remote placement) */
  ssh: SshSettings;
}

/** Secure-copy settings for remote placement */
export interface SshSettings {
  host: string;
  user: string;
  port: number;
  keyPath: string;
  remoteBasePath: string;
}

/** Default runtime settings */
export const DEFAULT_SETTINGS: AppSettings = {
  processMetadata: true,
  untaggedPolicy: 'keep',
  localPlacement: false,
  musicFolder: './music',
  failureReportPath: 'failed_downloads.txt',
  logDir: null,
  ytDlpPath: 'yt-dlp',
  ffmpegPath: 'ffmpeg',
  coverTimeoutMs: 15_000,
  ssh: {
    host: '',
    user: '',
    port: 22,
    keyPath: '',
    remoteBasePath: '',
  },
};
