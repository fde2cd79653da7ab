/**
 * Audio Reader Service
 *
 * Probes converted audio files with the music-metadata library to confirm
 * they are playable containers before a download is reported as successful.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as mm from 'music-metadata';
import { DownloadError, errorMessage } from './errors';

/** Container facts read from an audio file */
export interface AudioProbe {
  filePath: string;
  /** File size in bytes */
  fileSize: number;
  /** Container name reported by music-metadata (e.g. "MPEG") */
  container: string | null;
  /** Codec name (e.g. "MPEG 1 Layer 3") */
  codec: string | null;
  /** Duration in seconds */
  duration: number;
  /** Bitrate in bits per second, when known */
  bitrate: number | null;
}

/**
 * Reads container information from an audio file.
 *
 * @param filePath - Path to the audio file
 * @returns Container facts for the file
 * @throws DownloadError (INVALID_CONTAINER) when the file is missing, empty,
 *         unparseable or has no audio duration
 */
export async function probeAudioFile(filePath: string): Promise<AudioProbe> {
  let fileSize: number;
  try {
    fileSize = fs.statSync(filePath).size;
  } catch (error: unknown) {
    throw new DownloadError(`Converted file not found: ${errorMessage(error)}`, {
      step: 'probing',
      reason: 'INVALID_CONTAINER',
    });
  }

  if (fileSize === 0) {
    throw new DownloadError(`Converted file is empty: ${path.basename(filePath)}`, {
      step: 'probing',
      reason: 'INVALID_CONTAINER',
    });
  }

  let metadata: mm.IAudioMetadata;
  try {
    metadata = await mm.parseFile(filePath, { duration: true, skipCovers: true });
  } catch (error: unknown) {
    throw new DownloadError(
      `Failed to parse audio file "${path.basename(filePath)}": ${errorMessage(error)}`,
      {
        step: 'probing',
        reason: 'INVALID_CONTAINER',
        cause: error instanceof Error ? error : undefined,
      },
    );
  }

  const duration = metadata.format.duration ?? 0;
  if (duration <= 0) {
    throw new DownloadError(`No playable audio in "${path.basename(filePath)}"`, {
      step: 'probing',
      reason: 'INVALID_CONTAINER',
    });
  }

  return {
    filePath,
    fileSize,
    container: metadata.format.container ?? null,
    codec: metadata.format.codec ?? null,
    duration,
    bitrate: metadata.format.bitrate ?? null,
  };
}
