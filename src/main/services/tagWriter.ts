/**
 * Tag Writer Service
 *
 * Embeds NormalizedTags and an optional cover image into an MP3 file's
 * ID3v2 tag block.
 *
 * Key design decisions:
 * - Uses `node-id3` to encode the managed frames
 * - The existing tag is split into raw frames; only the managed frame IDs are
 *   dropped and every other frame is copied byte for byte, including frames
 *   node-id3 cannot decode (MCDI, RVA2, ...)
 * - An ID3v2.4 tag stays ID3v2.4; a file without a tag gets ID3v2.3
 * - The tagged file is written beside the original and renamed over it, so
 *   a failed write leaves the original untouched
 * - Does NOT re-encode audio (metadata-only modification)
 */

import * as fs from 'fs';
import * as path from 'path';
import NodeID3 from 'node-id3';
import type { CoverImage, NormalizedTags } from '../../shared/types';
import { TagWriteError, errorMessage } from './errors';
import { buildId3v2Tag, frameForVersion, readId3v2Tag } from '../utils/id3v2';

// ─── Types ────────────────────────────────────────────────────────────────────

/** Managed fields read back from a tagged file (absent when no frame exists) */
export interface EmbeddedTags {
  title?: string;
  artist?: string;
  album?: string;
  albumArtist?: string;
  releaseDate?: string;
  year?: string;
  genre?: string;
  trackNumber?: number;
  comment?: string;
  cover?: { data: Buffer; mimeType: string };
}

// ─── Constants ────────────────────────────────────────────────────────────────

/** Container extensions this writer can tag */
const SUPPORTED_CONTAINERS: readonly string[] = ['.mp3'];

/** Language code written into the comment frame */
const COMMENT_LANGUAGE = 'eng';

/** APIC picture type 3: front cover */
const FRONT_COVER_TYPE = { id: 3, name: 'front cover' };

/** Frame IDs this tool owns; all other frames are carried over untouched */
const MANAGED_FRAME_IDS: ReadonlySet<string> = new Set([
  'TIT2',
  'TPE1',
  'TALB',
  'TPE2',
  'TDRC',
  'TYER',
  'TCON',
  'TRCK',
  'COMM',
  'APIC',
]);

/** Version written when the file has no tag yet (node-id3 encodes 2.3) */
const DEFAULT_ID3_VERSION = 3;

// ─── ID3 Tag Building ─────────────────────────────────────────────────────────

/**
 * Builds the node-id3 tag object for the managed frames.
 * Empty release date and comment, and a null track number, produce no frame.
 *
 * @param tags - Normalized tag values
 * @param cover - Cover image, or null
 * @returns A node-id3 Tags object ready for writing
 */
export function buildId3Tags(tags: NormalizedTags, cover: CoverImage | null): NodeID3.Tags {
  const id3: NodeID3.Tags = {
    title: tags.title,
    artist: tags.artist,
    album: tags.album,
    performerInfo: tags.albumArtist,
    genre: tags.genre,
  };

  if (tags.releaseDate !== '') {
    id3.recordingTime = tags.releaseDate;
    id3.year = tags.releaseDate.slice(0, 4);
  }

  if (tags.trackNumber !== null) {
    id3.trackNumber = String(tags.trackNumber);
  }

  if (tags.comment !== '') {
    id3.comment = { language: COMMENT_LANGUAGE, text: tags.comment };
  }

  if (cover !== null) {
    id3.image = {
      mime: cover.mimeType,
      type: FRONT_COVER_TYPE,
      description: 'Front Cover',
      imageBuffer: cover.data,
    };
  }

  return id3;
}

/**
 * Replaces the managed frames of a file's leading ID3v2 tag.
 * Returns the complete new file contents.
 */
export function retagBuffer(original: Buffer, tags: NormalizedTags, cover: CoverImage | null): Buffer {
  const existing = readId3v2Tag(original);
  const version = existing?.version ?? DEFAULT_ID3_VERSION;

  const managed = readId3v2Tag(NodeID3.create(buildId3Tags(tags, cover)));
  const managedFrames = (managed?.frames ?? []).map((frame) => frameForVersion(frame, version));
  const preserved = (existing?.frames ?? []).filter((frame) => !MANAGED_FRAME_IDS.has(frame.id));

  return Buffer.concat([
    buildId3v2Tag(version, [...managedFrames, ...preserved]),
    original.subarray(existing?.length ?? 0),
  ]);
}

// ─── Tag Writing ──────────────────────────────────────────────────────────────

/**
 * Removes a leftover temp file after a failed write.
 */
function discardTempFile(tempPath: string): void {
  try {
    fs.rmSync(tempPath, { force: true });
  } catch {
    // Best effort; the caller raises the TagWriteError.
  }
}

/**
 * Writes the managed tag frames and optional cover into an MP3 file.
 *
 * Re-running with the same tags produces the same bytes and never
 * duplicates frames.
 *
 * @param filePath - Path to the MP3 file
 * @param tags - Normalized tag values
 * @param cover - Cover image to embed, or null
 * @throws TagWriteError when the container is unsupported, unreadable or
 *         the write cannot be committed
 */
export function embedTags(filePath: string, tags: NormalizedTags, cover: CoverImage | null): void {
  const extension = path.extname(filePath).toLowerCase();
  if (!SUPPORTED_CONTAINERS.includes(extension)) {
    throw new TagWriteError(`Unsupported container format: ${extension || '(none)'}`);
  }

  let original: Buffer;
  let mode: number;
  try {
    original = fs.readFileSync(filePath);
    mode = fs.statSync(filePath).mode & 0o777;
  } catch (error: unknown) {
    throw new TagWriteError(`Cannot open audio file: ${errorMessage(error)}`, {
      cause: error instanceof Error ? error : undefined,
    });
  }

  let tagged: Buffer;
  try {
    tagged = retagBuffer(original, tags, cover);
  } catch (error: unknown) {
    throw new TagWriteError(`Failed to build ID3 tag: ${errorMessage(error)}`, {
      cause: error instanceof Error ? error : undefined,
    });
  }

  const tempPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${process.pid}.tagging`,
  );
  try {
    fs.writeFileSync(tempPath, tagged, { mode });
    fs.renameSync(tempPath, filePath);
  } catch (error: unknown) {
    discardTempFile(tempPath);
    throw new TagWriteError(`Failed to commit tags: ${errorMessage(error)}`, {
      cause: error instanceof Error ? error : undefined,
    });
  }
}

// ─── Tag Reading ──────────────────────────────────────────────────────────────

/**
 * Reads the managed fields back from an MP3 file.
 *
 * @param filePath - Path to the MP3 file
 * @returns The managed fields present in the file's ID3 tag
 * @throws TagWriteError when the file cannot be read
 */
export function readEmbeddedTags(filePath: string): EmbeddedTags {
  let buffer: Buffer;
  try {
    buffer = fs.readFileSync(filePath);
  } catch (error: unknown) {
    throw new TagWriteError(`Cannot open audio file: ${errorMessage(error)}`, {
      cause: error instanceof Error ? error : undefined,
    });
  }

  const id3 = NodeID3.read(buffer, { noRaw: true });
  const result: EmbeddedTags = {};

  if (id3.title !== undefined) result.title = id3.title;
  if (id3.artist !== undefined) result.artist = id3.artist;
  if (id3.album !== undefined) result.album = id3.album;
  if (id3.performerInfo !== undefined) result.albumArtist = id3.performerInfo;
  if (id3.recordingTime !== undefined) result.releaseDate = id3.recordingTime;
  if (id3.year !== undefined) result.year = id3.year;
  if (id3.genre !== undefined) result.genre = id3.genre;
  if (id3.comment !== undefined) result.comment = id3.comment.text;

  if (id3.trackNumber !== undefined) {
    // TRCK may carry "n/total"
    const track = Number.parseInt(id3.trackNumber, 10);
    if (Number.isInteger(track)) result.trackNumber = track;
  }

  if (id3.image !== undefined && typeof id3.image !== 'string') {
    // node-id3 shortens image/jpeg and image/png to "jpeg" and "png" on read
    const mime = id3.image.mime;
    result.cover = {
      data: id3.image.imageBuffer,
      mimeType: mime.includes('/') ? mime : `image/${mime}`,
    };
  }

  return result;
}
