/**
 * Metadata Normalizer Service
 *
 * Turns the loosely-shaped metadata record returned by the downloader into
 * the fixed NormalizedTags schema. The raw record is read exactly once into
 * SourceFields, where every field is either absent or already of the right
 * type; the tag rules below work only on that record.
 *
 * normalizeMetadata never throws: each tag falls back to a fixed default
 * when the source has nothing usable.
 */

import type { NormalizedTags } from '../../shared/types';
import { sanitizeFilename } from '../utils/fileScanner';

// ─── Types ────────────────────────────────────────────────────────────────────

/** Source fields the normalizer understands, each present only when well-formed */
export interface SourceFields {
  title?: string;
  uploader?: string;
  channel?: string;
  playlistTitle?: string;
  playlistIndex?: number;
  /** Eight-digit YYYYMMDD string */
  releaseDate?: string;
  /** Eight-digit YYYYMMDD string */
  uploadDate?: string;
  categories: string[];
  description?: string;
  viewCount?: number;
  likeCount?: number;
}

// ─── Constants ───────────────────────────────────────────────────────────────

const UNKNOWN_TITLE = 'Unknown Title';
const UNKNOWN_ARTIST = 'Unknown Artist';
const UNKNOWN_GENRE = 'Unknown Genre';
const SINGLES_ALBUM_SUFFIX = ' - Singles';

/** Maximum description length carried into the comment tag, in code points */
export const MAX_DESCRIPTION_LENGTH = 500;

// ─── Field Readers ───────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(raw: Record<string, unknown>, key: string): string | undefined {
  const value = raw[key];
  if (typeof value !== 'string') return undefined;
  return value.trim().length > 0 ? value : undefined;
}

function readCount(raw: Record<string, unknown>, key: string): number | undefined {
  const value = raw[key];
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) return undefined;
  return value;
}

function readDateDigits(raw: Record<string, unknown>, key: string): string | undefined {
  const value = raw[key];
  if (typeof value !== 'string' && typeof value !== 'number') return undefined;
  const digits = String(value).trim();
  return /^\d{8}$/.test(digits) ? digits : undefined;
}

function readStringList(raw: Record<string, unknown>, key: string): string[] {
  const value = raw[key];
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === 'string' && item.trim().length > 0);
}

/**
 * Reads the raw downloader record into SourceFields.
 * Anything that is missing, null, or of an unexpected type is left out.
 */
export function readSourceFields(raw: unknown): SourceFields {
  if (!isRecord(raw)) {
    return { categories: [] };
  }

  return {
    title: readString(raw, 'title'),
    uploader: readString(raw, 'uploader'),
    channel: readString(raw, 'channel'),
    playlistTitle: readString(raw, 'playlist_title') ?? readString(raw, 'playlist'),
    playlistIndex: readCount(raw, 'playlist_index'),
    releaseDate: readDateDigits(raw, 'release_date'),
    uploadDate: readDateDigits(raw, 'upload_date'),
    categories: readStringList(raw, 'categories'),
    description: readString(raw, 'description'),
    viewCount: readCount(raw, 'view_count'),
    likeCount: readCount(raw, 'like_count'),
  };
}

// ─── Sanitizers ──────────────────────────────────────────────────────────────

/** Surrogate halves without their partner; not encodable as UTF-16 text */
const LONE_SURROGATES = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

/**
 * Cleans a single-line tag value: unpaired surrogates are dropped, control
 * characters become spaces, then characters invalid in file names are removed.
 */
export function sanitizeTagText(value: string): string {
  return sanitizeFilename(
    value.replace(LONE_SURROGATES, '').replace(/[\u0000-\u001f\u007f]/g, ' '),
  );
}

/**
 * Cleans a multi-line tag value: line breaks are normalized to \n and kept;
 * other control characters and unpaired surrogates are removed.
 */
export function sanitizeMultilineText(value: string): string {
  return value
    .replace(LONE_SURROGATES, '')
    .replace(/\r\n?/g, '\n')
    .replace(/[\u0000-\u0009\u000b-\u001f\u007f]/g, '')
    .trim();
}

// ─── Tag Rules ───────────────────────────────────────────────────────────────

/** First candidate that is non-empty after sanitizing, or the fallback */
function firstClean(candidates: Array<string | undefined>, fallback: string): string {
  for (const candidate of candidates) {
    if (candidate === undefined) continue;
    const clean = sanitizeTagText(candidate);
    if (clean.length > 0) return clean;
  }
  return fallback;
}

/**
 * Converts YYYYMMDD into YYYY-MM-DD when it names a real calendar date.
 * @returns The ISO date, or an empty string
 */
export function parseCompactDate(digits: string | undefined): string {
  if (digits === undefined || !/^\d{8}$/.test(digits)) return '';

  const year = Number(digits.slice(0, 4));
  const month = Number(digits.slice(4, 6));
  const day = Number(digits.slice(6, 8));
  const date = new Date(Date.UTC(year, month - 1, day));

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return '';
  }

  return `${digits.slice(0, 4)}-${digits.slice(4, 6)}-${digits.slice(6, 8)}`;
}

/**
 * Builds the comment: truncated description and view/like counts,
 * separated by a blank line.
 */
export function buildComment(fields: SourceFields): string {
  const parts: string[] = [];

  if (fields.description !== undefined) {
    const description = sanitizeMultilineText(fields.description);
    // Counted in code points so a surrogate pair is never split
    const codePoints = Array.from(description);
    if (codePoints.length > MAX_DESCRIPTION_LENGTH) {
      parts.push(`${codePoints.slice(0, MAX_DESCRIPTION_LENGTH).join('')}...`);
    } else if (description.length > 0) {
      parts.push(description);
    }
  }

  const stats: string[] = [];
  if (fields.viewCount !== undefined) {
    stats.push(`Views: ${fields.viewCount.toLocaleString('en-US')}`);
  }
  if (fields.likeCount !== undefined) {
    stats.push(`Likes: ${fields.likeCount.toLocaleString('en-US')}`);
  }
  if (stats.length > 0) {
    parts.push(stats.join(' | '));
  }

  return parts.join('\n\n');
}

/**
 * Normalizes a raw metadata record into the fixed tag schema.
 *
 * @param raw - Metadata record from the downloader (any shape)
 * @param fallbackTitle - Title used when the source has none, usually the file name
 * @returns A fully populated NormalizedTags record
 */
export function normalizeMetadata(raw: unknown, fallbackTitle: string): NormalizedTags {
  const fields = readSourceFields(raw);

  const title = firstClean([fields.title, fallbackTitle], UNKNOWN_TITLE);
  const artist = firstClean([fields.uploader, fields.channel], UNKNOWN_ARTIST);

  const playlistTitle =
    fields.playlistTitle !== undefined ? sanitizeTagText(fields.playlistTitle) : '';
  const album = playlistTitle.length > 0 ? playlistTitle : `${artist}${SINGLES_ALBUM_SUFFIX}`;

  const genres = fields.categories.map(sanitizeTagText).filter((genre) => genre.length > 0);

  const trackNumber =
    playlistTitle.length > 0 && fields.playlistIndex !== undefined && fields.playlistIndex > 0
      ? fields.playlistIndex
      : null;

  return {
    title,
    artist,
    album,
    albumArtist: artist,
    releaseDate: parseCompactDate(fields.releaseDate) || parseCompactDate(fields.uploadDate),
    genre: genres.length > 0 ? genres.join(', ') : UNKNOWN_GENRE,
    trackNumber,
    comment: buildComment(fields),
  };
}
