/**
 * Cover Art Resolver Service
 *
 * Picks the best thumbnail offered by the source and downloads it once.
 * Cover art is best-effort: an empty candidate list, a failed fetch or an
 * empty response all resolve to null and the file is tagged without art.
 */

import * as path from 'path';
import axios from 'axios';
import {
  COVER_MIME_TYPES,
  type CoverCandidate,
  type CoverFormat,
  type CoverImage,
  type CoverMimeType,
} from '../../shared/types';
import { FetchError, errorMessage, wrapError } from './errors';
import type { Logger } from './logger';

// ─── Types ────────────────────────────────────────────────────────────────────

/** Bytes and reported content type of a fetched image */
export interface FetchedImage {
  data: Buffer;
  /** Content-Type header without parameters, or null when absent */
  contentType: string | null;
}

/** Network collaborator used to download cover images */
export interface ImageFetcher {
  /** Throws FetchError on network failure, timeout or HTTP error status */
  get(url: string, timeoutMs: number): Promise<FetchedImage>;
}

/** Options for the CoverArtResolver */
export interface CoverArtResolverOptions {
  /** Image fetcher (defaults to AxiosImageFetcher) */
  fetcher?: ImageFetcher;
  /** Timeout for the single fetch attempt, in milliseconds */
  timeoutMs?: number;
  logger?: Logger;
}

// ─── Constants ───────────────────────────────────────────────────────────────

const DEFAULT_TIMEOUT_MS = 15_000;

const EXTENSION_FORMATS: Readonly<Record<string, CoverFormat>> = {
  '.jpg': 'jpeg',
  '.jpeg': 'jpeg',
  '.png': 'png',
  '.webp': 'webp',
};

// ─── Axios Fetcher ───────────────────────────────────────────────────────────

/**
 * Default ImageFetcher: one axios GET, redirects followed, bounded by timeout.
 */
export class AxiosImageFetcher implements ImageFetcher {
  async get(url: string, timeoutMs: number): Promise<FetchedImage> {
    try {
      const response = await axios.get<ArrayBuffer>(url, {
        responseType: 'arraybuffer',
        timeout: timeoutMs,
        maxRedirects: 5,
        validateStatus: (status) => status < 400,
      });

      const header: unknown = response.headers['content-type'];
      const contentType =
        typeof header === 'string' ? header.split(';')[0].trim().toLowerCase() || null : null;

      return { data: Buffer.from(response.data), contentType };
    } catch (error: unknown) {
      if (axios.isAxiosError(error)) {
        throw new FetchError(`Cover fetch failed: ${error.message}`, {
          url,
          statusCode: error.response?.status,
          cause: error,
        });
      }
      throw wrapError(error, 'FetchError', { url, step: 'fetching_cover' });
    }
  }
}

// ─── Candidate Extraction ────────────────────────────────────────────────────

/**
 * Infers an embeddable image format from the URL path extension.
 * @returns The format, or null for other extensions and unparseable URLs
 */
export function inferCoverFormat(url: string): CoverFormat | null {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return null;
  }
  return EXTENSION_FORMATS[path.posix.extname(pathname).toLowerCase()] ?? null;
}

function readDimension(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? Math.floor(value) : 0;
}

/** Parses a "1280x720" resolution string */
function readResolution(value: unknown): { width: number; height: number } | null {
  if (typeof value !== 'string') return null;
  const match = value.trim().match(/^(\d+)x(\d+)$/);
  if (!match) return null;
  return { width: Number(match[1]), height: Number(match[2]) };
}

function toCandidate(entry: unknown): CoverCandidate | null {
  if (typeof entry !== 'object' || entry === null) return null;
  const url: unknown = Reflect.get(entry, 'url');
  if (typeof url !== 'string' || url.length === 0) return null;

  let width = readDimension(Reflect.get(entry, 'width'));
  let height = readDimension(Reflect.get(entry, 'height'));
  if (width === 0 || height === 0) {
    const resolution = readResolution(Reflect.get(entry, 'resolution'));
    if (resolution) {
      width = resolution.width;
      height = resolution.height;
    }
  }

  return { url, width, height, format: inferCoverFormat(url) };
}

/**
 * Reads cover candidates from a raw metadata record, in source order.
 * Uses the `thumbnails` list, or the single `thumbnail` URL when the list
 * yields nothing.
 */
export function extractCoverCandidates(raw: unknown): CoverCandidate[] {
  if (typeof raw !== 'object' || raw === null) return [];

  const candidates: CoverCandidate[] = [];
  const thumbnails: unknown = Reflect.get(raw, 'thumbnails');
  if (Array.isArray(thumbnails)) {
    for (const entry of thumbnails) {
      const candidate = toCandidate(entry);
      if (candidate) candidates.push(candidate);
    }
  }

  if (candidates.length === 0) {
    const single: unknown = Reflect.get(raw, 'thumbnail');
    if (typeof single === 'string' && single.length > 0) {
      candidates.push({ url: single, width: 0, height: 0, format: inferCoverFormat(single) });
    }
  }

  return candidates;
}

// ─── Selection ───────────────────────────────────────────────────────────────

/**
 * Chooses the embeddable candidate with the largest width × height.
 * On equal area the earlier candidate wins.
 */
export function selectCoverCandidate(
  candidates: readonly CoverCandidate[],
): (CoverCandidate & { format: CoverFormat }) | null {
  let best: (CoverCandidate & { format: CoverFormat }) | null = null;
  let bestArea = -1;

  for (const candidate of candidates) {
    const format = candidate.format;
    if (format === null) continue;
    const area = candidate.width * candidate.height;
    if (area > bestArea) {
      best = { ...candidate, format };
      bestArea = area;
    }
  }

  return best;
}

function isCoverMimeType(value: string | null): value is CoverMimeType {
  return value === 'image/jpeg' || value === 'image/png' || value === 'image/webp';
}

// ─── Resolver ────────────────────────────────────────────────────────────────

/**
 * Resolves the cover image for one work item.
 *
 * Usage:
 * ```typescript
 * const resolver = new CoverArtResolver({ logger });
 * const cover = await resolver.resolve(extractCoverCandidates(raw));
 * ```
 */
export class CoverArtResolver {
  private readonly fetcher: ImageFetcher;
  private readonly timeoutMs: number;
  private readonly logger: Logger | null;

  constructor(options: CoverArtResolverOptions = {}) {
    this.fetcher = options.fetcher ?? new AxiosImageFetcher();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger ?? null;
  }

  /**
   * Selects the best candidate and fetches it with a single attempt.
   *
   * @param candidates - Cover candidates in source order
   * @param sourceUrl - URL of the work item, for log context
   * @returns The cover image, or null when none could be resolved
   */
  async resolve(
    candidates: readonly CoverCandidate[],
    sourceUrl?: string,
  ): Promise<CoverImage | null> {
    const chosen = selectCoverCandidate(candidates);
    if (!chosen) {
      this.logger?.debug('No embeddable cover candidate', { url: sourceUrl, step: 'fetching_cover' });
      return null;
    }

    this.logger?.debug(
      `Fetching cover ${chosen.width}x${chosen.height} ${chosen.format}: ${chosen.url}`,
      { url: sourceUrl, step: 'fetching_cover' },
    );

    let fetched: FetchedImage;
    try {
      fetched = await this.fetcher.get(chosen.url, this.timeoutMs);
    } catch (error: unknown) {
      this.logger?.debug(`Cover fetch failed, continuing without art: ${errorMessage(error)}`, {
        url: sourceUrl,
        step: 'fetching_cover',
        category: 'FetchError',
      });
      return null;
    }

    if (fetched.data.length === 0) {
      this.logger?.debug('Cover fetch returned an empty body', {
        url: sourceUrl,
        step: 'fetching_cover',
        category: 'FetchError',
      });
      return null;
    }

    const mimeType = isCoverMimeType(fetched.contentType)
      ? fetched.contentType
      : COVER_MIME_TYPES[chosen.format];

    return { data: fetched.data, mimeType };
  }
}
