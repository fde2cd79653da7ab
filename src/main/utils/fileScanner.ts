/**
 * File Scanner Utility
 *
 * Finds converted audio files in a work directory and builds safe,
 * collision-free destination file names.
 */

import * as fs from 'fs';
import * as path from 'path';

/** Extension of the audio files produced by the converter */
const AUDIO_EXTENSION = '.mp3';

/**
 * Checks if a file has the converter's audio extension.
 */
export function isAudioFile(filePath: string): boolean {
  return path.extname(filePath).toLowerCase() === AUDIO_EXTENSION;
}

/**
 * Lists audio files directly inside a directory (not recursive).
 * @param dirPath - Directory to scan
 * @returns Sorted absolute paths; empty when the directory cannot be read
 */
export function findAudioFiles(dirPath: string): string[] {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dirPath, { withFileTypes: true });
  } catch {
    return [];
  }

  return entries
    .filter((entry) => entry.isFile() && isAudioFile(entry.name))
    .map((entry) => path.join(dirPath, entry.name))
    .sort();
}

/** Characters that are invalid in file names on at least one platform */
const INVALID_FILENAME_CHARS = /[/\\:*?"<>|]/g;

/**
 * Sanitizes a filename by removing characters invalid on Windows,
 * the full-width vertical bar some sources use as a separator, and
 * control characters.
 * @param filename - The filename to sanitize
 * @returns Sanitized filename safe for any local or remote filesystem
 */
export function sanitizeFilename(filename: string): string {
  return filename
    .replace(/[\u0000-\u001f\u007f]/g, '')
    .replace(/｜/g, '-')
    .replace(INVALID_FILENAME_CHARS, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Generates a unique file path, appending (1), (2), etc. if the file already exists.
 * @param desiredPath - The desired file path
 * @returns A unique file path that doesn't conflict with existing files
 */
export function getUniqueFilePath(desiredPath: string): string {
  if (!fs.existsSync(desiredPath)) {
    return desiredPath;
  }

  const dir = path.dirname(desiredPath);
  const ext = path.extname(desiredPath);
  const baseName = path.basename(desiredPath, ext);

  let counter = 1;
  let candidatePath: string;

  do {
    candidatePath = path.join(dir, `${baseName} (${counter})${ext}`);
    counter++;
  } while (fs.existsSync(candidatePath));

  return candidatePath;
}
