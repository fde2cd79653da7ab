/**
 * ID3v2 Frame Utility
 *
 * Splits the ID3v2 tag at the start of an MP3 file into raw frames and
 * assembles a tag from raw frames. Frames are carried as stored, so frames
 * no tag library can decode survive a rewrite unchanged.
 *
 * Handles ID3v2.3 and ID3v2.4 (unsynchronisation, extended header, footer).
 */

/** One frame, header included, exactly as stored in the tag */
export interface Id3v2Frame {
  /** Four-character frame ID (e.g. "TIT2") */
  id: string;
  bytes: Buffer;
}

/** The ID3v2 tag found at the start of a file */
export interface Id3v2Tag {
  /** Major version: 3 or 4 */
  version: number;
  frames: Id3v2Frame[];
  /** Bytes the tag occupies at the start of the file, footer included */
  length: number;
}

const HEADER_SIZE = 10;
const FRAME_HEADER_SIZE = 10;
const FRAME_ID = /^[A-Z0-9]{4}$/;
const MAX_SYNCSAFE = 0x0fffffff;

const FLAG_UNSYNCHRONISATION = 0x80;
const FLAG_EXTENDED_HEADER = 0x40;
const FLAG_FOOTER = 0x10;

/**
 * Reads a 28-bit syncsafe integer (7 bits per byte).
 */
export function decodeSyncsafe(bytes: Buffer, offset: number): number {
  return (
    ((bytes[offset] & 0x7f) << 21) |
    ((bytes[offset + 1] & 0x7f) << 14) |
    ((bytes[offset + 2] & 0x7f) << 7) |
    (bytes[offset + 3] & 0x7f)
  );
}

/**
 * Encodes a size as a 4-byte syncsafe integer.
 * @throws Error when the value does not fit in 28 bits
 */
export function encodeSyncsafe(value: number): Buffer {
  if (!Number.isInteger(value) || value < 0 || value > MAX_SYNCSAFE) {
    throw new Error(`ID3v2 size out of range: ${value}`);
  }
  return Buffer.from([(value >> 21) & 0x7f, (value >> 14) & 0x7f, (value >> 7) & 0x7f, value & 0x7f]);
}

/**
 * Reverses tag-level unsynchronisation: every 0xFF 0x00 becomes 0xFF.
 */
export function removeUnsynchronisation(data: Buffer): Buffer {
  const out = Buffer.alloc(data.length);
  let length = 0;
  for (let i = 0; i < data.length; i++) {
    out[length++] = data[i];
    if (data[i] === 0xff && data[i + 1] === 0x00) i++;
  }
  return out.subarray(0, length);
}

function splitFrames(body: Buffer, version: number): Id3v2Frame[] {
  const frames: Id3v2Frame[] = [];
  let offset = 0;

  while (offset + FRAME_HEADER_SIZE <= body.length) {
    const id = body.toString('latin1', offset, offset + 4);
    // Padding (or anything that is not a frame header) ends the frame list
    if (!FRAME_ID.test(id)) break;

    const size = version === 4 ? decodeSyncsafe(body, offset + 4) : body.readUInt32BE(offset + 4);
    const end = offset + FRAME_HEADER_SIZE + size;
    if (end > body.length) {
      throw new Error(`ID3v2 frame ${id} runs past the end of the tag`);
    }

    frames.push({ id, bytes: Buffer.from(body.subarray(offset, end)) });
    offset = end;
  }

  return frames;
}

/**
 * Reads the ID3v2 tag at the start of a file.
 *
 * @param file - Full file contents
 * @returns The tag, or null when the file does not start with one
 * @throws Error for ID3v2 versions other than 2.3/2.4 and for truncated tags
 */
export function readId3v2Tag(file: Buffer): Id3v2Tag | null {
  if (file.length < HEADER_SIZE || file.toString('latin1', 0, 3) !== 'ID3') {
    return null;
  }

  const version = file[3];
  if (version !== 3 && version !== 4) {
    throw new Error(`Unsupported ID3v2.${version} tag`);
  }

  const flags = file[5];
  const size = decodeSyncsafe(file, 6);
  if (HEADER_SIZE + size > file.length) {
    throw new Error('ID3v2 tag is longer than the file');
  }

  let body = file.subarray(HEADER_SIZE, HEADER_SIZE + size);
  // In 2.4 unsynchronisation is flagged per frame and travels with the frame
  if (version === 3 && (flags & FLAG_UNSYNCHRONISATION) !== 0) {
    body = removeUnsynchronisation(body);
  }

  let offset = 0;
  if ((flags & FLAG_EXTENDED_HEADER) !== 0) {
    if (body.length < 4) {
      throw new Error('ID3v2 extended header is truncated');
    }
    offset = version === 3 ? 4 + body.readUInt32BE(0) : decodeSyncsafe(body, 0);
  }

  const footer = version === 4 && (flags & FLAG_FOOTER) !== 0 ? HEADER_SIZE : 0;

  return {
    version,
    frames: splitFrames(body.subarray(offset), version),
    length: HEADER_SIZE + size + footer,
  };
}

/**
 * Re-encodes the size field of a frame built for ID3v2.3 for the given
 * version (syncsafe in 2.4). Frame flags must be clear.
 */
export function frameForVersion(frame: Id3v2Frame, version: number): Id3v2Frame {
  if (version !== 4) return frame;
  const bytes = Buffer.from(frame.bytes);
  encodeSyncsafe(bytes.readUInt32BE(4)).copy(bytes, 4);
  return { id: frame.id, bytes };
}

/**
 * Assembles a tag (no padding, no flags) from frames encoded for `version`.
 */
export function buildId3v2Tag(version: number, frames: readonly Id3v2Frame[]): Buffer {
  const body = Buffer.concat(frames.map((frame) => frame.bytes));
  return Buffer.concat([
    Buffer.from('ID3', 'latin1'),
    Buffer.from([version, 0, 0]),
    encodeSyncsafe(body.length),
    body,
  ]);
}
