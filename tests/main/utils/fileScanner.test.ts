import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  isAudioFile,
  findAudioFiles,
  sanitizeFilename,
  getUniqueFilePath,
} from '../../../src/main/utils/fileScanner';

describe('fileScanner', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'filescanner-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('isAudioFile', () => {
    it('should accept .mp3 in any case', () => {
      expect(isAudioFile('song.mp3')).toBe(true);
      expect(isAudioFile('/music/Song.MP3')).toBe(true);
    });

    it('should reject other extensions', () => {
      expect(isAudioFile('song.webm')).toBe(false);
      expect(isAudioFile('song.m4a')).toBe(false);
      expect(isAudioFile('mp3')).toBe(false);
    });
  });

  describe('findAudioFiles', () => {
    it('should return sorted MP3 paths', () => {
      fs.writeFileSync(path.join(tempDir, 'c_song.mp3'), '');
      fs.writeFileSync(path.join(tempDir, 'a_song.mp3'), '');
      fs.writeFileSync(path.join(tempDir, 'b_song.mp3'), '');

      expect(findAudioFiles(tempDir)).toEqual([
        path.join(tempDir, 'a_song.mp3'),
        path.join(tempDir, 'b_song.mp3'),
        path.join(tempDir, 'c_song.mp3'),
      ]);
    });

    it('should ignore leftovers of the conversion', () => {
      fs.writeFileSync(path.join(tempDir, 'song.mp3'), '');
      fs.writeFileSync(path.join(tempDir, 'song.webm.part'), '');
      fs.writeFileSync(path.join(tempDir, 'song.jpg'), '');

      expect(findAudioFiles(tempDir)).toEqual([path.join(tempDir, 'song.mp3')]);
    });

    it('should not descend into subdirectories', () => {
      const subDir = path.join(tempDir, 'nested.mp3');
      fs.mkdirSync(subDir);
      fs.writeFileSync(path.join(subDir, 'inner.mp3'), '');

      expect(findAudioFiles(tempDir)).toEqual([]);
    });

    it('should return an empty array for a missing directory', () => {
      expect(findAudioFiles(path.join(tempDir, 'nonexistent'))).toEqual([]);
    });
  });

  describe('sanitizeFilename', () => {
    it('should remove characters invalid on Windows', () => {
      expect(sanitizeFilename('song/with:invalid*chars?.mp3')).toBe('songwithinvalidchars.mp3');
      expect(sanitizeFilename('song"name"<test>.mp3')).toBe('songnametest.mp3');
      expect(sanitizeFilename('song|name\\test.mp3')).toBe('songnametest.mp3');
    });

    it('should turn the full-width bar into a hyphen', () => {
      expect(sanitizeFilename('Artist ｜ Song.mp3')).toBe('Artist - Song.mp3');
    });

    it('should drop control characters', () => {
      expect(sanitizeFilename('Song\u0007\tName.mp3')).toBe('SongName.mp3');
    });

    it('should collapse and trim whitespace', () => {
      expect(sanitizeFilename('  song   name   test.mp3  ')).toBe('song name test.mp3');
    });

    it('should not modify valid filenames', () => {
      expect(sanitizeFilename('Artist - Song Name.mp3')).toBe('Artist - Song Name.mp3');
    });
  });

  describe('getUniqueFilePath', () => {
    it('should return the same path if the file does not exist', () => {
      const filePath = path.join(tempDir, 'newfile.mp3');
      expect(getUniqueFilePath(filePath)).toBe(filePath);
    });

    it('should append (1) if the file exists', () => {
      const filePath = path.join(tempDir, 'existing.mp3');
      fs.writeFileSync(filePath, '');

      expect(getUniqueFilePath(filePath)).toBe(path.join(tempDir, 'existing (1).mp3'));
    });

    it('should increment the counter past every taken name', () => {
      const filePath = path.join(tempDir, 'song.mp3');
      fs.writeFileSync(filePath, '');
      fs.writeFileSync(path.join(tempDir, 'song (1).mp3'), '');
      fs.writeFileSync(path.join(tempDir, 'song (2).mp3'), '');

      expect(getUniqueFilePath(filePath)).toBe(path.join(tempDir, 'song (3).mp3'));
    });
  });
});
