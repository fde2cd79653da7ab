/**
 * Tests for Settings Manager Service
 *
 * Covers batch file validation and loading, work item expansion and
 * environment settings.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  DEFAULT_DESTINATION,
  loadBatchConfig,
  loadEnvironmentSettings,
  resolveWorkItems,
  validateBatchConfig,
  validatePort,
} from '../../../src/main/services/settingsManager';
import { ConfigurationError } from '../../../src/main/services/errors';
import { DEFAULT_SETTINGS } from '../../../src/shared/types';

// ─── Helper ──────────────────────────────────────────────────────────────────

/** Creates a unique temporary directory for test isolation */
function createTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'settings-test-'));
}

// ─── Tests ───────────────────────────────────────────────────────────────────

describe('settingsManager', () => {
  // ─── validatePort ──────────────────────────────────────────────────

  describe('validatePort', () => {
    it('should accept valid ports as numbers or strings', () => {
      expect(validatePort(2222)).toBe(2222);
      expect(validatePort(' 8022 ')).toBe(8022);
    });

    it('should fall back to 22 for invalid values', () => {
      expect(validatePort(undefined)).toBe(22);
      expect(validatePort('')).toBe(22);
      expect(validatePort('ssh')).toBe(22);
      expect(validatePort(0)).toBe(22);
      expect(validatePort(70000)).toBe(22);
      expect(validatePort(22.5)).toBe(22);
    });
  });

  // ─── validateBatchConfig ───────────────────────────────────────────

  describe('validateBatchConfig', () => {
    it('should read tracks and the default destination', () => {
      expect(
        validateBatchConfig({
          default_destination: ' Rock ',
          tracks: [
            { url: ' https://www.youtube.com/watch?v=one ', destination: 'Pop' },
            { url: 'https://www.youtube.com/watch?v=two' },
          ],
        }),
      ).toEqual({
        defaultDestination: 'Rock',
        tracks: [
          { url: 'https://www.youtube.com/watch?v=one', destination: 'Pop' },
          { url: 'https://www.youtube.com/watch?v=two', destination: null },
        ],
      });
    });

    it('should default the destination to "Music"', () => {
      const config = validateBatchConfig({ tracks: [{ url: 'https://www.youtube.com/watch?v=x' }] });
      expect(config.defaultDestination).toBe(DEFAULT_DESTINATION);
      expect(DEFAULT_DESTINATION).toBe('Music');
    });

    it('should drop tracks without a usable URL', () => {
      const config = validateBatchConfig({
        tracks: [
          null,
          'https://www.youtube.com/watch?v=bare',
          { url: '   ' },
          { url: 42 },
          { destination: 'Pop' },
          { url: 'https://www.youtube.com/watch?v=kept', destination: '  ' },
        ],
      });
      expect(config.tracks).toEqual([
        { url: 'https://www.youtube.com/watch?v=kept', destination: null },
      ]);
    });

    it('should reject documents that are not objects', () => {
      expect(() => validateBatchConfig([])).toThrow('Batch file must contain a JSON object');
      expect(() => validateBatchConfig(null)).toThrow(ConfigurationError);
    });

    it('should reject a missing tracks list', () => {
      expect(() => validateBatchConfig({ default_destination: 'Rock' })).toThrow(
        'Batch file has no "tracks" list',
      );
    });

    it('should reject a list without usable tracks', () => {
      expect(() => validateBatchConfig({ tracks: [{ url: '' }] })).toThrow(
        'Batch file lists no track with a URL',
      );
    });
  });

  // ─── loadBatchConfig ───────────────────────────────────────────────

  describe('loadBatchConfig', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = createTempDir();
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should load a valid batch file', async () => {
      const filePath = path.join(tempDir, 'tracks_config.json');
      fs.writeFileSync(
        filePath,
        JSON.stringify({ tracks: [{ url: 'https://www.youtube.com/watch?v=one' }] }),
      );

      await expect(loadBatchConfig(filePath)).resolves.toEqual({
        defaultDestination: 'Music',
        tracks: [{ url: 'https://www.youtube.com/watch?v=one', destination: null }],
      });
    });

    it('should report a missing file', async () => {
      const filePath = path.join(tempDir, 'missing.json');

      const error = await loadBatchConfig(filePath).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigurationError);
      expect((error as ConfigurationError).message.startsWith(
        `Cannot read batch file "${filePath}": `,
      )).toBe(true);
    });

    it('should report invalid JSON', async () => {
      const filePath = path.join(tempDir, 'broken.json');
      fs.writeFileSync(filePath, '{ "tracks": [');

      const error = await loadBatchConfig(filePath).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigurationError);
      expect((error as ConfigurationError).message.startsWith(
        `Batch file "${filePath}" is not valid JSON: `,
      )).toBe(true);
    });
  });

  // ─── resolveWorkItems ──────────────────────────────────────────────

  describe('resolveWorkItems', () => {
    it('should apply the default destination in file order', () => {
      expect(
        resolveWorkItems({
          defaultDestination: 'Rock',
          tracks: [
            { url: 'https://www.youtube.com/watch?v=one', destination: null },
            { url: 'https://www.youtube.com/watch?v=two', destination: 'Jazz' },
          ],
        }),
      ).toEqual([
        { url: 'https://www.youtube.com/watch?v=one', destination: 'Rock' },
        { url: 'https://www.youtube.com/watch?v=two', destination: 'Jazz' },
      ]);
    });
  });

  // ─── loadEnvironmentSettings ───────────────────────────────────────

  describe('loadEnvironmentSettings', () => {
    it('should return the defaults for an empty environment', () => {
      expect(loadEnvironmentSettings({})).toEqual(DEFAULT_SETTINGS);
    });

    it('should read every variable', () => {
      const settings = loadEnvironmentSettings({
        SSH_HOST: 'nas.local',
        SSH_USER: 'music',
        SSH_PORT: '2222',
        SSH_KEY_PATH: '/home/test/.ssh/test_key',
        REMOTE_BASE_PATH: '/srv/music',
        MUSIC_FOLDER: '/data/music',
        FAILURE_REPORT_PATH: 'reports/failed.txt',
        YT_DLP_PATH: '/opt/yt-dlp',
        FFMPEG_PATH: '/opt/ffmpeg',
        LOG_DIR: 'logs',
      });

      expect(settings).toEqual({
        ...DEFAULT_SETTINGS,
        musicFolder: '/data/music',
        failureReportPath: 'reports/failed.txt',
        logDir: 'logs',
        ytDlpPath: '/opt/yt-dlp',
        ffmpegPath: '/opt/ffmpeg',
        ssh: {
          host: 'nas.local',
          user: 'music',
          port: 2222,
          keyPath: '/home/test/.ssh/test_key',
          remoteBasePath: '/srv/music',
        },
      });
    });

    it('should treat blank values as unset', () => {
      const settings = loadEnvironmentSettings({ MUSIC_FOLDER: '  ', LOG_DIR: '' });
      expect(settings.musicFolder).toBe('./music');
      expect(settings.logDir).toBeNull();
    });
  });
});
