/* eslint-disable @typescript-eslint/unbound-method */
import * as path from 'path';
import * as childProcess from 'child_process';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  YtDlpDownloader,
  buildYtDlpArgs,
  classifyDownloadFailure,
  extractErrorLine,
  parseInfoJson,
  verifyToolchain,
} from '../../../src/main/services/downloader';
import type { AudioProbe } from '../../../src/main/services/audioReader';
import { ConfigurationError, DownloadError } from '../../../src/main/services/errors';
import { cleanupTempDir, createTempDir, writeMp3File } from '../../helpers/mp3Fixture';

// ─── Mocks ───────────────────────────────────────────────────────────────────

vi.mock('child_process', () => ({
  execFile: vi.fn(),
}));

type ExecCallback = (error: Error | null, stdout: string, stderr: string) => void;

/** Get the mocked execFile function */
function getMockedExecFile(): ReturnType<typeof vi.mocked<typeof childProcess.execFile>> {
  return vi.mocked(childProcess.execFile);
}

/** Mock every execFile call with one outcome */
function mockExec(outcome: (file: string) => { error: Error | null; stdout: string; stderr: string }): void {
  getMockedExecFile().mockImplementation(((
    file: string,
    _args: unknown,
    _options: unknown,
    callback: unknown,
  ) => {
    const { error, stdout, stderr } = outcome(file);
    (callback as ExecCallback)(error, stdout, stderr);
  }) as unknown as typeof childProcess.execFile);
}

function exitError(message: string, code: number | string): Error {
  return Object.assign(new Error(message), { code });
}

function stubProbe(filePath: string): Promise<AudioProbe> {
  return Promise.resolve({
    filePath,
    fileSize: 8340,
    container: 'MPEG',
    codec: 'MPEG 1 Layer 3',
    duration: 0.52,
    bitrate: 128000,
  });
}

const SOURCE_URL = 'https://www.youtube.com/watch?v=test123';

// ─── Tests ───────────────────────────────────────────────────────────────────

describe('downloader', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  // ─── buildYtDlpArgs ───────────────────────────────────────────────────

  describe('buildYtDlpArgs', () => {
    it('should build the default argument list', () => {
      expect(buildYtDlpArgs(SOURCE_URL, '/tmp/work')).toEqual([
        '--no-playlist',
        '--format',
        'bestaudio/best',
        '--extract-audio',
        '--audio-format',
        'mp3',
        '--audio-quality',
        '192K',
        '--paths',
        '/tmp/work',
        '--output',
        '%(title)s.%(ext)s',
        '--no-simulate',
        '--no-progress',
        '--print',
        'after_move:%()j',
        SOURCE_URL,
      ]);
    });

    it('should pass a custom ffmpeg location and quality', () => {
      const args = buildYtDlpArgs(SOURCE_URL, '/tmp/work', {
        ffmpegPath: '/opt/ffmpeg/bin/ffmpeg',
        audioQuality: '320K',
      });
      expect(args.slice(6, 10)).toEqual([
        '--audio-quality',
        '320K',
        '--ffmpeg-location',
        '/opt/ffmpeg/bin/ffmpeg',
      ]);
    });

    it('should not pass the default ffmpeg name', () => {
      expect(buildYtDlpArgs(SOURCE_URL, '/tmp/work', { ffmpegPath: 'ffmpeg' })).not.toContain(
        '--ffmpeg-location',
      );
    });
  });

  // ─── Diagnostics ──────────────────────────────────────────────────────

  describe('classifyDownloadFailure', () => {
    it('should recognize known failure messages', () => {
      expect(classifyDownloadFailure('ERROR: [youtube] x: Video unavailable')).toBe('UNAVAILABLE');
      expect(classifyDownloadFailure('ERROR: [youtube] x: Private video. Sign in')).toBe('PRIVATE');
      expect(
        classifyDownloadFailure('ERROR: [youtube] x: Sign in to confirm your age'),
      ).toBe('AGE_RESTRICTED');
      expect(classifyDownloadFailure('ERROR: Unsupported URL: https://example.com')).toBe(
        'UNSUPPORTED_URL',
      );
    });

    it('should default to DOWNLOAD_FAILED', () => {
      expect(classifyDownloadFailure('ERROR: unable to download webpage')).toBe('DOWNLOAD_FAILED');
    });
  });

  describe('extractErrorLine', () => {
    it('should return the last ERROR line without its prefix', () => {
      const stderr = [
        'WARNING: [youtube] falling back',
        'ERROR: first',
        'ERROR: [youtube] test123: Video unavailable',
        '',
      ].join('\n');
      expect(extractErrorLine(stderr)).toBe('[youtube] test123: Video unavailable');
    });

    it('should return null when there is no ERROR line', () => {
      expect(extractErrorLine('WARNING: something')).toBeNull();
    });
  });

  describe('parseInfoJson', () => {
    it('should parse the last JSON object line', () => {
      const stdout = '[info] downloading\n{"title":"First"}\n{"title":"Second","id":"x"}\n';
      expect(parseInfoJson(stdout)).toEqual({ title: 'Second', id: 'x' });
    });

    it('should skip lines that are not JSON objects', () => {
      expect(parseInfoJson('{"title":"Ok"}\n{broken\n')).toEqual({ title: 'Ok' });
      expect(parseInfoJson('["array"]\nplain text')).toBeNull();
    });
  });

  // ─── YtDlpDownloader ──────────────────────────────────────────────────

  describe('YtDlpDownloader', () => {
    let workDir: string;

    beforeEach(() => {
      workDir = createTempDir('downloader-test');
    });

    afterEach(() => {
      cleanupTempDir(workDir);
    });

    it('should return the reported file and the metadata record', async () => {
      const audioPath = writeMp3File(workDir, 'Blue Hour.mp3');
      const info = { title: 'Blue Hour', uploader: 'The Placeholders', filepath: audioPath };
      mockExec(() => ({ error: null, stdout: `${JSON.stringify(info)}\n`, stderr: '' }));

      const downloader = new YtDlpDownloader({ ytDlpPath: '/usr/local/bin/yt-dlp', probe: stubProbe });
      const result = await downloader.fetch(SOURCE_URL, workDir);

      expect(result).toEqual({ audioPath, metadata: info });
      expect(getMockedExecFile()).toHaveBeenCalledWith(
        '/usr/local/bin/yt-dlp',
        buildYtDlpArgs(SOURCE_URL, workDir),
        expect.objectContaining({ encoding: 'utf8' }),
        expect.any(Function),
      );
    });

    it('should find the MP3 in the work directory when no path is reported', async () => {
      const audioPath = writeMp3File(workDir, 'Untitled.mp3');
      mockExec(() => ({ error: null, stdout: '{"title":"Untitled"}\n', stderr: '' }));

      const result = await new YtDlpDownloader({ probe: stubProbe }).fetch(SOURCE_URL, workDir);

      expect(result.audioPath).toBe(path.join(workDir, 'Untitled.mp3'));
      expect(result.audioPath).toBe(audioPath);
    });

    it('should fail with NO_AUDIO_OUTPUT when nothing was produced', async () => {
      mockExec(() => ({ error: null, stdout: '', stderr: '' }));

      const error = await new YtDlpDownloader({ probe: stubProbe })
        .fetch(SOURCE_URL, workDir)
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DownloadError);
      expect((error as DownloadError).reason).toBe('NO_AUDIO_OUTPUT');
      expect((error as DownloadError).message).toBe(`No MP3 file found in ${workDir}`);
      expect((error as DownloadError).url).toBe(SOURCE_URL);
    });

    it('should classify yt-dlp failures', async () => {
      mockExec(() => ({
        error: exitError('Command failed', 1),
        stdout: '',
        stderr: "ERROR: [youtube] test123: Private video. Sign in if you've been granted access\n",
      }));

      const error = await new YtDlpDownloader({ probe: stubProbe })
        .fetch(SOURCE_URL, workDir)
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DownloadError);
      expect((error as DownloadError).reason).toBe('PRIVATE');
      expect((error as DownloadError).step).toBe('downloading');
      expect((error as DownloadError).message).toBe(
        "[youtube] test123: Private video. Sign in if you've been granted access",
      );
    });

    it('should fail with INVALID_CONTAINER when the probe rejects the file', async () => {
      const audioPath = writeMp3File(workDir);
      mockExec(() => ({
        error: null,
        stdout: JSON.stringify({ filepath: audioPath }),
        stderr: '',
      }));

      const downloader = new YtDlpDownloader({
        probe: () => Promise.reject(new Error('No playable audio in "track.mp3"')),
      });
      const error = await downloader.fetch(SOURCE_URL, workDir).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DownloadError);
      expect((error as DownloadError).reason).toBe('INVALID_CONTAINER');
      expect((error as DownloadError).step).toBe('probing');
      expect((error as DownloadError).message).toBe('No playable audio in "track.mp3"');
    });
  });

  // ─── verifyToolchain ──────────────────────────────────────────────────

  describe('verifyToolchain', () => {
    it('should return the first version line of each tool', async () => {
      mockExec((file) =>
        file === 'yt-dlp'
          ? { error: null, stdout: '2024.08.06\n', stderr: '' }
          : { error: null, stdout: 'ffmpeg version 6.1\nbuilt with gcc\n', stderr: '' },
      );

      await expect(verifyToolchain()).resolves.toEqual({
        ytDlpVersion: '2024.08.06',
        ffmpegVersion: 'ffmpeg version 6.1',
      });
    });

    it('should raise ConfigurationError naming a missing binary', async () => {
      mockExec((file) =>
        file === 'yt-dlp'
          ? { error: null, stdout: '2024.08.06\n', stderr: '' }
          : { error: exitError('spawn /opt/ffmpeg ENOENT', 'ENOENT'), stdout: '', stderr: '' },
      );

      const error = await verifyToolchain('yt-dlp', '/opt/ffmpeg').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigurationError);
      expect((error as ConfigurationError).message).toBe(
        '"/opt/ffmpeg" was not found. Install it or set its path in the environment.',
      );
    });
  });
});
