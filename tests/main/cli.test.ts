import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { USAGE, formatSummary, main, parseCliArgs } from '../../src/main/cli';
import { ConfigurationError } from '../../src/main/services/errors';

const SOURCE_URL = 'https://www.youtube.com/watch?v=test123';

describe('cli', () => {
  describe('parseCliArgs', () => {
    it('should apply defaults', () => {
      expect(parseCliArgs([])).toEqual({
        url: null,
        configPath: 'tracks_config.json',
        local: false,
        processMetadata: true,
        discardUntagged: false,
        verbose: false,
        help: false,
      });
    });

    it('should read a URL and every flag', () => {
      expect(
        parseCliArgs([
          SOURCE_URL,
          '--config',
          'batch.json',
          '--local',
          '--no-metadata',
          '--discard-untagged',
          '-v',
        ]),
      ).toEqual({
        url: SOURCE_URL,
        configPath: 'batch.json',
        local: true,
        processMetadata: false,
        discardUntagged: true,
        verbose: true,
        help: false,
      });
    });

    it('should accept short options', () => {
      const options = parseCliArgs(['-c', 'other.json', '-h']);
      expect(options.configPath).toBe('other.json');
      expect(options.help).toBe(true);
    });

    it('should reject more than one URL', () => {
      expect(() => parseCliArgs([SOURCE_URL, SOURCE_URL])).toThrow(
        'Expected at most one URL, got 2',
      );
    });

    it('should reject unknown options', () => {
      expect(() => parseCliArgs(['--overwrite'])).toThrow(ConfigurationError);
    });
  });

  describe('formatSummary', () => {
    it('should print the counts', () => {
      expect(formatSummary({ succeeded: 3, failed: 0, skipped: 1, failures: [] }, null)).toBe(
        'Done: 3 succeeded, 0 failed, 1 skipped',
      );
    });

    it('should name the failure report when one was written', () => {
      expect(
        formatSummary({ succeeded: 1, failed: 1, skipped: 0, failures: [] }, 'failed_downloads.txt'),
      ).toBe('Done: 1 succeeded, 1 failed, 0 skipped\nFailure report written to failed_downloads.txt');
    });
  });

  describe('main', () => {
    let log: MockInstance<Parameters<typeof console.log>, void>;
    let errorLog: MockInstance<Parameters<typeof console.error>, void>;

    beforeEach(() => {
      log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      errorLog = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('should print usage for --help', async () => {
      await expect(main(['--help'])).resolves.toBe(0);
      expect(log).toHaveBeenCalledWith(USAGE);
    });

    it('should exit with 1 on bad arguments', async () => {
      await expect(main(['--bogus'])).resolves.toBe(1);
      expect(errorLog).toHaveBeenLastCalledWith(USAGE);
    });

    it('should exit with 1 when the batch file is missing', async () => {
      const missing = path.join(os.tmpdir(), 'tubetagger-cli-test-missing.json');

      await expect(main(['--local', '--config', missing])).resolves.toBe(1);
      const messages = errorLog.mock.calls.map(([message]) => String(message));
      expect(
        messages.some((m) => m.startsWith(`ConfigurationError: Cannot read batch file "${missing}"`)),
      ).toBe(true);
    });
  });
});
