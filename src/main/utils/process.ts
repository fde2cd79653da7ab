/**
 * Child Process Utility
 *
 * Promise wrapper around execFile for the external binaries the pipeline
 * drives (yt-dlp, ffmpeg, scp). Arguments are passed without a shell.
 */

import { execFile } from 'child_process';

/** Captured output of a finished process */
export interface ProcessOutput {
  stdout: string;
  stderr: string;
}

/** Options for running an external binary */
export interface RunProcessOptions {
  /** Kill the process after this many milliseconds (0 = no limit) */
  timeoutMs?: number;
  /** Largest stdout/stderr size accepted, in bytes */
  maxBuffer?: number;
}

/** Raised when a binary is missing, times out or exits with a failure status */
export class ProcessFailure extends Error {
  /** Exit code, or the errno code string (e.g. "ENOENT") */
  readonly code: number | string | null;
  readonly stdout: string;
  readonly stderr: string;

  constructor(message: string, code: number | string | null, output: ProcessOutput) {
    super(message);
    this.name = 'ProcessFailure';
    this.code = code;
    this.stdout = output.stdout;
    this.stderr = output.stderr;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /** Whether the binary could not be found at all */
  get notFound(): boolean {
    return this.code === 'ENOENT';
  }
}

const DEFAULT_MAX_BUFFER = 64 * 1024 * 1024;

/**
 * Runs a binary to completion and resolves with its output.
 *
 * @param command - Executable name or path
 * @param args - Arguments, passed verbatim
 * @param options - Timeout and buffer limits
 * @throws ProcessFailure when the process cannot start or exits with a failure status
 */
export function runProcess(
  command: string,
  args: readonly string[],
  options: RunProcessOptions = {},
): Promise<ProcessOutput> {
  return new Promise<ProcessOutput>((resolve, reject) => {
    execFile(
      command,
      args,
      {
        timeout: options.timeoutMs ?? 0,
        maxBuffer: options.maxBuffer ?? DEFAULT_MAX_BUFFER,
        encoding: 'utf8',
        windowsHide: true,
      },
      (error, stdout, stderr) => {
        if (error) {
          const code = typeof error.code === 'number' || typeof error.code === 'string' ? error.code : null;
          const detail = stderr.trim() ? ` (${stderr.trim().split('\n').slice(-1)[0]})` : '';
          reject(
            new ProcessFailure(`${command} failed: ${error.message}${detail}`, code, {
              stdout,
              stderr,
            }),
          );
          return;
        }
        resolve({ stdout, stderr });
      },
    );
  });
}
