/**
 * Destination Writer Service
 *
 * Moves a finished audio file to its destination label, either inside the
 * local music folder or on a remote host over scp.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { SshSettings } from '../../shared/types';
import { getUniqueFilePath, sanitizeFilename } from '../utils/fileScanner';
import { ProcessFailure, runProcess } from '../utils/process';
import { ConfigurationError, PlacementError, errorMessage } from './errors';
import type { Logger } from './logger';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** Final placement collaborator */
export interface DestinationWriter {
  /**
   * Places a local file under the destination label.
   * @returns Where the file ended up (local path or user@host:path)
   * @throws PlacementError when the file could not be placed
   */
  place(localPath: string, destination: string): Promise<string>;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

/**
 * Splits a destination label into safe path segments.
 * "Rock/Classics" → ["Rock", "Classics"]; ".." and empty segments are dropped.
 */
export function destinationSegments(destination: string): string[] {
  return destination
    .split(/[/\\]+/)
    .map((segment) => sanitizeFilename(segment))
    .filter((segment) => segment !== '' && segment !== '.' && segment !== '..');
}

// ─── Local Folder ────────────────────────────────────────────────────────────

/**
 * Copies files into `<musicFolder>/<destination>/`, never overwriting an
 * existing file.
 */
export class LocalFolderWriter implements DestinationWriter {
  private readonly musicFolder: string;
  private readonly logger: Logger | null;

  constructor(musicFolder: string, logger?: Logger) {
    this.musicFolder = musicFolder;
    this.logger = logger ?? null;
  }

  async place(localPath: string, destination: string): Promise<string> {
    const targetDir = path.join(this.musicFolder, ...destinationSegments(destination));
    const fileName = sanitizeFilename(path.basename(localPath)) || path.basename(localPath);

    try {
      await fs.promises.mkdir(targetDir, { recursive: true });
      const targetPath = getUniqueFilePath(path.join(targetDir, fileName));
      await fs.promises.copyFile(localPath, targetPath, fs.constants.COPYFILE_EXCL);
      this.logger?.debug(`Copied to ${targetPath}`, { step: 'placing' });
      return targetPath;
    } catch (error: unknown) {
      throw new PlacementError(`Local copy failed: ${errorMessage(error)}`, {
        cause: error instanceof Error ? error : undefined,
      });
    }
  }
}

// ─── Remote Host ─────────────────────────────────────────────────────────────

/**
 * Checks that every setting needed for remote placement is present.
 * @throws ConfigurationError listing the missing environment variables
 */
export function assertSshSettings(ssh: SshSettings): void {
  const missing: string[] = [];
  if (!ssh.host) missing.push('SSH_HOST');
  if (!ssh.user) missing.push('SSH_USER');
  if (!ssh.keyPath) missing.push('SSH_KEY_PATH');
  if (!ssh.remoteBasePath) missing.push('REMOTE_BASE_PATH');

  if (missing.length > 0) {
    throw new ConfigurationError(
      `Remote placement needs ${missing.join(', ')}. Set them in .env or use --local.`,
    );
  }
}

/**
 * Builds the remote target path for a file and destination label.
 */
export function remoteTargetPath(remoteBasePath: string, destination: string, fileName: string): string {
  const base = remoteBasePath.replace(/\/+$/, '');
  return [base, ...destinationSegments(destination), sanitizeFilename(fileName)].join('/');
}

/**
 * Builds the scp argument list for one transfer.
 */
export function buildScpArgs(ssh: SshSettings, localPath: string, destination: string): string[] {
  const target = remoteTargetPath(ssh.remoteBasePath, destination, path.basename(localPath));
  return [
    '-P',
    String(ssh.port),
    '-i',
    ssh.keyPath,
    '-o',
    'BatchMode=yes',
    localPath,
    `${ssh.user}@${ssh.host}:${target}`,
  ];
}

/**
 * Transfers files to `<remoteBase>/<destination>/` on the configured host.
 * The destination directory must already exist on the host.
 */
export class ScpWriter implements DestinationWriter {
  private readonly ssh: SshSettings;
  private readonly scpPath: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger | null;

  constructor(ssh: SshSettings, options: { scpPath?: string; timeoutMs?: number; logger?: Logger } = {}) {
    assertSshSettings(ssh);
    this.ssh = ssh;
    this.scpPath = options.scpPath ?? 'scp';
    this.timeoutMs = options.timeoutMs ?? 5 * 60 * 1000;
    this.logger = options.logger ?? null;
  }

  async place(localPath: string, destination: string): Promise<string> {
    const args = buildScpArgs(this.ssh, localPath, destination);
    const target = args[args.length - 1];

    try {
      await runProcess(this.scpPath, args, { timeoutMs: this.timeoutMs });
    } catch (error: unknown) {
      const detail =
        error instanceof ProcessFailure && error.stderr.trim()
          ? error.stderr.trim().split('\n').slice(-1)[0]
          : errorMessage(error);
      throw new PlacementError(`scp to ${target} failed: ${detail}`, {
        cause: error instanceof Error ? error : undefined,
      });
    }

    this.logger?.debug(`Transferred to ${target}`, { step: 'placing' });
    return target;
  }
}
