/**
 * Local Git Client
 * Clones and checks out sources using simple-git
 */

import { GitPluginError, simpleGit, type SimpleGit, type SimpleGitOptions } from 'simple-git';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import {
  AcquisitionError,
  StageTimeoutError,
  createLogger,
  type InstallerError,
  type Logger,
} from '@boostsmith/shared';
import {
  type GitConfig,
  type CloneOptions,
  type CheckoutOptions,
  DEFAULT_GIT_CONFIG,
} from '../types.js';

export interface LocalGitClientOptions {
  config?: Partial<GitConfig>;
  logger?: Logger;
}

const MAX_ERROR_LINES = 20;

export class LocalGitClient {
  private readonly config: GitConfig;
  private readonly logger: Logger;

  constructor(options: LocalGitClientOptions = {}) {
    this.config = { ...DEFAULT_GIT_CONFIG, ...options.config };
    this.logger = options.logger ?? createLogger('LocalGitClient');
  }

  /**
   * Get a simple-git instance rooted at a directory
   */
  private getGit(baseDir: string): SimpleGit {
    const options: Partial<SimpleGitOptions> = {
      baseDir,
      binary: this.config.binary,
      maxConcurrentProcesses: 1,
      trimmed: true,
    };
    if (this.config.timeoutMs > 0) {
      options.timeout = { block: this.config.timeoutMs };
    }
    return simpleGit(options);
  }

  /**
   * Clone a remote repository, pulling submodules unless disabled
   */
  async clone(remoteUrl: string, localPath: string, options: CloneOptions = {}): Promise<void> {
    const recursive = options.recursive ?? this.config.recursive;
    this.logger.info({ remoteUrl, localPath, recursive }, 'Cloning repository');

    const parent = dirname(localPath);
    await mkdir(parent, { recursive: true });

    try {
      await this.getGit(parent).clone(remoteUrl, localPath, recursive ? ['--recursive'] : []);
    } catch (error) {
      throw this.gitFailure(`Failed to clone ${remoteUrl}`, error, { remoteUrl });
    }

    this.logger.info({ localPath }, 'Repository cloned');
  }

  /**
   * Checkout a branch, tag or commit and bring submodules in line with it
   */
  async checkout(repoPath: string, ref: string, options: CheckoutOptions = {}): Promise<void> {
    if (ref.startsWith('-')) {
      throw new AcquisitionError(`Refusing to check out '${ref}': refs may not start with '-'`, {
        ref,
      });
    }

    const recursive = options.recursive ?? this.config.recursive;
    const git = this.getGit(repoPath);

    try {
      await git.checkout(ref);
      if (recursive) {
        await git.submoduleUpdate(['--init', '--recursive']);
      }
    } catch (error) {
      throw this.gitFailure(`Failed to check out '${ref}'`, error, { ref });
    }

    this.logger.info({ repoPath, ref }, 'Checked out');
  }

  /**
   * Resolve HEAD to a commit hash
   */
  async revision(repoPath: string): Promise<string> {
    return this.getGit(repoPath).revparse(['HEAD']);
  }

  private gitFailure(
    summary: string,
    error: unknown,
    context: Record<string, unknown>
  ): InstallerError {
    // raised by simple-git's timeout plugin once timeout.block elapses with no output
    if (error instanceof GitPluginError && error.plugin === 'timeout') {
      this.logger.error({ ...context, timeoutMs: this.config.timeoutMs }, `${summary}: timed out`);
      return new StageTimeoutError('acquiring', this.config.timeoutMs, context);
    }

    const detail = error instanceof Error ? error.message : String(error);
    const outputTail = detail
      .split(/\r?\n/)
      .map((line) => line.trimEnd())
      .filter(Boolean)
      .slice(-MAX_ERROR_LINES);

    this.logger.error({ ...context, error: detail }, summary);

    return new AcquisitionError(`${summary}: ${outputTail[0] ?? 'unknown error'}`, {
      ...context,
      outputTail,
    });
  }
}
