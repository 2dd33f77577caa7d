/**
 * Git Configuration Types
 */

export interface GitConfig {
  /** git executable */
  binary: string;
  /** Block timeout for each git process in ms; 0 disables it */
  timeoutMs: number;
  /** Clone submodules and keep them in sync after checkout */
  recursive: boolean;
}

export interface CloneOptions {
  /** Overrides GitConfig.recursive for this clone */
  recursive?: boolean;
}

export interface CheckoutOptions {
  /** Overrides GitConfig.recursive for the submodule sync */
  recursive?: boolean;
}

export const DEFAULT_GIT_CONFIG: GitConfig = {
  binary: 'git',
  timeoutMs: 600000, // 10 minutes
  recursive: true,
};
