/**
 * Types for the install pipeline
 */

import { tmpdir } from 'node:os';
import type {
  BuildRequest,
  HostPlatform,
  InstallRoute,
  InstallStage,
  InstallerError,
  ProbeVerdict,
  TimedStage,
} from '@boostsmith/shared';

/**
 * External tool executables
 */
export interface ToolPaths {
  git: string;
  cmake: string;
  make: string;
  r: string;
  rscript: string;
}

/**
 * Values used for request fields the caller leaves out
 */
export interface RequestDefaults {
  repositoryUrl: string;
  sourceRef: string;
  compilerId: string;
}

/**
 * Install orchestrator configuration
 */
export interface InstallOrchestratorConfig {
  /** Parent of the per-run working directories */
  workRoot: string;
  defaults: RequestDefaults;
  /** Package probed after the run */
  packageName: string;
  /** Subdirectory of the checkout holding the language binding */
  bindingDir: string;
  /** CMake option that turns on the language binding library */
  bindingLibraryFlag: string;
  tools: ToolPaths;
  /** Parallel jobs handed to make; defaults to the host's available parallelism */
  parallelJobs?: number;
  /** Timeout for each stage in ms; 0 disables it */
  stageTimeouts: Record<TimedStage, number>;
  /** Lines of tool output kept for failure reports */
  outputTailLines: number;
  /** Leave the working directory in place after the run */
  keepWorkDir: boolean;
  /** Fail the run unless the probe sees a fresh install */
  requireFreshInstall: boolean;
}

export type InstallOrchestratorOptions = Partial<
  Omit<InstallOrchestratorConfig, 'defaults' | 'tools' | 'stageTimeouts'>
> & {
  defaults?: Partial<RequestDefaults>;
  tools?: Partial<ToolPaths>;
  stageTimeouts?: Partial<Record<TimedStage, number>>;
};

export const DEFAULT_INSTALL_CONFIG: InstallOrchestratorConfig = {
  workRoot: tmpdir(),
  defaults: {
    repositoryUrl: 'https://github.com/dmlc/xgboost',
    sourceRef: 'master',
    compilerId: 'gcc',
  },
  packageName: 'xgboost',
  bindingDir: 'R-package',
  bindingLibraryFlag: 'R_LIB',
  tools: {
    git: 'git',
    cmake: 'cmake',
    make: 'make',
    r: 'R',
    rscript: 'Rscript',
  },
  stageTimeouts: {
    acquiring: 600000, // 10 minutes
    configuring: 300000, // 5 minutes
    building: 3600000, // 60 minutes
    installing: 900000, // 15 minutes
    probing: 60000,
  },
  outputTailLines: 40,
  keepWorkDir: false,
  requireFreshInstall: false,
};

/**
 * One step of an install plan. `cwd` is relative to the checkout directory.
 */
export type PlanStep =
  | {
      kind: 'clone';
      stage: 'acquiring';
      repositoryUrl: string;
      directory: string;
      recursive: boolean;
    }
  | { kind: 'checkout'; stage: 'acquiring'; ref: string; recursive: boolean }
  | { kind: 'mkdir'; stage: 'configuring'; path: string }
  | {
      kind: 'exec';
      stage: 'configuring' | 'building' | 'installing';
      command: string;
      args: string[];
      cwd: string;
    };

export type ExecStep = Extract<PlanStep, { kind: 'exec' }>;

/**
 * Ordered command sequence for one request on one platform
 */
export interface InstallPlan {
  platform: HostPlatform;
  route: InstallRoute;
  /** Directory name the repository is cloned into */
  checkoutDir: string;
  steps: PlanStep[];
  /** Request settings the platform or route does not honour */
  warnings: string[];
}

/**
 * Inputs to plan generation that come from configuration
 */
export interface PlanOptions {
  tools: ToolPaths;
  bindingDir: string;
  bindingLibraryFlag: string;
  parallelJobs: number;
}

/**
 * Install log entry
 */
export interface InstallLog {
  stage: InstallStage;
  timestamp: Date;
  level: 'info' | 'warn' | 'error';
  message: string;
}

/**
 * State of a single install run
 */
export interface InstallContext {
  id: string;
  /** Set once the request has been parsed */
  request?: BuildRequest;
  plan?: InstallPlan;
  /** Per-run working directory */
  workDir: string;
  stage: InstallStage;
  startedAt: Date;
  logs: InstallLog[];
}

/**
 * Installed package state at a point in time
 */
export interface ProbeSnapshot {
  installed: boolean;
  location?: string;
  /** mtime of the package's DESCRIPTION file */
  modifiedAtMs?: number;
}

export interface InstallSuccess {
  success: true;
  installId: string;
  stage: 'complete';
  platform: HostPlatform;
  route: InstallRoute;
  /** A missing package is never a success */
  probe: Exclude<ProbeVerdict, 'missing'>;
  location?: string;
  /** HEAD commit of the built sources */
  revision?: string;
  warnings: string[];
  logs: InstallLog[];
  processingTimeMs: number;
}

export interface InstallFailure {
  success: false;
  installId: string;
  /** Stage that failed */
  stage: InstallStage;
  error: InstallerError;
  outputTail: string[];
  warnings: string[];
  logs: InstallLog[];
  processingTimeMs: number;
}

export type InstallResult = InstallSuccess | InstallFailure;
