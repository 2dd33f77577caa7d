/**
 * Mapping from command-line options to request input and orchestrator options
 */

import { ValidationError, type HostPlatform } from '@boostsmith/shared';
import type { BuildRequestInput, InstallOrchestratorOptions } from '@boostsmith/core';

export interface RequestOptions {
  ref?: string;
  compiler?: string;
  repo?: string;
  gpu?: boolean;
  avx?: boolean;
  cudaRoot?: string;
  cudaCc?: string;
  cudaCxx?: string;
  nccl?: string;
}

export interface InstallCommandOptions extends RequestOptions {
  workRoot?: string;
  keepWorkdir?: boolean;
  requireFresh?: boolean;
  json?: boolean;
}

export interface PlanCommandOptions extends RequestOptions {
  platform?: string;
  workDir?: string;
  write?: string;
  json?: boolean;
}

export const PLATFORMS: readonly HostPlatform[] = ['windows', 'unix'];

export function toBuildRequestInput(options: RequestOptions): BuildRequestInput {
  const input: BuildRequestInput = {};

  if (options.ref !== undefined) input.sourceRef = options.ref;
  if (options.repo !== undefined) input.repositoryUrl = options.repo;
  if (options.compiler !== undefined) input.compilerId = options.compiler;
  if (options.gpu) input.enableAccelerator = true;
  if (options.avx) input.enableVectorization = true;

  const { cudaRoot, cudaCc, cudaCxx } = options;
  if (cudaRoot !== undefined && cudaCc !== undefined && cudaCxx !== undefined) {
    input.acceleratorToolkitPaths = {
      toolkitRoot: cudaRoot,
      cCompiler: cudaCc,
      cxxCompiler: cudaCxx,
    };
  } else if (cudaRoot !== undefined || cudaCc !== undefined || cudaCxx !== undefined) {
    throw new ValidationError('--cuda-root, --cuda-cc and --cuda-cxx must be given together', {
      cudaRoot,
      cudaCc,
      cudaCxx,
    });
  }

  if (options.nccl !== undefined) input.collectiveCommLibraryPath = options.nccl;

  return input;
}

export function installOverrides(options: InstallCommandOptions): InstallOrchestratorOptions {
  const overrides: InstallOrchestratorOptions = {};
  if (options.workRoot !== undefined) overrides.workRoot = options.workRoot;
  if (options.keepWorkdir) overrides.keepWorkDir = true;
  if (options.requireFresh) overrides.requireFreshInstall = true;
  return overrides;
}

export function parsePlatform(value: string | undefined, fallback: HostPlatform): HostPlatform {
  if (value === undefined) {
    return fallback;
  }
  const platform = PLATFORMS.find((candidate) => candidate === value);
  if (!platform) {
    throw new ValidationError(`Unknown platform '${value}'; expected one of ${PLATFORMS.join(', ')}`);
  }
  return platform;
}
