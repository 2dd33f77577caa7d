/**
 * Build request parsing
 * Validates caller input and fills configured defaults into a BuildRequest
 */

import { z } from 'zod';
import { AcquisitionError, ValidationError, type BuildRequest } from '@boostsmith/shared';
import type { RequestDefaults } from './types.js';

const CLONE_PROTOCOLS = ['http:', 'https:', 'git:', 'ssh:', 'file:'];

// user@host:path, as accepted by git for ssh remotes
const SCP_LIKE_URL = /^[\w.-]+@[\w.-]+:\S+$/;

const acceleratorToolkitPathsSchema = z
  .object({
    toolkitRoot: z.string().trim().min(1),
    cCompiler: z.string().trim().min(1),
    cxxCompiler: z.string().trim().min(1),
  })
  .strict();

export const buildRequestInputSchema = z
  .object({
    sourceRef: z
      .string()
      .trim()
      .refine((ref) => !ref.startsWith('-'), "must not start with '-'")
      .optional(),
    repositoryUrl: z.string().trim().min(1).optional(),
    compilerId: z.string().trim().min(1).optional(),
    enableAccelerator: z.boolean().optional(),
    enableVectorization: z.boolean().optional(),
    acceleratorToolkitPaths: acceleratorToolkitPathsSchema.optional(),
    collectiveCommLibraryPath: z.string().trim().min(1).optional(),
  })
  .strict();

export type BuildRequestInput = z.input<typeof buildRequestInputSchema>;

export function isCloneUrl(candidate: string): boolean {
  try {
    const url = new URL(candidate);
    if (!CLONE_PROTOCOLS.includes(url.protocol)) {
      return false;
    }
    return url.protocol === 'file:' || url.hostname.length > 0;
  } catch {
    return SCP_LIKE_URL.test(candidate);
  }
}

/**
 * Directory name git clones a repository into: the last path segment
 * without a trailing .git
 */
export function checkoutDirName(repositoryUrl: string): string {
  const trimmed = repositoryUrl.replace(/[/\\]+$/, '');
  const segment = trimmed.split(/[/\\:]/).pop() ?? '';
  const name = segment.replace(/\.git$/, '');
  return name.length > 0 && name !== '.' && name !== '..' ? name : 'source';
}

export function parseBuildRequest(input: unknown, defaults: RequestDefaults): BuildRequest {
  const parsed = buildRequestInputSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((e) => `${e.path.join('.') || 'request'}: ${e.message}`);
    throw new ValidationError(`Invalid build request: ${issues.join('; ')}`, { issues });
  }

  const value = parsed.data;
  const repositoryUrl = value.repositoryUrl ?? defaults.repositoryUrl;
  if (!isCloneUrl(repositoryUrl)) {
    throw new AcquisitionError(`Not a clonable repository URL: '${repositoryUrl}'`, {
      repositoryUrl,
    });
  }

  const request: BuildRequest = {
    sourceRef: value.sourceRef ?? defaults.sourceRef,
    repositoryUrl,
    compilerId: value.compilerId ?? defaults.compilerId,
    enableAccelerator: value.enableAccelerator ?? false,
    enableVectorization: value.enableVectorization ?? false,
  };
  if (value.acceleratorToolkitPaths) {
    request.acceleratorToolkitPaths = value.acceleratorToolkitPaths;
  }
  if (value.collectiveCommLibraryPath) {
    request.collectiveCommLibraryPath = value.collectiveCommLibraryPath;
  }
  return request;
}
