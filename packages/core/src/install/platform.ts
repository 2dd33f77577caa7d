import { availableParallelism } from 'node:os';
import type { HostPlatform } from '@boostsmith/shared';

export function detectPlatform(platform: NodeJS.Platform = process.platform): HostPlatform {
  return platform === 'win32' ? 'windows' : 'unix';
}

export function defaultParallelJobs(): number {
  return Math.max(1, availableParallelism());
}
