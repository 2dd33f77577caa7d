/**
 * Package Probe
 * Asks the R runtime where a package is installed and compares the
 * result before and after a run.
 */

import { stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createChildLogger, type ProbeVerdict } from '@boostsmith/shared';
import { describeOutcome, type CommandRunner } from './command-runner.js';
import type { ProbeSnapshot } from './types.js';

export interface PackageProbeConfig {
  rscript: string;
  packageName: string;
  timeoutMs: number;
}

export class PackageProbe {
  private logger = createChildLogger({ component: 'PackageProbe' });

  constructor(
    private readonly runner: Pick<CommandRunner, 'run'>,
    private readonly config: PackageProbeConfig
  ) {}

  /**
   * Expression printing the package's install path, or nothing when absent
   */
  expression(): string {
    return `cat(system.file(package = "${this.config.packageName}"))`;
  }

  async snapshot(): Promise<ProbeSnapshot> {
    const outcome = await this.runner.run({
      command: this.config.rscript,
      args: ['-e', this.expression()],
      cwd: tmpdir(),
      timeoutMs: this.config.timeoutMs,
    });

    if (outcome.error !== undefined || outcome.timedOut || outcome.exitCode !== 0) {
      this.logger.warn(
        { packageName: this.config.packageName, outputTail: outcome.output },
        `${describeOutcome(this.config.rscript, outcome)}; treating package as not installed`
      );
      return { installed: false };
    }

    const location = outcome.lines
      .filter((line) => line.stream === 'stdout')
      .map((line) => line.text.trim())
      .filter((text) => text.length > 0)
      .pop();

    if (location === undefined) {
      return { installed: false };
    }

    const snapshot: ProbeSnapshot = { installed: true, location };
    const modifiedAtMs = await this.descriptionMtime(location);
    if (modifiedAtMs !== undefined) {
      snapshot.modifiedAtMs = modifiedAtMs;
    }
    return snapshot;
  }

  private async descriptionMtime(location: string): Promise<number | undefined> {
    try {
      const info = await stat(join(location, 'DESCRIPTION'));
      return info.mtimeMs;
    } catch (error) {
      this.logger.debug({ location, error }, 'Package DESCRIPTION not readable');
      return undefined;
    }
  }
}

/**
 * Classify an install by comparing the package state before and after it
 */
export function compareSnapshots(before: ProbeSnapshot, after: ProbeSnapshot): ProbeVerdict {
  if (!after.installed) {
    return 'missing';
  }
  if (!before.installed || before.location !== after.location) {
    return 'fresh';
  }
  if (after.modifiedAtMs === undefined) {
    return 'unchanged';
  }
  if (before.modifiedAtMs === undefined || after.modifiedAtMs > before.modifiedAtMs) {
    return 'fresh';
  }
  return 'unchanged';
}
