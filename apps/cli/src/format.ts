import { InstallerError } from '@boostsmith/shared';
import type { InstallPlan, InstallResult } from '@boostsmith/core';

const indent = (line: string) => `  ${line}`;

export function formatInstallResult(result: InstallResult, packageName: string): string {
  const lines: string[] = [];

  if (result.success) {
    lines.push(
      `Installed ${packageName} (${result.probe}) on ${result.platform} via the ${result.route} route`
    );
    if (result.location !== undefined) lines.push(indent(`location: ${result.location}`));
    if (result.revision !== undefined) lines.push(indent(`revision: ${result.revision}`));
  } else {
    lines.push(
      `Install failed in ${result.stage} stage [${result.error.code}]: ${result.error.message}`
    );
  }

  for (const warning of result.warnings) {
    lines.push(indent(`warning: ${warning}`));
  }

  if (!result.success && result.outputTail.length > 0) {
    lines.push(indent('last output:'));
    lines.push(...result.outputTail.map((line) => indent(indent(line))));
  }

  lines.push(indent(`took ${(result.processingTimeMs / 1000).toFixed(1)}s`));
  return `${lines.join('\n')}\n`;
}

export function formatPlanJson(plan: InstallPlan): string {
  return `${JSON.stringify(plan, null, 2)}\n`;
}

export function formatError(error: unknown): string {
  if (error instanceof InstallerError) {
    return `error [${error.code}]: ${error.message}\n`;
  }
  return `error: ${error instanceof Error ? error.message : String(error)}\n`;
}
