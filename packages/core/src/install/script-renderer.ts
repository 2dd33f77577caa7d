/**
 * Script Renderer
 * Renders an install plan as a batch file or shell script so the exact
 * command sequence can be reviewed or run by hand.
 */

import { chmod, mkdir, writeFile } from 'node:fs/promises';
import { join, posix, win32 } from 'node:path';
import type { InstallPlan, PlanStep } from './types.js';

export interface RenderedScript {
  fileName: 'install.sh' | 'install.bat';
  content: string;
}

const POSIX_SAFE = /^[A-Za-z0-9_\-+=.,/:@%]+$/;
const BATCH_SPECIAL = /[\s&|<>^()"]/;

export function posixQuote(arg: string): string {
  if (POSIX_SAFE.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

export function batchQuote(arg: string): string {
  const escaped = arg.replace(/%/g, '%%');
  if (escaped === '') {
    return '""';
  }
  if (BATCH_SPECIAL.test(escaped)) {
    return `"${escaped.replace(/"/g, '""')}"`;
  }
  return escaped;
}

function commandFor(step: PlanStep): string[][] {
  switch (step.kind) {
    case 'clone':
      return [
        ['git', 'clone', ...(step.recursive ? ['--recursive'] : []), step.repositoryUrl, step.directory],
      ];
    case 'checkout':
      return step.recursive
        ? [
            ['git', 'checkout', step.ref],
            ['git', 'submodule', 'update', '--init', '--recursive'],
          ]
        : [['git', 'checkout', step.ref]];
    case 'mkdir':
      return [];
    case 'exec':
      return [[step.command, ...step.args]];
  }
}

export function renderInstallScript(plan: InstallPlan, workDir: string): RenderedScript {
  const windows = plan.platform === 'windows';
  const paths = windows ? win32 : posix;
  const quote = windows ? batchQuote : posixQuote;
  const checkoutPath = paths.join(workDir, plan.checkoutDir);

  const lines: string[] = windows ? ['@echo off'] : ['#!/bin/sh', 'set -e'];
  const run = (argv: string[]) => {
    const line = argv.map(quote).join(' ');
    lines.push(windows ? `${line} || exit /b 1` : line);
  };
  let current = workDir;
  const cd = (dir: string) => {
    if (dir !== current) {
      lines.push(`cd ${quote(dir)}`);
      current = dir;
    }
  };

  if (windows) {
    const drive = /^([A-Za-z]):/.exec(workDir);
    if (drive?.[1]) {
      lines.push(`${drive[1].toUpperCase()}:`);
    }
  }
  lines.push(`cd ${quote(workDir)}`);

  for (const step of plan.steps) {
    if (step.kind === 'mkdir') {
      const target = paths.join(checkoutPath, step.path);
      run(windows ? ['mkdir', target] : ['mkdir', '-p', target]);
      continue;
    }
    if (step.kind === 'checkout') {
      cd(checkoutPath);
    }
    if (step.kind === 'exec') {
      cd(paths.join(checkoutPath, step.cwd));
    }
    for (const argv of commandFor(step)) {
      run(argv);
    }
    if (step.kind === 'clone') {
      cd(checkoutPath);
    }
  }

  return {
    fileName: windows ? 'install.bat' : 'install.sh',
    content: lines.join(windows ? '\r\n' : '\n') + (windows ? '\r\n' : '\n'),
  };
}

/**
 * Write the rendered script into a directory; shell scripts are marked executable
 */
export async function writeInstallScript(
  plan: InstallPlan,
  workDir: string,
  outDir: string
): Promise<string> {
  const script = renderInstallScript(plan, workDir);
  const target = join(outDir, script.fileName);

  await mkdir(outDir, { recursive: true });
  await writeFile(target, script.content, 'utf-8');
  if (plan.platform === 'unix') {
    await chmod(target, 0o755);
  }

  return target;
}
