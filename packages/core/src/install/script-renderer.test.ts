import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { BuildRequest } from '@boostsmith/shared';
import { buildInstallPlan } from './install-plan.js';
import {
  batchQuote,
  posixQuote,
  renderInstallScript,
  writeInstallScript,
} from './script-renderer.js';
import type { PlanOptions } from './types.js';

const createRequest = (overrides: Partial<BuildRequest> = {}): BuildRequest => ({
  sourceRef: 'master',
  repositoryUrl: 'https://github.com/dmlc/xgboost',
  compilerId: 'gcc',
  enableAccelerator: false,
  enableVectorization: false,
  ...overrides,
});

const planOptions: PlanOptions = {
  tools: { git: 'git', cmake: 'cmake', make: 'make', r: 'R', rscript: 'Rscript' },
  bindingDir: 'R-package',
  bindingLibraryFlag: 'R_LIB',
  parallelJobs: 4,
};

describe('posixQuote', () => {
  it('should leave plain arguments alone', () => {
    expect(posixQuote('-DNCCL_ROOT=/opt/nccl')).toBe('-DNCCL_ROOT=/opt/nccl');
  });

  it('should single-quote anything else', () => {
    expect(posixQuote('/tmp/my work')).toBe("'/tmp/my work'");
    expect(posixQuote("it's")).toBe("'it'\\''s'");
    expect(posixQuote('')).toBe("''");
  });
});

describe('batchQuote', () => {
  it('should double percent signs', () => {
    expect(batchQuote('50%')).toBe('50%%');
  });

  it('should quote spaces and metacharacters', () => {
    expect(batchQuote('Visual Studio 17 2022')).toBe('"Visual Studio 17 2022"');
    expect(batchQuote('a&b')).toBe('"a&b"');
    expect(batchQuote('say "hi"')).toBe('"say ""hi"""');
    expect(batchQuote('')).toBe('""');
  });
});

describe('renderInstallScript', () => {
  it('should render a shell script for unix', () => {
    const plan = buildInstallPlan(createRequest(), 'unix', planOptions);

    const script = renderInstallScript(plan, '/tmp/work');

    expect(script.fileName).toBe('install.sh');
    expect(script.content).toBe(
      [
        '#!/bin/sh',
        'set -e',
        'cd /tmp/work',
        'git clone --recursive https://github.com/dmlc/xgboost xgboost',
        'cd /tmp/work/xgboost',
        'git checkout master',
        'git submodule update --init --recursive',
        'mkdir -p /tmp/work/xgboost/build',
        'cd /tmp/work/xgboost/build',
        'cmake .. -DR_LIB=ON',
        'make -j4',
        'make install -j4',
        '',
      ].join('\n')
    );
  });

  it('should quote a work directory with spaces', () => {
    const plan = buildInstallPlan(createRequest({ sourceRef: '' }), 'unix', planOptions);

    const lines = renderInstallScript(plan, '/tmp/my work').content.split('\n');

    expect(lines[2]).toBe("cd '/tmp/my work'");
    expect(lines[4]).toBe("cd '/tmp/my work/xgboost'");
    expect(lines[5]).toBe("mkdir -p '/tmp/my work/xgboost/build'");
  });

  it('should render a batch file for the windows generator route', () => {
    const plan = buildInstallPlan(
      createRequest({ compilerId: 'Visual Studio 17 2022' }),
      'windows',
      planOptions
    );

    const script = renderInstallScript(plan, 'C:\\build\\work');

    expect(script.fileName).toBe('install.bat');
    expect(script.content).toBe(
      [
        '@echo off',
        'C:',
        'cd C:\\build\\work',
        'git clone --recursive https://github.com/dmlc/xgboost xgboost || exit /b 1',
        'cd C:\\build\\work\\xgboost',
        'git checkout master || exit /b 1',
        'git submodule update --init --recursive || exit /b 1',
        'mkdir C:\\build\\work\\xgboost\\build || exit /b 1',
        'cd C:\\build\\work\\xgboost\\build',
        'cmake .. -G "Visual Studio 17 2022" -DR_LIB=ON || exit /b 1',
        'cmake --build . --config Release || exit /b 1',
        'cmake --build . --target install --config Release || exit /b 1',
        '',
      ].join('\r\n')
    );
  });

  it('should install from the binding directory on the windows binding route', () => {
    const plan = buildInstallPlan(createRequest({ sourceRef: '' }), 'windows', planOptions);

    const lines = renderInstallScript(plan, 'D:\\work').content.split('\r\n');

    expect(lines).toEqual([
      '@echo off',
      'D:',
      'cd D:\\work',
      'git clone --recursive https://github.com/dmlc/xgboost xgboost || exit /b 1',
      'cd D:\\work\\xgboost',
      'cd D:\\work\\xgboost\\R-package',
      'R CMD INSTALL . || exit /b 1',
      '',
    ]);
  });
});

describe('writeInstallScript', () => {
  let outDir: string;

  beforeEach(async () => {
    outDir = await mkdtemp(join(tmpdir(), 'render-test-'));
  });

  afterEach(async () => {
    await rm(outDir, { recursive: true, force: true });
  });

  it('should write an executable shell script', async () => {
    const plan = buildInstallPlan(createRequest(), 'unix', planOptions);

    const target = await writeInstallScript(plan, '/tmp/work', join(outDir, 'scripts'));

    expect(target).toBe(join(outDir, 'scripts', 'install.sh'));
    expect(await readFile(target, 'utf-8')).toBe(renderInstallScript(plan, '/tmp/work').content);
    expect((await stat(target)).mode & 0o777).toBe(0o755);
  });

  it('should name the batch file for windows plans', async () => {
    const plan = buildInstallPlan(createRequest(), 'windows', planOptions);

    const target = await writeInstallScript(plan, 'C:\\work', outDir);

    expect(target).toBe(join(outDir, 'install.bat'));
  });
});
