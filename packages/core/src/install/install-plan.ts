/**
 * Install Plan
 * Turns a build request into the ordered command sequence for a host platform.
 * Pure: nothing here touches the filesystem or spawns a process.
 */

import { NATIVE_MAKE_COMPILER, type BuildRequest, type HostPlatform } from '@boostsmith/shared';
import { checkoutDirName } from './request.js';
import type { ExecStep, InstallPlan, PlanOptions, PlanStep } from './types.js';

export const ACCELERATOR_FLAG = '-DUSE_CUDA=ON';
export const VECTORIZATION_FLAG = '-DUSE_AVX=ON';
export const COLLECTIVE_COMM_FLAG = '-DUSE_NCCL=ON';

const BUILD_DIR = 'build';
const RELEASE_CONFIG = 'Release';

const KNOWN_GENERATORS: readonly RegExp[] = [
  /^Visual Studio \d+( \d{4})?( (Win64|ARM|ARM64))?$/,
  /^(MinGW|MSYS|NMake|Unix) Makefiles$/,
  /^Ninja( Multi-Config)?$/,
];

export function isKnownGenerator(compilerId: string): boolean {
  return KNOWN_GENERATORS.some((pattern) => pattern.test(compilerId));
}

export function buildInstallPlan(
  request: BuildRequest,
  platform: HostPlatform,
  options: PlanOptions
): InstallPlan {
  const checkoutDir = checkoutDirName(request.repositoryUrl);
  const steps: PlanStep[] = [
    {
      kind: 'clone',
      stage: 'acquiring',
      repositoryUrl: request.repositoryUrl,
      directory: checkoutDir,
      recursive: true,
    },
  ];

  if (request.sourceRef !== '') {
    steps.push({ kind: 'checkout', stage: 'acquiring', ref: request.sourceRef, recursive: true });
  }

  if (platform === 'windows') {
    return windowsPlan(request, options, checkoutDir, steps);
  }
  return unixPlan(request, options, checkoutDir, steps);
}

function windowsPlan(
  request: BuildRequest,
  options: PlanOptions,
  checkoutDir: string,
  steps: PlanStep[]
): InstallPlan {
  const warnings: string[] = [];

  if (request.acceleratorToolkitPaths) {
    warnings.push('Accelerator toolkit paths are not supported on Windows and were ignored');
  }
  if (request.collectiveCommLibraryPath) {
    warnings.push('The collective communication library is not supported on Windows and was ignored');
  }

  if (request.compilerId === NATIVE_MAKE_COMPILER) {
    if (request.enableAccelerator || request.enableVectorization) {
      warnings.push(
        `Acceleration flags are ignored when compiler is '${NATIVE_MAKE_COMPILER}' (direct binding install)`
      );
    }
    steps.push({
      kind: 'exec',
      stage: 'installing',
      command: options.tools.r,
      args: ['CMD', 'INSTALL', '.'],
      cwd: options.bindingDir,
    });
    return { platform: 'windows', route: 'binding', checkoutDir, steps, warnings };
  }

  if (!isKnownGenerator(request.compilerId)) {
    warnings.push(`Unrecognised generator '${request.compilerId}' is passed to cmake unchanged`);
  }

  const configureArgs = ['..', '-G', request.compilerId];
  if (request.enableAccelerator) configureArgs.push(ACCELERATOR_FLAG);
  if (request.enableVectorization) configureArgs.push(VECTORIZATION_FLAG);
  configureArgs.push(bindingFlag(options));

  steps.push(
    { kind: 'mkdir', stage: 'configuring', path: BUILD_DIR },
    exec('configuring', options.tools.cmake, configureArgs),
    exec('building', options.tools.cmake, ['--build', '.', '--config', RELEASE_CONFIG]),
    exec('installing', options.tools.cmake, [
      '--build',
      '.',
      '--target',
      'install',
      '--config',
      RELEASE_CONFIG,
    ])
  );

  return { platform: 'windows', route: 'generator', checkoutDir, steps, warnings };
}

function unixPlan(
  request: BuildRequest,
  options: PlanOptions,
  checkoutDir: string,
  steps: PlanStep[]
): InstallPlan {
  const warnings: string[] = [];

  if (request.compilerId !== NATIVE_MAKE_COMPILER) {
    warnings.push(
      `Compiler '${request.compilerId}' only selects a generator on Windows; the default generator is used`
    );
  }
  if (!request.enableAccelerator) {
    if (request.acceleratorToolkitPaths) {
      warnings.push('Accelerator toolkit paths were ignored because the accelerator is disabled');
    }
    if (request.collectiveCommLibraryPath) {
      warnings.push(
        'The collective communication library was ignored because the accelerator is disabled'
      );
    }
  }

  const configureArgs = ['..', ...unixFeatureFlags(request), bindingFlag(options)];
  const jobs = `-j${options.parallelJobs}`;

  steps.push(
    { kind: 'mkdir', stage: 'configuring', path: BUILD_DIR },
    exec('configuring', options.tools.cmake, configureArgs),
    exec('building', options.tools.make, [jobs]),
    exec('installing', options.tools.make, ['install', jobs])
  );

  return { platform: 'unix', route: 'generator', checkoutDir, steps, warnings };
}

/**
 * Feature defines for Unix. Toolkit and collective-comm settings only
 * apply when the accelerator is enabled.
 */
export function unixFeatureFlags(request: BuildRequest): string[] {
  const flags: string[] = [];

  if (request.enableAccelerator) {
    flags.push(ACCELERATOR_FLAG);

    const toolkit = request.acceleratorToolkitPaths;
    if (toolkit) {
      flags.push(
        `-DCUDA_TOOLKIT_ROOT_DIR=${toolkit.toolkitRoot}`,
        `-DCMAKE_C_COMPILER=${toolkit.cCompiler}`,
        `-DCMAKE_CXX_COMPILER=${toolkit.cxxCompiler}`
      );
    }
    if (request.collectiveCommLibraryPath) {
      flags.push(COLLECTIVE_COMM_FLAG, `-DNCCL_ROOT=${request.collectiveCommLibraryPath}`);
    }
  }

  if (request.enableVectorization) {
    flags.push(VECTORIZATION_FLAG);
  }

  return flags;
}

function bindingFlag(options: PlanOptions): string {
  return `-D${options.bindingLibraryFlag}=ON`;
}

function exec(stage: ExecStep['stage'], command: string, args: string[]): ExecStep {
  return { kind: 'exec', stage, command, args, cwd: BUILD_DIR };
}
