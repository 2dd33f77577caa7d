import { describe, it, expect } from 'vitest';
import { ValidationError } from '@boostsmith/shared';
import { installOverrides, parsePlatform, toBuildRequestInput } from './options.js';

describe('toBuildRequestInput', () => {
  it('should leave out everything that was not given', () => {
    expect(toBuildRequestInput({})).toEqual({});
  });

  it('should map request options onto request fields', () => {
    expect(
      toBuildRequestInput({
        ref: 'v2.0.3',
        repo: 'https://example.com/mirror/xgboost.git',
        compiler: 'Visual Studio 17 2022',
        gpu: true,
        avx: true,
        cudaRoot: '/opt/cuda',
        cudaCc: '/usr/bin/gcc-9',
        cudaCxx: '/usr/bin/g++-9',
        nccl: '/opt/nccl',
      })
    ).toEqual({
      sourceRef: 'v2.0.3',
      repositoryUrl: 'https://example.com/mirror/xgboost.git',
      compilerId: 'Visual Studio 17 2022',
      enableAccelerator: true,
      enableVectorization: true,
      acceleratorToolkitPaths: {
        toolkitRoot: '/opt/cuda',
        cCompiler: '/usr/bin/gcc-9',
        cxxCompiler: '/usr/bin/g++-9',
      },
      collectiveCommLibraryPath: '/opt/nccl',
    });
  });

  it('should keep an empty ref', () => {
    expect(toBuildRequestInput({ ref: '' })).toEqual({ sourceRef: '' });
  });

  it('should require the cuda options together', () => {
    expect(() => toBuildRequestInput({ cudaRoot: '/opt/cuda', cudaCc: '/usr/bin/gcc-9' })).toThrow(
      ValidationError
    );
    expect(() => toBuildRequestInput({ cudaCxx: '/usr/bin/g++-9' })).toThrow(
      '--cuda-root, --cuda-cc and --cuda-cxx must be given together'
    );
  });
});

describe('installOverrides', () => {
  it('should only override what was given', () => {
    expect(installOverrides({})).toEqual({});
    expect(installOverrides({ workRoot: '/scratch', keepWorkdir: true, requireFresh: true })).toEqual({
      workRoot: '/scratch',
      keepWorkDir: true,
      requireFreshInstall: true,
    });
  });
});

describe('parsePlatform', () => {
  it('should fall back to the host platform', () => {
    expect(parsePlatform(undefined, 'unix')).toBe('unix');
  });

  it('should accept known platforms', () => {
    expect(parsePlatform('windows', 'unix')).toBe('windows');
  });

  it('should reject anything else', () => {
    expect(() => parsePlatform('darwin', 'unix')).toThrow(
      "Unknown platform 'darwin'; expected one of windows, unix"
    );
  });
});
