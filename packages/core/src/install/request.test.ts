import { describe, it, expect } from 'vitest';
import { AcquisitionError, ValidationError } from '@boostsmith/shared';
import { checkoutDirName, isCloneUrl, parseBuildRequest } from './request.js';
import type { RequestDefaults } from './types.js';

const defaults: RequestDefaults = {
  repositoryUrl: 'https://github.com/dmlc/xgboost',
  sourceRef: 'master',
  compilerId: 'gcc',
};

describe('parseBuildRequest', () => {
  it('should fill defaults for an empty request', () => {
    expect(parseBuildRequest({}, defaults)).toEqual({
      sourceRef: 'master',
      repositoryUrl: 'https://github.com/dmlc/xgboost',
      compilerId: 'gcc',
      enableAccelerator: false,
      enableVectorization: false,
    });
  });

  it('should keep supplied values and trim the ref', () => {
    const request = parseBuildRequest(
      {
        sourceRef: ' v1.7.6 ',
        compilerId: 'Visual Studio 17 2022',
        enableAccelerator: true,
        acceleratorToolkitPaths: {
          toolkitRoot: '/opt/cuda',
          cCompiler: '/usr/bin/gcc-9',
          cxxCompiler: '/usr/bin/g++-9',
        },
        collectiveCommLibraryPath: '/opt/nccl',
      },
      defaults
    );

    expect(request.sourceRef).toBe('v1.7.6');
    expect(request.compilerId).toBe('Visual Studio 17 2022');
    expect(request.enableAccelerator).toBe(true);
    expect(request.acceleratorToolkitPaths?.toolkitRoot).toBe('/opt/cuda');
    expect(request.collectiveCommLibraryPath).toBe('/opt/nccl');
  });

  it('should allow an empty ref', () => {
    expect(parseBuildRequest({ sourceRef: '' }, defaults).sourceRef).toBe('');
  });

  it('should reject a ref that looks like an option', () => {
    expect(() => parseBuildRequest({ sourceRef: '--upload-pack=touch' }, defaults)).toThrow(
      "Invalid build request: sourceRef: must not start with '-'"
    );
  });

  it('should reject a non-object request', () => {
    expect(() => parseBuildRequest(null, defaults)).toThrow(
      'Invalid build request: request: Expected object, received null'
    );
  });

  it('should reject unknown fields', () => {
    expect(() => parseBuildRequest({ branch: 'main' }, defaults)).toThrow(ValidationError);
  });

  it('should reject a partial toolkit triple', () => {
    expect(() =>
      parseBuildRequest({ acceleratorToolkitPaths: { toolkitRoot: '/opt/cuda' } }, defaults)
    ).toThrow(ValidationError);
  });

  it('should raise an acquisition error for a URL git cannot clone', () => {
    let caught: unknown;
    try {
      parseBuildRequest({ repositoryUrl: 'not a url' }, defaults);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(AcquisitionError);
    expect(caught).toMatchObject({
      code: 'E2001',
      message: "Not a clonable repository URL: 'not a url'",
    });
  });
});

describe('isCloneUrl', () => {
  it('should accept the protocols git clones from', () => {
    expect(isCloneUrl('https://github.com/dmlc/xgboost')).toBe(true);
    expect(isCloneUrl('ssh://git@example.com/repo.git')).toBe(true);
    expect(isCloneUrl('file:///srv/git/repo')).toBe(true);
    expect(isCloneUrl('git@github.com:dmlc/xgboost.git')).toBe(true);
  });

  it('should reject anything else', () => {
    expect(isCloneUrl('ftp://example.com/repo')).toBe(false);
    expect(isCloneUrl('xgboost')).toBe(false);
  });
});

describe('checkoutDirName', () => {
  it('should use the last path segment without .git', () => {
    expect(checkoutDirName('https://github.com/dmlc/xgboost')).toBe('xgboost');
    expect(checkoutDirName('https://github.com/dmlc/xgboost.git/')).toBe('xgboost');
    expect(checkoutDirName('git@github.com:dmlc/xgboost.git')).toBe('xgboost');
  });

  it('should fall back when no name can be derived', () => {
    expect(checkoutDirName('file:///')).toBe('source');
  });
});
