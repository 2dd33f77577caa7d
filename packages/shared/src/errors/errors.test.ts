/**
 * Error Hierarchy Tests
 */
import { describe, it, expect } from 'vitest';
import {
  AcquisitionError,
  BuildError,
  ConfigurationError,
  InstallError,
  InstallerError,
  ProbeAmbiguousError,
  StageTimeoutError,
  ValidationError,
  errorForStage,
  isRetryableError,
  wrapError,
} from './index.js';

describe('errors', () => {
  describe('errorForStage', () => {
    it('should map each tool stage to its error class', () => {
      expect(errorForStage('acquiring', 'clone failed')).toBeInstanceOf(AcquisitionError);
      expect(errorForStage('configuring', 'cmake failed')).toBeInstanceOf(ConfigurationError);
      expect(errorForStage('building', 'make failed')).toBeInstanceOf(BuildError);
      expect(errorForStage('installing', 'install failed')).toBeInstanceOf(InstallError);
      expect(errorForStage('probing', 'stale')).toBeInstanceOf(ProbeAmbiguousError);
    });

    it('should fall back to the base class for other stages', () => {
      const error = errorForStage('pending', 'odd');

      expect(error.constructor).toBe(InstallerError);
      expect(error.code).toBe('E9999');
      expect(error.stage).toBe('pending');
    });

    it('should carry the output tail', () => {
      const error = errorForStage('building', 'make exited with code 2', {
        outputTail: ['src/tree.cc:10: error: boom'],
      });

      expect(error.code).toBe('E4001');
      expect(error.stage).toBe('building');
      expect(error.outputTail).toEqual(['src/tree.cc:10: error: boom']);
      expect(error.context.category).toBe('BUILD');
    });
  });

  it('should force the stage on timeouts and mark them retryable', () => {
    const error = new StageTimeoutError('acquiring', 5000, { stage: 'building' });

    expect(error.message).toBe("Stage 'acquiring' timed out after 5000ms");
    expect(error.stage).toBe('acquiring');
    expect(error.timeoutMs).toBe(5000);
    expect(isRetryableError(error)).toBe(true);
    expect(isRetryableError(new ValidationError('bad'))).toBe(false);
    expect(isRetryableError(new Error('plain'))).toBe(false);
  });

  it('should serialise to JSON', () => {
    const json = new AcquisitionError('no route to host', { installId: 'abc12345' }).toJSON();

    expect(json.name).toBe('AcquisitionError');
    expect(json.code).toBe('E2001');
    expect(json.context).toMatchObject({
      category: 'ACQUISITION',
      stage: 'acquiring',
      installId: 'abc12345',
      retryable: false,
    });
  });

  describe('wrapError', () => {
    it('should return installer errors unchanged', () => {
      const original = new BuildError('link failed');
      expect(wrapError(original)).toBe(original);
    });

    it('should wrap plain errors', () => {
      const wrapped = wrapError(new TypeError('nope'), { stage: 'configuring' });

      expect(wrapped.code).toBe('E9999');
      expect(wrapped.message).toBe('nope');
      expect(wrapped.context.originalError).toBe('TypeError');
      expect(wrapped.stage).toBe('configuring');
    });

    it('should wrap non-error values', () => {
      expect(wrapError('text failure').message).toBe('text failure');
    });
  });
});
