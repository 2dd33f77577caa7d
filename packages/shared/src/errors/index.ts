/**
 * Custom error hierarchy for boostsmith
 */

import type { InstallStage } from '../types/install.js';

export type ErrorCategory =
  | 'VALIDATION'
  | 'ACQUISITION'
  | 'CONFIGURATION'
  | 'BUILD'
  | 'INSTALL'
  | 'PROBE'
  | 'TIMEOUT'
  | 'UNKNOWN';

export type ErrorSeverity = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export interface ErrorContext {
  category: ErrorCategory;
  severity: ErrorSeverity;
  retryable: boolean;
  installId?: string;
  stage?: InstallStage;
  /** Last lines of tool output captured for the failing step */
  outputTail?: string[];
  [key: string]: unknown;
}

/**
 * Base error class for boostsmith
 */
export class InstallerError extends Error {
  public readonly code: string;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    context: Partial<ErrorContext> = {}
  ) {
    super(message);
    this.name = 'InstallerError';
    this.code = code;
    this.context = {
      ...context,
      category: context.category ?? 'UNKNOWN',
      severity: context.severity ?? 'MEDIUM',
      retryable: context.retryable ?? false,
    };
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }

  get stage(): InstallStage | undefined {
    return this.context.stage;
  }

  get outputTail(): string[] {
    return this.context.outputTail ?? [];
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }
}

/**
 * Validation errors (malformed requests, bad settings)
 */
export class ValidationError extends InstallerError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E1001', {
      category: 'VALIDATION',
      severity: 'LOW',
      retryable: false,
      ...context,
    });
    this.name = 'ValidationError';
  }
}

/**
 * Clone or checkout failed (network, auth, bad ref, bad URL)
 */
export class AcquisitionError extends InstallerError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E2001', {
      category: 'ACQUISITION',
      severity: 'HIGH',
      retryable: false,
      stage: 'acquiring',
      ...context,
    });
    this.name = 'AcquisitionError';
  }
}

/**
 * The build-system generator rejected the options
 */
export class ConfigurationError extends InstallerError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E3001', {
      category: 'CONFIGURATION',
      severity: 'HIGH',
      retryable: false,
      stage: 'configuring',
      ...context,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Compilation or link failure
 */
export class BuildError extends InstallerError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E4001', {
      category: 'BUILD',
      severity: 'HIGH',
      retryable: false,
      stage: 'building',
      ...context,
    });
    this.name = 'BuildError';
  }
}

/**
 * Install step failed (permissions, missing target)
 */
export class InstallError extends InstallerError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E5001', {
      category: 'INSTALL',
      severity: 'HIGH',
      retryable: false,
      stage: 'installing',
      ...context,
    });
    this.name = 'InstallError';
  }
}

/**
 * The package probe cannot tell a fresh install from a stale or missing one
 */
export class ProbeAmbiguousError extends InstallerError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E6001', {
      category: 'PROBE',
      severity: 'MEDIUM',
      retryable: false,
      stage: 'probing',
      ...context,
    });
    this.name = 'ProbeAmbiguousError';
  }
}

export class StageTimeoutError extends InstallerError {
  public readonly timeoutMs: number;

  constructor(stage: InstallStage, timeoutMs: number, context: Partial<ErrorContext> = {}) {
    super(`Stage '${stage}' timed out after ${timeoutMs}ms`, 'E7001', {
      category: 'TIMEOUT',
      severity: 'MEDIUM',
      retryable: true,
      ...context,
      stage,
    });
    this.name = 'StageTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Pick the error class that describes a failure in the given stage
 */
export function errorForStage(
  stage: InstallStage,
  message: string,
  context: Partial<ErrorContext> = {}
): InstallerError {
  switch (stage) {
    case 'acquiring':
      return new AcquisitionError(message, context);
    case 'configuring':
      return new ConfigurationError(message, context);
    case 'building':
      return new BuildError(message, context);
    case 'installing':
      return new InstallError(message, context);
    case 'probing':
      return new ProbeAmbiguousError(message, context);
    default:
      return new InstallerError(message, 'E9999', { ...context, stage });
  }
}

/**
 * Helper to check if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof InstallerError) {
    return error.context.retryable;
  }
  return false;
}

/**
 * Helper to wrap unknown errors
 */
export function wrapError(error: unknown, context: Partial<ErrorContext> = {}): InstallerError {
  if (error instanceof InstallerError) {
    return error;
  }

  if (error instanceof Error) {
    return new InstallerError(error.message, 'E9999', {
      category: 'UNKNOWN',
      severity: 'MEDIUM',
      retryable: false,
      originalError: error.name,
      ...context,
    });
  }

  return new InstallerError(String(error), 'E9999', {
    category: 'UNKNOWN',
    severity: 'MEDIUM',
    retryable: false,
    ...context,
  });
}
