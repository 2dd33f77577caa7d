/**
 * Build request types
 */

/**
 * Compiler identifier that selects the direct binding install on Windows
 * instead of a build-system generator.
 */
export const NATIVE_MAKE_COMPILER = 'gcc';

/**
 * Overrides for the accelerator toolkit auto-detection (Unix only)
 */
export interface AcceleratorToolkitPaths {
  /** Toolkit root directory, e.g. /usr/local/cuda */
  toolkitRoot: string;
  /** Host C compiler used by the toolkit */
  cCompiler: string;
  /** Host C++ compiler used by the toolkit */
  cxxCompiler: string;
}

/**
 * One desired build/install of the target library
 */
export interface BuildRequest {
  /** Branch, tag or commit to check out; empty string keeps the default branch */
  sourceRef: string;
  /** Clone source */
  repositoryUrl: string;
  /** Native-make sentinel or a build-system generator name */
  compilerId: string;
  /** Hardware-accelerated build variant */
  enableAccelerator: boolean;
  /** CPU vector-instruction build variant */
  enableVectorization: boolean;
  acceleratorToolkitPaths?: AcceleratorToolkitPaths;
  /** Root of the multi-device collective communication library */
  collectiveCommLibraryPath?: string;
}
